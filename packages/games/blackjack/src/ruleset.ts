import { AceRule, ConfigError, EnvConfig, isAceRule } from "@hitstand/core";
import { CardRank, MAX_TOTAL, RANKS } from "./cards";

/**
 * Fixed rules of the simplified game. Passed explicitly to the environment,
 * the heuristic and the agents; instances are frozen.
 */
export interface RuleConfig {
  /** Dealer stands once its total reaches this, and hits while below it */
  readonly dealerStandThreshold: number;
  readonly cardValues: Readonly<Record<CardRank, number>>;
  readonly aceRule: AceRule;
}

export interface RuleOverrides {
  dealerStandThreshold?: number;
  cardValues?: Partial<Record<CardRank, number>>;
  aceRule?: AceRule;
}

export const STANDARD_CARD_VALUES: Readonly<Record<CardRank, number>> =
  Object.freeze({
    A: 11,
    "2": 2,
    "3": 3,
    "4": 4,
    "5": 5,
    "6": 6,
    "7": 7,
    "8": 8,
    "9": 9,
    "10": 10,
    J: 10,
    Q: 10,
    K: 10,
  });

function requireInteger(
  key: string,
  value: number,
  min: number,
  max: number
): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(key, `expected an integer in [${min}, ${max}], got ${value}`);
  }
  return value;
}

export function createRuleConfig(overrides: RuleOverrides = {}): RuleConfig {
  const dealerStandThreshold = requireInteger(
    "dealerStandThreshold",
    overrides.dealerStandThreshold ?? 17,
    2,
    MAX_TOTAL
  );

  const values: Record<CardRank, number> = { ...STANDARD_CARD_VALUES };
  for (const rank of RANKS) {
    const value = overrides.cardValues?.[rank];
    if (value !== undefined) {
      values[rank] = requireInteger(`cardValues.${rank}`, value, 1, 11);
    }
  }

  const aceRule = overrides.aceRule ?? "soft";
  if (!isAceRule(aceRule)) {
    throw new ConfigError("aceRule", `expected "soft" or "fixed", got "${String(aceRule)}"`);
  }

  return Object.freeze({
    dealerStandThreshold,
    cardValues: Object.freeze(values),
    aceRule,
  });
}

export const DEFAULT_RULES: RuleConfig = createRuleConfig();

export function ruleConfigFromEnv(config: EnvConfig): RuleConfig {
  return createRuleConfig({
    dealerStandThreshold: config.dealerStandThreshold,
    aceRule: config.aceRule,
  });
}
