import dotenv from "dotenv";
import { ConfigError } from "./errors";
import { isLogLevel, LogLevel } from "./logger";

export type AceRule = "soft" | "fixed";

export interface EnvConfig {
  logLevel: LogLevel;
  /** Number of hits the agents simulate before falling back to the heuristic */
  searchMaxDepth: number;
  dealerStandThreshold: number;
  aceRule: AceRule;
}

export const CONFIG_KEYS: (keyof EnvConfig)[] = [
  "logLevel",
  "searchMaxDepth",
  "dealerStandThreshold",
  "aceRule",
];

export const DEFAULTS: EnvConfig = {
  logLevel: "info",
  searchMaxDepth: 4,
  dealerStandThreshold: 17,
  aceRule: "soft",
};

export const ENV_MAP: Record<keyof EnvConfig, string> = {
  logLevel: "LOG_LEVEL",
  searchMaxDepth: "SEARCH_MAX_DEPTH",
  dealerStandThreshold: "DEALER_STAND_THRESHOLD",
  aceRule: "ACE_RULE",
};

export function isAceRule(value: string): value is AceRule {
  return value === "soft" || value === "fixed";
}

function parseInteger(key: keyof EnvConfig, raw: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(key, `expected an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

/**
 * Resolve config from an environment map. Empty values fall back to the
 * defaults; anything set must parse.
 */
export function resolveEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): EnvConfig {
  const resolved: EnvConfig = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const raw = env[ENV_MAP[key]];
    if (raw === undefined || raw === "") continue;

    switch (key) {
      case "logLevel":
        if (!isLogLevel(raw)) {
          throw new ConfigError(key, `unknown log level "${raw}"`);
        }
        resolved.logLevel = raw;
        break;
      case "searchMaxDepth":
        resolved.searchMaxDepth = parseInteger(key, raw);
        if (resolved.searchMaxDepth < 1) {
          throw new ConfigError(key, "must be at least 1");
        }
        break;
      case "dealerStandThreshold":
        resolved.dealerStandThreshold = parseInteger(key, raw);
        break;
      case "aceRule":
        if (!isAceRule(raw)) {
          throw new ConfigError(key, `expected "soft" or "fixed", got "${raw}"`);
        }
        resolved.aceRule = raw;
        break;
    }
  }

  return resolved;
}

/** Load `.env` (if present) into process.env, then resolve. */
export function loadEnvConfig(path?: string): EnvConfig {
  dotenv.config({ path, quiet: true });
  return resolveEnvConfig(process.env);
}
