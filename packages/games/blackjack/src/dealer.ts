import { InvalidStateError } from "@hitstand/core";
import { CardRank, HandTotal, addCard, isBust } from "./cards";
import { TOTAL_DRAW_WEIGHT, drawDistribution } from "./deck";
import type { RuleConfig } from "./ruleset";
import { BlackjackState, compareTotals, dealerHand } from "./state";

/** Where the dealer's hand ends up: a standing total or a bust */
export type DealerResult = number | "bust";

export type DealerDistribution = ReadonlyMap<DealerResult, number>;

export function dealerMustHit(total: number, rules: RuleConfig): boolean {
  return total < rules.dealerStandThreshold;
}

/**
 * Play out the dealer's fixed policy with cards from `draw`. Every card
 * raises the dealer's hard total, so the loop ends after finitely many draws.
 */
export function resolveDealer(
  state: BlackjackState,
  draw: () => CardRank,
  rules: RuleConfig
): BlackjackState {
  if (state.turn !== "DEALER") {
    throw new InvalidStateError(`Dealer cannot play on the ${state.turn} turn`);
  }

  let hand = dealerHand(state);
  while (dealerMustHit(hand.total, rules)) {
    hand = addCard(hand, draw(), rules);
  }

  return {
    ...state,
    dealerTotal: hand.total,
    dealerSoftAces: hand.softAces,
    turn: "TERMINAL",
    outcome: compareTotals(state.playerTotal, hand.total),
  };
}

// Keyed by rule config so variants never share entries
const cache = new WeakMap<RuleConfig, Map<string, DealerDistribution>>();

/**
 * Exact distribution of the dealer's final result from `hand`, over the
 * infinite deck. Memoized per rule config.
 */
export function dealerOutcomeDistribution(
  hand: HandTotal,
  rules: RuleConfig
): DealerDistribution {
  if (isBust(hand.total)) return new Map<DealerResult, number>([["bust", 1]]);
  if (!dealerMustHit(hand.total, rules)) {
    return new Map<DealerResult, number>([[hand.total, 1]]);
  }

  let byHand = cache.get(rules);
  if (!byHand) {
    byHand = new Map();
    cache.set(rules, byHand);
  }

  const key = `${hand.total}/${hand.softAces}`;
  const cached = byHand.get(key);
  if (cached) return cached;

  const weighted = new Map<DealerResult, number>();
  for (const { rank, weight } of drawDistribution()) {
    const next = dealerOutcomeDistribution(addCard(hand, rank, rules), rules);
    for (const [result, probability] of next) {
      weighted.set(result, (weighted.get(result) ?? 0) + weight * probability);
    }
  }

  const distribution = new Map<DealerResult, number>();
  for (const [result, mass] of weighted) {
    distribution.set(result, mass / TOTAL_DRAW_WEIGHT);
  }

  byHand.set(key, distribution);
  return distribution;
}
