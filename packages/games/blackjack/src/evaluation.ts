import { isBust } from "./cards";
import { dealerOutcomeDistribution } from "./dealer";
import type { RuleConfig } from "./ruleset";
import {
  BlackjackState,
  SettledOutcome,
  dealerHand,
  scoreOutcome,
} from "./state";

export const OUTCOME_VALUES: Readonly<Record<SettledOutcome, number>> = {
  WIN: 1,
  LOSE: 0,
  PUSH: 0.5,
};

/**
 * Value of standing with the player's current total: P(win) + P(push) / 2
 * against the dealer's exact final distribution.
 */
export function standValue(state: BlackjackState, rules: RuleConfig): number {
  if (isBust(state.playerTotal)) return 0;

  let value = 0;
  for (const [result, probability] of dealerOutcomeDistribution(
    dealerHand(state),
    rules
  )) {
    if (result === "bust" || state.playerTotal > result) {
      value += probability;
    } else if (state.playerTotal === result) {
      value += probability / 2;
    }
  }
  return value;
}

/**
 * Leaf value in [0, 1] for the search. Finished hands score their outcome;
 * anything else is valued as if the player stood now.
 */
export function evaluate(state: BlackjackState, rules: RuleConfig): number {
  if (state.turn === "TERMINAL") {
    return OUTCOME_VALUES[scoreOutcome(state)];
  }
  return standValue(state, rules);
}
