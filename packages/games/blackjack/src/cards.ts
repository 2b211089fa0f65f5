import type { RuleConfig } from "./ruleset";

/** The 13 ranks in draw order. Search ties between ranks resolve to the earlier one. */
export const RANKS = [
  "A",
  "2",
  "3",
  "4",
  "5",
  "6",
  "7",
  "8",
  "9",
  "10",
  "J",
  "Q",
  "K",
] as const;

export type CardRank = (typeof RANKS)[number];

export const MAX_TOTAL = 21;

/**
 * A hand reduced to what the rules need: its total and how many aces in it
 * are still counted high.
 */
export interface HandTotal {
  readonly total: number;
  readonly softAces: number;
}

export const EMPTY_HAND: HandTotal = { total: 0, softAces: 0 };

export function isCardRank(value: string): value is CardRank {
  return RANKS.some((rank) => rank === value);
}

export function isBust(total: number): boolean {
  return total > MAX_TOTAL;
}

/**
 * Add one card to a hand. Under the soft ace rule an ace enters at its table
 * value and is demoted to 1 while the hand would otherwise bust.
 */
export function addCard(
  hand: HandTotal,
  rank: CardRank,
  rules: RuleConfig
): HandTotal {
  const demotion = rules.cardValues.A - 1;
  let total = hand.total + rules.cardValues[rank];
  let softAces =
    hand.softAces + (rank === "A" && rules.aceRule === "soft" ? 1 : 0);

  while (isBust(total) && softAces > 0) {
    total -= demotion;
    softAces--;
  }

  return { total, softAces };
}

export function handOf(ranks: readonly CardRank[], rules: RuleConfig): HandTotal {
  return ranks.reduce((hand, rank) => addCard(hand, rank, rules), EMPTY_HAND);
}
