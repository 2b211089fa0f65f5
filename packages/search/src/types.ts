import type { Logger } from "@hitstand/core";
import type { CardRank, PlayerAction, RuleConfig } from "@hitstand/game-blackjack";

/** Alpha-beta bounds: what MAX can already guarantee, and what MIN can. */
export interface SearchWindow {
  readonly alpha: number;
  readonly beta: number;
}

export const FULL_WINDOW: SearchWindow = Object.freeze({
  alpha: -Infinity,
  beta: Infinity,
});

export interface DeckNodeValue {
  value: number;
  /** The card a MIN node settled on; absent for chance nodes */
  rank?: CardRank;
}

export interface SearchOptions {
  rules?: RuleConfig;
  /** Hits simulated before the heuristic takes over (default 4) */
  maxDepth?: number;
  log?: Logger;
}

export interface SearchResult {
  action: PlayerAction;
  /**
   * Value of each root action. Under pruning, a value that does not beat
   * an earlier action may be an upper bound rather than exact.
   */
  actionValues: Partial<Record<PlayerAction, number>>;
  nodesVisited: number;
}

export const DEFAULT_MAX_DEPTH = 4;
