import type { ChanceBranch, ChanceTransition } from "@hitstand/game-blackjack";
import type { DeckNodeValue, SearchWindow } from "./types";

/**
 * Values one branch of a deck node. `window` is undefined when the search
 * does not prune.
 */
export type BranchEvaluator = (
  branch: ChanceBranch,
  window: SearchWindow | undefined
) => number;

/**
 * The combination rule at a deck node, the only place the adversarial and
 * the probabilistic searches differ.
 */
export interface DeckReducer {
  readonly kind: "min" | "expected";
  /** Whether alpha-beta cutoffs keep this reducer's values */
  readonly prunable: boolean;
  reduce(
    node: ChanceTransition,
    evaluateBranch: BranchEvaluator,
    window: SearchWindow | undefined
  ): DeckNodeValue;
}

/** The deck deals whichever card is worst for the player. */
export const minReducer: DeckReducer = {
  kind: "min",
  prunable: true,

  reduce(node, evaluateBranch, window) {
    let best: DeckNodeValue = { value: Infinity };

    for (const branch of node.branches) {
      const childWindow = window && {
        alpha: window.alpha,
        beta: Math.min(window.beta, best.value),
      };
      const value = evaluateBranch(branch, childWindow);
      if (value < best.value) {
        best = { value, rank: branch.rank };
      }
      // MAX above already has something at least this good
      if (window && best.value <= window.alpha) break;
    }

    return best;
  },
};

/**
 * Probability-weighted mean over every card. Weights are integers, so the
 * sum is divided once.
 */
export const expectedReducer: DeckReducer = {
  kind: "expected",
  prunable: false,

  reduce(node, evaluateBranch) {
    let weighted = 0;
    for (const branch of node.branches) {
      weighted += branch.weight * evaluateBranch(branch, undefined);
    }
    return { value: weighted / node.totalWeight };
  },
};
