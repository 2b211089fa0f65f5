import { GameTreeSearch } from "./GameTreeSearch";
import { minReducer } from "./reducers";
import type { SearchOptions } from "./types";

/**
 * Minimax with alpha-beta cutoffs. Reaches the same root decision as
 * MinimaxAgent on every state while visiting fewer nodes.
 */
export class AlphaBetaAgent extends GameTreeSearch {
  constructor(options: SearchOptions = {}) {
    super(
      { agentId: "alphabeta", name: "Minimax (alpha-beta)" },
      minReducer,
      true,
      options
    );
  }
}
