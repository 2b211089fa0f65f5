import { GameTreeSearch } from "./GameTreeSearch";
import { minReducer } from "./reducers";
import type { SearchOptions } from "./types";

/**
 * Plays against a deck that always deals the worst card for the player,
 * whatever its probability. Every branch of every deck node is searched.
 */
export class MinimaxAgent extends GameTreeSearch {
  constructor(options: SearchOptions = {}) {
    super({ agentId: "minimax", name: "Minimax" }, minReducer, false, options);
  }
}
