import { GameTreeSearch } from "./GameTreeSearch";
import { expectedReducer } from "./reducers";
import type { SearchOptions } from "./types";

/** Treats each draw as a chance node with every rank at weight 1/13. */
export class ExpectimaxAgent extends GameTreeSearch {
  constructor(options: SearchOptions = {}) {
    super({ agentId: "expectimax", name: "Expectimax" }, expectedReducer, false, options);
  }
}
