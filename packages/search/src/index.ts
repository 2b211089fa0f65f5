export { GameTreeSearch } from "./GameTreeSearch";
export type { AgentIdentity } from "./GameTreeSearch";
export { MinimaxAgent } from "./MinimaxAgent";
export { AlphaBetaAgent } from "./AlphaBetaAgent";
export { ExpectimaxAgent } from "./ExpectimaxAgent";
export { minReducer, expectedReducer } from "./reducers";
export type { DeckReducer, BranchEvaluator } from "./reducers";
export * from "./agents";
export * from "./types";
