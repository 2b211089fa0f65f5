export { AgentRegistry } from "./AgentRegistry";
export { MatchOrchestrator } from "./MatchOrchestrator";
export type {
  MatchOrchestratorOptions,
  SubmitResult,
} from "./MatchOrchestrator";
export type { IGameModule, RandomSource } from "./interfaces/IGameModule";
export type { IDecisionAgent } from "./interfaces/IDecisionAgent";
