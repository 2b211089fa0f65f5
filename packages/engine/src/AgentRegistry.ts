import type { IDecisionAgent } from "./interfaces/IDecisionAgent";

/**
 * In-memory registry of decision agents, keyed by agentId.
 */
export class AgentRegistry<TState, TAction> {
  private agents = new Map<string, IDecisionAgent<TState, TAction>>();

  register(agent: IDecisionAgent<TState, TAction>): void {
    if (this.agents.has(agent.agentId)) {
      throw new Error(`Agent "${agent.agentId}" is already registered`);
    }
    this.agents.set(agent.agentId, agent);
  }

  get(agentId: string): IDecisionAgent<TState, TAction> | undefined {
    return this.agents.get(agentId);
  }

  list(): IDecisionAgent<TState, TAction>[] {
    return Array.from(this.agents.values());
  }

  has(agentId: string): boolean {
    return this.agents.has(agentId);
  }
}
