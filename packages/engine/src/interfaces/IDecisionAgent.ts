/** Anything that picks an action for the player to move. */
export interface IDecisionAgent<TState, TAction> {
  /** Registry key (e.g., "expectimax") */
  readonly agentId: string;

  /** Human-readable name */
  readonly name: string;

  decide(state: TState): TAction;
}
