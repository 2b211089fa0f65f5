/** Source of uniform integers; `SeededRng` in the game packages implements it. */
export interface RandomSource {
  /** Return an integer in [0, max) */
  nextInt(max: number): number;
}

/**
 * The stepping ABI a single-player game module implements so that an
 * orchestrator can deal, apply and score hands without knowing the game.
 *
 * Every function must be deterministic given the same inputs and the same
 * random source sequence.
 */
export interface IGameModule<TState, TAction, TOutcome> {
  /** Unique identifier for this game (e.g., "blackjack") */
  readonly gameId: string;

  /** Human-readable name */
  readonly name: string;

  readonly description: string;

  /** Deal a new starting state */
  init(rng: RandomSource): TState;

  /** Check if an action is legal in the current state */
  validateAction(state: TState, action: TAction): boolean;

  /**
   * Apply an action and return the new state. Chance events the action
   * triggers (card draws) are sampled from `rng`.
   */
  applyAction(state: TState, action: TAction, rng: RandomSource): TState;

  isTerminal(state: TState): boolean;

  getOutcome(state: TState): TOutcome;

  /** All legal actions, in the game's preference order */
  getLegalActions(state: TState): TAction[];
}
