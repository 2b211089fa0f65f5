import {
  HandTranscript,
  InvalidActionError,
  InvalidStateError,
  Logger,
  TranscriptEntry,
  chainHash,
  createLogger,
  hashState,
} from "@hitstand/core";
import type { IDecisionAgent } from "./interfaces/IDecisionAgent";
import type { IGameModule, RandomSource } from "./interfaces/IGameModule";

export interface MatchOrchestratorOptions<TState, TAction, TOutcome> {
  game: IGameModule<TState, TAction, TOutcome>;
  rng: RandomSource;
  matchId: string;
  log?: Logger;
}

export interface SubmitResult<TState, TOutcome> {
  state: TState;
  terminal: boolean;
  outcome?: TOutcome;
}

const defaultLog = createLogger("hitstand-engine");

/**
 * Orchestrates a single hand: deals, validates and applies the player's
 * actions, and builds a hash-chained transcript so the hand can be replayed
 * from the same seed and checked.
 */
export class MatchOrchestrator<TState, TAction, TOutcome> {
  private game: IGameModule<TState, TAction, TOutcome>;
  private rng: RandomSource;
  private state: TState;
  private matchId: string;
  private log: Logger;
  private transcript: TranscriptEntry<TAction>[] = [];
  private initialHash: string;
  private prevHash: string;

  constructor(opts: MatchOrchestratorOptions<TState, TAction, TOutcome>) {
    this.game = opts.game;
    this.rng = opts.rng;
    this.matchId = opts.matchId;
    this.log = (opts.log ?? defaultLog).child({ matchId: opts.matchId });

    this.state = opts.game.init(opts.rng);
    this.initialHash = hashState(this.state);
    this.prevHash = this.initialHash;
  }

  getState(): TState {
    return this.state;
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.state);
  }

  getOutcome(): TOutcome {
    return this.game.getOutcome(this.state);
  }

  getLegalActions(): TAction[] {
    return this.game.getLegalActions(this.state);
  }

  getTranscript(): HandTranscript<TAction> {
    return {
      matchId: this.matchId,
      gameId: this.game.gameId,
      initialHash: this.initialHash,
      entries: [...this.transcript],
      rootHash: this.prevHash,
    };
  }

  /**
   * Submit an action. Returns the new state, or throws if the hand is over
   * or the action is not legal.
   */
  submitAction(action: TAction): SubmitResult<TState, TOutcome> {
    if (this.isTerminal()) {
      throw new InvalidStateError("Hand is already over");
    }

    if (!this.game.validateAction(this.state, action)) {
      throw new InvalidActionError(`Illegal action: ${String(action)}`);
    }

    this.state = this.game.applyAction(this.state, action, this.rng);

    const entry: TranscriptEntry<TAction> = {
      sequence: this.transcript.length,
      action,
      stateHash: hashState(this.state),
      prevHash: this.prevHash,
    };
    this.prevHash = chainHash(this.prevHash, entry);
    this.transcript.push(entry);

    const terminal = this.game.isTerminal(this.state);
    return {
      state: this.state,
      terminal,
      outcome: terminal ? this.game.getOutcome(this.state) : undefined,
    };
  }

  /** Let `agent` make every decision until the hand ends. */
  playWith(agent: IDecisionAgent<TState, TAction>): TOutcome {
    while (!this.isTerminal()) {
      this.submitAction(agent.decide(this.state));
    }

    const outcome = this.getOutcome();
    this.log.debug(
      { agent: agent.agentId, actions: this.transcript.length, outcome },
      "Hand complete"
    );
    return outcome;
  }
}
