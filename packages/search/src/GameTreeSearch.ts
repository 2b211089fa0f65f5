import {
  ConfigError,
  InvalidStateError,
  Logger,
  createLogger,
} from "@hitstand/core";
import type { IDecisionAgent } from "@hitstand/engine";
import {
  BlackjackState,
  ChanceTransition,
  DEFAULT_RULES,
  PlayerAction,
  RuleConfig,
  applyPlayerAction,
  evaluate,
  getLegalActions,
} from "@hitstand/game-blackjack";
import type { DeckReducer } from "./reducers";
import {
  DEFAULT_MAX_DEPTH,
  DeckNodeValue,
  FULL_WINDOW,
  SearchOptions,
  SearchResult,
  SearchWindow,
} from "./types";

const log = createLogger("hitstand-search");

interface SearchCounter {
  nodesVisited: number;
}

export interface AgentIdentity {
  agentId: string;
  name: string;
}

/**
 * Depth-limited game-tree search over hands. The player's turn is a MAX
 * node over the legal actions; HIT opens a deck node whose children are
 * combined by the reducer. STAND has a single DEALER-turn successor that is
 * valued by the heuristic, as is every node at depth 0.
 *
 * Depth counts hits: the root sits at `maxDepth`, a deck node below a MAX
 * node at depth d sits at d - 1 and so do its children.
 */
export class GameTreeSearch implements IDecisionAgent<BlackjackState, PlayerAction> {
  readonly agentId: string;
  readonly name: string;
  readonly maxDepth: number;
  protected readonly rules: RuleConfig;
  readonly log: Logger;

  constructor(
    identity: AgentIdentity,
    private readonly reducer: DeckReducer,
    private readonly pruning: boolean,
    options: SearchOptions = {}
  ) {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new ConfigError("maxDepth", `must be an integer >= 1, got ${maxDepth}`);
    }
    if (pruning && !reducer.prunable) {
      throw new ConfigError("pruning", `${reducer.kind} nodes cannot be pruned`);
    }

    this.agentId = identity.agentId;
    this.name = identity.name;
    this.maxDepth = maxDepth;
    this.rules = options.rules ?? DEFAULT_RULES;
    this.log = (options.log ?? log).child({ agent: identity.agentId });
  }

  decide(state: BlackjackState): PlayerAction {
    return this.search(state).action;
  }

  search(state: BlackjackState): SearchResult {
    this.requirePlayerTurn(state);

    const counter: SearchCounter = { nodesVisited: 1 };
    const actionValues: Partial<Record<PlayerAction, number>> = {};
    let window = this.pruning ? FULL_WINDOW : undefined;
    let bestAction: PlayerAction | undefined;
    let bestValue = -Infinity;

    for (const action of getLegalActions(state)) {
      const value = this.actionValue(state, action, this.maxDepth, window, counter);
      actionValues[action] = value;
      // Strict: ties keep the earlier action, i.e. STAND
      if (value > bestValue) {
        bestAction = action;
        bestValue = value;
      }
      if (window) {
        window = { alpha: Math.max(window.alpha, bestValue), beta: window.beta };
      }
    }

    if (bestAction === undefined) {
      throw new InvalidStateError("No legal actions at the root");
    }

    this.log.debug(
      {
        playerTotal: state.playerTotal,
        dealerTotal: state.dealerTotal,
        action: bestAction,
        actionValues,
        nodesVisited: counter.nodesVisited,
      },
      "Search complete"
    );

    return { action: bestAction, actionValues, nodesVisited: counter.nodesVisited };
  }

  /**
   * Value of the deck node reached by hitting from `state`, with the card the
   * reducer settled on when it picks one.
   */
  evaluateDeckNode(
    state: BlackjackState,
    depth: number = this.maxDepth - 1
  ): DeckNodeValue {
    this.requirePlayerTurn(state);
    const transition = applyPlayerAction(state, "HIT", this.rules);
    if (transition.kind !== "chance") {
      throw new InvalidStateError("HIT did not open a deck node");
    }
    return this.deckValue(
      transition,
      depth,
      this.pruning ? FULL_WINDOW : undefined,
      { nodesVisited: 0 }
    );
  }

  private requirePlayerTurn(state: BlackjackState): void {
    if (state.turn !== "PLAYER") {
      throw new InvalidStateError(`Cannot search from the ${state.turn} turn`);
    }
  }

  private actionValue(
    state: BlackjackState,
    action: PlayerAction,
    depth: number,
    window: SearchWindow | undefined,
    counter: SearchCounter
  ): number {
    const transition = applyPlayerAction(state, action, this.rules);
    if (transition.kind === "deterministic") {
      return this.stateValue(transition.state, depth, window, counter);
    }
    return this.deckValue(transition, depth - 1, window, counter).value;
  }

  private stateValue(
    state: BlackjackState,
    depth: number,
    window: SearchWindow | undefined,
    counter: SearchCounter
  ): number {
    counter.nodesVisited++;
    if (state.turn !== "PLAYER" || depth === 0) {
      return evaluate(state, this.rules);
    }
    return this.maxValue(state, depth, window, counter);
  }

  private maxValue(
    state: BlackjackState,
    depth: number,
    window: SearchWindow | undefined,
    counter: SearchCounter
  ): number {
    let best = -Infinity;
    let bounds = window;

    for (const action of getLegalActions(state)) {
      best = Math.max(best, this.actionValue(state, action, depth, bounds, counter));
      if (bounds) {
        // MIN above already has something at least this bad for us
        if (best >= bounds.beta) break;
        bounds = { alpha: Math.max(bounds.alpha, best), beta: bounds.beta };
      }
    }

    return best;
  }

  private deckValue(
    node: ChanceTransition,
    depth: number,
    window: SearchWindow | undefined,
    counter: SearchCounter
  ): DeckNodeValue {
    counter.nodesVisited++;
    return this.reducer.reduce(
      node,
      (branch, childWindow) =>
        this.stateValue(branch.state, depth, childWindow, counter),
      window
    );
  }
}
