import { InvalidActionError, InvalidStateError } from "@hitstand/core";
import type { IGameModule, RandomSource } from "@hitstand/engine";
import { CardRank, EMPTY_HAND, addCard, isBust } from "./cards";
import { PlayerAction, getLegalActions, isLegalAction } from "./actions";
import { TOTAL_DRAW_WEIGHT, drawDistribution, sampleDraw } from "./deck";
import { resolveDealer } from "./dealer";
import { DEFAULT_RULES, RuleConfig } from "./ruleset";
import { BlackjackState, Outcome, createState, playerHand } from "./state";

export interface ChanceBranch {
  readonly rank: CardRank;
  readonly weight: number;
  readonly state: BlackjackState;
}

/**
 * Result of a player action. STAND has one successor; HIT is left
 * unresolved as one branch per possible card, for the caller to combine or
 * sample.
 */
export type Transition =
  | { readonly kind: "deterministic"; readonly state: BlackjackState }
  | {
      readonly kind: "chance";
      readonly branches: readonly ChanceBranch[];
      readonly totalWeight: number;
    };

export type ChanceTransition = Extract<Transition, { kind: "chance" }>;

/** Deal two cards each, alternating player and dealer. */
export function initialState(
  rng: RandomSource,
  rules: RuleConfig = DEFAULT_RULES
): BlackjackState {
  let player = EMPTY_HAND;
  let dealer = EMPTY_HAND;
  for (let round = 0; round < 2; round++) {
    player = addCard(player, sampleDraw(rng), rules);
    dealer = addCard(dealer, sampleDraw(rng), rules);
  }

  // Two fixed-value aces can bust on the deal
  return createState({
    playerTotal: player.total,
    playerSoftAces: player.softAces,
    dealerTotal: dealer.total,
    dealerSoftAces: dealer.softAces,
    turn: isBust(player.total) ? "TERMINAL" : "PLAYER",
  });
}

/** Give the player one specific card. A bust ends the hand at once. */
export function dealPlayerCard(
  state: BlackjackState,
  rank: CardRank,
  rules: RuleConfig
): BlackjackState {
  if (state.turn !== "PLAYER") {
    throw new InvalidStateError(`Cannot deal to the player on the ${state.turn} turn`);
  }

  const hand = addCard(playerHand(state), rank, rules);
  const bust = isBust(hand.total);
  return {
    ...state,
    playerTotal: hand.total,
    playerSoftAces: hand.softAces,
    turn: bust ? "TERMINAL" : "PLAYER",
    outcome: bust ? "LOSE" : "UNDECIDED",
  };
}

export function applyPlayerAction(
  state: BlackjackState,
  action: PlayerAction,
  rules: RuleConfig
): Transition {
  if (!isLegalAction(state, action)) {
    throw new InvalidActionError(
      `${String(action)} is not legal on the ${state.turn} turn`
    );
  }

  if (action === "STAND") {
    return { kind: "deterministic", state: { ...state, turn: "DEALER" } };
  }

  return {
    kind: "chance",
    branches: drawDistribution().map(({ rank, weight }) => ({
      rank,
      weight,
      state: dealPlayerCard(state, rank, rules),
    })),
    totalWeight: TOTAL_DRAW_WEIGHT,
  };
}

/**
 * Build the stepping module for a rule set. Unlike `applyPlayerAction`,
 * HIT samples its card and STAND plays the dealer out, so every call lands
 * on a PLAYER or TERMINAL state.
 */
export function createBlackjackModule(
  rules: RuleConfig = DEFAULT_RULES
): IGameModule<BlackjackState, PlayerAction, Outcome> {
  return {
    gameId: "blackjack",
    name: "Blackjack",
    description:
      "Single-player blackjack against a fixed dealer policy on an infinite deck.",

    init(rng: RandomSource): BlackjackState {
      return initialState(rng, rules);
    },

    validateAction(state: BlackjackState, action: PlayerAction): boolean {
      return isLegalAction(state, action);
    },

    applyAction(
      state: BlackjackState,
      action: PlayerAction,
      rng: RandomSource
    ): BlackjackState {
      if (!isLegalAction(state, action)) {
        throw new InvalidActionError(
          `${String(action)} is not legal on the ${state.turn} turn`
        );
      }

      if (action === "HIT") {
        return dealPlayerCard(state, sampleDraw(rng), rules);
      }
      return resolveDealer(
        { ...state, turn: "DEALER" },
        () => sampleDraw(rng),
        rules
      );
    },

    isTerminal(state: BlackjackState): boolean {
      return state.turn === "TERMINAL";
    },

    getOutcome(state: BlackjackState): Outcome {
      return state.outcome;
    },

    getLegalActions(state: BlackjackState): PlayerAction[] {
      return getLegalActions(state);
    },
  };
}

export const BlackjackModule = createBlackjackModule();
