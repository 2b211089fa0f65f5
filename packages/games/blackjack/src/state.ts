import { InvalidStateError } from "@hitstand/core";
import { HandTotal, isBust } from "./cards";

export type Turn = "PLAYER" | "DEALER" | "TERMINAL";

export type Outcome = "WIN" | "LOSE" | "PUSH" | "UNDECIDED";

/** An outcome that a finished hand can have */
export type SettledOutcome = Exclude<Outcome, "UNDECIDED">;

/**
 * Immutable snapshot of a hand. The dealer's whole hand is known to the
 * search; `outcome` is UNDECIDED exactly while `turn` is not TERMINAL.
 */
export interface BlackjackState {
  readonly playerTotal: number;
  readonly playerSoftAces: number;
  readonly dealerTotal: number;
  readonly dealerSoftAces: number;
  readonly turn: Turn;
  readonly outcome: Outcome;
}

export interface StateFields {
  playerTotal: number;
  dealerTotal: number;
  playerSoftAces?: number;
  dealerSoftAces?: number;
  turn?: Turn;
  /** Must match the totals: UNDECIDED, or the scored result for a TERMINAL state */
  outcome?: Outcome;
}

/** Player bust loses even if the dealer busts too. */
export function compareTotals(
  playerTotal: number,
  dealerTotal: number
): SettledOutcome {
  if (isBust(playerTotal)) return "LOSE";
  if (isBust(dealerTotal)) return "WIN";
  if (playerTotal > dealerTotal) return "WIN";
  if (playerTotal < dealerTotal) return "LOSE";
  return "PUSH";
}

export function scoreOutcome(state: BlackjackState): SettledOutcome {
  if (state.turn !== "TERMINAL") {
    throw new InvalidStateError(`Cannot score a hand on the ${state.turn} turn`);
  }
  return compareTotals(state.playerTotal, state.dealerTotal);
}

function requireCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidStateError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/** Build a state from known totals, checking the state invariants. */
export function createState(fields: StateFields): BlackjackState {
  const {
    playerTotal,
    dealerTotal,
    playerSoftAces = 0,
    dealerSoftAces = 0,
    turn = "PLAYER",
  } = fields;

  requireCount("playerTotal", playerTotal);
  requireCount("dealerTotal", dealerTotal);
  requireCount("playerSoftAces", playerSoftAces);
  requireCount("dealerSoftAces", dealerSoftAces);

  if (turn !== "TERMINAL" && isBust(playerTotal)) {
    throw new InvalidStateError(`A busted player (${playerTotal}) must be TERMINAL`);
  }

  const scored =
    turn === "TERMINAL" ? compareTotals(playerTotal, dealerTotal) : "UNDECIDED";
  const outcome = fields.outcome ?? scored;

  if (outcome !== scored) {
    throw new InvalidStateError(
      `Outcome ${outcome} is inconsistent with a ${turn} hand of ${playerTotal} v ${dealerTotal}`
    );
  }

  return { playerTotal, playerSoftAces, dealerTotal, dealerSoftAces, turn, outcome };
}

export function playerHand(state: BlackjackState): HandTotal {
  return { total: state.playerTotal, softAces: state.playerSoftAces };
}

export function dealerHand(state: BlackjackState): HandTotal {
  return { total: state.dealerTotal, softAces: state.dealerSoftAces };
}
