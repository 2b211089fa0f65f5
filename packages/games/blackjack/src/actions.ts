import type { BlackjackState } from "./state";

export type PlayerAction = "HIT" | "STAND";

/** Preference order: when two actions score the same, the earlier one is taken. */
export const PLAYER_ACTIONS: readonly PlayerAction[] = ["STAND", "HIT"];

export function isPlayerAction(value: unknown): value is PlayerAction {
  return value === "HIT" || value === "STAND";
}

export function getLegalActions(state: BlackjackState): PlayerAction[] {
  if (state.turn !== "PLAYER") {
    return [];
  }
  return [...PLAYER_ACTIONS];
}

export function isLegalAction(state: BlackjackState, action: unknown): boolean {
  return isPlayerAction(action) && getLegalActions(state).includes(action);
}
