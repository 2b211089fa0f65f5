import { EnvConfig, createLogger } from "@hitstand/core";
import { AgentRegistry } from "@hitstand/engine";
import {
  BlackjackState,
  PlayerAction,
  ruleConfigFromEnv,
} from "@hitstand/game-blackjack";
import { AlphaBetaAgent } from "./AlphaBetaAgent";
import { ExpectimaxAgent } from "./ExpectimaxAgent";
import { GameTreeSearch } from "./GameTreeSearch";
import { MinimaxAgent } from "./MinimaxAgent";
import type { SearchOptions } from "./types";

export type AgentKind = "minimax" | "alphabeta" | "expectimax";

export const AGENT_KINDS: readonly AgentKind[] = ["minimax", "alphabeta", "expectimax"];

export function createAgent(
  kind: AgentKind,
  options: SearchOptions = {}
): GameTreeSearch {
  switch (kind) {
    case "minimax":
      return new MinimaxAgent(options);
    case "alphabeta":
      return new AlphaBetaAgent(options);
    case "expectimax":
      return new ExpectimaxAgent(options);
  }
}

export type BlackjackAgentRegistry = AgentRegistry<BlackjackState, PlayerAction>;

/** A registry holding one agent of every kind, sharing the same options. */
export function createAgentRegistry(
  options: SearchOptions = {}
): BlackjackAgentRegistry {
  const registry: BlackjackAgentRegistry = new AgentRegistry();
  for (const kind of AGENT_KINDS) {
    registry.register(createAgent(kind, options));
  }
  return registry;
}

export function searchOptionsFromEnv(config: EnvConfig): SearchOptions {
  return {
    rules: ruleConfigFromEnv(config),
    maxDepth: config.searchMaxDepth,
    log: createLogger("hitstand-search", config.logLevel),
  };
}
