import { strict as assert } from "assert";
import {
  InvalidActionError,
  InvalidStateError,
  chainHash,
  hashState,
  verifyTranscript,
} from "@hitstand/core";
import { AgentRegistry } from "./AgentRegistry";
import { MatchOrchestrator } from "./MatchOrchestrator";
import type { IGameModule, RandomSource } from "./interfaces/IGameModule";
import type { IDecisionAgent } from "./interfaces/IDecisionAgent";

// Minimal push-your-luck game for the orchestrator tests
interface PileState {
  total: number;
  stopped: boolean;
}
type PileAction = "draw" | "stop";
type PileOutcome = "win" | "lose" | "pending";

/** Replays a fixed list of values, each reduced modulo `max`. */
class SequenceRng implements RandomSource {
  private index = 0;

  constructor(private readonly values: number[]) {}

  nextInt(max: number): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value % max;
  }
}

const isOver = (state: PileState): boolean => state.stopped || state.total > 5;

const PileGame: IGameModule<PileState, PileAction, PileOutcome> = {
  gameId: "pile",
  name: "Pile",
  description: "Test game",

  init(rng: RandomSource): PileState {
    return { total: rng.nextInt(3), stopped: false };
  },

  validateAction(state: PileState, action: PileAction): boolean {
    if (isOver(state)) return false;
    return action === "draw" || state.total > 0;
  },

  applyAction(state: PileState, action: PileAction, rng: RandomSource): PileState {
    if (action === "stop") return { ...state, stopped: true };
    return { ...state, total: state.total + 1 + rng.nextInt(3) };
  },

  isTerminal: isOver,

  getOutcome(state: PileState): PileOutcome {
    if (!isOver(state)) return "pending";
    return state.total >= 4 && state.total <= 5 ? "win" : "lose";
  },

  getLegalActions(state: PileState): PileAction[] {
    if (isOver(state)) return [];
    return state.total > 0 ? ["stop", "draw"] : ["draw"];
  },
};

const Cautious: IDecisionAgent<PileState, PileAction> = {
  agentId: "cautious",
  name: "Cautious",
  decide: (state) => (state.total < 4 ? "draw" : "stop"),
};

const Greedy: IDecisionAgent<PileState, PileAction> = {
  agentId: "greedy",
  name: "Greedy",
  decide: () => "draw",
};

function newMatch(values: number[] = [0, 1, 2]) {
  return new MatchOrchestrator({
    game: PileGame,
    rng: new SequenceRng(values),
    matchId: "test-match",
  });
}

describe("AgentRegistry", () => {
  it("registers and retrieves agents", () => {
    const registry = new AgentRegistry<PileState, PileAction>();
    registry.register(Cautious);
    registry.register(Greedy);

    assert.equal(registry.has("cautious"), true);
    assert.equal(registry.has("reckless"), false);
    assert.equal(registry.get("greedy"), Greedy);
    assert.equal(registry.get("reckless"), undefined);
    assert.deepEqual(
      registry.list().map((a) => a.agentId),
      ["cautious", "greedy"]
    );
  });

  it("rejects a second agent with the same id", () => {
    const registry = new AgentRegistry<PileState, PileAction>();
    registry.register(Cautious);
    assert.throws(() => registry.register(Cautious), /already registered/);
  });
});

describe("MatchOrchestrator", () => {
  it("deals the initial state from the random source", () => {
    const match = newMatch([2, 0]);
    assert.deepEqual(match.getState(), { total: 2, stopped: false });
    assert.deepEqual(match.getLegalActions(), ["stop", "draw"]);
    assert.equal(match.isTerminal(), false);
    assert.equal(match.getOutcome(), "pending");
  });

  it("applies actions and reports the outcome on the terminal move", () => {
    const match = newMatch();

    const first = match.submitAction("draw");
    assert.deepEqual(first.state, { total: 2, stopped: false });
    assert.equal(first.terminal, false);
    assert.equal(first.outcome, undefined);

    match.submitAction("draw");
    const last = match.submitAction("stop");
    assert.deepEqual(last.state, { total: 5, stopped: true });
    assert.equal(last.terminal, true);
    assert.equal(last.outcome, "win");
  });

  it("rejects illegal actions", () => {
    const match = newMatch();
    assert.throws(() => match.submitAction("stop"), InvalidActionError);
    assert.equal(match.getTranscript().entries.length, 0);
  });

  it("rejects actions once the hand is over", () => {
    const match = newMatch();
    match.submitAction("draw");
    match.submitAction("stop");
    assert.throws(() => match.submitAction("draw"), InvalidStateError);
  });

  it("plays a hand to completion with an agent", () => {
    assert.equal(newMatch().playWith(Cautious), "win");
    // 0 -> 2 -> 5 -> 6
    assert.equal(newMatch().playWith(Greedy), "lose");
  });

  it("builds a hash-chained transcript", () => {
    const match = newMatch();
    const initial = match.getState();
    match.playWith(Cautious);

    const transcript = match.getTranscript();
    assert.equal(transcript.matchId, "test-match");
    assert.equal(transcript.gameId, "pile");
    assert.equal(transcript.initialHash, hashState(initial));
    assert.deepEqual(
      transcript.entries.map((e) => e.action),
      ["draw", "draw", "stop"]
    );
    assert.equal(transcript.entries[0].prevHash, transcript.initialHash);
    assert.equal(
      transcript.entries[1].prevHash,
      chainHash(transcript.entries[0].prevHash, transcript.entries[0])
    );
    assert.equal(
      transcript.rootHash,
      chainHash(transcript.entries[2].prevHash, transcript.entries[2])
    );
    assert.equal(
      transcript.entries[2].stateHash,
      hashState({ total: 5, stopped: true })
    );
    assert.equal(verifyTranscript(transcript), true);
  });

  it("detects a transcript edited after the hand", () => {
    const match = newMatch();
    match.playWith(Cautious);

    const transcript = match.getTranscript();
    transcript.entries[1] = { ...transcript.entries[1], action: "stop" };
    assert.equal(verifyTranscript(transcript), false);
  });

  it("replays identically from the same random sequence", () => {
    const a = newMatch();
    const b = newMatch();
    a.playWith(Cautious);
    b.playWith(Cautious);
    assert.equal(a.getTranscript().rootHash, b.getTranscript().rootHash);
  });
});
