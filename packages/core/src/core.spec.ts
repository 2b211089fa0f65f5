import { strict as assert } from "assert";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigError, InvalidActionError } from "./errors";
import { DEFAULTS, ENV_MAP, loadEnvConfig, resolveEnvConfig } from "./config";
import { canonicalEncode } from "./libs/Encoding";
import { chainHash, hashState, verifyTranscript } from "./libs/Crypto";
import type { HandTranscript } from "./types/transcript";
import { createLogger, isLogLevel } from "./logger";

describe("Config", () => {
  it("falls back to defaults", () => {
    assert.deepEqual(resolveEnvConfig({}), {
      logLevel: "info",
      searchMaxDepth: 4,
      dealerStandThreshold: 17,
      aceRule: "soft",
    });
    assert.deepEqual(resolveEnvConfig({ SEARCH_MAX_DEPTH: "" }), DEFAULTS);
  });

  it("reads every key from the environment", () => {
    assert.deepEqual(
      resolveEnvConfig({
        LOG_LEVEL: "debug",
        SEARCH_MAX_DEPTH: "6",
        DEALER_STAND_THRESHOLD: "16",
        ACE_RULE: "fixed",
      }),
      {
        logLevel: "debug",
        searchMaxDepth: 6,
        dealerStandThreshold: 16,
        aceRule: "fixed",
      }
    );
  });

  it("rejects values that do not parse", () => {
    assert.throws(
      () => resolveEnvConfig({ SEARCH_MAX_DEPTH: "four" }),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.key === "searchMaxDepth" &&
        err.message === 'Invalid config "searchMaxDepth": expected an integer, got "four"'
    );
    assert.throws(() => resolveEnvConfig({ SEARCH_MAX_DEPTH: "0" }), ConfigError);
    assert.throws(() => resolveEnvConfig({ LOG_LEVEL: "loud" }), ConfigError);
    assert.throws(() => resolveEnvConfig({ ACE_RULE: "wild" }), ConfigError);
    assert.throws(() => resolveEnvConfig({ DEALER_STAND_THRESHOLD: "17.5" }), ConfigError);
  });

  describe("loadEnvConfig", () => {
    const keys = Object.values(ENV_MAP);
    const saved: Record<string, string | undefined> = {};
    let dir = "";

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "hitstand-env-"));
      for (const key of keys) {
        saved[key] = process.env[key];
        delete process.env[key];
      }
    });

    afterEach(() => {
      for (const key of keys) {
        const value = saved[key];
        if (value === undefined) delete process.env[key];
        else process.env[key] = value;
      }
      rmSync(dir, { recursive: true, force: true });
    });

    it("reads a .env file before resolving", () => {
      const path = join(dir, ".env");
      writeFileSync(path, "SEARCH_MAX_DEPTH=6\nACE_RULE=fixed\n");

      assert.deepEqual(loadEnvConfig(path), {
        logLevel: "info",
        searchMaxDepth: 6,
        dealerStandThreshold: 17,
        aceRule: "fixed",
      });
      assert.equal(process.env.SEARCH_MAX_DEPTH, "6");
    });

    it("keeps variables already set in the environment", () => {
      const path = join(dir, ".env");
      writeFileSync(path, "DEALER_STAND_THRESHOLD=18\n");
      process.env.DEALER_STAND_THRESHOLD = "16";

      assert.equal(loadEnvConfig(path).dealerStandThreshold, 16);
    });

    it("falls back to defaults when the file is missing", () => {
      assert.deepEqual(loadEnvConfig(join(dir, "missing.env")), DEFAULTS);
    });
  });
});

describe("Encoding", () => {
  it("sorts keys and drops undefined members", () => {
    assert.equal(
      canonicalEncode({ b: 1, a: { d: undefined, c: [2, 1] } }),
      '{"a":{"c":[2,1]},"b":1}'
    );
  });
});

describe("Crypto", () => {
  it("hashes equal states equally whatever the key order", () => {
    const a = hashState({ playerTotal: 12, dealerTotal: 6 });
    const b = hashState({ dealerTotal: 6, playerTotal: 12 });
    assert.equal(a, b);
    assert.match(a, /^0x[0-9a-f]{64}$/);
  });

  it("chains on the previous hash", () => {
    const initialHash = hashState({});
    const entry = { sequence: 0, action: "HIT", stateHash: hashState({ n: 1 }), prevHash: initialHash };
    const first = chainHash(initialHash, entry);
    assert.notEqual(first, hashState(entry));
    assert.notEqual(chainHash(first, entry), first);
  });

  describe("verifyTranscript", () => {
    function twoStepHand(): HandTranscript<string> {
      const initialHash = hashState({ n: 0 });
      const hit = { sequence: 0, action: "HIT", stateHash: hashState({ n: 1 }), prevHash: initialHash };
      const middle = chainHash(initialHash, hit);
      const stand = { sequence: 1, action: "STAND", stateHash: hashState({ n: 2 }), prevHash: middle };
      return {
        matchId: "hand-1",
        gameId: "blackjack",
        initialHash,
        entries: [hit, stand],
        rootHash: chainHash(middle, stand),
      };
    }

    it("accepts an intact chain", () => {
      assert.equal(verifyTranscript(twoStepHand()), true);
    });

    it("accepts a hand with no actions when the root is the initial hash", () => {
      const initialHash = hashState({ n: 0 });
      assert.equal(
        verifyTranscript({ matchId: "m", gameId: "g", initialHash, entries: [], rootHash: initialHash }),
        true
      );
    });

    it("rejects an edited action", () => {
      const hand = twoStepHand();
      hand.entries[0] = { ...hand.entries[0], action: "STAND" };
      assert.equal(verifyTranscript(hand), false);
    });

    it("rejects reordered entries", () => {
      const hand = twoStepHand();
      hand.entries.reverse();
      assert.equal(verifyTranscript(hand), false);
    });

    it("rejects a root that does not close the chain", () => {
      const hand = twoStepHand();
      assert.equal(verifyTranscript({ ...hand, rootHash: hand.initialHash }), false);
    });
  });
});

describe("Logger", () => {
  it("creates a logger at the given level", () => {
    const log = createLogger("core-test", "warn");
    assert.equal(log.level(), 40);
  });

  it("recognizes bunyan level names", () => {
    assert.equal(isLogLevel("trace"), true);
    assert.equal(isLogLevel("verbose"), false);
  });
});

describe("Errors", () => {
  it("names each error class", () => {
    const err = new InvalidActionError("HIT is not legal");
    assert.ok(err instanceof Error);
    assert.equal(err.name, "InvalidActionError");
    assert.equal(err.message, "HIT is not legal");
  });
});
