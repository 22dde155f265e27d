/**
 * Tests for the turn-taking conversation loop.
 *
 * Drives the loop with scripted in-process ports: the transcriber hands out
 * queued utterances and stops the loop when it runs out.
 *
 * Run: npx tsx --test voice/conversation-loop.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { abortReason } from "./cancellation.js";
import { createConversationLoop, handleStateTransition } from "./conversation-loop.js";
import { GenerationFailed, PlaybackFailed, RecognitionFailed } from "./errors.js";

import type { ConversationLoop } from "./conversation-loop.js";
import type { GenerationPort, LoopLogger, SpeechOutputPort, TranscriptionPort } from "./ports.js";
import type { ConversationConfig, LoopStatus, Turn } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

const PERSONA = "test persona";

function makeConfig(overrides: Partial<ConversationConfig> = {}): ConversationConfig {
  return {
    historyCapacity: 20,
    personaPrompt: PERSONA,
    portTimeoutMs: 0,
    listenTimeoutMs: 0,
    failureBackoffMs: 0,
    ...overrides,
  };
}

/** Promise that never settles on its own and rejects once the signal aborts. */
function untilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(abortReason(signal)), { once: true });
  });
}

/** A script step: an utterance, or a function run at listen time. */
type ListenStep = string | Error | ((signal: AbortSignal) => Promise<string>);

interface Harness {
  loop: ConversationLoop;
  lines: string[];
  transitions: string[];
  generateCalls: Array<{ persona: string; turns: Turn[] }>;
  spoken: string[];
  events: string[];
}

/**
 * Build a loop over scripted ports. When the listen script runs out, the
 * transcriber stops the loop and waits for the abort.
 */
function createHarness(options: {
  listens: ListenStep[];
  generate?: (turns: Turn[], signal: AbortSignal, call: number) => Promise<string>;
  speak?: (text: string, signal: AbortSignal, call: number) => Promise<void>;
  config?: Partial<ConversationConfig>;
}): Harness {
  const lines: string[] = [];
  const transitions: string[] = [];
  const generateCalls: Array<{ persona: string; turns: Turn[] }> = [];
  const spoken: string[] = [];
  const events: string[] = [];
  const listens = [...options.listens];
  let generateCount = 0;
  let speakCount = 0;

  const logger: LoopLogger = {
    debug: (message) => lines.push(`debug: ${message}`),
    log: (message) => lines.push(message),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
  };

  let loop: ConversationLoop | null = null;

  const transcriber: TranscriptionPort = {
    async listen(signal) {
      events.push("listen");
      const step = listens.shift();
      if (step === undefined) {
        loop?.stop();
        return untilAborted<string>(signal);
      }
      if (step instanceof Error) throw step;
      if (typeof step === "function") return step(signal);
      return step;
    },
    async destroy() {},
  };

  const generator: GenerationPort = {
    async generate(persona, turns, signal) {
      events.push("generate");
      generateCount++;
      generateCalls.push({ persona, turns: [...turns] });
      if (options.generate) return options.generate([...turns], signal, generateCount);
      return `reply ${generateCount}`;
    },
  };

  const speaker: SpeechOutputPort = {
    async speak(text, signal) {
      events.push("speak");
      speakCount++;
      spoken.push(text);
      if (options.speak) await options.speak(text, signal, speakCount);
    },
    async destroy() {},
  };

  loop = createConversationLoop(
    {
      transcriber,
      generator,
      speaker,
      logger,
      onStateChange: (from: LoopStatus, to: LoopStatus) => transitions.push(`${from}->${to}`),
    },
    makeConfig(options.config),
  );

  return { loop, lines, transitions, generateCalls, spoken, events };
}

// ============================================================================
// TESTS -- HAPPY PATH
// ============================================================================

test("one full cycle logs each stage in order", async () => {
  const h = createHarness({ listens: ["hi"], generate: async () => "hello" });

  await h.loop.run();

  assert.deepEqual(h.lines, [
    "Listening...",
    "Transcribed...",
    "User said: hi",
    "Generating...",
    "Speaking...",
    "Responding: hello",
    "Listening...",
    "Stopped",
  ]);
  assert.deepEqual(h.transitions, [
    "idle->listening",
    "listening->transcribed",
    "transcribed->generating",
    "generating->speaking",
    "speaking->listening",
    "listening->stopped",
  ]);
  assert.deepEqual(h.spoken, ["hello"]);
  assert.deepEqual(h.loop.getState(), { status: "stopped", completedCycles: 1 });
});

test("history capacity 2 keeps only the newest two turns", async () => {
  const replies = ["hello", "goodbye"];
  const h = createHarness({
    listens: ["hi", "bye"],
    generate: async (_turns, _signal, call) => replies[call - 1],
    config: { historyCapacity: 2 },
  });

  await h.loop.run();

  assert.deepEqual(h.generateCalls[0].turns, [{ role: "user", text: "hi" }]);
  assert.deepEqual(h.generateCalls[1].turns, [
    { role: "assistant", text: "hello" },
    { role: "user", text: "bye" },
  ]);
  assert.deepEqual(h.loop.getHistory(), [
    { role: "user", text: "bye" },
    { role: "assistant", text: "goodbye" },
  ]);
  assert.deepEqual(h.spoken, ["hello", "goodbye"]);
});

test("generation receives the persona on every call", async () => {
  const h = createHarness({ listens: ["one", "two"] });

  await h.loop.run();

  assert.deepEqual(
    h.generateCalls.map((call) => call.persona),
    [PERSONA, PERSONA],
  );
});

test("transcripts are trimmed before they are stored", async () => {
  const h = createHarness({ listens: ["  hi there \n"], generate: async () => "hello" });

  await h.loop.run();

  assert.deepEqual(h.loop.getHistory()[0], { role: "user", text: "hi there" });
  assert.ok(h.lines.includes("User said: hi there"));
});

test("port calls never overlap: listen, generate and speak alternate", async () => {
  const h = createHarness({ listens: ["a", "b"] });

  await h.loop.run();

  assert.deepEqual(h.events, ["listen", "generate", "speak", "listen", "generate", "speak", "listen"]);
});

// ============================================================================
// TESTS -- EMPTY AND FAILED TURNS
// ============================================================================

test("empty transcripts never reach the model or the history", async () => {
  const h = createHarness({ listens: ["", "   ", ""] });

  await h.loop.run();

  assert.equal(h.generateCalls.length, 0);
  assert.equal(h.spoken.length, 0);
  assert.deepEqual(h.loop.getHistory(), []);
  assert.deepEqual(h.lines, [
    "Listening...",
    "debug: (no speech)",
    "debug: (no speech)",
    "debug: (no speech)",
    "Stopped",
  ]);
  assert.equal(h.loop.getState().completedCycles, 0);
});

test("recognition failure is logged and the loop listens again", async () => {
  const h = createHarness({
    listens: [new RecognitionFailed("mic gone"), "hi"],
    generate: async () => "hello",
  });

  await h.loop.run();

  assert.ok(h.lines.includes("warn: (recognition failed: mic gone)"));
  assert.deepEqual(h.loop.getHistory(), [
    { role: "user", text: "hi" },
    { role: "assistant", text: "hello" },
  ]);
});

test("a plain error from the transcriber is treated as a recognition failure", async () => {
  const h = createHarness({ listens: [new Error("device busy")] });

  await h.loop.run();

  assert.ok(h.lines.includes("warn: (recognition failed: device busy)"));
  assert.equal(h.loop.getState().status, "stopped");
});

test("generation failure keeps the user turn and skips playback", async () => {
  const h = createHarness({
    listens: ["hi"],
    generate: async () => {
      throw new GenerationFailed("quota exceeded");
    },
  });

  await h.loop.run();

  assert.ok(h.lines.includes("error: Generation failed: quota exceeded"));
  assert.deepEqual(h.loop.getHistory(), [{ role: "user", text: "hi" }]);
  assert.equal(h.spoken.length, 0);
  assert.equal(h.loop.getState().completedCycles, 0);
  assert.ok(h.transitions.includes("generating->listening"));
});

test("a plain error from the generator is reported as a generation failure", async () => {
  const h = createHarness({
    listens: ["hi"],
    generate: async () => {
      throw new Error("socket hang up");
    },
  });

  await h.loop.run();

  assert.ok(h.lines.includes("error: Generation failed: socket hang up"));
  assert.deepEqual(h.loop.getHistory(), [{ role: "user", text: "hi" }]);
});

test("playback failure keeps the reply in history and counts the cycle", async () => {
  const h = createHarness({
    listens: ["hi"],
    generate: async () => "hello",
    speak: async () => {
      throw new PlaybackFailed("no output device");
    },
  });

  await h.loop.run();

  assert.ok(h.lines.includes("error: Playback failed: no output device"));
  assert.deepEqual(h.loop.getHistory(), [
    { role: "user", text: "hi" },
    { role: "assistant", text: "hello" },
  ]);
  assert.equal(h.loop.getState().completedCycles, 1);
});

// ============================================================================
// TESTS -- DEADLINES
// ============================================================================

test("a generation deadline becomes a generation failure", async () => {
  const h = createHarness({
    listens: ["hi"],
    generate: (_turns, signal) => untilAborted<string>(signal),
    config: { portTimeoutMs: 20 },
  });

  await h.loop.run();

  assert.ok(h.lines.includes("error: Generation failed: generation did not finish within 20ms"));
  assert.deepEqual(h.loop.getHistory(), [{ role: "user", text: "hi" }]);
});

test("a listen deadline is logged and treated as silence", async () => {
  const h = createHarness({
    listens: [(signal) => untilAborted<string>(signal)],
    config: { listenTimeoutMs: 20 },
  });

  await h.loop.run();

  assert.ok(h.lines.includes("warn: (listen timed out, continuing)"));
  assert.equal(h.generateCalls.length, 0);
});

// ============================================================================
// TESTS -- CANCELLATION
// ============================================================================

test("stop during generation rolls back the interrupted cycle", async () => {
  let loopRef: ConversationLoop | null = null;
  const h = createHarness({
    listens: ["hi", "again"],
    generate: (_turns, signal, call) => {
      if (call === 1) return Promise.resolve("hello");
      loopRef?.stop();
      return untilAborted<string>(signal);
    },
  });
  loopRef = h.loop;

  await h.loop.run();

  assert.deepEqual(h.loop.getHistory(), [
    { role: "user", text: "hi" },
    { role: "assistant", text: "hello" },
  ]);
  assert.deepEqual(h.spoken, ["hello"]);
  assert.deepEqual(h.loop.getState(), { status: "stopped", completedCycles: 1 });
});

test("stop during playback rolls back the interrupted cycle", async () => {
  let loopRef: ConversationLoop | null = null;
  const h = createHarness({
    listens: ["hi"],
    generate: async () => "hello",
    speak: (_text, signal) => {
      loopRef?.stop();
      return untilAborted<void>(signal);
    },
  });
  loopRef = h.loop;

  await h.loop.run();

  assert.deepEqual(h.loop.getHistory(), []);
  assert.deepEqual(h.loop.getState(), { status: "stopped", completedCycles: 0 });
  assert.equal(h.lines[h.lines.length - 1], "Stopped");
});

test("the port's signal is aborted when the loop stops", async () => {
  const seen: { signal?: AbortSignal } = {};
  const h = createHarness({
    listens: [
      (signal) => {
        seen.signal = signal;
        return untilAborted<string>(signal);
      },
    ],
  });

  const running = h.loop.run();
  assert.equal(seen.signal?.aborted, false);
  h.loop.stop();
  await running;

  assert.equal(seen.signal?.aborted, true);
});

test("a late failure from an abandoned call goes to the loop's logger", async () => {
  let failLate: (err: Error) => void = () => {};
  const h = createHarness({
    listens: [
      () =>
        new Promise<string>((_resolve, reject) => {
          failLate = reject;
        }),
    ],
  });

  const running = h.loop.run();
  h.loop.stop();
  await running;
  failLate(new Error("socket closed"));
  await new Promise((resolve) => setImmediate(resolve));

  assert.deepEqual(h.lines.slice(-2), [
    "Stopped",
    "warn: [loop] transcription failed after it was abandoned: socket closed",
  ]);
});

test("stop before run leaves the loop stopped", async () => {
  const h = createHarness({ listens: [] });

  h.loop.stop();

  assert.equal(h.loop.getState().status, "stopped");
  await assert.rejects(h.loop.run(), { message: "Conversation loop already started (status: stopped)" });
  assert.equal(h.events.length, 0);
});

test("run cannot be started twice", async () => {
  const h = createHarness({ listens: [(signal) => untilAborted<string>(signal)] });

  const running = h.loop.run();
  await assert.rejects(h.loop.run(), { message: "Conversation loop already started (status: listening)" });
  h.loop.stop();
  await running;

  assert.equal(h.loop.getState().status, "stopped");
});

test("each loop owns its own history", async () => {
  const first = createHarness({ listens: ["only first"] });
  const second = createHarness({ listens: [] });

  await first.loop.run();
  await second.loop.run();

  assert.equal(first.loop.getHistory().length, 2);
  assert.deepEqual(second.loop.getHistory(), []);
});

test("invalid history capacity is rejected at construction", () => {
  assert.throws(() => createHarness({ listens: [], config: { historyCapacity: 0 } }), {
    name: "RangeError",
    message: "History capacity must be a positive integer, got 0",
  });
});

// ============================================================================
// TESTS -- STATE MACHINE
// ============================================================================

test("handleStateTransition follows the cycle", () => {
  assert.equal(handleStateTransition("idle", "start"), "listening");
  assert.equal(handleStateTransition("listening", "transcript_ready"), "transcribed");
  assert.equal(handleStateTransition("transcribed", "generate"), "generating");
  assert.equal(handleStateTransition("generating", "reply_ready"), "speaking");
  assert.equal(handleStateTransition("speaking", "playback_complete"), "listening");
});

test("handleStateTransition returns to listening on empty transcripts and failed generation", () => {
  assert.equal(handleStateTransition("listening", "transcript_empty"), "listening");
  assert.equal(handleStateTransition("generating", "generation_failed"), "listening");
});

test("handleStateTransition ignores events that do not apply", () => {
  assert.equal(handleStateTransition("idle", "reply_ready"), "idle");
  assert.equal(handleStateTransition("speaking", "transcript_ready"), "speaking");
  assert.equal(handleStateTransition("listening", "generate"), "listening");
});

test("handleStateTransition treats stopped as terminal", () => {
  assert.equal(handleStateTransition("speaking", "stop"), "stopped");
  assert.equal(handleStateTransition("stopped", "start"), "stopped");
  assert.equal(handleStateTransition("stopped", "stop"), "stopped");
});
