/**
 * Turn-taking conversation loop.
 *
 * Wires the three ports and the history buffer into a state machine that runs
 * until stopped. All state is closure-scoped inside createConversationLoop, so
 * every loop owns its own history and nothing is shared between loops.
 *
 * Responsibilities:
 * - Run the cycle LISTENING -> TRANSCRIBED -> GENERATING -> SPEAKING -> LISTENING
 * - Drop empty transcripts without touching history or calling the model
 * - Append the user turn before generation and the reply turn before playback
 * - Translate port failures into the error taxonomy and recover per policy
 * - Stop on request: abort the in-flight port call and roll the interrupted
 *   cycle back to the history it started with
 */

import { createConversationHistory } from "./conversation-history.js";
import { delay, runCancellable } from "./cancellation.js";
import {
  DeadlineExceeded,
  GenerationFailed,
  Interrupted,
  PlaybackFailed,
  RecognitionFailed,
  describeError,
} from "./errors.js";

import type { ConversationHistory } from "./conversation-history.js";
import type { GenerationPort, LoopLogger, SpeechOutputPort, TranscriptionPort } from "./ports.js";
import type { ConversationConfig, LoopEvent, LoopState, LoopStatus, Turn } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Collaborators of a conversation loop.
 */
export interface ConversationLoopPorts {
  transcriber: TranscriptionPort;
  generator: GenerationPort;
  speaker: SpeechOutputPort;
  /** Diagnostics sink (defaults to console) */
  logger?: LoopLogger;
  /** Called on every status change, after it is logged */
  onStateChange?: (from: LoopStatus, to: LoopStatus) => void;
}

/**
 * Handle to a conversation loop.
 */
export interface ConversationLoop {
  /**
   * Run cycles until stop() is called.
   * Resolves once the loop is stopped; rejects only on a defect in the loop.
   * @throws Error if the loop was already started
   */
  run: () => Promise<void>;
  /** Abort the in-flight port call and end the loop */
  stop: () => void;
  /** Snapshot of the current state */
  getState: () => LoopState;
  /** Copy of the history, oldest first */
  getHistory: () => Turn[];
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a conversation loop over the given ports.
 *
 * @param ports - Transcription, generation and speech output ports
 * @param config - Capacity, persona and deadlines
 * @returns A ConversationLoop handle; call run() to start it
 * @throws RangeError if historyCapacity is not a positive integer
 */
export function createConversationLoop(
  ports: ConversationLoopPorts,
  config: ConversationConfig,
): ConversationLoop {
  const { transcriber, generator, speaker, onStateChange } = ports;
  const logger: LoopLogger = ports.logger ?? console;

  // ---- Closure-scoped state ----
  const history: ConversationHistory = createConversationHistory(config.historyCapacity);
  const controller = new AbortController();
  let state: LoopState = { status: "idle", completedCycles: 0 };

  /** Apply an event to the state machine, logging and reporting changes. */
  function transition(event: LoopEvent): void {
    const from = state.status;
    const to = handleStateTransition(from, event);
    if (to === from) return;

    state = { ...state, status: to };
    logger.log(formatStatus(to));
    onStateChange?.(from, to);
  }

  // ---- Port calls ----

  /**
   * Listen for one utterance. Recognition failures and listen deadlines
   * become an empty transcript.
   */
  async function listen(): Promise<string> {
    try {
      return await runCancellable((signal) => transcriber.listen(signal), {
        signal: controller.signal,
        timeoutMs: config.listenTimeoutMs,
        label: "transcription",
        logger,
      });
    } catch (err) {
      if (controller.signal.aborted) throw new Interrupted();
      if (err instanceof DeadlineExceeded) {
        logger.warn("(listen timed out, continuing)");
        return "";
      }

      const failure = err instanceof RecognitionFailed
        ? err
        : new RecognitionFailed(describeError(err), { cause: err });
      logger.warn(`(recognition failed: ${failure.message})`);
      await delay(config.failureBackoffMs, controller.signal);
      if (controller.signal.aborted) throw new Interrupted();
      return "";
    }
  }

  /** Ask the model for a reply to the current history. */
  async function generate(turns: Turn[]): Promise<string> {
    try {
      return await runCancellable((signal) => generator.generate(config.personaPrompt, turns, signal), {
        signal: controller.signal,
        timeoutMs: config.portTimeoutMs,
        label: "generation",
        logger,
      });
    } catch (err) {
      if (controller.signal.aborted) throw new Interrupted();
      if (err instanceof GenerationFailed) throw err;
      throw new GenerationFailed(describeError(err), { cause: err });
    }
  }

  /** Speak a reply, waiting for playback to finish. */
  async function speak(text: string): Promise<void> {
    try {
      await runCancellable((signal) => speaker.speak(text, signal), {
        signal: controller.signal,
        timeoutMs: config.portTimeoutMs,
        label: "playback",
        logger,
      });
    } catch (err) {
      if (controller.signal.aborted) throw new Interrupted();
      if (err instanceof PlaybackFailed) throw err;
      throw new PlaybackFailed(describeError(err), { cause: err });
    }
  }

  // ---- Main logic ----

  /**
   * Run one listen -> generate -> speak cycle.
   * An interrupted cycle restores the history it started with.
   */
  async function runCycle(): Promise<void> {
    const snapshot = history.asSequence();

    try {
      transition("start");

      const transcript = (await listen()).trim();
      if (!transcript) {
        logger.debug("(no speech)");
        transition("transcript_empty");
        return;
      }

      transition("transcript_ready");
      logger.log(`User said: ${transcript}`);
      history.append({ role: "user", text: transcript });

      transition("generate");
      let reply: string;
      try {
        reply = await generate(history.asSequence());
      } catch (err) {
        if (!(err instanceof GenerationFailed)) throw err;
        logger.error(`Generation failed: ${err.message}`);
        transition("generation_failed");
        return;
      }

      if (controller.signal.aborted) throw new Interrupted();
      history.append({ role: "assistant", text: reply });

      transition("reply_ready");
      logger.log(`Responding: ${reply}`);
      try {
        await speak(reply);
      } catch (err) {
        if (!(err instanceof PlaybackFailed)) throw err;
        logger.error(`Playback failed: ${err.message}`);
      }

      state = { ...state, completedCycles: state.completedCycles + 1 };
      transition("playback_complete");
    } catch (err) {
      if (err instanceof Interrupted) {
        history.restore(snapshot);
      }
      throw err;
    }
  }

  async function run(): Promise<void> {
    if (state.status !== "idle") {
      throw new Error(`Conversation loop already started (status: ${state.status})`);
    }

    try {
      while (!controller.signal.aborted) {
        await runCycle();
      }
    } catch (err) {
      if (!(err instanceof Interrupted)) {
        transition("stop");
        throw err;
      }
    }

    transition("stop");
  }

  function stop(): void {
    if (controller.signal.aborted) return;
    controller.abort(new Interrupted());
    // Never started: there is no cycle to unwind
    if (state.status === "idle") transition("stop");
  }

  return {
    run,
    stop,
    getState: () => ({ ...state }),
    getHistory: () => history.asSequence(),
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Pure function that computes the next loop status from the current status
 * and an event. Events that do not apply in the current status leave it
 * unchanged; `stopped` is terminal.
 *
 * @param from - Current loop status
 * @param event - Event triggering the transition
 * @returns The next loop status
 */
export function handleStateTransition(from: LoopStatus, event: LoopEvent): LoopStatus {
  if (from === "stopped") return from;

  switch (event) {
    case "stop":
      return "stopped";
    case "start":
      return from === "idle" || from === "listening" ? "listening" : from;
    case "transcript_empty":
      return from === "listening" ? "listening" : from;
    case "transcript_ready":
      return from === "listening" ? "transcribed" : from;
    case "generate":
      return from === "transcribed" ? "generating" : from;
    case "reply_ready":
      return from === "generating" ? "speaking" : from;
    case "generation_failed":
      return from === "generating" ? "listening" : from;
    case "playback_complete":
      return from === "speaking" ? "listening" : from;
    default:
      return from;
  }
}

/**
 * Status banner printed on each change, e.g. "Listening...".
 *
 * @param status - The new status
 * @returns Console line for the status
 */
function formatStatus(status: LoopStatus): string {
  if (status === "stopped") return "Stopped";
  const label = status.charAt(0).toUpperCase() + status.slice(1);
  return `${label}...`;
}
