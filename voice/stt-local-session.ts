/**
 * Recognition cycles inside the local recognition worker.
 *
 * Handles the begin/audio/cancel messages from the main thread: the models are
 * loaded once and shared by every cycle, each cycle gets a fresh VAD, and the
 * first segment the VAD completes is decoded and sent back as the utterance.
 * The worker entry point supplies the sherpa-onnx engine; tests supply a fake.
 *
 * Responsibilities:
 * - Load the engine at most once, even when cycles begin while it loads
 * - Activate a cycle only if it is still the newest one and was not cancelled
 * - Feed the VAD whole windows, carrying the remainder to the next chunk
 * - Report load, VAD and decode failures for the cycle they belong to
 */

import { describeError } from "./errors.js";

import type { WorkerReply, WorkerRequest } from "./stt-local.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** The part of sherpa-onnx's Vad a cycle uses */
export interface SpeechDetector {
  acceptWaveform(samples: Float32Array): void;
  isEmpty(): boolean;
  front(): { samples: Float32Array };
  pop(): void;
}

/** Loaded models: a VAD factory and a Whisper decoder */
export interface RecognitionEngine {
  createDetector(): SpeechDetector;
  decode(samples: Float32Array): string;
}

export interface RecognitionSession {
  /** Handle one request. Never rejects; failures are replied as errors. */
  handleMessage(message: WorkerRequest): Promise<void>;
}

// ============================================================================
// CONSTANTS
// ============================================================================

/** Silero VAD window at 16kHz */
export const VAD_WINDOW_SIZE = 512;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

interface ActiveCycle {
  cycleId: number;
  engine: RecognitionEngine;
  detector: SpeechDetector;
  pending: Float32Array;
}

/**
 * Create the cycle handler for one worker.
 *
 * @param loadEngine - Loads the models; called once, again only after a failure
 * @param reply - Posts a reply to the main thread
 * @returns A RecognitionSession
 */
export function createRecognitionSession(
  loadEngine: () => Promise<RecognitionEngine>,
  reply: (message: WorkerReply) => void,
): RecognitionSession {
  let engineLoad: Promise<RecognitionEngine> | null = null;
  let active: ActiveCycle | null = null;
  // Newest cycle that has begun and not been cancelled; 0 when none
  let wanted = 0;

  function getEngine(): Promise<RecognitionEngine> {
    if (!engineLoad) {
      const load = loadEngine();
      engineLoad = load;
      load.catch(() => {
        if (engineLoad === load) engineLoad = null;
      });
    }
    return engineLoad;
  }

  async function begin(cycleId: number): Promise<void> {
    wanted = cycleId;
    active = null;

    const engine = await getEngine();
    // A cancel or a newer begin arrived while the models loaded
    if (wanted !== cycleId) return;

    active = { cycleId, engine, detector: engine.createDetector(), pending: new Float32Array(0) };
  }

  /**
   * Feed samples to the VAD in whole windows and decode the first segment it
   * completes. The cycle ends after one utterance.
   */
  function processAudio(cycle: ActiveCycle, samples: Float32Array): void {
    const buffered = new Float32Array(cycle.pending.length + samples.length);
    buffered.set(cycle.pending);
    buffered.set(samples, cycle.pending.length);

    let offset = 0;
    while (offset + VAD_WINDOW_SIZE <= buffered.length) {
      cycle.detector.acceptWaveform(buffered.subarray(offset, offset + VAD_WINDOW_SIZE));
      offset += VAD_WINDOW_SIZE;

      if (!cycle.detector.isEmpty()) {
        const segment = cycle.detector.front();
        cycle.detector.pop();
        active = null;
        wanted = 0;
        reply({ type: "utterance", cycleId: cycle.cycleId, text: cycle.engine.decode(segment.samples) });
        return;
      }
    }
    cycle.pending = buffered.slice(offset);
  }

  async function dispatch(message: WorkerRequest): Promise<void> {
    switch (message.type) {
      case "begin":
        await begin(message.cycleId);
        return;

      case "audio":
        if (active?.cycleId === message.cycleId) processAudio(active, message.samples);
        return;

      case "cancel":
        if (wanted === message.cycleId) wanted = 0;
        if (active?.cycleId === message.cycleId) active = null;
        return;
    }
  }

  async function handleMessage(message: WorkerRequest): Promise<void> {
    try {
      await dispatch(message);
    } catch (err) {
      if (active?.cycleId === message.cycleId) active = null;
      if (wanted === message.cycleId) wanted = 0;
      reply({ type: "error", cycleId: message.cycleId, message: describeError(err) });
    }
  }

  return { handleMessage };
}
