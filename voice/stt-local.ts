/**
 * Local speech-to-text: sherpa-onnx Whisper + Silero VAD in a worker thread.
 *
 * Each listen() starts a fresh capture process and a new recognition cycle in
 * the worker, streams mic samples to it, and resolves with the first
 * utterance the worker decodes. Cycles are numbered so a result from a
 * cancelled cycle is never delivered to a later one.
 *
 * Responsibilities:
 * - Own the recognition worker (created on first listen, terminated on destroy)
 * - Stream captured PCM to the worker as Float32 samples
 * - Tell the worker to drop a cycle when the loop aborts the listen
 * - Translate worker, capture and model failures into RecognitionFailed
 */

import { extname } from "path";
import { fileURLToPath } from "url";
import { Worker } from "worker_threads";

import { bufferToFloat32, startMicCapture } from "./audio-io.js";
import { abortReason } from "./cancellation.js";
import { RecognitionFailed, describeError } from "./errors.js";

import type { MicCapture } from "./audio-io.js";
import type { TranscriptionPort } from "./ports.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** Data the worker is started with */
export interface LocalWorkerOptions {
  modelPath: string;
  language: string;
  sampleRate: number;
}

/** Messages from the main thread to the worker */
export type WorkerRequest =
  | { type: "begin"; cycleId: number }
  | { type: "audio"; cycleId: number; samples: Float32Array }
  | { type: "cancel"; cycleId: number };

/** Messages from the worker to the main thread */
export type WorkerReply =
  | { type: "utterance"; cycleId: number; text: string }
  | { type: "error"; cycleId: number; message: string };

/** The part of a worker_threads Worker this module uses */
export interface RecognitionWorker {
  postMessage(message: WorkerRequest): void;
  on(event: "message", listener: (message: WorkerReply) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "exit", listener: (exitCode: number) => void): unknown;
  terminate(): Promise<number>;
}

/**
 * Configuration for the local transcriber.
 */
export interface LocalTranscriberConfig extends LocalWorkerOptions {
  /** Worker factory (defaults to the bundled recognition worker) */
  createWorker?: (options: LocalWorkerOptions) => RecognitionWorker;
  /** Capture factory (defaults to startMicCapture) */
  startCapture?: (sampleRate: number) => MicCapture;
}

/** The listen() call the worker's replies are routed to */
interface PendingListen {
  cycleId: number;
  resolve: (text: string) => void;
  reject: (err: Error) => void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a TranscriptionPort backed by the local recognition worker.
 *
 * @param config - Model directory, language, sample rate and test seams
 * @returns A TranscriptionPort
 */
export function createLocalTranscriber(config: LocalTranscriberConfig): TranscriptionPort {
  const { modelPath, language, sampleRate } = config;
  const createWorker = config.createWorker ?? spawnRecognitionWorker;
  const startCapture = config.startCapture ?? startMicCapture;

  let worker: RecognitionWorker | null = null;
  let pending: PendingListen | null = null;
  let nextCycleId = 1;

  function getWorker(): RecognitionWorker {
    if (worker) return worker;

    const created = createWorker({ modelPath, language, sampleRate });
    created.on("message", (message) => {
      if (!pending || message.cycleId !== pending.cycleId) return;
      if (message.type === "utterance") {
        pending.resolve(message.text);
      } else {
        pending.reject(new RecognitionFailed(`Local recognition failed: ${message.message}`));
      }
    });
    created.on("error", (err) => {
      console.error(`[stt-local] worker error: ${err.message}`);
      pending?.reject(new RecognitionFailed(`Recognition worker crashed: ${err.message}`, { cause: err }));
    });
    created.on("exit", (exitCode) => {
      if (worker === created) worker = null;
      pending?.reject(new RecognitionFailed(`Recognition worker exited with code ${exitCode}`));
    });

    worker = created;
    return created;
  }

  function listen(signal: AbortSignal): Promise<string> {
    if (signal.aborted) return Promise.reject(abortReason(signal));

    const activeWorker = getWorker();
    const cycleId = nextCycleId++;
    const capture = startCapture(sampleRate);
    let leftover: Buffer = Buffer.alloc(0);

    return new Promise<string>((resolve, reject) => {
      function finish(): void {
        pending = null;
        capture.stop();
        capture.micStream.off("data", onData);
        capture.micStream.off("error", onCaptureError);
        signal.removeEventListener("abort", onAbort);
      }

      function onData(chunk: Buffer): void {
        const bytes = leftover.length > 0 ? Buffer.concat([leftover, chunk]) : chunk;
        const usable = bytes.length - (bytes.length % 2);
        leftover = bytes.subarray(usable);
        if (usable === 0) return;
        activeWorker.postMessage({ type: "audio", cycleId, samples: bufferToFloat32(bytes.subarray(0, usable)) });
      }

      function onCaptureError(err: Error): void {
        activeWorker.postMessage({ type: "cancel", cycleId });
        finish();
        reject(new RecognitionFailed(`Microphone capture failed: ${err.message}`, { cause: err }));
      }

      function onAbort(): void {
        activeWorker.postMessage({ type: "cancel", cycleId });
        finish();
        reject(abortReason(signal));
      }

      pending = {
        cycleId,
        resolve: (text) => {
          finish();
          resolve(text);
        },
        reject: (err) => {
          finish();
          reject(err);
        },
      };

      signal.addEventListener("abort", onAbort, { once: true });
      capture.micStream.on("data", onData);
      capture.micStream.on("error", onCaptureError);
      activeWorker.postMessage({ type: "begin", cycleId });
    });
  }

  async function destroy(): Promise<void> {
    const current = worker;
    worker = null;
    if (current) {
      try {
        await current.terminate();
      } catch (err) {
        console.warn(`[stt-local] worker terminate failed: ${describeError(err)}`);
      }
    }
  }

  return { listen, destroy };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Start the recognition worker beside this module: the .ts source under tsx,
 * the compiled .js under dist/.
 */
function spawnRecognitionWorker(options: LocalWorkerOptions): RecognitionWorker {
  const extension = extname(fileURLToPath(import.meta.url));
  return new Worker(new URL(`./stt-local-worker${extension}`, import.meta.url), { workerData: options });
}
