/**
 * Worker thread running local recognition: Silero VAD segments the incoming
 * mic samples and Whisper decodes the first complete utterance of each cycle.
 *
 * Both run synchronously in native code, so they live here rather than on the
 * main thread. Cycle handling is in stt-local-session.ts; this file loads
 * sherpa-onnx and connects the session to the parent port.
 */

import { parentPort, workerData } from "worker_threads";

import { VAD_WINDOW_SIZE, createRecognitionSession } from "./stt-local-session.js";
import { resolveWhisperModel, whisperLanguage } from "./whisper-model.js";

import type { RecognitionEngine } from "./stt-local-session.js";
import type { LocalWorkerOptions, WorkerReply, WorkerRequest } from "./stt-local.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Seconds of audio the VAD buffers */
const VAD_BUFFER_SECONDS = 30;

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

async function loadSherpaEngine(options: LocalWorkerOptions): Promise<RecognitionEngine> {
  const files = resolveWhisperModel(options.modelPath);
  if (!files) {
    throw new Error(`No complete Whisper model set in ${options.modelPath}`);
  }

  const sherpa = (await import("sherpa-onnx-node")).default;
  const recognizer = new sherpa.OfflineRecognizer({
    featConfig: { sampleRate: options.sampleRate, featureDim: 80 },
    modelConfig: {
      whisper: {
        encoder: files.encoder,
        decoder: files.decoder,
        ...(files.multilingual ? { language: whisperLanguage(options.language), task: "transcribe" } : {}),
      },
      tokens: files.tokens,
      numThreads: 2,
    },
  });
  console.log(`[stt-local] loaded ${files.encoder}`);

  return {
    createDetector: () =>
      new sherpa.Vad(
        {
          sileroVad: {
            model: files.vad,
            threshold: 0.5,
            minSpeechDuration: 0.25,
            minSilenceDuration: 0.8,
            windowSize: VAD_WINDOW_SIZE,
          },
          sampleRate: options.sampleRate,
          numThreads: 1,
        },
        VAD_BUFFER_SECONDS,
      ),
    decode: (samples) => {
      const stream = recognizer.createStream();
      stream.acceptWaveform({ sampleRate: options.sampleRate, samples });
      recognizer.decode(stream);
      return recognizer.getResult(stream).text.trim();
    },
  };
}

function reply(message: WorkerReply): void {
  parentPort?.postMessage(message);
}

// ============================================================================
// ENTRY POINT
// ============================================================================

const options: LocalWorkerOptions = workerData;
const session = createRecognitionSession(() => loadSherpaEngine(options), reply);

// handleMessage replies failures itself and never rejects
parentPort?.on("message", (message: WorkerRequest) => void session.handleMessage(message));
