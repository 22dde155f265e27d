/**
 * Azure Speech transcription.
 *
 * Each listen() spawns a capture process, pushes its PCM into an SDK push
 * stream and runs recognizeOnceAsync on a fresh SpeechRecognizer, so nothing
 * captured during the previous reply reaches the next utterance.
 *
 * Responsibilities:
 * - Build the speech config for the key, region and language
 * - Stream mic PCM into the recognizer for one utterance
 * - Map recognition results: speech to text, no match to "", cancel to RecognitionFailed
 * - Close the recognizer and stop capture on completion or abort
 */

import * as sdk from "microsoft-cognitiveservices-speech-sdk";

import { startMicCapture } from "./audio-io.js";
import { abortReason } from "./cancellation.js";
import { RecognitionFailed } from "./errors.js";

import type { MicCapture } from "./audio-io.js";
import type { TranscriptionPort } from "./ports.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Configuration for the Azure Speech transcriber.
 */
export interface AzureTranscriberConfig {
  speechKey: string;
  speechRegion: string;
  /** BCP-47 recognition language, e.g. "en-US" */
  language: string;
  /** Capture sample rate in Hz */
  sampleRate: number;
  /** Capture factory (defaults to startMicCapture) */
  startCapture?: (sampleRate: number) => MicCapture;
}

/** Cancellation details of a canceled recognition */
export interface RecognitionCancellation {
  reason: sdk.CancellationReason;
  errorDetails: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a TranscriptionPort backed by Azure Speech.
 *
 * @param config - Credentials, language and capture settings
 * @returns A TranscriptionPort
 */
export function createAzureTranscriber(config: AzureTranscriberConfig): TranscriptionPort {
  const startCapture = config.startCapture ?? startMicCapture;
  const speechConfig = sdk.SpeechConfig.fromSubscription(config.speechKey, config.speechRegion);
  speechConfig.speechRecognitionLanguage = config.language;
  const format = sdk.AudioStreamFormat.getWaveFormatPCM(config.sampleRate, 16, 1);

  const active = new Set<() => void>();

  function listen(signal: AbortSignal): Promise<string> {
    if (signal.aborted) return Promise.reject(abortReason(signal));

    const pushStream = sdk.AudioInputStream.createPushStream(format);
    const recognizer = new sdk.SpeechRecognizer(speechConfig, sdk.AudioConfig.fromStreamInput(pushStream));
    const capture = startCapture(config.sampleRate);

    return new Promise<string>((resolve, reject) => {
      let done = false;

      function finish(): void {
        if (done) return;
        done = true;
        active.delete(abandon);
        signal.removeEventListener("abort", onAbort);
        capture.micStream.off("data", onData);
        capture.micStream.off("error", onCaptureError);
        capture.stop();
        pushStream.close();
        recognizer.close();
      }

      function abandon(): void {
        finish();
        reject(new RecognitionFailed("Transcriber destroyed"));
      }

      function onData(chunk: Buffer): void {
        const copy = new ArrayBuffer(chunk.length);
        new Uint8Array(copy).set(chunk);
        pushStream.write(copy);
      }

      function onCaptureError(err: Error): void {
        finish();
        reject(new RecognitionFailed(`Microphone capture failed: ${err.message}`, { cause: err }));
      }

      function onAbort(): void {
        finish();
        reject(abortReason(signal));
      }

      active.add(abandon);
      signal.addEventListener("abort", onAbort, { once: true });
      capture.micStream.on("data", onData);
      capture.micStream.on("error", onCaptureError);

      recognizer.recognizeOnceAsync(
        (result) => {
          if (done) return;
          const cancellation =
            result.reason === sdk.ResultReason.Canceled ? sdk.CancellationDetails.fromResult(result) : undefined;
          finish();
          try {
            resolve(interpretRecognition(result.reason, result.text, cancellation));
          } catch (err) {
            reject(err);
          }
        },
        (error) => {
          if (done) return;
          finish();
          reject(new RecognitionFailed(`Azure Speech recognition failed: ${error}`));
        },
      );
    });
  }

  async function destroy(): Promise<void> {
    for (const abandon of active) abandon();
    active.clear();
    speechConfig.close();
  }

  return { listen, destroy };
}

/**
 * Map a recognition outcome to a transcript.
 *
 * @param reason - Result reason reported by the recognizer
 * @param text - Recognized text, if any
 * @param cancellation - Details when the recognition was canceled
 * @returns The transcript, or "" when nothing was recognized
 * @throws RecognitionFailed when the recognition was canceled with an error
 */
export function interpretRecognition(
  reason: sdk.ResultReason,
  text: string | undefined,
  cancellation?: RecognitionCancellation,
): string {
  switch (reason) {
    case sdk.ResultReason.RecognizedSpeech:
      return (text ?? "").trim();

    case sdk.ResultReason.NoMatch:
      return "";

    case sdk.ResultReason.Canceled:
      if (cancellation?.reason === sdk.CancellationReason.Error) {
        console.warn(`[stt-azure] recognition canceled: ${cancellation.errorDetails}`);
        throw new RecognitionFailed(`Azure Speech canceled recognition: ${cancellation.errorDetails}`);
      }
      return "";

    default:
      return "";
  }
}
