/**
 * ElevenLabs speech output via the streaming HTTP API.
 *
 * POSTs the reply to the ElevenLabs text-to-speech streaming endpoint, which
 * returns raw 24kHz 16-bit mono PCM, and pipes the chunks into a player
 * process as they arrive. speak() resolves once the player has drained.
 *
 * Responsibilities:
 * - POST text to the ElevenLabs TTS streaming API and receive chunked PCM audio
 * - Write PCM audio to the player with backpressure handling
 * - Wait for the player to finish before resolving
 * - Cancel the request and kill the player when the loop aborts playback
 * - Translate HTTP and player failures into PlaybackFailed
 */

import { abortReason } from "./cancellation.js";
import { startSpeakerPlayback, writePcm } from "./audio-io.js";
import { PlaybackFailed, describeError } from "./errors.js";

import type { SpeakerPlayback } from "./audio-io.js";
import type { SpeechOutputPort } from "./ports.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** ElevenLabs TTS streaming API base URL */
const ELEVENLABS_TTS_BASE_URL = "https://api.elevenlabs.io/v1/text-to-speech";

/** PCM output sample rate in Hz (matches output_format=pcm_24000) */
export const TTS_SAMPLE_RATE = 24000;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Configuration for the ElevenLabs TTS provider.
 */
export interface ElevenlabsSpeakerConfig {
  /** ElevenLabs API key for authentication */
  apiKey: string;
  /** ElevenLabs voice ID to use for generation */
  voiceId: string;
  /** ElevenLabs model ID (e.g. "eleven_flash_v2_5") */
  modelId: string;
  /** HTTP client (defaults to global fetch) */
  fetchFn?: typeof fetch;
  /** Player factory (defaults to startSpeakerPlayback) */
  startPlayback?: (sampleRate: number) => SpeakerPlayback;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SpeechOutputPort that uses the ElevenLabs streaming TTS API.
 *
 * @param config - ElevenLabs TTS configuration (API key, voice, model)
 * @returns A SpeechOutputPort
 */
export function createElevenlabsSpeaker(config: ElevenlabsSpeakerConfig): SpeechOutputPort {
  const { apiKey, voiceId, modelId } = config;
  const fetchFn = config.fetchFn ?? fetch;
  const startPlayback = config.startPlayback ?? startSpeakerPlayback;

  let activePlayback: SpeakerPlayback | null = null;

  /**
   * Fetch PCM for `text` and play it to completion.
   *
   * @param text - The text to synthesize
   * @param signal - Aborts the request and the player
   */
  async function speak(text: string, signal: AbortSignal): Promise<void> {
    if (signal.aborted) throw abortReason(signal);

    const url = `${ELEVENLABS_TTS_BASE_URL}/${voiceId}/stream?output_format=pcm_${TTS_SAMPLE_RATE}`;

    let response: Response;
    try {
      response = await fetchFn(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "xi-api-key": apiKey,
        },
        body: JSON.stringify({ text, model_id: modelId }),
        signal,
      });
    } catch (err) {
      if (signal.aborted) throw abortReason(signal);
      throw new PlaybackFailed(`ElevenLabs TTS request failed: ${describeError(err)}`, { cause: err });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "unknown error");
      throw new PlaybackFailed(`ElevenLabs TTS API error ${response.status}: ${errorText}`);
    }

    const playback = startPlayback(TTS_SAMPLE_RATE);
    activePlayback = playback;
    const onAbort = (): void => playback.stop();
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      let totalBytes = 0;
      for await (const chunk of readResponseChunks(response)) {
        if (signal.aborted) break;
        totalBytes += chunk.length;
        await writePcm(playback.speakerInput, Buffer.from(chunk));
      }

      if (signal.aborted) throw abortReason(signal);

      playback.speakerInput.end();
      await playback.finished;
      console.log(`[tts-elevenlabs] played ${(totalBytes / (TTS_SAMPLE_RATE * 2)).toFixed(1)}s of audio`);
    } catch (err) {
      playback.stop();
      // Let a pending exit settle without an unhandled rejection
      playback.finished.catch(() => undefined);
      if (signal.aborted) throw abortReason(signal);
      throw new PlaybackFailed(`ElevenLabs playback failed: ${describeError(err)}`, { cause: err });
    } finally {
      signal.removeEventListener("abort", onAbort);
      if (activePlayback === playback) activePlayback = null;
    }
  }

  async function destroy(): Promise<void> {
    activePlayback?.stop();
    activePlayback = null;
  }

  return { speak, destroy };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Read chunks from a fetch Response body as an async iterable.
 *
 * @param response - The fetch Response to read from
 * @yields Uint8Array chunks of raw PCM audio data
 * @throws Error if the response has no body
 */
async function* readResponseChunks(response: Response): AsyncGenerator<Uint8Array> {
  const body = response.body;
  if (!body) throw new Error("ElevenLabs TTS response has no body");

  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
