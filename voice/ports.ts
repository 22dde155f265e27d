/**
 * Port interfaces between the conversation loop and its back ends.
 *
 * Any transcription, generation or speech output back end implements one of
 * these so the loop stays back-end agnostic. Every call takes an AbortSignal:
 * the loop aborts it on stop or deadline, and the adapter forwards the abort
 * to whatever work it has in flight.
 *
 * Responsibilities:
 * - Define the three capability contracts the loop depends on
 * - Define the logger the loop writes to
 */

import type { Turn } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Captures one user utterance and returns its text.
 * Implemented by stt-azure.ts, stt-local.ts and stt-console.ts.
 */
export interface TranscriptionPort {
  /**
   * Block until one utterance is captured and transcribed.
   *
   * @param signal - Aborted when the loop stops or the listen deadline passes
   * @returns The transcript, or an empty string on silence/no match
   * @throws RecognitionFailed if the back end fails
   */
  listen(signal: AbortSignal): Promise<string>;

  /** Free capture processes, workers and recognizers. */
  destroy(): Promise<void>;
}

/**
 * Produces one reply from a persona and the ordered conversation turns.
 * Implemented by llm-openai.ts and llm-anthropic.ts.
 */
export interface GenerationPort {
  /**
   * @param persona - Fixed system instruction
   * @param turns - History oldest-to-newest, including the latest user turn
   * @param signal - Aborted when the loop stops or the port deadline passes
   * @returns The top reply candidate
   * @throws GenerationFailed on auth, rate-limit, network errors or an empty reply
   */
  generate(persona: string, turns: readonly Turn[], signal: AbortSignal): Promise<string>;
}

/**
 * Synthesizes and plays text.
 * Implemented by tts-elevenlabs.ts, tts-system.ts and tts-console.ts.
 */
export interface SpeechOutputPort {
  /**
   * @param text - The reply to speak
   * @param signal - Aborted when the loop stops or the port deadline passes
   * @returns Resolves once playback has finished
   * @throws PlaybackFailed if synthesis or playback fails
   */
  speak(text: string, signal: AbortSignal): Promise<void>;

  /** Stop any playback and free resources. */
  destroy(): Promise<void>;
}

/**
 * Output sink for loop diagnostics. `console` satisfies it.
 */
export interface LoopLogger {
  debug(message: string): void;
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
