/**
 * Error taxonomy for the conversation loop and its ports.
 *
 * Every error raised by the loop or translated by a port adapter extends
 * {@link VoiceLoopError}, so callers can branch on `instanceof` or on `code`:
 *
 * ```ts
 * try {
 *   await generator.generate(persona, turns, signal);
 * } catch (err) {
 *   if (err instanceof GenerationFailed) { ... }
 * }
 * ```
 */

/** Machine-readable error codes */
export type VoiceLoopErrorCode =
  | "RECOGNITION_FAILED"
  | "GENERATION_FAILED"
  | "PLAYBACK_FAILED"
  | "INTERRUPTED"
  | "DEADLINE_EXCEEDED"
  | "CONFIG_ERROR";

/** Base error for the conversation loop. */
export class VoiceLoopError extends Error {
  readonly code: VoiceLoopErrorCode;
  constructor(code: VoiceLoopErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VoiceLoopError";
    this.code = code;
  }
}

/** The transcription back end failed to produce a result. */
export class RecognitionFailed extends VoiceLoopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RECOGNITION_FAILED", message, options);
    this.name = "RecognitionFailed";
  }
}

/** The language model call failed (auth, rate limit, network, empty reply). */
export class GenerationFailed extends VoiceLoopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_FAILED", message, options);
    this.name = "GenerationFailed";
  }
}

/** Speech synthesis or audio playback failed. */
export class PlaybackFailed extends VoiceLoopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PLAYBACK_FAILED", message, options);
    this.name = "PlaybackFailed";
  }
}

/** The operator asked the loop to stop. */
export class Interrupted extends VoiceLoopError {
  constructor(message = "Conversation interrupted") {
    super("INTERRUPTED", message);
    this.name = "Interrupted";
  }
}

/** A port call ran past its configured deadline. */
export class DeadlineExceeded extends VoiceLoopError {
  readonly label: string;
  readonly timeoutMs: number;
  constructor(label: string, timeoutMs: number) {
    super("DEADLINE_EXCEEDED", `${label} did not finish within ${timeoutMs}ms`);
    this.name = "DeadlineExceeded";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

/** A configuration value is missing or invalid. */
export class ConfigError extends VoiceLoopError {
  readonly variable: string;
  constructor(variable: string, message: string) {
    super("CONFIG_ERROR", `Invalid ${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/**
 * Render any thrown value as a one-line message for logging.
 *
 * @param err - The thrown value
 * @returns The error message, or the value stringified
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
