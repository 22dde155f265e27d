/**
 * Locating the local Whisper and Silero VAD model files.
 *
 * The model directory holds sherpa-onnx's exported Whisper files under a name
 * prefix ("small" for the multilingual model, "small.en" for English-only)
 * plus silero_vad.onnx.
 */

import { existsSync } from "fs";
import { join } from "path";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Silero VAD model file name */
export const VAD_MODEL_FILE = "silero_vad.onnx";

/** Whisper file prefixes, in order of preference */
const MODEL_PREFIXES = ["small", "small.en"];

/** Required Whisper file suffixes within the model directory */
const REQUIRED_SUFFIXES = ["-encoder.int8.onnx", "-decoder.int8.onnx", "-tokens.txt"];

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Absolute paths of a complete local model set.
 */
export interface WhisperModelFiles {
  encoder: string;
  decoder: string;
  tokens: string;
  vad: string;
  /** false for English-only (".en") models, which take no language setting */
  multilingual: boolean;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Find a complete model set in `modelPath`.
 *
 * @param modelPath - Model directory
 * @returns The model files, or null if no complete set exists
 */
export function resolveWhisperModel(modelPath: string): WhisperModelFiles | null {
  const vad = join(modelPath, VAD_MODEL_FILE);
  if (!existsSync(vad)) return null;

  for (const prefix of MODEL_PREFIXES) {
    const [encoder, decoder, tokens] = REQUIRED_SUFFIXES.map((suffix) => join(modelPath, `${prefix}${suffix}`));
    if ([encoder, decoder, tokens].every((file) => existsSync(file))) {
      return { encoder, decoder, tokens, vad, multilingual: !prefix.endsWith(".en") };
    }
  }
  return null;
}

/**
 * File names expected in the model directory, for error messages.
 *
 * @returns The English-only set plus the VAD model
 */
export function expectedModelFiles(): string[] {
  return [...REQUIRED_SUFFIXES.map((suffix) => `small.en${suffix}`), VAD_MODEL_FILE];
}

/**
 * Whisper language code for a BCP-47 tag: its primary subtag, lowercased.
 *
 * @param tag - e.g. "en-US"
 * @returns e.g. "en"
 */
export function whisperLanguage(tag: string): string {
  return tag.split(/[-_]/)[0].toLowerCase();
}
