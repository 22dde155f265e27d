/**
 * Console speech output: prints replies instead of speaking them.
 * Lets the loop run on machines without audio output.
 */

import type { Writable } from "stream";
import type { SpeechOutputPort } from "./ports.js";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SpeechOutputPort that writes `Robot: <text>` lines.
 *
 * @param output - Destination stream (defaults to stdout)
 * @returns A SpeechOutputPort
 */
export function createConsoleSpeaker(output: Writable = process.stdout): SpeechOutputPort {
  return {
    async speak(text: string): Promise<void> {
      output.write(`Robot: ${text}\n`);
    },

    async destroy(): Promise<void> {},
  };
}
