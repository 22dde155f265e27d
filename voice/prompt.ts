/**
 * Persona prompt and request building for the language model.
 */

import type { PromptMessage, Turn } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Persona used when PERSONA_PROMPT is not set */
export const DEFAULT_PERSONA_PROMPT = [
  "You are a friendly social robot with emotions.",
  "You enjoy talking to people and getting to know them.",
  "Please respond with an appropriate message.",
].join("\n");

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Serialize history turns into model messages.
 *
 * By default every turn is sent under the "user" role, so the model sees its
 * own earlier replies as user messages. With `roleFaithful` the stored roles
 * are sent as-is.
 *
 * @param turns - History oldest-to-newest
 * @param roleFaithful - Send the stored roles instead of collapsing to "user"
 * @returns Messages in history order
 */
export function buildPromptMessages(turns: readonly Turn[], roleFaithful: boolean): PromptMessage[] {
  return turns.map((turn) => ({
    role: roleFaithful ? turn.role : "user",
    content: turn.text,
  }));
}
