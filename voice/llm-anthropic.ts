/**
 * Anthropic generation via the Messages API.
 *
 * The persona goes in the `system` field and the history turns become the
 * message list. Text blocks of the response are joined into the reply.
 */

import Anthropic from "@anthropic-ai/sdk";

import { abortReason } from "./cancellation.js";
import { GenerationFailed, describeError } from "./errors.js";
import { buildPromptMessages } from "./prompt.js";

import type { GenerationPort } from "./ports.js";
import type { Turn } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** Request body fields this adapter controls */
export interface AnthropicRequest {
  system: string;
  messages: Anthropic.MessageParam[];
}

/**
 * Sends one Messages API request and returns the joined text blocks.
 * Injected in tests; built from the SDK client otherwise.
 */
export type MessagesFn = (request: AnthropicRequest, signal: AbortSignal) => Promise<string>;

/**
 * Configuration for the Anthropic generation provider.
 */
export interface AnthropicGeneratorConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  roleFaithfulPrompt: boolean;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a GenerationPort backed by the Anthropic Messages API.
 *
 * @param config - Credentials, model and role serialization
 * @param send - Request function (defaults to the SDK client)
 * @returns A GenerationPort
 */
export function createAnthropicGenerator(
  config: AnthropicGeneratorConfig,
  send: MessagesFn = createMessagesFn(config),
): GenerationPort {
  return {
    async generate(persona: string, turns: readonly Turn[], signal: AbortSignal): Promise<string> {
      const request: AnthropicRequest = {
        system: persona,
        messages: buildAnthropicMessages(turns, config.roleFaithfulPrompt),
      };

      let text: string;
      try {
        text = await send(request, signal);
      } catch (err) {
        if (signal.aborted) throw abortReason(signal);
        throw new GenerationFailed(formatAnthropicError(err), { cause: err });
      }

      const reply = text.trim();
      if (!reply) {
        throw new GenerationFailed("Anthropic returned an empty reply");
      }
      return reply;
    },
  };
}

/**
 * Build the Messages API message list from history turns.
 *
 * The API wants the conversation to open with a user message, so assistant
 * turns left at the front after history eviction are dropped.
 *
 * @param turns - History oldest-to-newest
 * @param roleFaithful - Keep assistant roles instead of sending everything as user
 * @returns Messages for messages.create
 */
export function buildAnthropicMessages(turns: readonly Turn[], roleFaithful: boolean): Anthropic.MessageParam[] {
  const messages = buildPromptMessages(turns, roleFaithful);
  const firstUser = messages.findIndex((message) => message.role === "user");
  if (firstUser === -1) return [];

  return messages.slice(firstUser).map((message) => ({ role: message.role, content: message.content }));
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function createMessagesFn(config: AnthropicGeneratorConfig): MessagesFn {
  let client: Anthropic | null = null;

  return async (request, signal) => {
    client ??= new Anthropic({ apiKey: config.apiKey });

    const response = await client.messages.create(
      {
        model: config.model,
        max_tokens: config.maxTokens,
        system: request.system,
        messages: request.messages,
      },
      { signal },
    );

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") parts.push(block.text);
    }
    return parts.join("");
  };
}

function formatAnthropicError(err: unknown): string {
  // SDK messages already start with the HTTP status, e.g. "429 Rate limit reached"
  if (err instanceof Anthropic.APIError) {
    return `Anthropic API error: ${err.message}`;
  }
  return `Anthropic request failed: ${describeError(err)}`;
}
