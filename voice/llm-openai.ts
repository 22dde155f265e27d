/**
 * OpenAI / Azure OpenAI generation via chat completions.
 *
 * Sends the persona as the system message followed by the history turns, and
 * returns the first choice. When an endpoint is configured the Azure OpenAI
 * client is used, otherwise the public OpenAI API.
 *
 * Responsibilities:
 * - Build chat completion messages from persona and turns
 * - Call chat.completions.create with the loop's abort signal
 * - Take the top choice, rejecting empty replies
 * - Translate API, network and abort errors for the loop
 */

import OpenAI, { AzureOpenAI } from "openai";

import { abortReason } from "./cancellation.js";
import { GenerationFailed, describeError } from "./errors.js";
import { buildPromptMessages } from "./prompt.js";

import type { GenerationPort } from "./ports.js";
import type { Turn } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** Chat completion message as accepted by the OpenAI SDK */
export type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;

/**
 * Performs one chat completion and returns the top choice's content.
 * Injected in tests; built from the SDK client otherwise.
 */
export type ChatCompletionFn = (messages: ChatMessage[], signal: AbortSignal) => Promise<string | null | undefined>;

/**
 * Configuration for the OpenAI generation provider.
 */
export interface OpenAiGeneratorConfig {
  apiKey: string;
  /** Model name, or the deployment name on Azure */
  model: string;
  /** Azure OpenAI endpoint; empty for the public API */
  endpoint: string;
  /** Azure OpenAI API version */
  apiVersion: string;
  /** Send real user/assistant roles instead of collapsing to "user" */
  roleFaithfulPrompt: boolean;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a GenerationPort backed by OpenAI chat completions.
 *
 * @param config - Credentials, model and role serialization
 * @param complete - Completion function (defaults to the SDK client)
 * @returns A GenerationPort
 */
export function createOpenAiGenerator(
  config: OpenAiGeneratorConfig,
  complete: ChatCompletionFn = createChatCompletionFn(config),
): GenerationPort {
  return {
    async generate(persona: string, turns: readonly Turn[], signal: AbortSignal): Promise<string> {
      const messages = buildChatMessages(persona, turns, config.roleFaithfulPrompt);

      let content: string | null | undefined;
      try {
        content = await complete(messages, signal);
      } catch (err) {
        if (signal.aborted) throw abortReason(signal);
        throw new GenerationFailed(formatOpenAiError(err), { cause: err });
      }

      const reply = content?.trim();
      if (!reply) {
        throw new GenerationFailed("OpenAI returned an empty reply");
      }
      return reply;
    },
  };
}

/**
 * Build the chat completion messages: persona as system, then the turns.
 *
 * @param persona - System instruction
 * @param turns - History oldest-to-newest
 * @param roleFaithful - Keep assistant roles instead of sending everything as user
 * @returns Messages for chat.completions.create
 */
export function buildChatMessages(persona: string, turns: readonly Turn[], roleFaithful: boolean): ChatMessage[] {
  const history = buildPromptMessages(turns, roleFaithful).map((message): ChatMessage =>
    message.role === "assistant"
      ? { role: "assistant", content: message.content }
      : { role: "user", content: message.content },
  );
  return [{ role: "system", content: persona }, ...history];
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Build the default completion function from the SDK client.
 * The client is created lazily so a missing key only fails on first use.
 */
function createChatCompletionFn(config: OpenAiGeneratorConfig): ChatCompletionFn {
  let client: OpenAI | null = null;

  return async (messages, signal) => {
    client ??= config.endpoint
      ? new AzureOpenAI({
          apiKey: config.apiKey,
          endpoint: config.endpoint,
          apiVersion: config.apiVersion,
          deployment: config.model,
        })
      : new OpenAI({ apiKey: config.apiKey });

    const completion = await client.chat.completions.create({ model: config.model, messages }, { signal });
    return completion.choices[0]?.message.content;
  };
}

/**
 * One-line description of an OpenAI SDK error.
 *
 * @param err - Error thrown by the SDK
 * @returns One-line message for the loop to log
 */
function formatOpenAiError(err: unknown): string {
  // SDK messages already start with the HTTP status, e.g. "429 Rate limit reached"
  if (err instanceof OpenAI.APIError) {
    return `OpenAI API error: ${err.message}`;
  }
  return `OpenAI request failed: ${describeError(err)}`;
}
