/**
 * Language model provider factory and readiness checks.
 *
 * Responsibilities:
 * - Create a GenerationPort for the configured provider
 * - Check that the provider's credentials are configured
 */

import { createAnthropicGenerator } from "./llm-anthropic.js";
import { createOpenAiGenerator } from "./llm-openai.js";

import type { GenerationPort } from "./ports.js";
import type { LlmProviderConfig, ProviderStatus } from "./types.js";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a GenerationPort for the configured provider.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @returns A GenerationPort
 */
export function createGeneratorForProvider(providerConfig: LlmProviderConfig): GenerationPort {
  switch (providerConfig.provider) {
    case "openai":
      return createOpenAiGenerator({
        ...providerConfig.openai,
        roleFaithfulPrompt: providerConfig.roleFaithfulPrompt,
      });

    case "anthropic":
      return createAnthropicGenerator({
        ...providerConfig.anthropic,
        roleFaithfulPrompt: providerConfig.roleFaithfulPrompt,
      });
  }
}

/**
 * Check whether the configured provider has its credentials.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @returns Readiness status with reason if not ready
 */
export function getLlmProviderStatus(providerConfig: LlmProviderConfig): ProviderStatus {
  switch (providerConfig.provider) {
    case "openai":
      if (!providerConfig.openai.apiKey) {
        return { ready: false, reason: "missing_api_key", detail: "OPENAI_KEY is not set" };
      }
      return { ready: true };

    case "anthropic":
      if (!providerConfig.anthropic.apiKey) {
        return { ready: false, reason: "missing_api_key", detail: "ANTHROPIC_API_KEY is not set" };
      }
      return { ready: true };
  }
}
