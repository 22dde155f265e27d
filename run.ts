#!/usr/bin/env node
/**
 * Entry point: runs a spoken conversation until Ctrl+C.
 *
 * Responsibilities:
 * - Load configuration from .env and the process environment
 * - Check that the configured providers are ready before starting
 * - Build the transcription, generation and speech output ports
 * - Run the conversation loop and stop it on SIGINT/SIGTERM
 * - Release adapters on the way out
 */

import { loadEnv } from "./services/env.js";
import { loadConfig } from "./voice/config.js";
import { createConversationLoop } from "./voice/conversation-loop.js";
import { describeError } from "./voice/errors.js";
import { createGeneratorForProvider, getLlmProviderStatus } from "./voice/llm-provider.js";
import { createTranscriberForProvider, getSttProviderStatus } from "./voice/stt-provider.js";
import { createSpeakerForProvider, getTtsProviderStatus } from "./voice/tts-provider.js";

import type { ProviderStatus } from "./voice/types.js";

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

async function main(): Promise<void> {
  const config = loadConfig(await loadEnv());

  assertReady("STT", config.stt.provider, await getSttProviderStatus(config.stt));
  assertReady("TTS", config.tts.provider, await getTtsProviderStatus(config.tts));
  assertReady("LLM", config.llm.provider, getLlmProviderStatus(config.llm));

  console.log(
    `Providers: stt=${config.stt.provider} tts=${config.tts.provider} llm=${config.llm.provider}, ` +
      `history capacity ${config.conversation.historyCapacity}`,
  );

  // The console transcriber ends the conversation when stdin closes
  let stopLoop = (): void => {};

  const transcriber = createTranscriberForProvider(config.stt, { onInputClosed: () => stopLoop() });
  const speaker = createSpeakerForProvider(config.tts);
  const generator = createGeneratorForProvider(config.llm);

  const loop = createConversationLoop({ transcriber, generator, speaker }, config.conversation);
  stopLoop = loop.stop;

  let signals = 0;
  const onSignal = (): void => {
    signals++;
    if (signals > 1) {
      console.log("Forced exit");
      process.exit(130);
    }
    loop.stop();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  console.log("Starting conversation, press Ctrl+C to stop");

  try {
    await loop.run();
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await releaseAdapters([transcriber.destroy, speaker.destroy]);
  }

  console.log(`Conversation ended after ${loop.getState().completedCycles} exchanges`);
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Fail startup when a provider is not ready.
 *
 * @param kind - Provider family shown in the message
 * @param provider - Configured provider name
 * @param status - Readiness check result
 */
function assertReady(kind: string, provider: string, status: ProviderStatus): void {
  if (!status.ready) {
    throw new Error(`${kind} provider "${provider}" is not ready (${status.reason}): ${status.detail}`);
  }
}

/**
 * Destroy every adapter, logging failures instead of stopping at the first.
 */
async function releaseAdapters(destroyers: Array<() => Promise<void>>): Promise<void> {
  const results = await Promise.allSettled(destroyers.map((destroy) => destroy()));
  for (const result of results) {
    if (result.status === "rejected") {
      console.error(`Cleanup failed: ${describeError(result.reason)}`);
    }
  }
}

// ============================================================================
// ENTRY POINT
// ============================================================================

main().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error(`Startup failed: ${describeError(err)}`);
    process.exit(1);
  },
);
