/**
 * TTS provider factory and readiness checks.
 *
 * Routes speech output creation to the correct provider implementation based
 * on config, and checks provider readiness (binaries, API keys) before startup.
 *
 * Responsibilities:
 * - Create a SpeechOutputPort for the configured provider
 * - Check provider readiness (installed binaries, API keys)
 */

import { commandExists, playbackCommand } from "./audio-io.js";
import { createConsoleSpeaker } from "./tts-console.js";
import { createElevenlabsSpeaker, TTS_SAMPLE_RATE } from "./tts-elevenlabs.js";
import { createSystemSpeaker, speechCommand } from "./tts-system.js";

import type { SpeechOutputPort } from "./ports.js";
import type { ProviderStatus, TtsProviderConfig } from "./types.js";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SpeechOutputPort for the configured provider.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @returns A SpeechOutputPort ready for playback
 */
export function createSpeakerForProvider(providerConfig: TtsProviderConfig): SpeechOutputPort {
  switch (providerConfig.provider) {
    case "elevenlabs":
      return createElevenlabsSpeaker({
        apiKey: providerConfig.elevenlabs.apiKey,
        voiceId: providerConfig.elevenlabs.voiceId,
        modelId: providerConfig.elevenlabs.modelId,
      });

    case "system":
      return createSystemSpeaker({ voice: providerConfig.system.voice });

    case "console":
      return createConsoleSpeaker();
  }
}

/**
 * Check whether the configured TTS provider is ready to use.
 *
 * ElevenLabs: checks the API key is set and the PCM player exists.
 * System: checks the platform speech command exists.
 * Console: always ready.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @param platform - Platform to check for (defaults to the current one)
 * @returns Readiness status with reason if not ready
 */
export async function getTtsProviderStatus(
  providerConfig: TtsProviderConfig,
  platform: NodeJS.Platform = process.platform,
): Promise<ProviderStatus> {
  switch (providerConfig.provider) {
    case "elevenlabs": {
      if (!providerConfig.elevenlabs.apiKey) {
        return { ready: false, reason: "missing_api_key", detail: "ELEVENLABS_API_KEY is not set" };
      }
      const [player] = playbackCommand(platform, TTS_SAMPLE_RATE);
      if (!(await commandExists(player))) {
        return { ready: false, reason: "not_installed", detail: `${player} not found on PATH` };
      }
      return { ready: true };
    }

    case "system": {
      const [cmd] = speechCommand(platform, "", providerConfig.system.voice);
      if (!(await commandExists(cmd))) {
        return { ready: false, reason: "not_installed", detail: `${cmd} not found on PATH` };
      }
      return { ready: true };
    }

    case "console":
      return { ready: true };
  }
}
