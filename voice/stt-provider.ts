/**
 * STT provider factory and readiness checks.
 *
 * Routes transcriber creation to the correct provider implementation based on
 * config, and checks provider readiness (capture tools, model files, API keys)
 * before startup.
 *
 * Responsibilities:
 * - Create a TranscriptionPort for the configured provider
 * - Check provider readiness
 */

import { captureCommand, commandExists } from "./audio-io.js";
import { createAzureTranscriber } from "./stt-azure.js";
import { createConsoleTranscriber } from "./stt-console.js";
import { createLocalTranscriber } from "./stt-local.js";
import { expectedModelFiles, resolveWhisperModel } from "./whisper-model.js";

import type { TranscriptionPort } from "./ports.js";
import type { ProviderStatus, SttProviderConfig } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Hooks the console provider needs from the entry point.
 */
export interface CreateTranscriberOptions {
  /** Called when console input ends */
  onInputClosed?: () => void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a TranscriptionPort for the configured provider.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @param options - Entry point hooks
 * @returns A TranscriptionPort
 */
export function createTranscriberForProvider(
  providerConfig: SttProviderConfig,
  options: CreateTranscriberOptions = {},
): TranscriptionPort {
  switch (providerConfig.provider) {
    case "azure":
      return createAzureTranscriber({
        speechKey: providerConfig.azure.speechKey,
        speechRegion: providerConfig.azure.speechRegion,
        language: providerConfig.language,
        sampleRate: providerConfig.sampleRate,
      });

    case "local":
      return createLocalTranscriber({
        modelPath: providerConfig.local.modelPath,
        language: providerConfig.language,
        sampleRate: providerConfig.sampleRate,
      });

    case "console":
      return createConsoleTranscriber({ onClose: options.onInputClosed });
  }
}

/**
 * Check whether the configured STT provider is ready to use.
 *
 * Azure: checks key, region and the capture command.
 * Local: checks the model files and the capture command.
 * Console: always ready.
 *
 * @param providerConfig - Provider selection and per-provider settings
 * @param platform - Platform to check for (defaults to the current one)
 * @returns Readiness status with reason if not ready
 */
export async function getSttProviderStatus(
  providerConfig: SttProviderConfig,
  platform: NodeJS.Platform = process.platform,
): Promise<ProviderStatus> {
  switch (providerConfig.provider) {
    case "azure":
      if (!providerConfig.azure.speechKey) {
        return { ready: false, reason: "missing_api_key", detail: "SPEECH_KEY is not set" };
      }
      if (!providerConfig.azure.speechRegion) {
        return { ready: false, reason: "missing_api_key", detail: "SPEECH_REGION is not set" };
      }
      return checkCaptureCommand(providerConfig.sampleRate, platform);

    case "local": {
      const { modelPath } = providerConfig.local;
      if (!resolveWhisperModel(modelPath)) {
        return {
          ready: false,
          reason: "not_installed",
          detail: `Missing model files in ${modelPath}, expected ${expectedModelFiles().join(", ")}`,
        };
      }
      return checkCaptureCommand(providerConfig.sampleRate, platform);
    }

    case "console":
      return { ready: true };
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

async function checkCaptureCommand(sampleRate: number, platform: NodeJS.Platform): Promise<ProviderStatus> {
  if (platform === "win32") {
    return { ready: false, reason: "unsupported_platform", detail: "Microphone capture needs parec (Linux) or sox (macOS)" };
  }
  const [cmd] = captureCommand(platform, sampleRate);
  if (!(await commandExists(cmd))) {
    return { ready: false, reason: "not_installed", detail: `${cmd} not found on PATH` };
  }
  return { ready: true };
}
