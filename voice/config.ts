/**
 * Typed application configuration built from environment variables.
 *
 * Responsibilities:
 * - Map .env / process variables onto AppConfig with defaults
 * - Validate numbers, booleans and provider names, throwing ConfigError
 *   that names the offending variable
 */

import { homedir } from "os";
import { join } from "path";

import { ConfigError } from "./errors.js";
import { DEFAULT_PERSONA_PROMPT } from "./prompt.js";

import type { EnvRecord } from "../services/env.js";
import type { AppConfig, LlmProviderType, SttProviderType, TtsProviderType } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Turns kept when HISTORY_CAPACITY is not set. Higher = longer memory, slower and costlier calls. */
const DEFAULT_HISTORY_CAPACITY = 20;

const DEFAULT_LANGUAGE = "en-US";

const DEFAULT_SAMPLE_RATE = 16000;

const DEFAULT_FAILURE_BACKOFF_MS = 500;

const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

/** Azure OpenAI API version used when OPENAI_API_VERSION is not set */
const DEFAULT_OPENAI_API_VERSION = "2023-12-01-preview";

const DEFAULT_ANTHROPIC_MODEL = "claude-haiku-4-5-20251001";

const DEFAULT_ANTHROPIC_MAX_TOKENS = 300;

const DEFAULT_ELEVENLABS_VOICE_ID = "21m00Tcm4TlvDq8ikWAM";

const DEFAULT_ELEVENLABS_MODEL_ID = "eleven_flash_v2_5";

/** Standard path where local Whisper and VAD model files are stored */
export const DEFAULT_STT_MODEL_PATH = join(homedir(), ".voice-chat-models", "whisper-small");

const STT_PROVIDERS: readonly SttProviderType[] = ["azure", "local", "console"];
const TTS_PROVIDERS: readonly TtsProviderType[] = ["elevenlabs", "system", "console"];
const LLM_PROVIDERS: readonly LlmProviderType[] = ["openai", "anthropic"];

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Build the application config from an environment record.
 *
 * API keys are not required here; provider readiness checks report missing
 * keys for the providers actually selected.
 *
 * @param env - Merged environment (see loadEnv)
 * @returns The typed configuration
 * @throws ConfigError if any value is malformed
 */
export function loadConfig(env: EnvRecord): AppConfig {
  return {
    conversation: {
      historyCapacity: readInteger(env, "HISTORY_CAPACITY", DEFAULT_HISTORY_CAPACITY, 1),
      personaPrompt: readPersona(env),
      portTimeoutMs: readInteger(env, "PORT_TIMEOUT_MS", 0, 0),
      listenTimeoutMs: readInteger(env, "LISTEN_TIMEOUT_MS", 0, 0),
      failureBackoffMs: readInteger(env, "FAILURE_BACKOFF_MS", DEFAULT_FAILURE_BACKOFF_MS, 0),
    },
    stt: {
      provider: readChoice(env, "STT_PROVIDER", STT_PROVIDERS, "azure"),
      language: readString(env, "RECOGNITION_LANGUAGE", DEFAULT_LANGUAGE),
      sampleRate: readInteger(env, "SAMPLE_RATE", DEFAULT_SAMPLE_RATE, 8000),
      azure: {
        speechKey: readString(env, "SPEECH_KEY", ""),
        speechRegion: readString(env, "SPEECH_REGION", ""),
      },
      local: {
        modelPath: readString(env, "STT_MODEL_PATH", DEFAULT_STT_MODEL_PATH),
      },
    },
    tts: {
      provider: readChoice(env, "TTS_PROVIDER", TTS_PROVIDERS, "system"),
      elevenlabs: {
        apiKey: readString(env, "ELEVENLABS_API_KEY", ""),
        voiceId: readString(env, "ELEVENLABS_VOICE_ID", DEFAULT_ELEVENLABS_VOICE_ID),
        modelId: readString(env, "ELEVENLABS_MODEL_ID", DEFAULT_ELEVENLABS_MODEL_ID),
      },
      system: {
        voice: readString(env, "SYSTEM_TTS_VOICE", ""),
      },
    },
    llm: {
      provider: readChoice(env, "LLM_PROVIDER", LLM_PROVIDERS, "openai"),
      roleFaithfulPrompt: readBoolean(env, "ROLE_FAITHFUL_PROMPT", false),
      openai: {
        apiKey: readString(env, "OPENAI_KEY", ""),
        model: readString(env, "OPENAI_MODEL", DEFAULT_OPENAI_MODEL),
        endpoint: readString(env, "OPENAI_ENDPOINT", ""),
        apiVersion: readString(env, "OPENAI_API_VERSION", DEFAULT_OPENAI_API_VERSION),
      },
      anthropic: {
        apiKey: readString(env, "ANTHROPIC_API_KEY", ""),
        model: readString(env, "ANTHROPIC_MODEL", DEFAULT_ANTHROPIC_MODEL),
        maxTokens: readInteger(env, "ANTHROPIC_MAX_TOKENS", DEFAULT_ANTHROPIC_MAX_TOKENS, 1),
      },
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Read a trimmed string, falling back when unset or blank.
 */
function readString(env: EnvRecord, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

/**
 * Read a base-10 integer no smaller than `min`.
 *
 * @throws ConfigError if the value is not an integer or is below `min`
 */
function readInteger(env: EnvRecord, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(name, `must be at least ${min}, got ${value}`);
  }
  return value;
}

/**
 * Read a boolean flag: true/false, 1/0, yes/no (case-insensitive).
 *
 * @throws ConfigError on any other value
 */
function readBoolean(env: EnvRecord, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;

  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new ConfigError(name, `expected true or false, got "${raw}"`);
}

/**
 * Read one of a fixed set of lowercase names.
 *
 * @throws ConfigError if the value is not in `choices`
 */
function readChoice<T extends string>(env: EnvRecord, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;

  const match = choices.find((choice) => choice === raw);
  if (match === undefined) {
    throw new ConfigError(name, `expected one of ${choices.join(", ")}, got "${raw}"`);
  }
  return match;
}

/**
 * Read the persona prompt. A literal "\n" in the variable becomes a newline,
 * so multi-line personas fit on one .env line.
 *
 * @throws ConfigError if PERSONA_PROMPT is set but blank
 */
function readPersona(env: EnvRecord): string {
  const raw = env.PERSONA_PROMPT;
  if (raw === undefined) return DEFAULT_PERSONA_PROMPT;

  const persona = raw.replace(/\\n/g, "\n").trim();
  if (!persona) {
    throw new ConfigError("PERSONA_PROMPT", "must not be empty");
  }
  return persona;
}
