/**
 * Shared types for the spoken conversation loop.
 *
 * Defines the DTOs used across the loop, the history buffer, the port
 * adapters and the config layer:
 * - Conversation turns and prompt messages
 * - Conversation loop state
 * - Provider selection and per-provider settings
 * - Provider readiness status
 */

// ============================================================================
// TURN TYPES
// ============================================================================

/** Who produced a turn */
export type TurnRole = "user" | "assistant";

/**
 * One unit of conversational content.
 * User turns come from transcription, assistant turns from generation.
 */
export interface Turn {
  readonly role: TurnRole;
  readonly text: string;
}

/**
 * A single message as sent to a language model, after role serialization.
 */
export interface PromptMessage {
  role: TurnRole;
  content: string;
}

// ============================================================================
// CONVERSATION LOOP STATE
// ============================================================================

/** Possible states of the conversation loop state machine */
export type LoopStatus = "idle" | "listening" | "transcribed" | "generating" | "speaking" | "stopped";

/** Events that drive the conversation loop state machine */
export type LoopEvent =
  | "start"
  | "transcript_ready"
  | "transcript_empty"
  | "generate"
  | "reply_ready"
  | "generation_failed"
  | "playback_complete"
  | "stop";

/**
 * Current state of the conversation loop.
 */
export interface LoopState {
  /** Current state of the loop */
  status: LoopStatus;
  /** Number of cycles that reached playback (successfully or not) */
  completedCycles: number;
}

// ============================================================================
// CONFIGURATION INTERFACES
// ============================================================================

/**
 * Settings consumed by the conversation loop itself.
 */
export interface ConversationConfig {
  /** Maximum number of turns kept in history */
  historyCapacity: number;
  /** Fixed instruction sent as system context on every generation call */
  personaPrompt: string;
  /** Deadline (ms) for each generation and playback call. 0 disables it. */
  portTimeoutMs: number;
  /** Deadline (ms) for each listen call. 0 disables it. */
  listenTimeoutMs: number;
  /** Pause (ms) after a failed recognition before listening again */
  failureBackoffMs: number;
}

/** Speech-to-text provider identifiers */
export type SttProviderType = "azure" | "local" | "console";

/** Text-to-speech provider identifiers */
export type TtsProviderType = "elevenlabs" | "system" | "console";

/** Language model provider identifiers */
export type LlmProviderType = "openai" | "anthropic";

/**
 * Speech-to-text provider selection and per-provider settings.
 */
export interface SttProviderConfig {
  provider: SttProviderType;
  /** BCP-47 language tag, opaque to the loop (e.g. "en-US") */
  language: string;
  /** Mic capture sample rate in Hz */
  sampleRate: number;
  azure: {
    speechKey: string;
    speechRegion: string;
  };
  local: {
    /** Directory holding the Whisper encoder/decoder/tokens and silero_vad.onnx */
    modelPath: string;
  };
}

/**
 * Text-to-speech provider selection and per-provider settings.
 */
export interface TtsProviderConfig {
  provider: TtsProviderType;
  elevenlabs: {
    apiKey: string;
    voiceId: string;
    modelId: string;
  };
  system: {
    /** Optional voice name passed to the platform speech command */
    voice: string;
  };
}

/**
 * Language model provider selection and per-provider settings.
 */
export interface LlmProviderConfig {
  provider: LlmProviderType;
  /** Send real user/assistant roles instead of collapsing everything to "user" */
  roleFaithfulPrompt: boolean;
  openai: {
    apiKey: string;
    model: string;
    /** Azure OpenAI endpoint. Empty string means the public OpenAI API. */
    endpoint: string;
    apiVersion: string;
  };
  anthropic: {
    apiKey: string;
    model: string;
    maxTokens: number;
  };
}

/**
 * Complete application configuration, built by config.ts from the environment.
 */
export interface AppConfig {
  conversation: ConversationConfig;
  stt: SttProviderConfig;
  tts: TtsProviderConfig;
  llm: LlmProviderConfig;
}

// ============================================================================
// PROVIDER STATUS
// ============================================================================

/** Reason a provider is not ready */
export type ProviderNotReadyReason = "missing_api_key" | "not_installed" | "unsupported_platform";

/**
 * Readiness of a provider, checked before startup.
 */
export type ProviderStatus =
  | { ready: true }
  | { ready: false; reason: ProviderNotReadyReason; detail: string };
