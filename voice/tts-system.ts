/**
 * System speech output via the platform's speech command.
 *
 * Spawns `say` on macOS or `espeak-ng` on Linux once per reply and waits for
 * it to exit, which is when playback has finished.
 *
 * Responsibilities:
 * - Build the platform speech command for a reply
 * - Resolve when the command exits cleanly, reject with PlaybackFailed otherwise
 * - Kill the command when the loop aborts playback
 */

import { spawn } from "child_process";

import { abortReason } from "./cancellation.js";
import { PlaybackFailed } from "./errors.js";

import type { CommandLine } from "./audio-io.js";
import type { SpeechOutputPort } from "./ports.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Configuration for the system speech provider.
 */
export interface SystemSpeakerConfig {
  /** Voice name for the speech command; empty uses its default voice */
  voice: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SpeechOutputPort backed by the platform speech command.
 *
 * @param config - Voice selection
 * @returns A SpeechOutputPort
 */
export function createSystemSpeaker(config: SystemSpeakerConfig): SpeechOutputPort {
  const running = new Set<() => void>();

  function speak(text: string, signal: AbortSignal): Promise<void> {
    const [cmd, ...args] = speechCommand(process.platform, text, config.voice);

    return new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }

      const proc = spawn(cmd, args, { stdio: ["ignore", "ignore", "pipe"] });
      let stderr = "";
      proc.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      const kill = (): void => {
        proc.kill();
      };
      running.add(kill);

      const onAbort = (): void => {
        kill();
        reject(abortReason(signal));
      };
      signal.addEventListener("abort", onAbort, { once: true });

      const cleanup = (): void => {
        running.delete(kill);
        signal.removeEventListener("abort", onAbort);
      };

      proc.once("error", (err) => {
        cleanup();
        reject(new PlaybackFailed(`${cmd} failed to start: ${err.message}`, { cause: err }));
      });

      proc.once("exit", (code) => {
        cleanup();
        if (code === 0) {
          resolve();
        } else {
          const detail = stderr.trim() || `exit code ${code}`;
          reject(new PlaybackFailed(`${cmd} failed: ${detail}`));
        }
      });
    });
  }

  async function destroy(): Promise<void> {
    for (const kill of running) kill();
    running.clear();
  }

  return { speak, destroy };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Speech command for a platform. The text is passed as a single argument,
 * never through a shell.
 *
 * @param platform - Value of process.platform
 * @param text - Text to speak
 * @param voice - Voice name, or empty for the default
 * @returns The command line
 */
export function speechCommand(platform: NodeJS.Platform, text: string, voice: string): CommandLine {
  const cmd = platform === "darwin" ? "say" : "espeak-ng";
  const voiceArgs = voice ? ["-v", voice] : [];
  return [cmd, ...voiceArgs, "--", text];
}
