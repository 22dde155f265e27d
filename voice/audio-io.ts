/**
 * Microphone capture and speaker playback via audio CLI tools.
 *
 * Uses one child process per use: `parec` / `pacat` (PulseAudio / PipeWire)
 * on Linux and sox `rec` / `play` on macOS. Every listen cycle spawns its own
 * capture process so no audio buffered during the previous reply leaks into
 * the next utterance.
 *
 * Responsibilities:
 * - Spawn a capture process producing 16-bit signed mono PCM on stdout
 * - Spawn a playback process consuming 16-bit signed mono PCM on stdin
 * - Check that the required CLI tools exist
 * - Convert raw PCM buffers to Float32Array samples
 * - Write PCM to a stream with backpressure handling
 */

import { exec, spawn, type ChildProcess } from "child_process";

import type { Readable, Writable } from "stream";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Divisor for normalizing 16-bit signed PCM to -1.0..1.0 range */
const PCM_16BIT_MAX = 32768.0;

/** Number of bytes per 16-bit sample */
const BYTES_PER_SAMPLE = 2;

// ============================================================================
// INTERFACES
// ============================================================================

/** A command line: executable followed by its arguments */
export type CommandLine = [string, ...string[]];

/** A running microphone capture process */
export interface MicCapture {
  /** Raw 16-bit signed little-endian mono PCM */
  micStream: Readable;
  /** Kill the capture process. Safe to call more than once. */
  stop: () => void;
}

/** A running playback process */
export interface SpeakerPlayback {
  /** Raw 16-bit signed little-endian mono PCM to play */
  speakerInput: Writable;
  /** Resolves when the player exits cleanly after its input ended */
  finished: Promise<void>;
  /** Kill the player, discarding queued audio. Safe to call more than once. */
  stop: () => void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Start capturing mono 16-bit PCM from the default input device.
 * Spawn failures surface as an "error" event on `micStream`.
 *
 * @param sampleRate - Capture rate in Hz (e.g. 16000)
 * @returns The capture handle
 */
export function startMicCapture(sampleRate: number): MicCapture {
  const [cmd, ...args] = captureCommand(process.platform, sampleRate);
  const proc = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
  const micStream = proc.stdout;

  proc.on("error", (err) => {
    micStream.destroy(new Error(`${cmd} failed to start: ${err.message}`));
  });
  logStderr(proc, cmd);

  let stopped = false;
  return {
    micStream,
    stop(): void {
      if (stopped) return;
      stopped = true;
      proc.kill();
    },
  };
}

/**
 * Start a player for mono 16-bit PCM on the default output device.
 * End `speakerInput` to let the player drain and exit.
 *
 * @param sampleRate - Playback rate in Hz (e.g. 24000)
 * @returns The playback handle
 */
export function startSpeakerPlayback(sampleRate: number): SpeakerPlayback {
  const [cmd, ...args] = playbackCommand(process.platform, sampleRate);
  const proc = spawn(cmd, args, { stdio: ["pipe", "ignore", "pipe"] });
  logStderr(proc, cmd);

  let stopped = false;
  const finished = waitForExit(proc, cmd, () => stopped);

  // Writes racing a killed player fail with EPIPE; the exit status reports it
  proc.stdin.on("error", (err) => {
    if (!stopped) console.error(`[audio] ${cmd} input error: ${err.message}`);
  });

  return {
    speakerInput: proc.stdin,
    finished,
    stop(): void {
      if (stopped) return;
      stopped = true;
      proc.kill();
    },
  };
}

/**
 * Check whether a command is available on PATH.
 *
 * @param cmd - Command name
 * @returns true if `command -v` finds it
 */
export function commandExists(cmd: string): Promise<boolean> {
  return new Promise((resolve) => {
    exec(`command -v ${cmd}`, (error) => {
      resolve(error === null);
    });
  });
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Capture command for a platform.
 *
 * @param platform - Value of process.platform
 * @param sampleRate - Capture rate in Hz
 * @returns Command line writing raw s16le mono PCM to stdout
 */
export function captureCommand(platform: NodeJS.Platform, sampleRate: number): CommandLine {
  if (platform === "darwin") {
    return ["rec", "-q", "-t", "raw", "-b", "16", "-e", "signed-integer", "-c", "1", "-r", String(sampleRate), "-"];
  }
  return ["parec", "--format=s16le", `--rate=${sampleRate}`, "--channels=1", "--raw"];
}

/**
 * Playback command for a platform.
 *
 * @param platform - Value of process.platform
 * @param sampleRate - Playback rate in Hz
 * @returns Command line reading raw s16le mono PCM from stdin
 */
export function playbackCommand(platform: NodeJS.Platform, sampleRate: number): CommandLine {
  if (platform === "darwin") {
    return ["play", "-q", "-t", "raw", "-b", "16", "-e", "signed-integer", "-c", "1", "-r", String(sampleRate), "-"];
  }
  return ["pacat", "--format=s16le", `--rate=${sampleRate}`, "--channels=1", "--raw", "--playback"];
}

/**
 * Converts a raw 16-bit signed PCM buffer to a Float32Array normalized to -1.0..1.0.
 * A trailing odd byte is ignored.
 *
 * @param buffer - Raw 16-bit signed little-endian PCM
 * @returns Float32Array with values in the range -1.0 to 1.0
 */
export function bufferToFloat32(buffer: Buffer): Float32Array {
  const sampleCount = Math.floor(buffer.length / BYTES_PER_SAMPLE);
  const float32 = new Float32Array(sampleCount);

  for (let i = 0; i < sampleCount; i++) {
    const sample = buffer.readInt16LE(i * BYTES_PER_SAMPLE);
    float32[i] = sample / PCM_16BIT_MAX;
  }

  return float32;
}

/**
 * Write a PCM buffer to a stream, respecting backpressure.
 *
 * @param stream - Destination stream
 * @param pcmBuffer - Raw PCM bytes to write
 */
export function writePcm(stream: Writable, pcmBuffer: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const ok = stream.write(pcmBuffer, (err: Error | null | undefined) => {
      if (err) reject(err);
    });
    if (ok) {
      resolve();
    } else {
      stream.once("drain", () => resolve());
    }
  });
}

/**
 * Resolve when the player exits with status 0 or was stopped on purpose;
 * reject on a spawn error or a non-zero exit.
 */
function waitForExit(proc: ChildProcess, cmd: string, wasStopped: () => boolean): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    proc.once("error", (err) => {
      reject(new Error(`${cmd} failed to start: ${err.message}`));
    });
    proc.once("exit", (code, signal) => {
      if (code === 0 || wasStopped()) {
        resolve();
      } else {
        reject(new Error(`${cmd} exited with ${code !== null ? `code ${code}` : `signal ${signal}`}`));
      }
    });
  });
}

/** Forward a child's stderr lines to the console, tagged with the command. */
function logStderr(proc: ChildProcess, cmd: string): void {
  proc.stderr?.on("data", (data: Buffer) => {
    for (const line of data.toString().split("\n")) {
      const trimmed = line.trim();
      if (trimmed) console.log(`[${cmd}] ${trimmed}`);
    }
  });
}
