/**
 * Console transcription: each listen() returns the next line typed on stdin.
 * Lets the loop run on machines without a microphone.
 */

import { createInterface, type Interface } from "readline";

import { abortReason } from "./cancellation.js";

import type { Readable } from "stream";
import type { TranscriptionPort } from "./ports.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Options for the console transcriber.
 */
export interface ConsoleTranscriberOptions {
  /** Line source (defaults to stdin) */
  input?: Readable;
  /** Called once when the input ends */
  onClose?: () => void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a TranscriptionPort reading one line per listen.
 * Lines typed while the loop is busy are queued. After the input ends,
 * listen() resolves with "".
 *
 * @param options - Input stream and end-of-input callback
 * @returns A TranscriptionPort
 */
export function createConsoleTranscriber(options: ConsoleTranscriberOptions = {}): TranscriptionPort {
  const input = options.input ?? process.stdin;

  let rl: Interface | null = null;
  let closed = false;
  const queued: string[] = [];
  let waiting: ((line: string) => void) | null = null;

  function open(): Interface {
    if (rl) return rl;
    const created = createInterface({ input, terminal: false });
    created.on("line", (line) => {
      if (waiting) {
        const deliver = waiting;
        waiting = null;
        deliver(line);
      } else {
        queued.push(line);
      }
    });
    created.on("close", () => {
      closed = true;
      waiting?.("");
      waiting = null;
      options.onClose?.();
    });
    rl = created;
    return created;
  }

  function listen(signal: AbortSignal): Promise<string> {
    if (signal.aborted) return Promise.reject(abortReason(signal));
    open();

    const next = queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (closed) return Promise.resolve("");

    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        waiting = null;
        reject(abortReason(signal));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      waiting = (line) => {
        signal.removeEventListener("abort", onAbort);
        resolve(line);
      };
    });
  }

  async function destroy(): Promise<void> {
    rl?.close();
    rl = null;
  }

  return { listen, destroy };
}
