/**
 * Fixed-capacity conversation history with FIFO eviction.
 *
 * A ring buffer of turns: appending at capacity overwrites the oldest slot.
 * The buffer has no opinion on turn content; the conversation loop decides
 * what gets appended. Only the owning loop writes to it.
 */

import type { Turn } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** History buffer returned by createConversationHistory. */
export interface ConversationHistory {
  /** Maximum number of turns retained */
  readonly capacity: number;

  /** Number of turns currently held */
  readonly size: number;

  /**
   * Add a turn as the newest entry, evicting the oldest one when full.
   *
   * @param turn - The turn to append
   */
  append(turn: Turn): void;

  /**
   * @returns A copy of the held turns, oldest first
   */
  asSequence(): Turn[];

  /**
   * Replace the contents with the given turns. Only the newest `capacity`
   * turns are kept when more are given.
   *
   * @param turns - Turns oldest first
   */
  restore(turns: readonly Turn[]): void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create an empty history that holds at most `capacity` turns.
 *
 * @param capacity - Positive integer bound on the number of turns
 * @returns A ConversationHistory instance
 * @throws RangeError if capacity is not a positive integer
 */
export function createConversationHistory(capacity: number): ConversationHistory {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
  }

  const slots: (Turn | undefined)[] = new Array<Turn | undefined>(capacity);
  // Index of the oldest turn
  let head = 0;
  let count = 0;

  function append(turn: Turn): void {
    const tail = (head + count) % capacity;
    slots[tail] = turn;
    if (count < capacity) {
      count++;
    } else {
      head = (head + 1) % capacity;
    }
  }

  function asSequence(): Turn[] {
    const result: Turn[] = [];
    for (let i = 0; i < count; i++) {
      const turn = slots[(head + i) % capacity];
      if (turn) result.push(turn);
    }
    return result;
  }

  function restore(turns: readonly Turn[]): void {
    slots.fill(undefined);
    head = 0;
    count = 0;
    for (const turn of turns.slice(-capacity)) {
      append(turn);
    }
  }

  return {
    capacity,
    get size(): number {
      return count;
    },
    append,
    asSequence,
    restore,
  };
}
