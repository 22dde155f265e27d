/**
 * Tests for the bounded conversation history.
 *
 * Run: npx tsx --test voice/conversation-history.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { createConversationHistory } from "./conversation-history.js";

import type { Turn } from "./types.js";

const user = (text: string): Turn => ({ role: "user", text });
const assistant = (text: string): Turn => ({ role: "assistant", text });

test("starts empty with the given capacity", () => {
  const history = createConversationHistory(3);

  assert.equal(history.capacity, 3);
  assert.equal(history.size, 0);
  assert.deepEqual(history.asSequence(), []);
});

test("keeps turns oldest first below capacity", () => {
  const history = createConversationHistory(3);
  history.append(user("hi"));
  history.append(assistant("hello"));

  assert.equal(history.size, 2);
  assert.deepEqual(history.asSequence(), [user("hi"), assistant("hello")]);
});

test("evicts the oldest turn once full", () => {
  const history = createConversationHistory(2);
  history.append(user("hi"));
  history.append(assistant("hello"));
  history.append(user("bye"));

  assert.equal(history.size, 2);
  assert.deepEqual(history.asSequence(), [assistant("hello"), user("bye")]);
});

test("keeps order across several wrap-arounds", () => {
  const history = createConversationHistory(3);
  for (let i = 1; i <= 8; i++) history.append(user(`turn ${i}`));

  assert.deepEqual(history.asSequence(), [user("turn 6"), user("turn 7"), user("turn 8")]);
});

test("capacity 1 holds only the latest turn", () => {
  const history = createConversationHistory(1);
  history.append(user("hi"));
  history.append(assistant("hello"));

  assert.deepEqual(history.asSequence(), [assistant("hello")]);
});

test("asSequence returns a copy", () => {
  const history = createConversationHistory(2);
  history.append(user("hi"));

  const snapshot = history.asSequence();
  snapshot.push(user("injected"));

  assert.deepEqual(history.asSequence(), [user("hi")]);
});

test("restore replaces the contents", () => {
  const history = createConversationHistory(3);
  history.append(user("a"));
  history.append(assistant("b"));
  history.append(user("c"));
  history.append(assistant("d"));

  history.restore([user("x")]);

  assert.equal(history.size, 1);
  assert.deepEqual(history.asSequence(), [user("x")]);
  history.append(assistant("y"));
  assert.deepEqual(history.asSequence(), [user("x"), assistant("y")]);
});

test("restore keeps only the newest turns that fit", () => {
  const history = createConversationHistory(2);

  history.restore([user("a"), assistant("b"), user("c")]);

  assert.deepEqual(history.asSequence(), [assistant("b"), user("c")]);
});

test("rejects capacities that are not positive integers", () => {
  for (const capacity of [0, -1, 1.5, Number.NaN]) {
    assert.throws(() => createConversationHistory(capacity), {
      name: "RangeError",
      message: `History capacity must be a positive integer, got ${capacity}`,
    });
  }
});
