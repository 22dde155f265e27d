/**
 * Tests for the platform speech command provider.
 *
 * Run: npx tsx --test voice/tts-system.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { Interrupted } from "./errors.js";
import { createSystemSpeaker, speechCommand } from "./tts-system.js";

test("uses say on macOS", () => {
  assert.deepEqual(speechCommand("darwin", "hello there", ""), ["say", "--", "hello there"]);
});

test("uses espeak-ng elsewhere", () => {
  assert.deepEqual(speechCommand("linux", "hello", ""), ["espeak-ng", "--", "hello"]);
});

test("passes the voice and keeps text after the option terminator", () => {
  assert.deepEqual(speechCommand("darwin", "-v trick", "Alex"), ["say", "-v", "Alex", "--", "-v trick"]);
});

test("does not start speaking once stopped", async () => {
  const speaker = createSystemSpeaker({ voice: "" });
  const controller = new AbortController();
  controller.abort(new Interrupted());

  await assert.rejects(speaker.speak("hello", controller.signal), Interrupted);
  await speaker.destroy();
});
