/**
 * Tests for ElevenLabs speech output, using an in-process fetch and player.
 *
 * Run: npx tsx --test voice/tts-elevenlabs.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { PassThrough } from "stream";

import { Interrupted, PlaybackFailed } from "./errors.js";
import { TTS_SAMPLE_RATE, createElevenlabsSpeaker } from "./tts-elevenlabs.js";

import type { SpeakerPlayback } from "./audio-io.js";

// ============================================================================
// HELPERS
// ============================================================================

interface FakePlayer {
  playback: SpeakerPlayback;
  received: Buffer[];
  stopped: () => boolean;
}

function createFakePlayer(): FakePlayer {
  const speakerInput = new PassThrough();
  const received: Buffer[] = [];
  let stopped = false;
  speakerInput.on("data", (chunk: Buffer) => received.push(chunk));
  const finished = new Promise<void>((resolve) => speakerInput.once("finish", () => resolve()));

  return {
    playback: {
      speakerInput,
      finished,
      stop: () => {
        stopped = true;
      },
    },
    received,
    stopped: () => stopped,
  };
}

interface RecordedRequest {
  url: string;
  init: RequestInit | undefined;
}

// ============================================================================
// TESTS
// ============================================================================

test("streams the synthesized PCM into the player", async () => {
  const requests: RecordedRequest[] = [];
  const player = createFakePlayer();
  const rates: number[] = [];

  const fetchFn: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), init });
    return new Response(new Uint8Array([1, 2, 3, 4]), { status: 200 });
  };

  const speaker = createElevenlabsSpeaker({
    apiKey: "test-secret",
    voiceId: "voice-1",
    modelId: "model-1",
    fetchFn,
    startPlayback: (rate) => {
      rates.push(rate);
      return player.playback;
    },
  });

  await speaker.speak("hello", new AbortController().signal);

  assert.equal(requests.length, 1);
  assert.equal(requests[0].url, "https://api.elevenlabs.io/v1/text-to-speech/voice-1/stream?output_format=pcm_24000");
  assert.equal(requests[0].init?.method, "POST");
  assert.deepEqual(requests[0].init?.headers, { "Content-Type": "application/json", "xi-api-key": "test-secret" });
  assert.equal(requests[0].init?.body, JSON.stringify({ text: "hello", model_id: "model-1" }));
  assert.deepEqual(rates, [TTS_SAMPLE_RATE]);
  assert.deepEqual(Buffer.concat(player.received), Buffer.from([1, 2, 3, 4]));
  assert.equal(player.stopped(), false);
});

test("reports API errors as PlaybackFailed", async () => {
  const fetchFn: typeof fetch = async () => new Response("invalid api key", { status: 401 });
  const speaker = createElevenlabsSpeaker({ apiKey: "test-secret", voiceId: "v", modelId: "m", fetchFn });

  await assert.rejects(speaker.speak("hello", new AbortController().signal), (err: unknown) => {
    assert.ok(err instanceof PlaybackFailed);
    assert.equal(err.message, "ElevenLabs TTS API error 401: invalid api key");
    return true;
  });
});

test("reports network errors as PlaybackFailed", async () => {
  const fetchFn: typeof fetch = async () => {
    throw new TypeError("fetch failed");
  };
  const speaker = createElevenlabsSpeaker({ apiKey: "test-secret", voiceId: "v", modelId: "m", fetchFn });

  await assert.rejects(speaker.speak("hello", new AbortController().signal), {
    name: "PlaybackFailed",
    message: "ElevenLabs TTS request failed: fetch failed",
  });
});

test("an aborted request rejects with the abort reason", async () => {
  const controller = new AbortController();
  const fetchFn: typeof fetch = async () => {
    controller.abort(new Interrupted());
    throw new Error("This operation was aborted");
  };
  const speaker = createElevenlabsSpeaker({ apiKey: "test-secret", voiceId: "v", modelId: "m", fetchFn });

  await assert.rejects(speaker.speak("hello", controller.signal), Interrupted);
});

test("does not call the API once stopped", async () => {
  const controller = new AbortController();
  controller.abort(new Interrupted());
  let called = false;
  const fetchFn: typeof fetch = async () => {
    called = true;
    return new Response(null, { status: 200 });
  };
  const speaker = createElevenlabsSpeaker({ apiKey: "test-secret", voiceId: "v", modelId: "m", fetchFn });

  await assert.rejects(speaker.speak("hello", controller.signal), Interrupted);
  assert.equal(called, false);
});
