import assert from "node:assert/strict";
import { test } from "node:test";
import { cleanTextForSpeech, splitIntoSpeechChunks } from "../../voice/speech-text";
import { SpeechSynthesizer, VoiceOutputQueue, VoiceSink } from "../../voice/voice-output.queue";
import { createRecordingLogger, noopLogger } from "../support/fakes";

interface Delivery {
  sessionId: string;
  text: string;
  chunkIndex: number;
}

class RecordingSink implements VoiceSink {
  readonly deliveries: Delivery[] = [];

  async deliver(sessionId: string, audio: Buffer, chunkIndex: number): Promise<void> {
    this.deliveries.push({ sessionId, text: audio.toString("utf8"), chunkIndex });
  }
}

const echoSynthesizer: SpeechSynthesizer = {
  async synthesize(text: string): Promise<Buffer> {
    return Buffer.from(text, "utf8");
  },
};

test("markdown is stripped before synthesis", () => {
  assert.equal(cleanTextForSpeech("**Question 1 of 3:**\nWhat is `const`?"), "Question 1 of 3: What is const?");
  assert.equal(cleanTextForSpeech("# Title\n---\nBody"), "Title Body");
});

test("text is chunked by sentence and long sentences by comma", () => {
  assert.deepEqual(splitIntoSpeechChunks("Hello there. How are you? Fine!"), ["Hello there.", "How are you?", "Fine!"]);
  assert.deepEqual(splitIntoSpeechChunks("aaaaaaaaaa, bbbbbbbbbb, cccccccccc", 20), [
    "aaaaaaaaaa",
    "bbbbbbbbbb",
    "cccccccccc",
  ]);
});

test("queued chunks are delivered in order", async () => {
  const sink = new RecordingSink();
  const queue = new VoiceOutputQueue(echoSynthesizer, sink, noopLogger);

  assert.equal(queue.speak("s1", "One. Two."), 2);
  assert.equal(queue.speak("s2", "Three."), 1);
  assert.equal(await queue.waitUntilIdle(1_000), true);

  assert.deepEqual(sink.deliveries, [
    { sessionId: "s1", text: "One.", chunkIndex: 0 },
    { sessionId: "s1", text: "Two.", chunkIndex: 1 },
    { sessionId: "s2", text: "Three.", chunkIndex: 0 },
  ]);
  assert.equal(queue.isSpeaking(), false);
});

test("a failing chunk is logged and the rest still play", async () => {
  const { logger, entries } = createRecordingLogger();
  const sink = new RecordingSink();
  const synthesizer: SpeechSynthesizer = {
    async synthesize(text: string): Promise<Buffer> {
      if (text === "Bad.") {
        throw new Error("HTTP 500");
      }
      return Buffer.from(text, "utf8");
    },
  };
  const queue = new VoiceOutputQueue(synthesizer, sink, logger);

  queue.speak("s1", "Good. Bad. Fine.");
  await queue.waitUntilIdle(1_000);

  assert.deepEqual(
    sink.deliveries.map((item) => item.text),
    ["Good.", "Fine."],
  );
  const failure = entries.find((entry) => entry.message === "voice.output.chunk_failed");
  assert.deepEqual(failure?.meta, { sessionId: "s1", chunkIndex: 1, error: "HTTP 500" });
});

test("shutdown drops pending chunks and gives up on a stuck one", async () => {
  const { logger, entries } = createRecordingLogger();
  const sink = new RecordingSink();
  const stuck: SpeechSynthesizer = {
    synthesize: () => new Promise<Buffer>(() => undefined),
  };
  const queue = new VoiceOutputQueue(stuck, sink, logger, { cleanupTimeoutMs: 20 });

  queue.speak("s1", "First. Second. Third.");
  assert.equal(queue.isSpeaking(), true);
  assert.equal(queue.pendingCount(), 2);

  assert.equal(await queue.shutdown(), false);
  assert.equal(queue.pendingCount(), 0);
  assert.equal(queue.speak("s1", "Again."), 0);
  assert.deepEqual(sink.deliveries, []);
  assert.ok(entries.some((entry) => entry.message === "voice.output.cleanup_timeout"));
});
