import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage, Logger } from "../config/logger";
import { splitIntoSpeechChunks } from "./speech-text";

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<Buffer>;
}

export interface VoiceSink {
  deliver(sessionId: string, audio: Buffer, chunkIndex: number): Promise<void>;
}

/** What the intake engine sees of voice output. */
export interface SpeechOutput {
  speak(sessionId: string, text: string): number;
}

interface VoiceJob {
  sessionId: string;
  text: string;
  chunkIndex: number;
}

export interface VoiceOutputQueueOptions {
  cleanupTimeoutMs?: number;
  maxChunkLength?: number;
}

const DEFAULT_CLEANUP_TIMEOUT_MS = 2_000;
const DEFAULT_SPEAK_WAIT_MS = 30_000;

export class VoiceOutputQueue implements SpeechOutput {
  private readonly jobs: VoiceJob[] = [];
  private worker: Promise<void> | null = null;
  private stopped = false;

  constructor(
    private readonly synthesizer: SpeechSynthesizer,
    private readonly sink: VoiceSink,
    private readonly logger: Logger,
    private readonly options: VoiceOutputQueueOptions = {},
  ) {}

  /** Queues the text chunk by chunk and returns the number of chunks queued. */
  speak(sessionId: string, text: string): number {
    if (this.stopped) {
      return 0;
    }
    const chunks = splitIntoSpeechChunks(text, this.options.maxChunkLength);
    chunks.forEach((chunk, chunkIndex) => {
      this.jobs.push({ sessionId, text: chunk, chunkIndex });
    });
    this.startWorker();
    return chunks.length;
  }

  isSpeaking(): boolean {
    return this.worker !== null;
  }

  pendingCount(): number {
    return this.jobs.length;
  }

  /** Resolves true once the queue is drained, false if the wait timed out. */
  async waitUntilIdle(timeoutMs = DEFAULT_SPEAK_WAIT_MS): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (this.worker) {
      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await waitWithTimeout(this.worker, remaining))) {
        return false;
      }
    }
    return true;
  }

  /** Drops queued chunks, stops the worker and waits briefly for the chunk in flight. */
  async shutdown(): Promise<boolean> {
    this.stopped = true;
    this.jobs.length = 0;
    const drained = await this.waitUntilIdle(this.options.cleanupTimeoutMs ?? DEFAULT_CLEANUP_TIMEOUT_MS);
    if (!drained) {
      this.logger.warn("voice.output.cleanup_timeout", {
        timeoutMs: this.options.cleanupTimeoutMs ?? DEFAULT_CLEANUP_TIMEOUT_MS,
      });
    }
    return drained;
  }

  private startWorker(): void {
    if (this.worker || this.stopped || this.jobs.length === 0) {
      return;
    }
    this.worker = this.runWorker().finally(() => {
      this.worker = null;
      this.startWorker();
    });
  }

  private async runWorker(): Promise<void> {
    while (!this.stopped) {
      const job = this.jobs.shift();
      if (!job) {
        return;
      }
      try {
        const audio = await this.synthesizer.synthesize(job.text);
        if (this.stopped) {
          return;
        }
        await this.sink.deliver(job.sessionId, audio, job.chunkIndex);
      } catch (error) {
        this.logger.warn("voice.output.chunk_failed", {
          sessionId: job.sessionId,
          chunkIndex: job.chunkIndex,
          error: errorMessage(error),
        });
      }
    }
  }
}

/** Writes each synthesized chunk to `<dir>/<session>/<time>-<chunk>.mp3`. */
export class FileVoiceSink implements VoiceSink {
  constructor(private readonly directory: string) {}

  async deliver(sessionId: string, audio: Buffer, chunkIndex: number): Promise<void> {
    const sessionDir = path.resolve(this.directory, sanitizeSegment(sessionId));
    await mkdir(sessionDir, { recursive: true });
    await writeFile(path.join(sessionDir, `${Date.now()}-${chunkIndex}.mp3`), audio);
  }
}

function sanitizeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, "_");
}

function waitWithTimeout(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    void promise.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}
