import { ChatCompletionClient, ChatMessage, CompletionOptions } from "../../ai/llm.client";
import { Logger } from "../../config/logger";

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface RecordedLog {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): { logger: Logger; entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    logger: {
      debug(message, meta) {
        entries.push({ level: "debug", message, meta });
      },
      info(message, meta) {
        entries.push({ level: "info", message, meta });
      },
      warn(message, meta) {
        entries.push({ level: "warn", message, meta });
      },
      error(message, meta) {
        entries.push({ level: "error", message, meta });
      },
    },
  };
}

export interface RecordedCompletion {
  promptName?: string;
  messages: ReadonlyArray<ChatMessage>;
  options?: CompletionOptions;
}

type ScriptedReply = string | Error;

/**
 * Model stand-in that answers from per-prompt queues. A prompt with an empty
 * queue fails the call, which the intake services treat as a model failure.
 */
export class ScriptedLlmClient implements ChatCompletionClient {
  readonly calls: RecordedCompletion[] = [];
  private readonly queues = new Map<string, ScriptedReply[]>();

  reply(promptName: string, ...replies: ScriptedReply[]): this {
    const queue = this.queues.get(promptName) ?? [];
    queue.push(...replies);
    this.queues.set(promptName, queue);
    return this;
  }

  callsFor(promptName: string): RecordedCompletion[] {
    return this.calls.filter((call) => call.promptName === promptName);
  }

  getModelName(): string {
    return "scripted-model";
  }

  async complete(messages: ReadonlyArray<ChatMessage>, options?: CompletionOptions): Promise<string> {
    this.calls.push({ promptName: options?.promptName, messages, options });
    const next = this.queues.get(options?.promptName ?? "")?.shift();
    if (next === undefined) {
      throw new Error(`No scripted reply for ${options?.promptName ?? "unnamed prompt"}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
