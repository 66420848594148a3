import { errorMessage, Logger } from "../config/logger";
import { ChatCompletionClient, ChatMessage } from "./llm.client";

interface SafeCallBaseArgs {
  llmClient: ChatCompletionClient;
  messages: ReadonlyArray<ChatMessage>;
  promptName: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface JsonSafeCallArgs<T> extends SafeCallBaseArgs {
  /** "object" reads the outermost {...}; "value" also accepts a top-level array. */
  shape?: "object" | "value";
  validate: (value: unknown) => value is T;
}

export type TextSafeCallArgs = SafeCallBaseArgs;

export type LlmFailureCode = "timeout" | "llm_failure";

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: LlmFailureCode | "json_parse_failed" | "schema_invalid";
      raw?: string;
    };

export type SafeTextResult = { ok: true; text: string } | { ok: false; error_code: LlmFailureCode };

const DEFAULT_TIMEOUT_MS = 25_000;

export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  const attempt = await attemptCall(args);
  if (!attempt.ok) {
    return attempt;
  }

  const parsed = args.shape === "value" ? tryParseJsonValue(attempt.text) : tryParseJsonObject(attempt.text);
  if (!parsed.ok) {
    args.logger?.debug("llm.safe.json_parse_failed", { promptName: args.promptName });
    return { ok: false, error_code: "json_parse_failed", raw: attempt.text };
  }
  if (!args.validate(parsed.data)) {
    args.logger?.debug("llm.safe.schema_invalid", { promptName: args.promptName });
    return { ok: false, error_code: "schema_invalid", raw: attempt.text };
  }
  return { ok: true, data: parsed.data };
}

export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  const attempt = await attemptCall(args);
  if (!attempt.ok) {
    return attempt;
  }
  if (!attempt.text) {
    return { ok: false, error_code: "llm_failure" };
  }
  return attempt;
}

async function attemptCall(
  args: SafeCallBaseArgs,
): Promise<{ ok: true; text: string } | { ok: false; error_code: LlmFailureCode }> {
  try {
    const text = await withTimeout(
      args.llmClient.complete(args.messages, {
        temperature: args.temperature,
        maxTokens: args.maxTokens,
        promptName: args.promptName,
      }),
      normalizeTimeout(args.timeoutMs),
    );
    return { ok: true, text: text.trim() };
  } catch (error) {
    const errorCode: LlmFailureCode = isTimeoutError(error) ? "timeout" : "llm_failure";
    args.logger?.warn("llm.safe.call_failed", {
      promptName: args.promptName,
      modelName: args.llmClient.getModelName?.(),
      errorCode,
      error: errorMessage(error),
    });
    return { ok: false, error_code: errorCode };
  }
}

export function tryParseJsonObject(raw: string): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    if (!isRecord(parsed)) {
      return { ok: false };
    }
    return { ok: true, data: parsed };
  } catch {
    return { ok: false };
  }
}

/** Reads whichever of a top-level array or object opens first in the text. */
export function tryParseJsonValue(raw: string): { ok: true; data: unknown } | { ok: false } {
  const text = raw.trim();
  const firstBracket = text.indexOf("[");
  const firstBrace = text.indexOf("{");
  if (firstBracket >= 0 && (firstBrace < 0 || firstBracket < firstBrace)) {
    const lastBracket = text.lastIndexOf("]");
    if (lastBracket > firstBracket) {
      try {
        return { ok: true, data: JSON.parse(text.slice(firstBracket, lastBracket + 1)) };
      } catch {
        return { ok: false };
      }
    }
    return { ok: false };
  }
  return tryParseJsonObject(text);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  return errorMessage(error).toLowerCase().includes("timeout");
}
