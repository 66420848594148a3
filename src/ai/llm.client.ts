import fetch from "node-fetch";
import { errorMessage, Logger } from "../config/logger";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  promptName?: string;
}

/** The slice of the model client the intake services depend on. */
export interface ChatCompletionClient {
  complete(messages: ReadonlyArray<ChatMessage>, options?: CompletionOptions): Promise<string>;
  getModelName?(): string;
}

export interface LlmClientConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  defaultTemperature?: number;
  defaultMaxTokens?: number;
}

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: ChatMessage[];
  max_tokens: number;
}

interface ChatCompletionsResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export class LlmClient implements ChatCompletionClient {
  private readonly baseUrl: string;

  constructor(
    private readonly config: LlmClientConfig,
    private readonly logger: Logger,
  ) {
    this.baseUrl = (config.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
  }

  getModelName(): string {
    return this.config.model;
  }

  async complete(messages: ReadonlyArray<ChatMessage>, options?: CompletionOptions): Promise<string> {
    const startedAt = Date.now();
    const requestBody = this.buildRequestBody(messages, options);
    const promptName = options?.promptName ?? "chat_completion";
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.config.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`OpenAI API error: HTTP ${response.status} - ${body}`);
      }

      const body = (await response.json()) as ChatCompletionsResponse;
      const content = body.choices?.[0]?.message?.content;
      if (!content) {
        throw new Error("OpenAI response does not contain message content");
      }

      const trimmed = content.trim();
      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.config.model,
        latencyMs: Date.now() - startedAt,
        maxTokens: requestBody.max_tokens,
        tokenEstimate: estimateTokenCount(messages, trimmed),
      });
      return trimmed;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.config.model,
        latencyMs: Date.now() - startedAt,
        maxTokens: requestBody.max_tokens,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  buildRequestBody(
    messages: ReadonlyArray<ChatMessage>,
    options?: CompletionOptions,
  ): ChatCompletionsRequestBody {
    return {
      model: this.config.model,
      temperature: options?.temperature ?? this.config.defaultTemperature ?? 0.7,
      max_tokens: options?.maxTokens ?? this.config.defaultMaxTokens ?? 500,
      messages: messages.map((message) => ({ role: message.role, content: message.content })),
    };
  }
}

function estimateTokenCount(messages: ReadonlyArray<ChatMessage>, output: string): number {
  const totalChars = messages.reduce((sum, message) => sum + message.content.length, 0) + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}
