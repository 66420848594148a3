import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { TelegramApiResponse } from "../shared/types/telegram.types";

interface SetWebhookPayload {
  url: string;
  secret_token?: string;
  allowed_updates?: string[];
}

interface SendMessagePayload {
  chat_id: number;
  text: string;
  parse_mode?: "Markdown";
}

interface TelegramFileInfo {
  file_id: string;
  file_unique_id: string;
  file_path?: string;
}

const MAX_TEXT_LENGTH = 3900;

export interface TelegramMessenger {
  sendMessage(chatId: number, text: string): Promise<void>;
  downloadFileById(fileId: string): Promise<Buffer>;
}

export class TelegramClient implements TelegramMessenger {
  private readonly apiBase: string;

  constructor(
    private readonly token: string,
    private readonly logger: Logger,
  ) {
    this.apiBase = `https://api.telegram.org/bot${this.token}`;
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    const payload: SetWebhookPayload = { url, allowed_updates: ["message"] };
    if (secretToken) {
      payload.secret_token = secretToken;
    }
    await this.request<boolean>("setWebhook", payload);
  }

  /** Sends with Markdown first and falls back to plain text when Telegram rejects the markup. */
  async sendMessage(chatId: number, text: string): Promise<void> {
    const payload: SendMessagePayload = {
      chat_id: chatId,
      text: clampTelegramText(toTelegramMarkdown(text)),
      parse_mode: "Markdown",
    };

    try {
      await this.request("sendMessage", payload);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      if (!message.includes("HTTP 400")) {
        throw error;
      }
      this.logger.warn("telegram.send.markdown_rejected", { chatId });
      await this.request("sendMessage", { chat_id: chatId, text: clampTelegramText(text) });
    }
  }

  async downloadFileById(fileId: string): Promise<Buffer> {
    const fileInfo = await this.request<TelegramFileInfo>("getFile", { file_id: fileId });
    if (!fileInfo.file_path) {
      throw new Error("Telegram file path is missing");
    }

    const response = await fetch(`https://api.telegram.org/file/bot${this.token}/${fileInfo.file_path}`, {
      method: "GET",
    });
    if (!response.ok) {
      throw new Error(`Telegram file download failed: HTTP ${response.status}`);
    }
    return response.buffer();
  }

  private async request<TResponse>(method: string, payload: unknown): Promise<TResponse> {
    const response = await fetch(`${this.apiBase}/${method}`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      throw new Error(`Telegram request failed (${method}): HTTP ${response.status}`);
    }

    const body = (await response.json()) as TelegramApiResponse<TResponse>;
    if (!body.ok) {
      this.logger.error("telegram.api.failure", {
        method,
        code: body.error_code,
        description: body.description,
      });
      throw new Error(`Telegram API error (${method}): ${body.description}`);
    }
    return body.result;
  }
}

/** Telegram's legacy Markdown marks bold with a single asterisk. */
export function toTelegramMarkdown(text: string): string {
  return text.replace(/\*\*(.+?)\*\*/g, "*$1*");
}

export function clampTelegramText(text: string): string {
  if (text.length <= MAX_TEXT_LENGTH) {
    return text;
  }
  return `${text.slice(0, MAX_TEXT_LENGTH - 3)}...`;
}
