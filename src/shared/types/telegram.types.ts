export interface TelegramUser {
  id: number;
  username?: string;
  language_code?: string;
}

export interface TelegramChat {
  id: number;
}

export interface TelegramVoice {
  file_id: string;
  duration: number;
  mime_type?: string;
}

export interface TelegramMessage {
  message_id: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
  voice?: TelegramVoice;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

interface TelegramApiSuccess<T> {
  ok: true;
  result: T;
}

interface TelegramApiFailure {
  ok: false;
  error_code: number;
  description: string;
}

export type TelegramApiResponse<T> = TelegramApiSuccess<T> | TelegramApiFailure;

interface NormalizedUpdateBase {
  updateId: number;
  messageId: number;
  chatId: number;
  userId: number;
  username?: string;
  languageCode?: string;
}

export type NormalizedUpdate =
  | (NormalizedUpdateBase & { kind: "text"; text: string })
  | (NormalizedUpdateBase & { kind: "voice"; fileId: string; durationSec: number; mimeType?: string })
  | (NormalizedUpdateBase & { kind: "unsupported_message" });
