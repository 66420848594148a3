import { NormalizedUpdate, TelegramUpdate } from "../shared/types/telegram.types";

export function normalizeUpdate(update: TelegramUpdate): NormalizedUpdate | null {
  const message = update.message;
  if (!message?.from) {
    return null;
  }

  const base = {
    updateId: update.update_id,
    messageId: message.message_id,
    chatId: message.chat.id,
    userId: message.from.id,
    username: message.from.username,
    languageCode: message.from.language_code,
  };

  if (typeof message.text === "string") {
    return { ...base, kind: "text", text: message.text };
  }

  if (message.voice) {
    return {
      ...base,
      kind: "voice",
      fileId: message.voice.file_id,
      durationSec: message.voice.duration,
      mimeType: message.voice.mime_type,
    };
  }

  return { ...base, kind: "unsupported_message" };
}
