import { Request, Response, Router } from "express";
import { errorMessage, Logger, logContext } from "../config/logger";
import {
  getSupportedLanguages,
  isSupportedLanguage,
  LanguageCode,
  translate,
} from "../i18n/language.service";
import { IntakeEngine } from "../intake/intake.engine";
import { NormalizedUpdate, TelegramUpdate } from "../shared/types/telegram.types";
import { UpdateDeduplicator } from "../shared/utils/telegram-idempotency";
import { TelegramMessenger } from "./telegram.client";
import { normalizeUpdate } from "./update-normalizer";
import { asyncRoute } from "../shared/utils/async-route";

export interface SpeechTranscriber {
  transcribe(buffer: Buffer, fileName?: string, contentType?: string): Promise<string>;
}

interface WebhookControllerDeps {
  /** Null when the model is not configured; every message then gets the setup notice. */
  engine: IntakeEngine | null;
  messenger: TelegramMessenger;
  logger: Logger;
  defaultLanguage: LanguageCode;
  deduplicator?: UpdateDeduplicator;
  transcriber?: SpeechTranscriber;
  secretToken?: string;
}

const LANGUAGE_COMMAND = /^\/language(?:@\w+)?(?:\s+(\S+))?\s*$/i;
const START_COMMAND = /^\/start(?:@\w+)?(?:\s|$)/i;
const CHAT_PRUNE_INTERVAL_MS = 60_000;

function isSecretTokenValid(request: Request, expectedSecretToken?: string): boolean {
  if (!expectedSecretToken) {
    return true;
  }
  return request.header("x-telegram-bot-api-secret-token") === expectedSecretToken;
}

function isTelegramUpdate(value: unknown): value is TelegramUpdate {
  return typeof value === "object" && value !== null && "update_id" in value && typeof value.update_id === "number";
}

/** Maps each Telegram chat to one intake session and relays text and voice turns. */
export class TelegramConversationService {
  private readonly sessionsByChat = new Map<number, string>();
  private lastPrunedAt = 0;

  constructor(private readonly deps: WebhookControllerDeps) {}

  sessionIdFor(chatId: number): string | undefined {
    return this.sessionsByChat.get(chatId);
  }

  /** Forgets chats whose session was reset or evicted. Returns how many were dropped. */
  pruneStaleChats(): number {
    const engine = this.deps.engine;
    if (!engine) {
      return 0;
    }
    let dropped = 0;
    for (const [chatId, sessionId] of this.sessionsByChat) {
      if (!engine.hasSession(sessionId)) {
        this.sessionsByChat.delete(chatId);
        dropped += 1;
      }
    }
    return dropped;
  }

  async handle(update: NormalizedUpdate): Promise<void> {
    const { engine, messenger } = this.deps;
    const now = Date.now();
    if (now - this.lastPrunedAt >= CHAT_PRUNE_INTERVAL_MS) {
      this.lastPrunedAt = now;
      const dropped = this.pruneStaleChats();
      if (dropped > 0) {
        this.deps.logger.debug("telegram.chats.pruned", { dropped });
      }
    }
    if (!engine) {
      await messenger.sendMessage(update.chatId, translate(this.deps.defaultLanguage, "api_key_warning"));
      return;
    }

    if (update.kind === "unsupported_message") {
      await messenger.sendMessage(update.chatId, translate(this.languageFor(update), "error_processing"));
      return;
    }

    if (update.kind === "voice") {
      const text = await this.transcribeVoice(update.chatId, update.fileId, update.mimeType);
      if (text === null) {
        await messenger.sendMessage(update.chatId, translate(this.languageFor(update), "error_processing"));
        return;
      }
      await this.handleText(engine, update, text);
      return;
    }

    await this.handleText(engine, update, update.text);
  }

  private async handleText(engine: IntakeEngine, update: NormalizedUpdate, text: string): Promise<void> {
    const trimmed = text.trim();
    const languageCommand = LANGUAGE_COMMAND.exec(trimmed);
    if (languageCommand) {
      await this.switchLanguage(engine, update, languageCommand[1]);
      return;
    }

    const sessionId = this.sessionsByChat.get(update.chatId);
    if (START_COMMAND.test(trimmed) || !sessionId || !engine.hasSession(sessionId)) {
      await this.startFresh(engine, update, this.languageFor(update));
      return;
    }

    const result = await engine.handleMessage(sessionId, trimmed);
    await this.deps.messenger.sendMessage(update.chatId, result.reply);
  }

  private async switchLanguage(engine: IntakeEngine, update: NormalizedUpdate, requested?: string): Promise<void> {
    const code = requested?.toLowerCase();
    if (!code || !isSupportedLanguage(code)) {
      const options = getSupportedLanguages()
        .map((language) => `${language.flag} /language ${language.code} (${language.name})`)
        .join("\n");
      await this.deps.messenger.sendMessage(update.chatId, options);
      return;
    }

    const sessionId = this.sessionsByChat.get(update.chatId);
    if (!sessionId || !engine.hasSession(sessionId)) {
      await this.startFresh(engine, update, code);
      return;
    }
    const changed = await engine.changeLanguage(sessionId, code, false);
    await this.deps.messenger.sendMessage(update.chatId, changed.reply);
  }

  private async startFresh(engine: IntakeEngine, update: NormalizedUpdate, language: LanguageCode): Promise<void> {
    const previous = this.sessionsByChat.get(update.chatId);
    if (previous) {
      await engine.resetSession(previous);
    }
    const started = await engine.startSession(language);
    this.sessionsByChat.set(update.chatId, started.session.sessionId);
    logContext(this.deps.logger, "info", "telegram.session.started", {
      session_id: started.session.sessionId,
      language,
      channel: "telegram",
    }, { chatId: update.chatId });
    await this.deps.messenger.sendMessage(update.chatId, started.reply);
  }

  private async transcribeVoice(chatId: number, fileId: string, mimeType?: string): Promise<string | null> {
    if (!this.deps.transcriber) {
      this.deps.logger.warn("telegram.voice.transcriber_missing", { chatId });
      return null;
    }
    try {
      const audio = await this.deps.messenger.downloadFileById(fileId);
      return await this.deps.transcriber.transcribe(audio, "voice.ogg", mimeType ?? "audio/ogg");
    } catch (error) {
      this.deps.logger.warn("telegram.voice.transcription_failed", { chatId, error: errorMessage(error) });
      return null;
    }
  }

  private languageFor(update: NormalizedUpdate): LanguageCode {
    const sessionId = this.sessionsByChat.get(update.chatId);
    const snapshot = sessionId ? this.deps.engine?.getSnapshot(sessionId) : null;
    if (snapshot) {
      return snapshot.language;
    }
    const userLanguage = update.languageCode?.slice(0, 2).toLowerCase();
    return userLanguage && isSupportedLanguage(userLanguage) ? userLanguage : this.deps.defaultLanguage;
  }
}

export function buildWebhookController(deps: WebhookControllerDeps): Router {
  const router = Router();
  const conversations = new TelegramConversationService(deps);
  const deduplicator = deps.deduplicator ?? new UpdateDeduplicator();

  router.post("/", asyncRoute(async (request: Request, response: Response) => {
    if (!isSecretTokenValid(request, deps.secretToken)) {
      response.status(401).json({ ok: false, error: "Invalid Telegram secret token" });
      return;
    }

    const body: unknown = request.body;
    if (!isTelegramUpdate(body)) {
      response.status(400).json({ ok: false, error: "Invalid body" });
      return;
    }

    const normalized = normalizeUpdate(body);
    if (!normalized) {
      deps.logger.debug("telegram.update.unsupported", { updateId: body.update_id });
      response.status(200).json({ ok: true });
      return;
    }

    if (!deduplicator.markIfNew(normalized.updateId)) {
      deps.logger.debug("telegram.update.duplicate", { updateId: normalized.updateId });
      response.status(200).json({ ok: true });
      return;
    }

    try {
      await conversations.handle(normalized);
    } catch (error) {
      deps.logger.error("telegram.update.failed", {
        updateId: normalized.updateId,
        error: errorMessage(error),
      });
    }
    response.status(200).json({ ok: true });
  }));

  return router;
}
