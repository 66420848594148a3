import express, { Express, NextFunction, Request, Response } from "express";
import {
  buildSessionCookie,
  extractCookie,
  issueAdminSessionToken,
  verifyAdminSecret,
  verifyAdminSessionToken,
} from "./admin/admin-auth.service";
import { renderAdminDashboardPage } from "./admin/admin-dashboard.page";
import { AdminDashboardService } from "./admin/admin-dashboard.service";
import { ChatCompletionClient, LlmClient } from "./ai/llm.client";
import { SpeechClient } from "./ai/speech.client";
import { EnvConfig } from "./config/env";
import { createLogger, errorMessage, Logger } from "./config/logger";
import { SupabaseRestClient } from "./db/supabase.client";
import { IntakeEngine } from "./intake/intake.engine";
import { LlmExtractorService } from "./intake/llm-extractor.service";
import { TechnicalQuestionsService } from "./intake/technical-questions.service";
import { buildChatController } from "./router/chat.controller";
import { ADMIN_SESSION_COOKIE_NAME } from "./shared/constants";
import { SessionService } from "./state/session.service";
import { InMemoryPersistenceGateway } from "./storage/in-memory.gateway";
import { PersistenceGateway } from "./storage/persistence.gateway";
import { SupabasePersistenceGateway } from "./storage/supabase.gateway";
import { TelegramClient, TelegramMessenger } from "./telegram/telegram.client";
import { buildWebhookController, SpeechTranscriber } from "./telegram/webhook.controller";
import { FileVoiceSink, SpeechOutput, VoiceOutputQueue } from "./voice/voice-output.queue";
import { asyncRoute } from "./shared/utils/async-route";

const SESSION_SWEEP_INTERVAL_MS = 60_000;

/** Collaborators tests swap for in-process stand-ins. */
export interface AppOverrides {
  logger?: Logger;
  llmClient?: ChatCompletionClient;
  persistence?: PersistenceGateway;
  telegramMessenger?: TelegramMessenger;
  transcriber?: SpeechTranscriber;
  speechOutput?: SpeechOutput;
  now?: () => Date;
}

export interface AppContext {
  app: Express;
  logger: Logger;
  engine: IntakeEngine | null;
  persistence: PersistenceGateway;
  telegramClient?: TelegramClient;
  shutdown(): Promise<void>;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  const supabaseClient =
    env.supabaseUrl && env.supabaseServiceRoleKey
      ? new SupabaseRestClient({ url: env.supabaseUrl, serviceRoleKey: env.supabaseServiceRoleKey })
      : undefined;
  const persistence =
    overrides.persistence ??
    (supabaseClient
      ? new SupabasePersistenceGateway(logger, supabaseClient)
      : new InMemoryPersistenceGateway(logger, overrides.now));
  logger.info("persistence.store.selected", { store: persistence.name });

  const speechClient = env.openaiApiKey
    ? new SpeechClient({
        apiKey: env.openaiApiKey,
        baseUrl: env.openaiBaseUrl,
        transcriptionModel: env.openaiTranscriptionModel,
        ttsModel: env.openaiTtsModel,
        ttsVoice: env.openaiTtsVoice,
      })
    : undefined;

  let voiceQueue: VoiceOutputQueue | undefined;
  let speechOutput = overrides.speechOutput;
  if (!speechOutput && env.enableVoice && speechClient) {
    voiceQueue = new VoiceOutputQueue(speechClient, new FileVoiceSink(env.voiceOutputDir), logger, {
      cleanupTimeoutMs: env.voiceCleanupTimeoutMs,
    });
    speechOutput = voiceQueue;
  }

  const llmClient =
    overrides.llmClient ??
    (env.openaiApiKey
      ? new LlmClient(
          {
            apiKey: env.openaiApiKey,
            model: env.llmModel,
            baseUrl: env.openaiBaseUrl,
            defaultTemperature: env.llmTemperature,
            defaultMaxTokens: env.llmMaxTokens,
          },
          logger,
        )
      : undefined);

  const engine = llmClient
    ? new IntakeEngine(
        new SessionService({
          completedTtlMs: env.sessionCompletedTtlSec * 1000,
          idleTtlMs: env.sessionIdleTtlSec * 1000,
        }),
        new LlmExtractorService(llmClient, logger, env.llmTimeoutMs),
        new TechnicalQuestionsService(llmClient, logger, env.llmTimeoutMs),
        llmClient,
        persistence,
        logger,
        {
          voice: speechOutput,
          llmTimeoutMs: env.llmTimeoutMs,
          conversationTemperature: env.llmTemperature,
        },
      )
    : null;

  const sessionSweepTimer = engine
    ? setInterval(() => {
        engine.sweepSessions();
      }, SESSION_SWEEP_INTERVAL_MS)
    : undefined;
  sessionSweepTimer?.unref();

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, llmConfigured: engine !== null, store: persistence.name });
  });

  app.use("/api", buildChatController({ engine, logger, defaultLanguage: env.defaultLanguage }));

  const telegramClient = env.telegramBotToken ? new TelegramClient(env.telegramBotToken, logger) : undefined;
  const telegramMessenger = overrides.telegramMessenger ?? telegramClient;
  if (telegramMessenger) {
    app.use(
      env.telegramWebhookPath,
      buildWebhookController({
        engine,
        messenger: telegramMessenger,
        logger,
        defaultLanguage: env.defaultLanguage,
        transcriber: overrides.transcriber ?? speechClient,
        secretToken: env.telegramSecretToken,
      }),
    );
  }

  const adminDashboardService = new AdminDashboardService(persistence, logger, overrides.now);
  const adminSecret = env.adminSecret;
  const secureCookie = env.nodeEnv === "production";

  function isAdminRequest(request: Request): boolean {
    if (!adminSecret) {
      return false;
    }
    if (verifyAdminSecret(request.header("x-admin-secret"), adminSecret)) {
      return true;
    }
    const token = extractCookie(request.header("cookie"), ADMIN_SESSION_COOKIE_NAME);
    return token !== null && verifyAdminSessionToken(token, adminSecret) !== null;
  }

  function requireAdmin(request: Request, response: Response, next: NextFunction): void {
    if (!adminSecret) {
      response.status(503).json({ ok: false, error: "ADMIN_SECRET is not configured" });
      return;
    }
    if (!isAdminRequest(request)) {
      response.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }
    next();
  }

  app.get("/admin", (_request: Request, response: Response) => {
    response.status(200).type("html").send(renderAdminDashboardPage());
  });

  app.post("/admin/api/auth/login", (request: Request, response: Response) => {
    if (!adminSecret) {
      response.status(503).json({ ok: false, error: "ADMIN_SECRET is not configured" });
      return;
    }
    const body: unknown = request.body;
    const secret =
      typeof body === "object" && body !== null && "secret" in body && typeof body.secret === "string"
        ? body.secret.trim()
        : "";
    if (!verifyAdminSecret(secret, adminSecret)) {
      logger.warn("admin.login.rejected", { ip: request.ip });
      response.status(401).json({ ok: false, error: "Invalid admin secret" });
      return;
    }

    const token = issueAdminSessionToken({ secret: adminSecret, ttlSeconds: env.adminSessionTtlSec });
    response.setHeader(
      "Set-Cookie",
      buildSessionCookie(ADMIN_SESSION_COOKIE_NAME, token, env.adminSessionTtlSec, secureCookie),
    );
    response.status(200).json({ ok: true, expiresInSec: env.adminSessionTtlSec });
  });

  app.post("/admin/api/auth/logout", (_request: Request, response: Response) => {
    response.setHeader("Set-Cookie", buildSessionCookie(ADMIN_SESSION_COOKIE_NAME, "", 0, secureCookie));
    response.status(200).json({ ok: true });
  });

  app.get("/admin/api/session", requireAdmin, (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.get("/admin/api/overview", requireAdmin, asyncRoute(async (_request: Request, response: Response) => {
    response.status(200).json(await adminDashboardService.getOverview());
  }));

  app.get("/admin/api/profiles", requireAdmin, asyncRoute(async (request: Request, response: Response) => {
    const limit = typeof request.query.limit === "string" ? Number(request.query.limit) : undefined;
    const completeRaw = request.query.complete;
    const complete = completeRaw === "true" ? true : completeRaw === "false" ? false : undefined;
    const profiles = await adminDashboardService.listProfiles({ limit, complete });
    response.status(200).json({ ok: true, profiles });
  }));

  app.get("/admin/api/profiles/:id", requireAdmin, asyncRoute(async (request: Request, response: Response) => {
    const detail = await adminDashboardService.getProfile(request.params.id);
    if (!detail) {
      response.status(404).json({ ok: false, error: "Profile not found" });
      return;
    }
    response.status(200).json(detail);
  }));

  app.get("/admin/api/export.json", requireAdmin, asyncRoute(async (_request: Request, response: Response) => {
    sendExport(response, await adminDashboardService.exportJson());
  }));

  app.get("/admin/api/export.csv", requireAdmin, asyncRoute(async (_request: Request, response: Response) => {
    sendExport(response, await adminDashboardService.exportCsv());
  }));

  app.use((error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    logger.error("http.request.failed", { error: errorMessage(error) });
    response.status(500).json({ ok: false, error: "Internal server error" });
  });

  return {
    app,
    logger,
    engine,
    persistence,
    telegramClient,
    async shutdown(): Promise<void> {
      if (sessionSweepTimer) {
        clearInterval(sessionSweepTimer);
      }
      if (voiceQueue) {
        await voiceQueue.shutdown();
      }
    },
  };
}

function sendExport(response: Response, file: { fileName: string; contentType: string; body: string }): void {
  response.setHeader("Content-Type", file.contentType);
  response.setHeader("Content-Disposition", `attachment; filename="${file.fileName}"`);
  response.status(200).send(file.body);
}
