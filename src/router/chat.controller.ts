import { Request, Response, Router } from "express";
import { errorMessage, Logger } from "../config/logger";
import {
  getSupportedLanguages,
  isSupportedLanguage,
  LanguageCode,
  translate,
} from "../i18n/language.service";
import { IntakeEngine } from "../intake/intake.engine";
import { asyncRoute } from "../shared/utils/async-route";

interface ChatControllerDeps {
  /** Null when the model is not configured; chat endpoints then answer 503. */
  engine: IntakeEngine | null;
  logger: Logger;
  defaultLanguage: LanguageCode;
}

type LanguageParse = { ok: true; language: LanguageCode } | { ok: false };

function readLanguage(value: unknown, fallback: LanguageCode): LanguageParse {
  if (value === undefined || value === null || value === "") {
    return { ok: true, language: fallback };
  }
  const code = typeof value === "string" ? value.trim().toLowerCase() : "";
  return isSupportedLanguage(code) ? { ok: true, language: code } : { ok: false };
}

function readBody(request: Request): Record<string, unknown> {
  const body: unknown = request.body;
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

export function buildChatController(deps: ChatControllerDeps): Router {
  const router = Router();

  function requireEngine(response: Response, language: LanguageCode): IntakeEngine | null {
    if (deps.engine) {
      return deps.engine;
    }
    response.status(503).json({
      ok: false,
      error: translate(language, "configuration_required"),
      message: translate(language, "api_key_warning"),
    });
    return null;
  }

  router.get("/languages", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, languages: getSupportedLanguages() });
  });

  router.post("/chat/sessions", asyncRoute(async (request: Request, response: Response) => {
    const body = readBody(request);
    const parsed = readLanguage(body.language, deps.defaultLanguage);
    if (!parsed.ok) {
      response.status(400).json({ ok: false, error: "Unsupported language" });
      return;
    }
    const engine = requireEngine(response, parsed.language);
    if (!engine) {
      return;
    }
    const started = await engine.startSession(parsed.language);
    response.status(201).json({ ok: true, reply: started.reply, session: started.session });
  }));

  router.get("/chat/sessions/:id", (request: Request, response: Response) => {
    const engine = requireEngine(response, deps.defaultLanguage);
    if (!engine) {
      return;
    }
    const snapshot = engine.getSnapshot(request.params.id);
    if (!snapshot) {
      response.status(404).json({ ok: false, error: "Session not found" });
      return;
    }
    response.status(200).json({ ok: true, session: snapshot });
  });

  router.post("/chat/sessions/:id/messages", asyncRoute(async (request: Request, response: Response) => {
    const engine = requireEngine(response, deps.defaultLanguage);
    if (!engine) {
      return;
    }
    const sessionId = request.params.id;
    if (!engine.hasSession(sessionId)) {
      response.status(404).json({ ok: false, error: "Session not found" });
      return;
    }
    const text = readBody(request).text;
    if (typeof text !== "string") {
      response.status(400).json({ ok: false, error: "Field 'text' must be a string" });
      return;
    }

    try {
      const result = await engine.handleMessage(sessionId, text);
      response.status(200).json({ ok: true, ...result, session: engine.getSnapshot(sessionId) });
    } catch (error) {
      deps.logger.error("chat.message.failed", { sessionId, error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Failed to process message" });
    }
  }));

  router.put("/chat/sessions/:id/language", asyncRoute(async (request: Request, response: Response) => {
    const engine = requireEngine(response, deps.defaultLanguage);
    if (!engine) {
      return;
    }
    const sessionId = request.params.id;
    if (!engine.hasSession(sessionId)) {
      response.status(404).json({ ok: false, error: "Session not found" });
      return;
    }
    const body = readBody(request);
    if (typeof body.language !== "string") {
      response.status(400).json({ ok: false, error: "Field 'language' is required" });
      return;
    }
    const parsed = readLanguage(body.language, deps.defaultLanguage);
    if (!parsed.ok) {
      response.status(400).json({ ok: false, error: "Unsupported language" });
      return;
    }

    const changed = await engine.changeLanguage(sessionId, parsed.language, body.startFresh === true);
    response.status(200).json({ ok: true, reply: changed.reply, session: changed.session });
  }));

  router.delete("/chat/sessions/:id", asyncRoute(async (request: Request, response: Response) => {
    const engine = requireEngine(response, deps.defaultLanguage);
    if (!engine) {
      return;
    }
    if (!(await engine.resetSession(request.params.id))) {
      response.status(404).json({ ok: false, error: "Session not found" });
      return;
    }
    response.status(200).json({ ok: true });
  }));

  return router;
}
