import assert from "node:assert/strict";
import { once } from "node:events";
import { test } from "node:test";
import fetch, { Response } from "node-fetch";
import { AppContext, AppOverrides, createApp } from "../../app";
import { loadEnv } from "../../config/env";
import { translate } from "../../i18n/language.service";
import { IntakeSessionSnapshot } from "../../shared/types/intake.types";
import { noopLogger, ScriptedLlmClient } from "../support/fakes";

const FIXED_NOW = new Date("2026-03-02T09:15:00.000Z");

interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

interface SessionBody {
  ok: boolean;
  reply: string;
  session: IntakeSessionSnapshot;
}

interface TurnBody extends SessionBody {
  phase: string;
  progress: number;
  ended: boolean;
}

async function startServer(context: AppContext): Promise<RunningServer> {
  const server = context.app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server did not bind to a TCP port");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

async function withServer(
  envSource: Record<string, string>,
  overrides: AppOverrides,
  run: (server: RunningServer) => Promise<void>,
): Promise<void> {
  const context = createApp(loadEnv(envSource), { logger: noopLogger, now: () => FIXED_NOW, ...overrides });
  const server = await startServer(context);
  try {
    await run(server);
  } finally {
    await server.close();
    await context.shutdown();
  }
}

function send(baseUrl: string, method: string, path: string, body?: unknown, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}${path}`, {
    method,
    headers: { "content-type": "application/json", ...headers },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function readJson<T>(response: Response): Promise<T> {
  return (await response.json()) as T;
}

async function testMissingModelAnswers503(): Promise<void> {
  await withServer({}, {}, async ({ baseUrl }) => {
    const health = await send(baseUrl, "GET", "/health");
    assert.equal(health.status, 200);
    assert.deepEqual(await health.json(), { ok: true, llmConfigured: false, store: "memory" });

    const created = await send(baseUrl, "POST", "/api/chat/sessions", { language: "en" });
    assert.equal(created.status, 503);
    assert.deepEqual(await created.json(), {
      ok: false,
      error: translate("en", "configuration_required"),
      message: translate("en", "api_key_warning"),
    });

    const languages = await readJson<{ ok: boolean; languages: Array<{ code: string }> }>(
      await send(baseUrl, "GET", "/api/languages"),
    );
    assert.deepEqual(
      languages.languages.map((language) => language.code),
      ["en", "de", "hi", "kn", "fr"],
    );
  });
}

async function testChatConversationOverHttp(): Promise<void> {
  const llm = new ScriptedLlmClient()
    .reply("profile_extraction_v1", "{}")
    .reply("next_question_v1", "Thanks, Jane! What is your email address?");

  await withServer({}, { llmClient: llm }, async ({ baseUrl }) => {
    const created = await send(baseUrl, "POST", "/api/chat/sessions", { language: "en" });
    assert.equal(created.status, 201);
    const started = await readJson<SessionBody>(created);
    assert.equal(started.reply, translate("en", "greeting"));
    assert.equal(started.session.phase, "greeting");
    const sessionId = started.session.sessionId;

    const turn = await readJson<TurnBody>(
      await send(baseUrl, "POST", `/api/chat/sessions/${sessionId}/messages`, { text: "Jane Doe" }),
    );
    assert.equal(turn.reply, "Thanks, Jane! What is your email address?");
    assert.equal(turn.phase, "info_gathering");
    assert.equal(turn.progress, 14);
    assert.equal(turn.ended, false);
    assert.equal(turn.session.profile.fullName, "Jane Doe");

    const fetched = await readJson<{ ok: boolean; session: IntakeSessionSnapshot }>(
      await send(baseUrl, "GET", `/api/chat/sessions/${sessionId}`),
    );
    assert.equal(fetched.session.progress, 14);

    const stopped = await readJson<TurnBody>(
      await send(baseUrl, "POST", `/api/chat/sessions/${sessionId}/messages`, { text: "bye" }),
    );
    assert.equal(stopped.reply, translate("en", "farewell"));
    assert.equal(stopped.phase, "completed");
    assert.equal(stopped.ended, true);
  });
}

async function testRequestValidation(): Promise<void> {
  await withServer({}, { llmClient: new ScriptedLlmClient() }, async ({ baseUrl }) => {
    const badLanguage = await send(baseUrl, "POST", "/api/chat/sessions", { language: "xx" });
    assert.equal(badLanguage.status, 400);
    assert.deepEqual(await badLanguage.json(), { ok: false, error: "Unsupported language" });

    const unknown = await send(baseUrl, "POST", "/api/chat/sessions/missing/messages", { text: "hi" });
    assert.equal(unknown.status, 404);
    assert.deepEqual(await unknown.json(), { ok: false, error: "Session not found" });

    const started = await readJson<SessionBody>(await send(baseUrl, "POST", "/api/chat/sessions", {}));
    assert.equal(started.session.language, "en");
    const sessionId = started.session.sessionId;

    const notText = await send(baseUrl, "POST", `/api/chat/sessions/${sessionId}/messages`, { text: 42 });
    assert.equal(notText.status, 400);
    assert.deepEqual(await notText.json(), { ok: false, error: "Field 'text' must be a string" });

    const noLanguage = await send(baseUrl, "PUT", `/api/chat/sessions/${sessionId}/language`, {});
    assert.equal(noLanguage.status, 400);
    assert.deepEqual(await noLanguage.json(), { ok: false, error: "Field 'language' is required" });

    const spanish = await send(baseUrl, "PUT", `/api/chat/sessions/${sessionId}/language`, { language: "es" });
    assert.equal(spanish.status, 400);
  });
}

async function testLanguageChangeAndReset(): Promise<void> {
  await withServer({}, { llmClient: new ScriptedLlmClient() }, async ({ baseUrl }) => {
    const started = await readJson<SessionBody>(
      await send(baseUrl, "POST", "/api/chat/sessions", { language: "de" }),
    );
    assert.equal(started.reply, translate("de", "greeting"));
    const sessionId = started.session.sessionId;

    const switched = await readJson<SessionBody>(
      await send(baseUrl, "PUT", `/api/chat/sessions/${sessionId}/language`, { language: "FR" }),
    );
    assert.equal(switched.reply, translate("fr", "greeting"));
    assert.equal(switched.session.sessionId, sessionId);
    assert.equal(switched.session.language, "fr");

    const fresh = await readJson<SessionBody>(
      await send(baseUrl, "PUT", `/api/chat/sessions/${sessionId}/language`, { language: "kn", startFresh: true }),
    );
    assert.notEqual(fresh.session.sessionId, sessionId);
    assert.equal(fresh.reply, translate("kn", "greeting"));

    const oldSession = await send(baseUrl, "GET", `/api/chat/sessions/${sessionId}`);
    assert.equal(oldSession.status, 404);

    const deleted = await send(baseUrl, "DELETE", `/api/chat/sessions/${fresh.session.sessionId}`);
    assert.equal(deleted.status, 200);
    const deletedAgain = await send(baseUrl, "DELETE", `/api/chat/sessions/${fresh.session.sessionId}`);
    assert.equal(deletedAgain.status, 404);
  });
}

async function testAdminAccessAndExport(): Promise<void> {
  await withServer({ ADMIN_SECRET: "test-secret" }, { llmClient: new ScriptedLlmClient() }, async ({ baseUrl }) => {
    await send(baseUrl, "POST", "/api/chat/sessions", { language: "en" });

    const anonymous = await send(baseUrl, "GET", "/admin/api/overview");
    assert.equal(anonymous.status, 401);

    const rejected = await send(baseUrl, "POST", "/admin/api/auth/login", { secret: "wrong-secret" });
    assert.equal(rejected.status, 401);
    assert.deepEqual(await rejected.json(), { ok: false, error: "Invalid admin secret" });

    const login = await send(baseUrl, "POST", "/admin/api/auth/login", { secret: "test-secret" });
    assert.equal(login.status, 200);
    assert.deepEqual(await login.json(), { ok: true, expiresInSec: 3600 });
    const setCookie = login.headers.get("set-cookie") ?? "";
    assert.ok(setCookie.startsWith("intake_admin_session="));
    assert.ok(setCookie.includes("; HttpOnly; SameSite=Strict; Max-Age=3600"));
    const cookie = setCookie.split(";")[0];

    const overview = await send(baseUrl, "GET", "/admin/api/overview", undefined, { cookie });
    assert.equal(overview.status, 200);
    assert.deepEqual(await overview.json(), {
      store: "memory",
      totalCandidates: 1,
      averageExperience: null,
      completedProfiles: 0,
      createdToday: 1,
    });

    const csv = await send(baseUrl, "GET", "/admin/api/export.csv", undefined, { "x-admin-secret": "test-secret" });
    assert.equal(csv.status, 200);
    assert.equal(csv.headers.get("content-disposition"), 'attachment; filename="candidates_20260302_091500.csv"');
    assert.equal(csv.headers.get("content-type"), "text/csv; charset=utf-8");

    const missing = await send(baseUrl, "GET", "/admin/api/profiles/999", undefined, { cookie });
    assert.equal(missing.status, 404);
  });
}

async function testAdminDisabledWithoutSecret(): Promise<void> {
  await withServer({}, {}, async ({ baseUrl }) => {
    const response = await send(baseUrl, "GET", "/admin/api/overview", undefined, { "x-admin-secret": "test-secret" });
    assert.equal(response.status, 503);
    assert.deepEqual(await response.json(), { ok: false, error: "ADMIN_SECRET is not configured" });
  });
}

test("chat endpoints answer 503 until a model is configured", testMissingModelAnswers503);
test("a chat session runs over HTTP", testChatConversationOverHttp);
test("chat requests are validated", testRequestValidation);
test("the session language can be switched or restarted", testLanguageChangeAndReset);
test("admin endpoints need the secret or a session cookie", testAdminAccessAndExport);
test("admin endpoints are disabled without a configured secret", testAdminDisabledWithoutSecret);
