import dotenv from "dotenv";
import { LanguageCode, isSupportedLanguage } from "../i18n/language.service";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey?: string;
  openaiBaseUrl: string;
  llmModel: string;
  llmMaxTokens: number;
  llmTemperature: number;
  llmTimeoutMs: number;
  defaultLanguage: LanguageCode;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
  telegramBotToken?: string;
  telegramWebhookPath: string;
  telegramWebhookUrl?: string;
  telegramSecretToken?: string;
  adminSecret?: string;
  adminSessionTtlSec: number;
  enableVoice: boolean;
  openaiTtsModel: string;
  openaiTtsVoice: string;
  openaiTranscriptionModel: string;
  voiceOutputDir: string;
  voiceCleanupTimeoutMs: number;
  sessionCompletedTtlSec: number;
  sessionIdleTtlSec: number;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const maxTokensRaw = source.LLM_MAX_TOKENS ?? "500";
  const llmMaxTokens = Number(maxTokensRaw);
  const temperatureRaw = source.LLM_TEMPERATURE ?? "0.7";
  const llmTemperature = Number(temperatureRaw);
  const timeoutRaw = source.LLM_TIMEOUT_MS ?? "25000";
  const llmTimeoutMs = Number(timeoutRaw);
  const adminSessionTtlRaw = source.ADMIN_SESSION_TTL_SEC ?? "3600";
  const adminSessionTtlSec = Number(adminSessionTtlRaw);
  const cleanupTimeoutRaw = source.VOICE_CLEANUP_TIMEOUT_MS ?? "2000";
  const voiceCleanupTimeoutMs = Number(cleanupTimeoutRaw);
  const completedTtlRaw = source.SESSION_COMPLETED_TTL_SEC ?? "600";
  const sessionCompletedTtlSec = Number(completedTtlRaw);
  const idleTtlRaw = source.SESSION_IDLE_TTL_SEC ?? "86400";
  const sessionIdleTtlSec = Number(idleTtlRaw);
  const enableVoice = parseBoolean(source.ENABLE_VOICE ?? "false");
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());
  const defaultLanguageRaw = (source.DEFAULT_LANGUAGE ?? "en").trim().toLowerCase();

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(llmMaxTokens) || llmMaxTokens < 16) {
    throw new Error(`Invalid LLM_MAX_TOKENS value: ${maxTokensRaw}`);
  }
  if (!Number.isFinite(llmTemperature) || llmTemperature < 0 || llmTemperature > 2) {
    throw new Error(`Invalid LLM_TEMPERATURE value: ${temperatureRaw}. Expected number between 0 and 2.`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${timeoutRaw}`);
  }
  if (!Number.isInteger(adminSessionTtlSec) || adminSessionTtlSec < 300) {
    throw new Error(`Invalid ADMIN_SESSION_TTL_SEC value: ${adminSessionTtlRaw}`);
  }
  if (!Number.isInteger(voiceCleanupTimeoutMs) || voiceCleanupTimeoutMs < 0) {
    throw new Error(`Invalid VOICE_CLEANUP_TIMEOUT_MS value: ${cleanupTimeoutRaw}`);
  }
  if (!Number.isInteger(sessionCompletedTtlSec) || sessionCompletedTtlSec < 0) {
    throw new Error(`Invalid SESSION_COMPLETED_TTL_SEC value: ${completedTtlRaw}`);
  }
  if (!Number.isInteger(sessionIdleTtlSec) || sessionIdleTtlSec < 60) {
    throw new Error(`Invalid SESSION_IDLE_TTL_SEC value: ${idleTtlRaw}`);
  }
  if (!isSupportedLanguage(defaultLanguageRaw)) {
    throw new Error(`Invalid DEFAULT_LANGUAGE value: ${defaultLanguageRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel,
    openaiApiKey: getOptionalTrimmed(source, "OPENAI_API_KEY"),
    openaiBaseUrl: getOptionalTrimmed(source, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1",
    llmModel: getOptionalTrimmed(source, "LLM_MODEL") ?? "gpt-3.5-turbo",
    llmMaxTokens,
    llmTemperature,
    llmTimeoutMs,
    defaultLanguage: defaultLanguageRaw,
    supabaseUrl: getOptionalTrimmed(source, "SUPABASE_URL"),
    supabaseServiceRoleKey: getOptionalTrimmed(source, "SUPABASE_SERVICE_ROLE_KEY"),
    telegramBotToken: getOptionalTrimmed(source, "TELEGRAM_BOT_TOKEN"),
    telegramWebhookPath: source.TELEGRAM_WEBHOOK_PATH ?? "/telegram/webhook",
    telegramWebhookUrl: getOptionalTrimmed(source, "TELEGRAM_WEBHOOK_URL"),
    telegramSecretToken: getOptionalTrimmed(source, "TELEGRAM_SECRET_TOKEN"),
    adminSecret: getOptionalTrimmed(source, "ADMIN_SECRET"),
    adminSessionTtlSec,
    enableVoice,
    openaiTtsModel: getOptionalTrimmed(source, "OPENAI_TTS_MODEL") ?? "tts-1",
    openaiTtsVoice: getOptionalTrimmed(source, "OPENAI_TTS_VOICE") ?? "alloy",
    openaiTranscriptionModel: getOptionalTrimmed(source, "OPENAI_TRANSCRIPTION_MODEL") ?? "whisper-1",
    voiceOutputDir: getOptionalTrimmed(source, "VOICE_OUTPUT_DIR") ?? "voice-output",
    voiceCleanupTimeoutMs,
    sessionCompletedTtlSec,
    sessionIdleTtlSec,
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
