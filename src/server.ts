import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { errorMessage } from "./config/logger";
import { translate } from "./i18n/language.service";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, engine, telegramClient, shutdown } = createApp(env);

  if (!engine) {
    logger.warn(translate(env.defaultLanguage, "api_key_warning"));
  }

  const server = app.listen(env.port, () => {
    logger.info("Server started", {
      port: env.port,
      llmConfigured: engine !== null,
      voiceEnabled: env.enableVoice,
      defaultLanguage: env.defaultLanguage,
    });
    void registerWebhook();
  });

  async function registerWebhook(): Promise<void> {
    if (!telegramClient) {
      return;
    }
    if (!env.telegramWebhookUrl) {
      logger.warn("TELEGRAM_WEBHOOK_URL is not set, skipping webhook registration");
      return;
    }
    const webhookUrl = `${env.telegramWebhookUrl}${env.telegramWebhookPath}`;
    try {
      await telegramClient.setWebhook(webhookUrl, env.telegramSecretToken);
      logger.info("Telegram webhook registered", { webhookUrl });
    } catch (error) {
      logger.error("Failed to register Telegram webhook", { webhookUrl, error: errorMessage(error) });
    }
  }

  const stop = (signal: string): void => {
    logger.info("Shutting down", { signal });
    server.close();
    shutdown()
      .catch((error: unknown) => {
        logger.error("Shutdown failed", { error: errorMessage(error) });
      })
      .finally(() => process.exit(0));
  };
  process.once("SIGTERM", () => stop("SIGTERM"));
  process.once("SIGINT", () => stop("SIGINT"));
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start: ${errorMessage(error)}\n`);
  process.exit(1);
});
