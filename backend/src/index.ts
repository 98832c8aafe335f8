// Entry point: load configuration, wire the extraction core to Telegram, start polling.

import { loadEnvFromProject } from "./runtime/env";
import { type AppConfig, ConfigError, loadConfig } from "./runtime/config";
import { ModelPool } from "./providers/registry";
import { GeminiProvider } from "./providers/gemini";
import { FailoverExtractor } from "./providers/failover";
import { ExtractionPipeline } from "./ocr/pipeline";
import { openPdf } from "./ocr/document";
import { OcrManager } from "./ocr/manager";
import { ResultLedgerStore } from "./stores/result-ledger";
import { SmtpMailer } from "./mail/mailer";
import { TelegramAdapter } from "./messaging/telegram-adapter";
import { TelegramBridge } from "./telegram/bot";
import { logger, serverLog } from "./logger";

function readConfig(): Readonly<AppConfig> {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      serverLog.fatal({ issues: err.issues }, "Invalid configuration");
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  loadEnvFromProject(process.cwd());

  const config = readConfig();
  logger.level = config.logLevel;

  if (config.telegram.authorizedUsers.length === 0) {
    serverLog.warn("AUTHORIZED_USERS is empty; every user will be refused");
  }

  const pool = new ModelPool(config.gemini.models);
  const extractor = new FailoverExtractor(pool, new GeminiProvider({ apiKey: config.gemini.apiKey }), {
    retryFactor: config.gemini.retryFactor,
    backoffMs: config.gemini.backoffMs,
  });
  const pipeline = new ExtractionPipeline(extractor, {
    pageCap: config.ocr.pageCap,
    pageDelayMs: config.ocr.pageDelayMs,
  });

  const manager = new OcrManager({
    pipeline,
    pool,
    ledgers: new ResultLedgerStore(),
    delivery: new SmtpMailer(config.mail),
    openDocument: openPdf,
    authorizedUsers: config.telegram.authorizedUsers,
    destination: config.mail.destination,
    chunkSize: config.ocr.chunkSize,
  });

  const bridge = new TelegramBridge(
    { botToken: config.telegram.token },
    manager,
    new TelegramAdapter(config.telegram.token),
  );

  const shutdown = (signal: string) => {
    serverLog.info({ signal }, "Shutting down");
    bridge
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        serverLog.error({ err }, "Error during shutdown");
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  serverLog.info({ models: config.gemini.models, pageCap: config.ocr.pageCap }, "Starting Persian OCR bot");
  await bridge.startPolling();
}

main().catch((err: unknown) => {
  serverLog.fatal({ err }, "Fatal startup error");
  process.exit(1);
});
