// Process configuration: validated once at startup, immutable afterwards.

import type { ZodIssue } from "zod";
import { EnvSchema } from "../validation/schemas";

export interface AppConfig {
  telegram: {
    token: string;
    /** Telegram user ids allowed to use the bot. */
    authorizedUsers: readonly number[];
  };
  gemini: {
    apiKey: string;
    /** Ordered failover pool. */
    models: readonly string[];
    retryFactor: number;
    backoffMs: number;
  };
  ocr: {
    pageCap: number;
    pageDelayMs: number;
    chunkSize: number;
  };
  mail: {
    host: string;
    port: number;
    /** Sender address, also the SMTP login. */
    address: string;
    password: string;
    /** Fixed destination for "Send to Email". */
    destination: string;
  };
  logLevel: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

function formatIssue(issue: ZodIssue): string {
  const key = issue.path.join(".");
  return key ? `${key}: ${issue.message}` : issue.message;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const inner of Object.values(value)) {
    if (inner && typeof inner === "object" && !Object.isFrozen(inner)) deepFreeze(inner);
  }
  return Object.freeze(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }
  const e = result.data;

  return deepFreeze<AppConfig>({
    telegram: {
      token: e.TELEGRAM_TOKEN,
      authorizedUsers: e.AUTHORIZED_USERS,
    },
    gemini: {
      apiKey: e.GOOGLE_API_KEY,
      models: e.GEMINI_MODELS,
      retryFactor: e.RETRY_FACTOR,
      backoffMs: e.RETRY_BACKOFF_MS,
    },
    ocr: {
      pageCap: e.PDF_PAGE_CAP,
      pageDelayMs: e.PAGE_DELAY_MS,
      chunkSize: e.CHUNK_SIZE,
    },
    mail: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      address: e.EMAIL_ADDRESS,
      password: e.EMAIL_PASSWORD,
      destination: e.USER_EMAIL,
    },
    logLevel: e.LOG_LEVEL,
  });
}
