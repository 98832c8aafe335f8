// Input validation schemas using Zod for type-safe configuration parsing

import { z } from "zod";
import { FAILOVER, MAIL, MESSAGING, OCR } from "../constants";

// ─── Helpers ─────────────────────────────────────────────────────────────────

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Treat an empty env var the same as an unset one. */
function blankAsUnset(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

function positiveInt(fallback: number, max?: number) {
  const base = z.coerce.number().int().positive();
  return z.preprocess(blankAsUnset, (max === undefined ? base : base.max(max)).default(fallback));
}

/** Outbound segment size; the splitter needs room for a whole surrogate pair. */
const ChunkSizeSchema = z.preprocess(
  blankAsUnset,
  z.coerce
    .number()
    .int()
    .min(MESSAGING.MIN_CHUNK_SIZE)
    .max(MESSAGING.MAX_MESSAGE_LENGTH)
    .default(MESSAGING.DEFAULT_CHUNK_SIZE),
);

function nonNegativeInt(fallback: number) {
  return z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback));
}

// ─── Common Schemas ──────────────────────────────────────────────────────────

const RequiredString = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

export const AuthorizedUsersSchema = z
  .preprocess(blankAsUnset, z.string().default(""))
  .transform(splitList)
  .pipe(z.array(z.coerce.number().int("User ids must be integers")));

export const ModelPoolSchema = z
  .preprocess(blankAsUnset, z.string().optional())
  .transform((value) => (value === undefined ? [...FAILOVER.DEFAULT_MODELS] : splitList(value)))
  .pipe(z.array(z.string().min(1)).min(1, "GEMINI_MODELS must name at least one model"));

export const LogLevelSchema = z
  .preprocess(blankAsUnset, z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"));

// ─── Environment ─────────────────────────────────────────────────────────────

export const EnvSchema = z.object({
  TELEGRAM_TOKEN: RequiredString("TELEGRAM_TOKEN"),
  GOOGLE_API_KEY: RequiredString("GOOGLE_API_KEY"),
  EMAIL_ADDRESS: RequiredString("EMAIL_ADDRESS"),
  EMAIL_PASSWORD: RequiredString("EMAIL_PASSWORD"),
  USER_EMAIL: RequiredString("USER_EMAIL").pipe(z.string().email("USER_EMAIL must be an email address")),
  AUTHORIZED_USERS: AuthorizedUsersSchema,
  GEMINI_MODELS: ModelPoolSchema,
  PDF_PAGE_CAP: positiveInt(OCR.DEFAULT_PAGE_CAP),
  RETRY_FACTOR: positiveInt(FAILOVER.DEFAULT_RETRY_FACTOR),
  RETRY_BACKOFF_MS: nonNegativeInt(FAILOVER.DEFAULT_BACKOFF_MS),
  PAGE_DELAY_MS: nonNegativeInt(OCR.DEFAULT_PAGE_DELAY_MS),
  CHUNK_SIZE: ChunkSizeSchema,
  SMTP_HOST: z.preprocess(blankAsUnset, z.string().default(MAIL.DEFAULT_HOST)),
  SMTP_PORT: positiveInt(MAIL.DEFAULT_PORT, 65535),
  LOG_LEVEL: LogLevelSchema,
});

export type ParsedEnv = z.infer<typeof EnvSchema>;
