// Fixed strings and defaults shared across the bot.

export const OCR = {
  PROMPT:
    "Extract and transcribe any Persian text in this image. Return ONLY the Persian text, no explanations.",
  /** Zoom applied when rasterizing PDF pages. */
  PAGE_RENDER_SCALE: 2,
  DEFAULT_PAGE_CAP: 3,
  DEFAULT_PAGE_DELAY_MS: 1000,
} as const;

export const FAILOVER = {
  DEFAULT_RETRY_FACTOR: 3,
  DEFAULT_BACKOFF_MS: 2000,
  DEFAULT_MODELS: ["gemini-2.5-flash", "gemini-2.5-pro", "gemini-2.0-flash"],
} as const;

export const MESSAGING = {
  DEFAULT_CHUNK_SIZE: 4000,
  MIN_CHUNK_SIZE: 2,
  /** Telegram rejects text messages longer than this. */
  MAX_MESSAGE_LENGTH: 4096,
  CONTINUATION_MARKER: "(continued...)",
} as const;

export const MAIL = {
  SUBJECT: "Extracted Persian Text",
  DEFAULT_HOST: "smtp.gmail.com",
  DEFAULT_PORT: 465,
} as const;

export const ACTION = {
  SEND_EMAIL_PREFIX: "send_email:",
  SEND_EMAIL_LABEL: "Send to Email",
} as const;
