// Root pino logger and per-subsystem children.
// Every log call takes structured context first and the message second.

import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "parsi-ocr" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const serverLog = logger.child({ module: "server" });
export const telegramLog = logger.child({ module: "telegram" });
export const providerLog = logger.child({ module: "provider" });
export const ocrLog = logger.child({ module: "ocr" });
export const mailLog = logger.child({ module: "mail" });
