// Extraction handles and the button payload that carries them.

import { ACTION } from "../constants";

export type ExtractionSource = "img" | "pdf";

/** Handle for a result whose last outbound chunk has the given message id. */
export function makeHandle(source: ExtractionSource, messageId: number): string {
  return `${source}_${messageId}`;
}

export function encodeSendEmailAction(handle: string): string {
  return `${ACTION.SEND_EMAIL_PREFIX}${handle}`;
}

/** Returns the handle, or null when the payload is not a send-to-email action. */
export function decodeSendEmailAction(data: string): string | null {
  if (!data.startsWith(ACTION.SEND_EMAIL_PREFIX)) return null;
  const handle = data.slice(ACTION.SEND_EMAIL_PREFIX.length);
  return handle.length > 0 ? handle : null;
}
