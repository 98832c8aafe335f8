// Messaging: conversation channel types.
// The Telegram adapter implements these; the OCR manager only talks to this surface.

export const CHANNEL_PREFIX = {
  telegram: "telegram-",
} as const;

export type ChannelId = keyof typeof CHANNEL_PREFIX;

export interface SentMessage {
  messageId: number;
}

/** A single inline button bound to an opaque payload. */
export interface ActionButton {
  label: string;
  data: string;
}

/** One conversation as seen from a single inbound event. */
export interface ConversationChannel {
  readonly channelId: ChannelId;
  /** Stable per chat, e.g. telegram-<chatId>. Keys the result ledger. */
  readonly conversationId: string;
  /** Sender of the event being handled, if known. */
  readonly userId: number | undefined;

  reply(text: string, button?: ActionButton): Promise<SentMessage>;
  deleteMessage(messageId: number): Promise<void>;
}

/** Extra surface available while handling a button tap. */
export interface ActionChannel extends ConversationChannel {
  /** Acknowledge the tap so the client stops its spinner. */
  acknowledge(): Promise<void>;
  /** Remove the button from the message that carried it. */
  clearAction(): Promise<void>;
}

/** An inbound file the channel can fetch on demand. */
export interface Attachment {
  fileName?: string;
  mimeType?: string;
  download(): Promise<Uint8Array>;
}
