// Telegram channel adapter: exposes a grammy update as a ConversationChannel.
// Conversation id format: telegram-<chatId> so one chat = one conversation.

import { InlineKeyboard, type Api, type Context } from "grammy";
import type { ActionChannel, Attachment, ConversationChannel } from "./types";
import { CHANNEL_PREFIX } from "./types";
import { MESSAGING } from "../constants";
import { telegramLog } from "../logger";

const FILE_BASE = "https://api.telegram.org/file/bot";

type FetchImpl = typeof fetch;
type FileApi = Pick<Api, "getFile">;

export class TelegramAdapter {
  readonly channelId = "telegram";

  constructor(
    private readonly token: string,
    private readonly fetchImpl: FetchImpl = fetch,
  ) {}

  channelFor(ctx: Context): ConversationChannel {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) throw new Error("Telegram update has no chat");
    const api = ctx.api;

    return {
      channelId: this.channelId,
      conversationId: `${CHANNEL_PREFIX.telegram}${chatId}`,
      userId: ctx.from?.id,
      async reply(text, button) {
        if (text.length > MESSAGING.MAX_MESSAGE_LENGTH) {
          telegramLog.warn({ chatId, length: text.length }, "Outgoing message exceeds Telegram limit");
        }
        const message = await api.sendMessage(
          chatId,
          text,
          button ? { reply_markup: new InlineKeyboard().text(button.label, button.data) } : undefined,
        );
        return { messageId: message.message_id };
      },
      async deleteMessage(messageId) {
        await api.deleteMessage(chatId, messageId);
      },
    };
  }

  actionChannelFor(ctx: Context): ActionChannel {
    return {
      ...this.channelFor(ctx),
      async acknowledge() {
        await ctx.answerCallbackQuery();
      },
      async clearAction() {
        await ctx.editMessageReplyMarkup({ reply_markup: { inline_keyboard: [] } });
      },
    };
  }

  attachment(api: FileApi, fileId: string, meta: { fileName?: string; mimeType?: string } = {}): Attachment {
    return {
      ...meta,
      download: () => this.download(api, fileId),
    };
  }

  /** Resolve a file id to its download path and fetch the bytes. */
  async download(api: FileApi, fileId: string): Promise<Uint8Array> {
    const file = await api.getFile(fileId);
    if (!file.file_path) {
      throw new Error(`Telegram returned no download path for file ${fileId}`);
    }
    const res = await this.fetchImpl(`${FILE_BASE}${this.token}/${file.file_path}`);
    if (!res.ok) {
      throw new Error(`Telegram file download failed: ${res.status} ${res.statusText}`);
    }
    const bytes = new Uint8Array(await res.arrayBuffer());
    telegramLog.debug({ fileId, bytes: bytes.byteLength }, "Downloaded attachment");
    return bytes;
  }
}
