// Telegram bridge: maps grammy updates onto the OCR manager.
// Updates from one chat run in order; different chats are handled concurrently.

import { Bot } from "grammy";
import { run, sequentialize, type RunnerHandle } from "@grammyjs/runner";
import type { OcrManager } from "../ocr/manager";
import type { TelegramAdapter } from "../messaging/telegram-adapter";
import { telegramLog } from "../logger";

export interface TelegramConfig {
  botToken: string;
}

export class TelegramBridge {
  private readonly bot: Bot;
  private runner: RunnerHandle | null = null;

  constructor(
    config: TelegramConfig,
    private readonly manager: OcrManager,
    private readonly adapter: TelegramAdapter,
  ) {
    this.bot = new Bot(config.botToken);
    this.setupHandlers();
  }

  private setupHandlers() {
    this.bot.use(sequentialize((ctx) => ctx.chat?.id.toString()));

    this.bot.command("start", (ctx) => this.manager.start(this.adapter.channelFor(ctx)));
    this.bot.command("help", (ctx) => this.manager.help(this.adapter.channelFor(ctx)));
    this.bot.command("status", (ctx) => this.manager.status(this.adapter.channelFor(ctx)));

    this.bot.on("callback_query:data", (ctx) =>
      this.manager.handleAction(this.adapter.actionChannelFor(ctx), ctx.callbackQuery.data),
    );

    this.bot.on("message:photo", async (ctx) => {
      // Telegram lists sizes smallest first.
      const photo = ctx.message.photo.at(-1);
      if (!photo) return;
      await this.manager.handlePhoto(
        this.adapter.channelFor(ctx),
        this.adapter.attachment(ctx.api, photo.file_id, { mimeType: "image/jpeg" }),
      );
    });

    this.bot.on("message:document", async (ctx) => {
      const doc = ctx.message.document;
      await this.manager.handleDocument(
        this.adapter.channelFor(ctx),
        this.adapter.attachment(ctx.api, doc.file_id, { fileName: doc.file_name, mimeType: doc.mime_type }),
      );
    });

    this.bot.catch((err) => {
      telegramLog.error({ err: err.error, updateId: err.ctx.update.update_id }, "Unhandled error in Telegram handler");
    });
  }

  async startPolling(): Promise<void> {
    await this.bot.init();
    telegramLog.info({ username: this.bot.botInfo.username }, "Telegram bot started");
    this.runner = run(this.bot);
  }

  async stop(): Promise<void> {
    if (this.runner?.isRunning()) {
      await this.runner.stop();
    }
    this.runner = null;
    telegramLog.info("Telegram bot stopped");
  }
}
