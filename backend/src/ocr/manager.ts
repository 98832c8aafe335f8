// OCR manager: handles one inbound event for one conversation.
// Authorization comes first; every failure ends as a message to the user, never as a thrown error.

import type { ActionChannel, Attachment, ConversationChannel, SentMessage } from "../messaging/types";
import type { DeliveryBoundary } from "../mail/mailer";
import type { ModelPool } from "../providers/registry";
import type { AttemptListener } from "../providers/types";
import { ExtractionError } from "../providers/errors";
import { NotFoundError, type ResultLedgerStore } from "../stores/result-ledger";
import { chunkText } from "../messaging/chunk";
import { type DocumentOpener, isPdf, withTempFile } from "./document";
import { type DocumentProgressListener, type ExtractionPipeline, renderDocumentText } from "./pipeline";
import { type ExtractionSource, decodeSendEmailAction, encodeSendEmailAction, makeHandle } from "./handles";
import { ACTION, MAIL, MESSAGING } from "../constants";
import { ocrLog } from "../logger";

export const REPLIES = {
  WELCOME:
    "Welcome to the Persian OCR Bot! Send me images or PDFs containing Persian text, " +
    "and I'll extract the text for you.\n" +
    "After each extraction, you'll see a button to send the result to your email.",
  HELP:
    "Send me an image or PDF containing Persian text and I'll extract it.\n" +
    "Commands:\n" +
    "/start - Start the bot\n" +
    "/help - Get help information\n" +
    "/status - Show model usage\n\n" +
    "After each extraction, you'll see a button to send the result to your email.",
  UNAUTHORIZED: "Sorry, you are not authorized to use this bot.",
  PROCESSING_IMAGE: "Processing your image...",
  PROCESSING_PDF: "Processing your PDF...",
  NOT_A_PDF: "Please send a PDF document.",
  IMAGE_HEADER: "✅ Extracted Persian Text:",
  PDF_HEADER: "✅ Extracted Persian Text from PDF:",
  NO_TEXT_IMAGE: "No Persian text detected in the image.",
  NO_TEXT_PDF: "No Persian text detected in the PDF.",
  OFFER_EMAIL: "Would you like to send this text to your email?",
  NOT_FOUND: "❌ Could not find the extracted text.",
  SEND_FAILED: "❌ Failed to send email. Please check the logs.",
} as const;

type InputKind = "image" | "PDF";

export interface OcrManagerOptions {
  pipeline: ExtractionPipeline;
  pool: ModelPool;
  ledgers: ResultLedgerStore;
  delivery: DeliveryBoundary;
  openDocument: DocumentOpener;
  authorizedUsers: readonly number[];
  /** Fixed "Send to Email" destination. */
  destination: string;
  chunkSize?: number;
}

export class OcrManager {
  private readonly pipeline: ExtractionPipeline;
  private readonly pool: ModelPool;
  private readonly ledgers: ResultLedgerStore;
  private readonly delivery: DeliveryBoundary;
  private readonly openDocument: DocumentOpener;
  private readonly authorized: ReadonlySet<number>;
  private readonly destination: string;
  private readonly chunkSize: number;

  constructor(options: OcrManagerOptions) {
    this.pipeline = options.pipeline;
    this.pool = options.pool;
    this.ledgers = options.ledgers;
    this.delivery = options.delivery;
    this.openDocument = options.openDocument;
    this.authorized = new Set(options.authorizedUsers);
    this.destination = options.destination;
    this.chunkSize = options.chunkSize ?? MESSAGING.DEFAULT_CHUNK_SIZE;
  }

  isAuthorized(userId: number | undefined): boolean {
    return userId !== undefined && this.authorized.has(userId);
  }

  // ─── Commands ──────────────────────────────────────────────────────────────

  async start(channel: ConversationChannel): Promise<void> {
    if (!(await this.authorize(channel))) return;
    await channel.reply(REPLIES.WELCOME);
  }

  async help(channel: ConversationChannel): Promise<void> {
    if (!(await this.authorize(channel, { quiet: true }))) return;
    await channel.reply(REPLIES.HELP);
  }

  async status(channel: ConversationChannel): Promise<void> {
    if (!(await this.authorize(channel))) return;
    const { cursor, models } = this.pool.snapshot();
    const lines = models.map((m, i) => {
      const marker = i === cursor ? "▶" : "•";
      const lastUsed = m.lastUsedAt === null ? "never" : new Date(m.lastUsedAt).toISOString();
      return `${marker} ${m.name}: ${m.requestCount} requests, ${m.errorCount} errors, last used ${lastUsed}`;
    });
    await channel.reply(`📊 Model pool\n\n${lines.join("\n")}`);
  }

  // ─── Extraction ────────────────────────────────────────────────────────────

  async handlePhoto(channel: ConversationChannel, photo: Attachment): Promise<void> {
    if (!(await this.authorize(channel))) return;

    const processing = await channel.reply(REPLIES.PROCESSING_IMAGE);
    try {
      const bytes = await photo.download();
      const image = { mimeType: photo.mimeType ?? "image/jpeg", base64: Buffer.from(bytes).toString("base64") };
      const text = await this.pipeline.extractImage(image, this.attemptNotices(channel));

      if (!text.trim()) {
        await channel.reply(REPLIES.NO_TEXT_IMAGE);
        return;
      }
      await this.sendResult(channel, "img", REPLIES.IMAGE_HEADER, text);
    } catch (err) {
      await this.reportFailure(channel, "image", err);
    } finally {
      await this.dropMessage(channel, processing.messageId);
    }
  }

  async handleDocument(channel: ConversationChannel, document: Attachment): Promise<void> {
    if (!(await this.authorize(channel))) return;

    if (!isPdf(document.fileName, document.mimeType)) {
      await channel.reply(REPLIES.NOT_A_PDF);
      return;
    }

    const processing = await channel.reply(REPLIES.PROCESSING_PDF);
    try {
      const bytes = await document.download();
      const results = await withTempFile(bytes, ".pdf", async (filePath) => {
        await channel.reply(`Opening PDF... (${document.fileName ?? "document.pdf"})`);
        const pdf = await this.openDocument(filePath);
        try {
          await channel.reply(`Found ${pdf.pageCount} pages. Processing...`);
          return await this.pipeline.extractDocument(pdf, this.pageNotices(channel));
        } finally {
          pdf.close();
        }
      });

      const text = renderDocumentText(results);
      if (!text.trim()) {
        await channel.reply(REPLIES.NO_TEXT_PDF);
        return;
      }
      await this.sendResult(channel, "pdf", REPLIES.PDF_HEADER, text);
    } catch (err) {
      await this.reportFailure(channel, "PDF", err);
    } finally {
      await this.dropMessage(channel, processing.messageId);
    }
  }

  // ─── Send to Email ─────────────────────────────────────────────────────────

  async handleAction(channel: ActionChannel, data: string): Promise<void> {
    // Telegram refuses answers to stale taps; the tap itself is still honoured.
    await channel.acknowledge().catch((err: unknown) => {
      ocrLog.warn({ err, conversationId: channel.conversationId }, "Could not answer the button tap");
    });
    if (!(await this.authorize(channel))) return;

    const handle = decodeSendEmailAction(data);
    if (handle === null) {
      ocrLog.debug({ data, conversationId: channel.conversationId }, "Ignoring unknown action");
      return;
    }

    let text: string;
    try {
      text = this.retrieveResult(channel.conversationId, handle);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      ocrLog.warn({ handle, conversationId: channel.conversationId }, "Extraction handle not in ledger");
      await channel.reply(REPLIES.NOT_FOUND);
      return;
    }

    const delivered = await this.delivery.send(this.destination, MAIL.SUBJECT, text).catch((err: unknown) => {
      ocrLog.error({ err, handle }, "Delivery raised instead of reporting failure");
      return false;
    });

    if (!delivered) {
      // The button stays so the user can tap again.
      await channel.reply(REPLIES.SEND_FAILED);
      return;
    }

    await channel.clearAction().catch((err: unknown) => {
      ocrLog.warn({ err, handle }, "Could not remove the send button");
    });
    await channel.reply(`✅ Text sent to ${this.destination}`);
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async authorize(channel: ConversationChannel, opts: { quiet?: boolean } = {}): Promise<boolean> {
    if (this.isAuthorized(channel.userId)) return true;
    ocrLog.warn({ userId: channel.userId, conversationId: channel.conversationId }, "Blocked unauthorized user");
    if (!opts.quiet) await channel.reply(REPLIES.UNAUTHORIZED);
    return false;
  }

  private retrieveResult(conversationId: string, handle: string): string {
    const ledger = this.ledgers.peek(conversationId);
    if (!ledger) throw new NotFoundError(handle);
    return ledger.retrieve(handle);
  }

  /** Header, chunks with continuation markers, then the ledger entry and its button. */
  private async sendResult(
    channel: ConversationChannel,
    source: ExtractionSource,
    header: string,
    text: string,
  ): Promise<void> {
    await channel.reply(header);

    const chunks = chunkText(text, this.chunkSize);
    let last: SentMessage | undefined;
    for (const [i, chunk] of chunks.entries()) {
      last = await channel.reply(chunk);
      if (i < chunks.length - 1) await channel.reply(MESSAGING.CONTINUATION_MARKER);
    }
    if (!last) return;

    const handle = makeHandle(source, last.messageId);
    this.ledgers.forConversation(channel.conversationId).store(handle, text);
    ocrLog.info({ handle, conversationId: channel.conversationId, length: text.length }, "Extraction stored");

    await channel.reply(REPLIES.OFFER_EMAIL, {
      label: ACTION.SEND_EMAIL_LABEL,
      data: encodeSendEmailAction(handle),
    });
  }

  private attemptNotices(channel: ConversationChannel): AttemptListener {
    return {
      onAttempt: (model, attempt) =>
        this.notify(
          channel,
          attempt === 1 ? `Extracting Persian text with ${model}...` : `Retrying with ${model} (attempt ${attempt})...`,
        ),
    };
  }

  private pageNotices(channel: ConversationChannel): DocumentProgressListener {
    let page = 0;
    let total = 0;
    return {
      onPageStart: (pageNumber, pageTotal) => {
        page = pageNumber;
        total = pageTotal;
      },
      onAttempt: (model, attempt) =>
        this.notify(
          channel,
          attempt === 1
            ? `Processing page ${page}/${total} with ${model}...`
            : `Retrying page ${page} with ${model} (attempt ${attempt})...`,
        ),
      onPageResult: (result) => {
        const n = result.pageIndex + 1;
        if ("error" in result) return this.notify(channel, `Error on page ${n}: ${result.error}`);
        return this.notify(channel, result.text.trim() ? `Page ${n} text extracted` : `No text found on page ${n}`);
      },
    };
  }

  private async reportFailure(channel: ConversationChannel, kind: InputKind, err: unknown): Promise<void> {
    if (err instanceof ExtractionError) {
      ocrLog.warn({ conversationId: channel.conversationId, kind, error: err.message, name: err.name }, "Extraction failed");
      await this.notify(channel, `Error processing ${kind}: ${err.message}`);
      return;
    }
    ocrLog.error({ err, conversationId: channel.conversationId, kind }, "Unexpected error while processing input");
    await this.notify(channel, `Error processing ${kind}: unexpected failure, please try again.`);
  }

  /** Progress and error replies; a failed send is logged and does not abort the request. */
  private async notify(channel: ConversationChannel, text: string): Promise<void> {
    try {
      await channel.reply(text);
    } catch (err) {
      ocrLog.warn({ err, conversationId: channel.conversationId }, "Status message failed");
    }
  }

  private async dropMessage(channel: ConversationChannel, messageId: number): Promise<void> {
    try {
      await channel.deleteMessage(messageId);
    } catch (err) {
      ocrLog.debug({ err, messageId }, "Could not delete status message");
    }
  }
}
