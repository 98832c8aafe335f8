// Extraction Pipeline: one image, or the first pages of a document, through the failover engine.

import type { AttemptListener, InputImage, TextExtractor } from "../providers/types";
import { ExtractionError } from "../providers/errors";
import { sleep as defaultSleep } from "../providers/utils";
import { OCR } from "../constants";
import { ocrLog } from "../logger";

/** A document whose pages can be rendered to images on demand. */
export interface PageSource {
  readonly pageCount: number;
  renderPage(pageIndex: number): Promise<InputImage>;
}

export type PerPageResult =
  | { pageIndex: number; text: string }
  | { pageIndex: number; error: string };

export interface DocumentProgressListener extends AttemptListener {
  onPageStart?(pageNumber: number, total: number): void | Promise<void>;
  onPageResult?(result: PerPageResult): void | Promise<void>;
}

export interface PipelineOptions {
  pageCap?: number;
  pageDelayMs?: number;
  prompt?: string;
  sleep?: (ms: number) => Promise<void>;
}

export class ExtractionPipeline {
  readonly pageCap: number;
  private readonly pageDelayMs: number;
  private readonly prompt: string;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly extractor: TextExtractor,
    options: PipelineOptions = {},
  ) {
    this.pageCap = options.pageCap ?? OCR.DEFAULT_PAGE_CAP;
    this.pageDelayMs = options.pageDelayMs ?? OCR.DEFAULT_PAGE_DELAY_MS;
    this.prompt = options.prompt ?? OCR.PROMPT;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Raw model output, verbatim (may be empty). */
  extractImage(image: InputImage, listener?: AttemptListener): Promise<string> {
    return this.extractor.extract(image, this.prompt, listener);
  }

  /**
   * Extract the first `pageCap` pages in order. A page whose extraction fails records the
   * error and the remaining pages are still attempted.
   */
  async extractDocument(pages: PageSource, listener?: DocumentProgressListener): Promise<PerPageResult[]> {
    const total = Math.min(pages.pageCount, this.pageCap);
    const results: PerPageResult[] = [];

    for (let pageIndex = 0; pageIndex < total; pageIndex++) {
      if (pageIndex > 0 && this.pageDelayMs > 0) {
        await this.sleep(this.pageDelayMs);
      }
      await listener?.onPageStart?.(pageIndex + 1, total);

      const image = await pages.renderPage(pageIndex);
      let result: PerPageResult;
      try {
        result = { pageIndex, text: await this.extractImage(image, listener) };
      } catch (err) {
        if (!(err instanceof ExtractionError)) throw err;
        ocrLog.warn({ page: pageIndex + 1, error: err.message }, "Page extraction failed");
        result = { pageIndex, error: err.message };
      }

      results.push(result);
      await listener?.onPageResult?.(result);
    }

    return results;
  }
}

/** One text blob with a banner per page, in page order. */
export function renderDocumentText(results: readonly PerPageResult[]): string {
  let out = "";
  for (const result of [...results].sort((a, b) => a.pageIndex - b.pageIndex)) {
    const pageNumber = result.pageIndex + 1;
    if ("error" in result) {
      out += `\n--- Page ${pageNumber}: Error processing - ${result.error} ---\n`;
      continue;
    }
    const text = result.text.trim();
    out += text
      ? `\n--- Page ${pageNumber} ---\n${text}\n`
      : `\n--- Page ${pageNumber}: No text detected ---\n`;
  }
  return out;
}
