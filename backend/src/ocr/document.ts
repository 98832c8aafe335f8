// PDF input: temp-file scope and page rasterization through MuPDF.

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { PageSource } from "./pipeline";
import { OCR } from "../constants";
import { ocrLog } from "../logger";

export interface PdfDocument extends PageSource {
  close(): void;
}

export type DocumentOpener = (filePath: string) => Promise<PdfDocument>;

/**
 * Write `bytes` to a fresh temp file, run `fn` with its path and delete the file afterwards,
 * whether `fn` resolved or threw.
 */
export async function withTempFile<T>(
  bytes: Uint8Array,
  suffix: string,
  fn: (filePath: string) => Promise<T>,
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "parsi-ocr-"));
  const filePath = join(dir, `input${suffix}`);
  try {
    await writeFile(filePath, bytes);
    return await fn(filePath);
  } finally {
    await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
      ocrLog.error({ dir, error: String(err) }, "Could not remove temp directory");
    });
  }
}

/** Open a PDF from disk; pages render as PNG at 2× zoom. */
export async function openPdf(filePath: string): Promise<PdfDocument> {
  const mupdf = await import("mupdf");
  const data = await readFile(filePath);
  const doc = mupdf.Document.openDocument(data, "application/pdf");
  const scale = OCR.PAGE_RENDER_SCALE;

  return {
    pageCount: doc.countPages(),
    async renderPage(pageIndex) {
      const page = doc.loadPage(pageIndex);
      try {
        const pixmap = page.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false, true);
        try {
          return { mimeType: "image/png", base64: Buffer.from(pixmap.asPNG()).toString("base64") };
        } finally {
          pixmap.destroy();
        }
      } finally {
        page.destroy();
      }
    },
    close() {
      doc.destroy();
    },
  };
}

export function isPdf(fileName: string | undefined, mimeType: string | undefined): boolean {
  if (mimeType === "application/pdf") return true;
  return fileName?.toLowerCase().endsWith(".pdf") ?? false;
}
