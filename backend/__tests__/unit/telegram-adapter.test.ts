/**
 * Unit Tests: Telegram file download
 */

import { describe, it, expect } from "vitest";
import { TelegramAdapter } from "../../src/messaging/telegram-adapter";

function fileApi(filePath: string | undefined) {
  return {
    getFile: async (fileId: string) => ({ file_id: fileId, file_unique_id: "unique-1", file_path: filePath }),
  };
}

function recordingFetch(response: () => Response) {
  const urls: string[] = [];
  const fetchImpl = async (input: string | URL | Request): Promise<Response> => {
    urls.push(String(input));
    return response();
  };
  return { urls, fetchImpl };
}

describe("TelegramAdapter.download", () => {
  it("resolves the file path and fetches the bytes with the bot token", async () => {
    const { urls, fetchImpl } = recordingFetch(() => new Response(new Uint8Array([9, 8, 7])));
    const adapter = new TelegramAdapter("test-token", fetchImpl);

    const bytes = await adapter.download(fileApi("photos/file_1.jpg"), "file-id-1");

    expect(Array.from(bytes)).toEqual([9, 8, 7]);
    expect(urls).toEqual(["https://api.telegram.org/file/bottest-token/photos/file_1.jpg"]);
  });

  it("fails when Telegram gives no download path", async () => {
    const { urls, fetchImpl } = recordingFetch(() => new Response(""));
    const adapter = new TelegramAdapter("test-token", fetchImpl);

    await expect(adapter.download(fileApi(undefined), "file-id-2")).rejects.toThrow(
      "Telegram returned no download path for file file-id-2",
    );
    expect(urls).toEqual([]);
  });

  it("fails on a non-OK response", async () => {
    const { fetchImpl } = recordingFetch(() => new Response("gone", { status: 404, statusText: "Not Found" }));
    const adapter = new TelegramAdapter("test-token", fetchImpl);

    await expect(adapter.download(fileApi("documents/file_2.pdf"), "file-id-3")).rejects.toThrow(
      "Telegram file download failed: 404 Not Found",
    );
  });

  it("builds attachments that download lazily", async () => {
    const { urls, fetchImpl } = recordingFetch(() => new Response(new Uint8Array([1])));
    const adapter = new TelegramAdapter("test-token", fetchImpl);

    const attachment = adapter.attachment(fileApi("documents/scan.pdf"), "file-id-4", {
      fileName: "scan.pdf",
      mimeType: "application/pdf",
    });

    expect(attachment.fileName).toBe("scan.pdf");
    expect(attachment.mimeType).toBe("application/pdf");
    expect(urls).toEqual([]);
    expect(Array.from(await attachment.download())).toEqual([1]);
  });
});
