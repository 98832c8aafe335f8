// Google provider: single-shot multimodal generateContent through Google's GenAI SDK.
// The model name is chosen per call by the failover engine.

import { GoogleGenAI } from "@google/genai";
import type { InputImage, TextExtractionProvider } from "./types";

export interface GeminiProviderConfig {
  apiKey: string;
}

export class GeminiProvider implements TextExtractionProvider {
  readonly name = "google";
  private readonly client: GoogleGenAI;

  constructor(config: GeminiProviderConfig) {
    this.client = new GoogleGenAI({ apiKey: config.apiKey });
  }

  async generateText(model: string, prompt: string, image: InputImage): Promise<string> {
    const response = await this.client.models.generateContent({
      model,
      contents: [
        {
          role: "user",
          parts: [
            { text: prompt },
            { inlineData: { mimeType: image.mimeType, data: image.base64 } },
          ],
        },
      ],
    });
    return response.text ?? "";
  }
}
