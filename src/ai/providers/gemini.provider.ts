import fetch from "node-fetch";
import { Logger } from "../../config/logger";
import { LlmProvider } from "../llm.provider";
import { RECRUITING_ANALYST_SYSTEM_PROMPT } from "../system/recruiting-analyst.system";

interface GenerateContentResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
}

export class GeminiProvider implements LlmProvider {
  readonly name = "gemini" as const;

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly maxTokens: number,
    private readonly logger: Logger,
    private readonly apiBase = "https://generativelanguage.googleapis.com/v1beta",
  ) {}

  getModelName(): string {
    return this.model;
  }

  async send(prompt: string): Promise<string> {
    const startedAt = Date.now();
    const url = `${this.apiBase}/models/${encodeURIComponent(this.model)}:generateContent`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "x-goog-api-key": this.apiKey,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        systemInstruction: { parts: [{ text: RECRUITING_ANALYST_SYSTEM_PROMPT }] },
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        generationConfig: { maxOutputTokens: this.maxTokens },
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Gemini API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as GenerateContentResponse;
    const text = (body.candidates?.[0]?.content?.parts ?? [])
      .map((part) => part.text ?? "")
      .join("")
      .trim();
    if (!text) {
      throw new Error("Gemini response does not contain text content");
    }

    this.logger.debug("llm.call.completed", {
      provider: this.name,
      model_name: this.model,
      latency_ms: Date.now() - startedAt,
    });
    return text;
  }
}
