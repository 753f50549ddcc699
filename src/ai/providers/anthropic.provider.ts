import fetch from "node-fetch";
import { Logger } from "../../config/logger";
import { LlmProvider } from "../llm.provider";
import { RECRUITING_ANALYST_SYSTEM_PROMPT } from "../system/recruiting-analyst.system";

interface MessagesResponse {
  content?: Array<{
    type: string;
    text?: string;
  }>;
}

const ANTHROPIC_VERSION = "2023-06-01";

export class AnthropicProvider implements LlmProvider {
  readonly name = "anthropic" as const;

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly maxTokens: number,
    private readonly logger: Logger,
    private readonly apiUrl = "https://api.anthropic.com/v1/messages",
  ) {}

  getModelName(): string {
    return this.model;
  }

  async send(prompt: string): Promise<string> {
    const startedAt = Date.now();
    const response = await fetch(this.apiUrl, {
      method: "POST",
      headers: {
        "x-api-key": this.apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: this.maxTokens,
        system: RECRUITING_ANALYST_SYSTEM_PROMPT,
        messages: [{ role: "user", content: prompt }],
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Anthropic API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as MessagesResponse;
    const text = (body.content ?? [])
      .filter((block) => block.type === "text" && typeof block.text === "string")
      .map((block) => block.text ?? "")
      .join("")
      .trim();
    if (!text) {
      throw new Error("Anthropic response does not contain text content");
    }

    this.logger.debug("llm.call.completed", {
      provider: this.name,
      model_name: this.model,
      latency_ms: Date.now() - startedAt,
    });
    return text;
  }
}
