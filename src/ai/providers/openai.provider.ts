import fetch from "node-fetch";
import { Logger } from "../../config/logger";
import { LlmProvider } from "../llm.provider";
import { RECRUITING_ANALYST_SYSTEM_PROMPT } from "../system/recruiting-analyst.system";

interface ChatCompletionsResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export class OpenAiProvider implements LlmProvider {
  readonly name = "openai" as const;

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly maxTokens: number,
    private readonly logger: Logger,
    private readonly apiUrl = "https://api.openai.com/v1/chat/completions",
  ) {}

  getModelName(): string {
    return this.model;
  }

  async send(prompt: string): Promise<string> {
    const startedAt = Date.now();
    const response = await fetch(this.apiUrl, {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        temperature: 0.7,
        max_tokens: this.maxTokens,
        messages: [
          { role: "system", content: RECRUITING_ANALYST_SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`OpenAI API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as ChatCompletionsResponse;
    const content = body.choices?.[0]?.message?.content;
    if (!content || !content.trim()) {
      throw new Error("OpenAI response does not contain message content");
    }

    this.logger.debug("llm.call.completed", {
      provider: this.name,
      model_name: this.model,
      latency_ms: Date.now() - startedAt,
    });
    return content.trim();
  }
}
