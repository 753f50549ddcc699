import { LlmProvider } from "../../ai/llm.provider";
import { EnvConfig } from "../../config/env";
import { Logger } from "../../config/logger";

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface CapturedLog {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  meta?: Record<string, unknown>;
}

export function createCapturingLogger(): { logger: Logger; entries: CapturedLog[] } {
  const entries: CapturedLog[] = [];
  return {
    entries,
    logger: {
      debug(message, meta) {
        entries.push({ level: "debug", message, meta });
      },
      info(message, meta) {
        entries.push({ level: "info", message, meta });
      },
      warn(message, meta) {
        entries.push({ level: "warn", message, meta });
      },
      error(message, meta) {
        entries.push({ level: "error", message, meta });
      },
    },
  };
}

export type ScriptedReply = string | Error;

/** Replays the given replies in order; the last one repeats once the script runs out. */
export class ScriptedLlmProvider implements LlmProvider {
  public readonly name = "openai" as const;
  public readonly prompts: string[] = [];
  private index = 0;

  constructor(private readonly replies: ScriptedReply[]) {}

  getModelName(): string {
    return "scripted-model";
  }

  async send(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies[Math.min(this.index, this.replies.length - 1)];
    this.index += 1;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    async sleep(ms: number) {
      delays.push(ms);
    },
  };
}

export const FIXED_NOW = new Date("2024-06-15T12:00:00.000Z");

export function testEnv(overrides: Partial<EnvConfig> = {}): EnvConfig {
  return {
    nodeEnv: "test",
    logLevel: "error",
    port: 0,
    automationSecret: "test-secret",
    airtableApiKey: "test-airtable-key",
    airtableBaseId: "appTestBase",
    airtableApiUrl: "http://127.0.0.1:1/v0",
    llmProvider: "openai",
    llmModel: "scripted-model",
    llmApiKey: "test-llm-key",
    maxTokensPerCall: 1000,
    maxRetries: 3,
    llmRetryBaseDelayMs: 10,
    batchDelayMs: 0,
    shortlistCriteria: {
      minYears: 4,
      tier1Companies: ["Google", "Meta", "OpenAI"],
      maxRate: 100,
      minAvailability: 20,
      approvedLocations: ["US", "United States", "Canada", "UK"],
    },
    duplicateLeadPolicy: "skip",
    ...overrides,
  };
}
