import dotenv from "dotenv";
import { ShortlistCriteria } from "../shared/types/shortlist.types";

dotenv.config();

export type LogLevelName = "debug" | "info" | "warn" | "error";
export type LlmProviderName = "openai" | "anthropic" | "gemini";
export type DuplicateLeadPolicy = "skip" | "append";

export interface EnvConfig {
  nodeEnv: string;
  logLevel: LogLevelName;
  port: number;
  automationSecret?: string;
  airtableApiKey: string;
  airtableBaseId: string;
  airtableApiUrl: string;
  llmProvider: LlmProviderName;
  llmModel?: string;
  llmApiKey: string;
  maxTokensPerCall: number;
  maxRetries: number;
  llmRetryBaseDelayMs: number;
  batchDelayMs: number;
  shortlistCriteria: ShortlistCriteria;
  duplicateLeadPolicy: DuplicateLeadPolicy;
}

const DEFAULT_TIER_1_COMPANIES = "Google,Meta,OpenAI,Microsoft,Amazon,Apple,Netflix,Anthropic";
const DEFAULT_APPROVED_LOCATIONS = "US,USA,United States,Canada,UK,United Kingdom,Germany,India";

function getRequiredString(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(): EnvConfig {
  const portRaw = process.env.PORT ?? "3000";
  const port = Number(portRaw);
  const maxTokensRaw = process.env.MAX_TOKENS_PER_CALL ?? "1000";
  const maxTokensPerCall = Number(maxTokensRaw);
  const maxRetriesRaw = process.env.MAX_RETRIES ?? "3";
  const maxRetries = Number(maxRetriesRaw);
  const retryBaseDelayRaw = process.env.LLM_RETRY_BASE_DELAY_MS ?? "1000";
  const llmRetryBaseDelayMs = Number(retryBaseDelayRaw);
  const batchDelayRaw = process.env.BATCH_DELAY_MS ?? "1000";
  const batchDelayMs = Number(batchDelayRaw);
  const logLevel = parseLogLevel((process.env.LOG_LEVEL ?? "info").trim().toLowerCase());
  const llmProvider = parseLlmProvider((process.env.LLM_PROVIDER ?? "openai").trim().toLowerCase());
  const duplicateLeadPolicy = parseDuplicateLeadPolicy(
    (process.env.SHORTLIST_DUPLICATE_LEADS ?? "skip").trim().toLowerCase(),
  );

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(maxTokensPerCall) || maxTokensPerCall <= 0) {
    throw new Error(`Invalid MAX_TOKENS_PER_CALL value: ${maxTokensRaw}`);
  }
  if (!Number.isInteger(maxRetries) || maxRetries < 1 || maxRetries > 10) {
    throw new Error(`Invalid MAX_RETRIES value: ${maxRetriesRaw}. Expected integer between 1 and 10.`);
  }
  if (!Number.isFinite(llmRetryBaseDelayMs) || llmRetryBaseDelayMs < 0) {
    throw new Error(`Invalid LLM_RETRY_BASE_DELAY_MS value: ${retryBaseDelayRaw}`);
  }
  if (!Number.isFinite(batchDelayMs) || batchDelayMs < 0) {
    throw new Error(`Invalid BATCH_DELAY_MS value: ${batchDelayRaw}`);
  }

  return {
    nodeEnv: process.env.NODE_ENV ?? "development",
    logLevel,
    port,
    automationSecret: getOptionalTrimmed("AUTOMATION_SECRET"),
    airtableApiKey: getRequiredString("AIRTABLE_API_KEY"),
    airtableBaseId: getRequiredString("AIRTABLE_BASE_ID"),
    airtableApiUrl: getOptionalTrimmed("AIRTABLE_API_URL") ?? "https://api.airtable.com/v0",
    llmProvider,
    llmModel: getOptionalTrimmed("LLM_MODEL"),
    llmApiKey: getRequiredString(providerApiKeyVariable(llmProvider)),
    maxTokensPerCall,
    maxRetries,
    llmRetryBaseDelayMs,
    batchDelayMs,
    shortlistCriteria: loadShortlistCriteria(),
    duplicateLeadPolicy,
  };
}

export function loadShortlistCriteria(): ShortlistCriteria {
  const minYearsRaw = process.env.MIN_YEARS_EXPERIENCE ?? "4";
  const maxRateRaw = process.env.MAX_HOURLY_RATE ?? "100";
  const minAvailabilityRaw = process.env.MIN_AVAILABILITY_HOURS ?? "20";
  const minYears = Number(minYearsRaw);
  const maxRate = Number(maxRateRaw);
  const minAvailability = Number(minAvailabilityRaw);

  if (!Number.isFinite(minYears) || minYears < 0) {
    throw new Error(`Invalid MIN_YEARS_EXPERIENCE value: ${minYearsRaw}`);
  }
  if (!Number.isFinite(maxRate) || maxRate <= 0) {
    throw new Error(`Invalid MAX_HOURLY_RATE value: ${maxRateRaw}`);
  }
  if (!Number.isFinite(minAvailability) || minAvailability < 0) {
    throw new Error(`Invalid MIN_AVAILABILITY_HOURS value: ${minAvailabilityRaw}`);
  }

  return {
    minYears,
    tier1Companies: parseList(process.env.TIER_1_COMPANIES ?? DEFAULT_TIER_1_COMPANIES),
    maxRate,
    minAvailability,
    approvedLocations: parseList(process.env.APPROVED_LOCATIONS ?? DEFAULT_APPROVED_LOCATIONS),
  };
}

export function providerApiKeyVariable(provider: LlmProviderName): string {
  if (provider === "anthropic") {
    return "ANTHROPIC_API_KEY";
  }
  if (provider === "gemini") {
    return "GEMINI_API_KEY";
  }
  return "OPENAI_API_KEY";
}

function parseList(rawValue: string): string[] {
  const values = rawValue
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return Array.from(new Set(values));
}

function parseLogLevel(value: string): LogLevelName {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}

function parseLlmProvider(value: string): LlmProviderName {
  if (value === "openai" || value === "anthropic" || value === "gemini") {
    return value;
  }
  throw new Error(`Invalid LLM_PROVIDER value: ${value}. Expected openai, anthropic or gemini.`);
}

function parseDuplicateLeadPolicy(value: string): DuplicateLeadPolicy {
  if (value === "skip" || value === "append") {
    return value;
  }
  throw new Error(`Invalid SHORTLIST_DUPLICATE_LEADS value: ${value}. Expected skip or append.`);
}
