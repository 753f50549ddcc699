import assert from "node:assert/strict";
import { loadEnv, loadShortlistCriteria, providerApiKeyVariable } from "../../config/env";

const MANAGED_KEYS = [
  "AIRTABLE_API_KEY",
  "AIRTABLE_BASE_ID",
  "AIRTABLE_API_URL",
  "LLM_PROVIDER",
  "LLM_MODEL",
  "OPENAI_API_KEY",
  "ANTHROPIC_API_KEY",
  "GEMINI_API_KEY",
  "PORT",
  "LOG_LEVEL",
  "MAX_TOKENS_PER_CALL",
  "MAX_RETRIES",
  "LLM_RETRY_BASE_DELAY_MS",
  "BATCH_DELAY_MS",
  "MIN_YEARS_EXPERIENCE",
  "MAX_HOURLY_RATE",
  "MIN_AVAILABILITY_HOURS",
  "TIER_1_COMPANIES",
  "APPROVED_LOCATIONS",
  "SHORTLIST_DUPLICATE_LEADS",
  "AUTOMATION_SECRET",
];

function resetEnv(values: Record<string, string>): void {
  for (const key of MANAGED_KEYS) {
    delete process.env[key];
  }
  Object.assign(process.env, values);
}

const BASE_ENV = {
  AIRTABLE_API_KEY: "test-airtable-key",
  AIRTABLE_BASE_ID: "appTestBase",
  OPENAI_API_KEY: "test-openai-key",
};

function testDefaults(): void {
  resetEnv(BASE_ENV);
  const env = loadEnv();

  assert.equal(env.port, 3000);
  assert.equal(env.logLevel, "info");
  assert.equal(env.airtableApiUrl, "https://api.airtable.com/v0");
  assert.equal(env.llmProvider, "openai");
  assert.equal(env.llmApiKey, "test-openai-key");
  assert.equal(env.llmModel, undefined);
  assert.equal(env.maxTokensPerCall, 1000);
  assert.equal(env.maxRetries, 3);
  assert.equal(env.duplicateLeadPolicy, "skip");
  assert.equal(env.automationSecret, undefined);
  assert.deepEqual(env.shortlistCriteria, {
    minYears: 4,
    tier1Companies: ["Google", "Meta", "OpenAI", "Microsoft", "Amazon", "Apple", "Netflix", "Anthropic"],
    maxRate: 100,
    minAvailability: 20,
    approvedLocations: ["US", "USA", "United States", "Canada", "UK", "United Kingdom", "Germany", "India"],
  });
}

function testProviderSelectsItsKey(): void {
  resetEnv({
    ...BASE_ENV,
    LLM_PROVIDER: " Anthropic ",
    ANTHROPIC_API_KEY: "test-anthropic-key",
    LLM_MODEL: "claude-test",
  });
  const env = loadEnv();
  assert.equal(env.llmProvider, "anthropic");
  assert.equal(env.llmApiKey, "test-anthropic-key");
  assert.equal(env.llmModel, "claude-test");
  assert.equal(providerApiKeyVariable("gemini"), "GEMINI_API_KEY");
}

function testMissingRequiredValues(): void {
  resetEnv({ AIRTABLE_BASE_ID: "appTestBase", OPENAI_API_KEY: "test-openai-key" });
  assert.throws(() => loadEnv(), new Error("Missing required environment variable: AIRTABLE_API_KEY"));

  resetEnv({ ...BASE_ENV, LLM_PROVIDER: "gemini" });
  assert.throws(() => loadEnv(), new Error("Missing required environment variable: GEMINI_API_KEY"));
}

function testInvalidValuesAreRejected(): void {
  resetEnv({ ...BASE_ENV, MAX_RETRIES: "0" });
  assert.throws(() => loadEnv(), /Invalid MAX_RETRIES value: 0/);

  resetEnv({ ...BASE_ENV, LLM_PROVIDER: "mistral" });
  assert.throws(() => loadEnv(), /Invalid LLM_PROVIDER value: mistral/);

  resetEnv({ ...BASE_ENV, SHORTLIST_DUPLICATE_LEADS: "merge" });
  assert.throws(() => loadEnv(), /Invalid SHORTLIST_DUPLICATE_LEADS value: merge/);

  resetEnv({ ...BASE_ENV, MAX_HOURLY_RATE: "-5" });
  assert.throws(() => loadEnv(), /Invalid MAX_HOURLY_RATE value: -5/);
}

function testCriteriaOverrides(): void {
  resetEnv({
    MIN_YEARS_EXPERIENCE: "6",
    MAX_HOURLY_RATE: "120.5",
    MIN_AVAILABILITY_HOURS: "10",
    TIER_1_COMPANIES: " Stripe , Google,,Stripe ",
    APPROVED_LOCATIONS: "Canada",
  });
  assert.deepEqual(loadShortlistCriteria(), {
    minYears: 6,
    tier1Companies: ["Stripe", "Google"],
    maxRate: 120.5,
    minAvailability: 10,
    approvedLocations: ["Canada"],
  });
}

function run(): void {
  const snapshot = { ...process.env };
  try {
    testDefaults();
    testProviderSelectsItsKey();
    testMissingRequiredValues();
    testInvalidValuesAreRejected();
    testCriteriaOverrides();
  } finally {
    process.env = snapshot;
  }
  process.stdout.write("Env config tests passed.\n");
}

run();
