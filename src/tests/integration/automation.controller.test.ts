import assert from "node:assert/strict";
import { Server } from "node:http";
import fetch from "node-fetch";
import { createApp } from "../../app";
import { APPLICANT_FIELDS, APPLICANTS_TABLE, SHORTLISTED_LEADS_TABLE } from "../../db/tables";
import { seedApplicant, seedFullApplicant } from "../support/applicant-fixtures";
import { FIXED_NOW, noopLogger, recordingSleep, ScriptedLlmProvider, testEnv } from "../support/fakes";
import { InMemoryRecordStore } from "../support/in-memory-record-store";

const EVALUATION_REPLY = [
  "Summary: Experienced backend engineer.",
  "Score: 9",
  "Issues: None",
  "Follow-Ups:",
  "- Which billing incidents did you own?",
].join("\n");

interface Harness {
  baseUrl: string;
  store: InMemoryRecordStore;
  provider: ScriptedLlmProvider;
  close: () => Promise<void>;
}

async function startHarness(): Promise<Harness> {
  const store = new InMemoryRecordStore();
  const provider = new ScriptedLlmProvider([EVALUATION_REPLY]);
  const { app } = createApp(testEnv(), {
    store,
    provider,
    logger: noopLogger,
    sleep: recordingSleep().sleep,
    now: () => FIXED_NOW,
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server did not bind to a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    store,
    provider,
    close: () =>
      new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve()))),
  };
}

async function post(harness: Harness, path: string, secret = "test-secret"): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${harness.baseUrl}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json", "x-automation-secret": secret },
    body: "{}",
  });
  return { status: response.status, body: await response.json() };
}

function fieldOf(store: InMemoryRecordStore, applicantId: string, field: string): unknown {
  return store.all(APPLICANTS_TABLE).find((record) => record.id === applicantId)?.fields[field];
}

async function testHealth(harness: Harness): Promise<void> {
  const response = await fetch(`${harness.baseUrl}/health`);
  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { ok: true });
}

async function testRejectsWrongSecret(harness: Harness): Promise<void> {
  const applicantId = seedFullApplicant(harness.store);
  const response = await post(harness, `/automation/applicants/${applicantId}/compress`, "wrong-secret");
  assert.equal(response.status, 401);
  assert.equal(fieldOf(harness.store, applicantId, APPLICANT_FIELDS.compressedJson), undefined);
}

async function testUnknownOperation(harness: Harness): Promise<void> {
  const response = await post(harness, "/automation/applicants/rec1/archive");
  assert.equal(response.status, 400);
  assert.deepEqual(response.body, { ok: false, error: "Unsupported operation: archive" });
}

async function testStatusCodesFollowErrorCodes(harness: Harness): Promise<void> {
  const missing = await post(harness, "/automation/applicants/recMissing/compress");
  assert.equal(missing.status, 404);

  const emptyId = seedApplicant(harness.store, {});
  const empty = await post(harness, `/automation/applicants/${emptyId}/shortlist`);
  assert.equal(empty.status, 422);
  assert.deepEqual(empty.body, { ok: false, error_code: "empty_document", error: "Compressed JSON is empty" });
}

async function testPipelineRunsAllSteps(harness: Harness): Promise<void> {
  const applicantId = seedFullApplicant(harness.store);
  const response = await post(harness, `/automation/applicants/${applicantId}/pipeline`);

  assert.equal(response.status, 200);
  assert.deepEqual(response.body, {
    applicantId,
    ok: true,
    shortlisted: true,
    steps: [
      { step: "compress", ok: true },
      { step: "shortlist", ok: true },
      { step: "enrich", ok: true, skipped: false },
    ],
  });
  assert.equal(fieldOf(harness.store, applicantId, APPLICANT_FIELDS.shortlistStatus), "Shortlisted");
  assert.equal(fieldOf(harness.store, applicantId, APPLICANT_FIELDS.llmScore), 9);
  assert.equal(fieldOf(harness.store, applicantId, APPLICANT_FIELDS.llmIssues), "None");
  assert.equal(harness.store.all(SHORTLISTED_LEADS_TABLE).length, 1);
}

async function run(): Promise<void> {
  const harness = await startHarness();
  try {
    await testHealth(harness);
    await testRejectsWrongSecret(harness);
    await testUnknownOperation(harness);
    await testStatusCodesFollowErrorCodes(harness);
    await testPipelineRunsAllSteps(harness);
  } finally {
    await harness.close();
  }
  process.stdout.write("Automation controller tests passed.\n");
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
