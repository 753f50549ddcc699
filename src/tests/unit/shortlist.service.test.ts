import assert from "node:assert/strict";
import { serializeCompressedDocument } from "../../compression/compressed-document";
import { DuplicateLeadPolicy } from "../../config/env";
import { ApplicantsRepository } from "../../db/repositories/applicants.repo";
import { ShortlistedLeadsRepository } from "../../db/repositories/shortlisted-leads.repo";
import {
  APPLICANT_FIELDS,
  APPLICANTS_TABLE,
  SHORTLISTED_LEAD_FIELDS,
  SHORTLISTED_LEADS_TABLE,
} from "../../db/tables";
import { ShortlistService } from "../../shortlist/shortlist.service";
import { CompressedDocument } from "../../shared/types/compressed-document.types";
import { seedApplicant } from "../support/applicant-fixtures";
import { FIXED_NOW, noopLogger, testEnv } from "../support/fakes";
import { InMemoryRecordStore } from "../support/in-memory-record-store";

function candidate(overrides: Partial<CompressedDocument> = {}): CompressedDocument {
  return {
    personal: { name: "Jordan Sample", email: "", location: "Toronto, Canada", linkedin: "" },
    experience: [
      {
        company: "Northwind Labs",
        title: "Engineer",
        start_date: "2020-01-01",
        end_date: "2023-07-01",
        technologies: "",
        description: "",
      },
    ],
    total_experience_years: 3.5,
    salary: { preferred_rate: 80, minimum_rate: 60, currency: "USD", availability: 25 },
    ...overrides,
  };
}

function buildService(store: InMemoryRecordStore, policy: DuplicateLeadPolicy = "skip"): ShortlistService {
  return new ShortlistService(
    new ApplicantsRepository(noopLogger, store),
    new ShortlistedLeadsRepository(noopLogger, store),
    testEnv().shortlistCriteria,
    noopLogger,
    policy,
    () => FIXED_NOW,
  );
}

function seedWithDocument(store: InMemoryRecordStore, document: CompressedDocument): string {
  return seedApplicant(store, {
    applicant: { [APPLICANT_FIELDS.compressedJson]: serializeCompressedDocument(document) },
  });
}

function statusOf(store: InMemoryRecordStore, applicantId: string): unknown {
  return store.all(APPLICANTS_TABLE).find((record) => record.id === applicantId)?.fields[
    APPLICANT_FIELDS.shortlistStatus
  ];
}

async function testBelowMinimumIsRejected(): Promise<void> {
  const store = new InMemoryRecordStore();
  const applicantId = seedWithDocument(store, candidate());

  const result = await buildService(store).evaluate(applicantId);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.data.passed, false);
  assert.equal(result.data.leadId, null);
  assert.equal(statusOf(store, applicantId), "Rejected");
  assert.equal(store.all(SHORTLISTED_LEADS_TABLE).length, 0);
}

async function testTier1ExperienceCreatesLead(): Promise<void> {
  const store = new InMemoryRecordStore();
  const document = candidate({
    experience: [
      ...candidate().experience,
      {
        company: "Google",
        title: "Intern",
        start_date: "2019-06-01",
        end_date: "2019-09-01",
        technologies: "",
        description: "",
      },
    ],
  });
  const applicantId = seedWithDocument(store, document);

  const result = await buildService(store).evaluate(applicantId);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.data.passed, true);
  assert.equal(statusOf(store, applicantId), "Shortlisted");

  const leads = store.all(SHORTLISTED_LEADS_TABLE);
  assert.equal(leads.length, 1);
  assert.equal(result.data.leadId, leads[0].id);
  assert.deepEqual(leads[0].fields, {
    [SHORTLISTED_LEAD_FIELDS.applicant]: [applicantId],
    [SHORTLISTED_LEAD_FIELDS.compressedJson]: serializeCompressedDocument(document),
    [SHORTLISTED_LEAD_FIELDS.scoreReason]: [
      "Experience: Tier-1 company experience: Google",
      "Compensation: Rate $80/hr within $100 cap; availability 25 hrs/wk meets 20 hrs/wk minimum",
      "Location: Approved location: Canada",
    ].join("\n"),
    [SHORTLISTED_LEAD_FIELDS.createdAt]: "2024-06-15T12:00:00.000Z",
  });
}

async function testMissingSalaryFailsClosed(): Promise<void> {
  const store = new InMemoryRecordStore();
  const applicantId = seedWithDocument(
    store,
    candidate({
      total_experience_years: 8,
      salary: { preferred_rate: 0, minimum_rate: 0, currency: "USD", availability: 0 },
    }),
  );

  const result = await buildService(store).evaluate(applicantId);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.data.passed, false);
  assert.equal(
    result.data.criteria[1].reason,
    "Preferred rate missing or invalid; Availability missing or invalid",
  );
}

async function testDuplicateLeadPolicy(): Promise<void> {
  const passing = candidate({ total_experience_years: 6 });

  const skipStore = new InMemoryRecordStore();
  const skipId = seedWithDocument(skipStore, passing);
  const skipService = buildService(skipStore, "skip");
  await skipService.evaluate(skipId);
  const second = await skipService.evaluate(skipId);
  assert.equal(second.ok && second.data.leadSkipped, true);
  assert.equal(skipStore.all(SHORTLISTED_LEADS_TABLE).length, 1);

  const appendStore = new InMemoryRecordStore();
  const appendId = seedWithDocument(appendStore, passing);
  const appendService = buildService(appendStore, "append");
  await appendService.evaluate(appendId);
  await appendService.evaluate(appendId);
  assert.equal(appendStore.all(SHORTLISTED_LEADS_TABLE).length, 2);
}

async function testUnreadableDocumentIsNotEvaluated(): Promise<void> {
  const store = new InMemoryRecordStore();
  const emptyId = seedApplicant(store, {});
  const brokenId = seedApplicant(store, { applicant: { [APPLICANT_FIELDS.compressedJson]: "{oops" } });
  const service = buildService(store);

  const empty = await service.evaluate(emptyId);
  assert.equal(empty.ok ? "ok" : empty.error_code, "empty_document");
  const broken = await service.evaluate(brokenId);
  assert.equal(broken.ok ? "ok" : broken.error_code, "malformed_document");
  assert.equal(statusOf(store, emptyId), "Pending");
  assert.equal(statusOf(store, brokenId), "Pending");
}

async function testLeadWriteFailure(): Promise<void> {
  const store = new InMemoryRecordStore();
  const applicantId = seedWithDocument(store, candidate({ total_experience_years: 6 }));
  store.failOn({ method: "create", table: SHORTLISTED_LEADS_TABLE });

  const result = await buildService(store).evaluate(applicantId);
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.error_code, "write_failure");
  assert.equal(statusOf(store, applicantId), "Shortlisted");
}

async function testShortlistAllSummary(): Promise<void> {
  const store = new InMemoryRecordStore();
  seedWithDocument(store, candidate({ total_experience_years: 6 }));
  seedWithDocument(store, candidate());
  seedApplicant(store, {});

  const result = await buildService(store).shortlistAll();
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.deepEqual(result.data, { total: 3, succeeded: 2, failed: 1, skipped: 0, shortlisted: 1 });
}

async function run(): Promise<void> {
  await testBelowMinimumIsRejected();
  await testTier1ExperienceCreatesLead();
  await testMissingSalaryFailsClosed();
  await testDuplicateLeadPolicy();
  await testUnreadableDocumentIsNotEvaluated();
  await testLeadWriteFailure();
  await testShortlistAllSummary();
  process.stdout.write("Shortlist service tests passed.\n");
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
