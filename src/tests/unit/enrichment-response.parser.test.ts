import assert from "node:assert/strict";
import { parseEnrichmentResponse } from "../../enrichment/enrichment-response.parser";

function testWellFormedReply(): void {
  const reply = [
    "Summary: Backend engineer with seven years of TypeScript.",
    "Led the billing platform migration.",
    "Score: 8",
    "Issues: No public portfolio; short tenure at last role",
    "Follow-Ups:",
    "- Can you walk through the billing migration?",
    "- Why did you leave Contoso after a year?",
  ].join("\n");

  const parsed = parseEnrichmentResponse(reply);
  assert.equal(parsed.ok, true);
  if (!parsed.ok) return;
  assert.deepEqual(parsed.data, {
    summary: "Backend engineer with seven years of TypeScript. Led the billing platform migration.",
    score: 8,
    issues: ["No public portfolio", "short tenure at last role"],
    followUps: ["Can you walk through the billing migration?", "Why did you leave Contoso after a year?"],
  });
  assert.deepEqual(parsed.warnings, []);
}

function testMarkdownHeadersAndBulletedIssues(): void {
  const reply = [
    "**Summary:** Solid frontend profile.",
    "**Score:** 7/10",
    "**Issues:**",
    "* Gap between 2020 and 2021",
    "1. Rate near the cap",
    "## Follow ups:",
    "1) First question?",
    "2) Second question?",
    "3) Third question?",
    "4) Fourth question?",
  ].join("\n");

  const parsed = parseEnrichmentResponse(reply);
  assert.equal(parsed.ok, true);
  if (!parsed.ok) return;
  assert.equal(parsed.data.summary, "Solid frontend profile.");
  assert.equal(parsed.data.score, 7);
  assert.deepEqual(parsed.data.issues, ["Gap between 2020 and 2021", "Rate near the cap"]);
  assert.deepEqual(parsed.data.followUps, ["First question?", "Second question?", "Third question?"]);
}

function testMissingIssuesSectionIsEmpty(): void {
  const parsed = parseEnrichmentResponse("Summary: Short profile.\nScore: 5");
  assert.equal(parsed.ok, true);
  if (!parsed.ok) return;
  assert.deepEqual(parsed.data.issues, []);
  assert.deepEqual(parsed.data.followUps, []);
}

function testNoneMarkerMeansNoIssues(): void {
  const parsed = parseEnrichmentResponse("Summary: Fine.\nScore: 9\nIssues: None");
  assert.equal(parsed.ok, true);
  if (!parsed.ok) return;
  assert.deepEqual(parsed.data.issues, []);
}

function testScoreCoercion(): void {
  const decimal = parseEnrichmentResponse("Score: 6.6");
  assert.equal(decimal.ok && decimal.data.score, 7);

  const outOfRange = parseEnrichmentResponse("Score: 14");
  assert.equal(outOfRange.ok, true);
  if (!outOfRange.ok) return;
  assert.equal(outOfRange.data.score, null);
  assert.deepEqual(outOfRange.warnings, ["Score out of range 1-10: 14"]);

  const exponent = parseEnrichmentResponse("Summary: ok\nScore: 1e3");
  assert.equal(exponent.ok, true);
  if (!exponent.ok) return;
  assert.equal(exponent.data.score, null);
  assert.deepEqual(exponent.warnings, ["Score out of range 1-10: 1e3"]);

  const words = parseEnrichmentResponse("Score: strong");
  assert.equal(words.ok, true);
  if (!words.ok) return;
  assert.equal(words.data.score, null);
  assert.deepEqual(words.warnings, ['Score is not numeric: "strong"']);
}

function testFirstOccurrenceWins(): void {
  const parsed = parseEnrichmentResponse("Score: 4\nSummary: One.\nScore: 9\nextra line");
  assert.equal(parsed.ok, true);
  if (!parsed.ok) return;
  assert.equal(parsed.data.score, 4);
  assert.equal(parsed.data.summary, "One.");
}

function testReplyWithoutHeadersFails(): void {
  const parsed = parseEnrichmentResponse("I am unable to evaluate this applicant.");
  assert.equal(parsed.ok, false);
  if (parsed.ok) return;
  assert.equal(parsed.error_code, "parse_failure");
}

function run(): void {
  testWellFormedReply();
  testMarkdownHeadersAndBulletedIssues();
  testMissingIssuesSectionIsEmpty();
  testNoneMarkerMeansNoIssues();
  testScoreCoercion();
  testFirstOccurrenceWins();
  testReplyWithoutHeadersFails();
  process.stdout.write("Enrichment response parser tests passed.\n");
}

run();
