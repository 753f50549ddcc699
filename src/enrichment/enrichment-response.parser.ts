import { EnrichmentParseResult } from "../shared/types/enrichment.types";

type SectionName = "summary" | "score" | "issues" | "followUps";

interface SectionText {
  inline: string;
  lines: string[];
}

const MAX_FOLLOW_UPS = 3;
const HEADER_PATTERN =
  /^\s*[#>*-]*\s*\**\s*(summary|score|issues|follow[\s-]?ups)\s*\**\s*:\s*\**\s*(.*)$/i;
const BULLET_PREFIX = /^\s*(?:[-*•]|\d+[.)])\s+/;
const EMPTY_MARKERS = new Set(["none", "none.", "n/a", "na", "-", "no issues", "no issues."]);

function toSectionName(header: string): SectionName {
  const normalized = header.toLowerCase();
  if (normalized === "summary" || normalized === "score" || normalized === "issues") {
    return normalized;
  }
  return "followUps";
}

/**
 * Parses the labelled four-section reply (Summary / Score / Issues / Follow-Ups).
 * Missing sections default to empty values; only a reply without any recognisable
 * header is a parse failure. Score problems are reported as warnings, not failures.
 */
export function parseEnrichmentResponse(rawText: string): EnrichmentParseResult {
  const sections = splitSections(rawText);
  if (!sections.size) {
    return {
      ok: false,
      error_code: "parse_failure",
      message: "Response contains no recognizable section headers",
    };
  }

  const warnings: string[] = [];
  const summarySection = sections.get("summary");
  const summary = summarySection
    ? [summarySection.inline, ...summarySection.lines]
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .join(" ")
    : "";

  return {
    ok: true,
    data: {
      summary,
      score: parseScore(sections.get("score"), warnings),
      issues: parseIssues(sections.get("issues")),
      followUps: parseFollowUps(sections.get("followUps")),
    },
    warnings,
  };
}

function splitSections(rawText: string): Map<SectionName, SectionText> {
  const sections = new Map<SectionName, SectionText>();
  let current: SectionText | null = null;

  for (const line of rawText.replace(/\r\n/g, "\n").split("\n")) {
    const header = line.match(HEADER_PATTERN);
    if (header) {
      const name = toSectionName(header[1]);
      if (sections.has(name)) {
        // Only the first occurrence of a section counts.
        current = null;
        continue;
      }
      current = { inline: stripEmphasis(header[2]), lines: [] };
      sections.set(name, current);
      continue;
    }
    if (current && line.trim()) {
      current.lines.push(line.trim());
    }
  }
  return sections;
}

function parseScore(section: SectionText | undefined, warnings: string[]): number | null {
  if (!section) {
    return null;
  }
  const text = [section.inline, ...section.lines].join(" ").trim();
  const match = text.match(/-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/);
  if (!match) {
    warnings.push(`Score is not numeric: "${text}"`);
    return null;
  }

  const score = Math.round(Number(match[0]));
  if (!Number.isFinite(score) || score < 1 || score > 10) {
    warnings.push(`Score out of range 1-10: ${match[0]}`);
    return null;
  }
  return score;
}

function parseIssues(section: SectionText | undefined): string[] {
  if (!section) {
    return [];
  }
  const inlineItems = section.inline.split(/[,;]/);
  const lineItems = section.lines.map((line) => line.replace(BULLET_PREFIX, ""));
  return cleanItems([...inlineItems, ...lineItems]);
}

function parseFollowUps(section: SectionText | undefined): string[] {
  if (!section) {
    return [];
  }
  const items = [section.inline, ...section.lines].map((line) => line.replace(BULLET_PREFIX, ""));
  return cleanItems(items).slice(0, MAX_FOLLOW_UPS);
}

function cleanItems(items: string[]): string[] {
  return items
    .map((item) => stripEmphasis(item).trim())
    .filter((item) => item.length > 0 && !EMPTY_MARKERS.has(item.toLowerCase()));
}

function stripEmphasis(value: string): string {
  return value.replace(/^\*+|\*+$/g, "").trim();
}
