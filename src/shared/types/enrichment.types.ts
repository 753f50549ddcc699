export interface EnrichmentResult {
  summary: string;
  score: number | null;
  issues: string[];
  followUps: string[];
}

export type EnrichmentParseResult =
  | {
      ok: true;
      data: EnrichmentResult;
      warnings: string[];
    }
  | {
      ok: false;
      error_code: "parse_failure";
      message: string;
    };
