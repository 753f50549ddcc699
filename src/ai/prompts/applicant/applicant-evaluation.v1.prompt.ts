export const APPLICANT_EVALUATION_V1_PROMPT = `You are a recruiting analyst. Given the JSON applicant profile below, do four things:

1. Provide a concise 75-word summary of the candidate.
2. Rate overall candidate quality from 1-10 (higher is better).
3. List any data gaps or inconsistencies you notice.
4. Suggest up to three follow-up questions to clarify gaps.

Return your response in exactly this format:

Summary: <text>
Score: <integer>
Issues: <comma-separated list or 'None'>
Follow-Ups:
- <question 1>
- <question 2>
- <question 3>

If there are fewer than three follow-up questions, list only the relevant ones.`;

export function buildApplicantEvaluationV1Prompt(compressedJson: string): string {
  return [
    APPLICANT_EVALUATION_V1_PROMPT,
    "",
    "Applicant Profile:",
    "```json",
    compressedJson.trim(),
    "```",
  ].join("\n");
}
