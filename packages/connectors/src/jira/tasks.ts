import type { TrainingTask } from "@issuecorpus/shared";

export const SUMMARY_MAX_CHARS = 300;

/**
 * Placeholder summary: description plus the first comment, cut at
 * SUMMARY_MAX_CHARS with a trailing ellipsis when cut.
 */
export function truncateSummary(description: string, comments: readonly string[]): string {
  const combined = comments.length > 0 ? `${description}\n${comments[0]}` : description;
  // Count code points so an astral character is never split in half.
  const chars = Array.from(combined);
  if (chars.length <= SUMMARY_MAX_CHARS) return combined;
  return `${chars.slice(0, SUMMARY_MAX_CHARS).join("")}...`;
}

export function deriveTrainingTasks(params: {
  issueKey: string;
  description: string;
  comments: readonly string[];
  issueType: string | null;
}): TrainingTask[] {
  const summary = truncateSummary(params.description, params.comments);
  return [
    { task: "summarisation", input: params.description, output: summary },
    { task: "classification", input: params.description, output: params.issueType ?? "Unknown" },
    { task: "question_answering", question: `What is the issue ${params.issueKey} about?`, answer: summary },
  ];
}
