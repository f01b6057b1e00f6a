export type TrainingTask =
  | { task: "summarisation"; input: string; output: string }
  | { task: "classification"; input: string; output: string }
  | { task: "question_answering"; question: string; answer: string };

/**
 * One line of the output corpus. Keys are snake_case because this is the
 * on-disk format, and every key is always present: absent upstream values are
 * null, or empty for the text and list fields.
 */
export interface NormalizedIssue {
  issue_key: string;
  title: string | null;
  status: string | null;
  project: string | null;
  issue_type: string | null;
  priority: string | null;
  reporter: string | null;
  assignee: string | null;
  created: string | null;
  updated: string | null;
  labels: string[];
  description: string;
  comments: string[];
  tasks: TrainingTask[];
}
