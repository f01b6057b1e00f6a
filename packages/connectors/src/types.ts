import type { IssueSource, NormalizedIssue, ScraperEnv } from "@issuecorpus/shared";

import type { JiraClientOverrides } from "./jira/fetch";

export interface NormalizeContext {
  issueKey: string;
  projectKey: string;
}

export interface Connector {
  sourceType: string;
  createSource(env: ScraperEnv, overrides?: JiraClientOverrides): IssueSource;
  normalize(raw: Record<string, unknown>, context: NormalizeContext): NormalizedIssue;
}
