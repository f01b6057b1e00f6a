import type { Connector } from "../types";
import { createJiraClient } from "./fetch";
import { normalizeJiraIssue } from "./normalize";

export * from "./config";
export { createJiraClient, JiraClient, type JiraClientOptions, type JiraClientOverrides } from "./fetch";
export { normalizeJiraIssue, richText } from "./normalize";
export { decodeSearchPage, PaginatedFetcher, type PaginatedFetcherOptions } from "./paginate";
export { deriveTrainingTasks, SUMMARY_MAX_CHARS, truncateSummary } from "./tasks";

export const jiraConnector: Connector = {
  sourceType: "jira",
  createSource: (env, overrides) => createJiraClient(env, overrides),
  normalize: (raw, context) => normalizeJiraIssue(raw, context),
};
