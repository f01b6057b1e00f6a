/** Fields requested on every listing page. */
export const SEARCH_FIELDS = [
  "summary",
  "description",
  "status",
  "priority",
  "assignee",
  "reporter",
  "created",
  "updated",
  "comment",
] as const;

/** Detail fetch adds what normalization needs beyond the listing. */
export const DETAIL_FIELDS = [...SEARCH_FIELDS, "issuetype", "labels", "project"] as const;

export const MAX_PAGE_SIZE = 100;

export interface JiraClientConfig {
  baseUrl: string;
}

/** Project keys are upper-case letters, digits and underscores, starting with a letter. */
export function isValidProjectKey(value: string): boolean {
  return /^[A-Z][A-Z0-9_]*$/.test(value);
}

export function normalizeProjectKey(value: string): string {
  return value.trim().toUpperCase();
}

export function projectJql(projectKey: string): string {
  if (!isValidProjectKey(projectKey)) {
    throw new RangeError(`Invalid project key: ${JSON.stringify(projectKey)}`);
  }
  return `project=${projectKey} order by key asc`;
}

export function assertPageSize(pageSize: number): number {
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new RangeError(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`);
  }
  return pageSize;
}
