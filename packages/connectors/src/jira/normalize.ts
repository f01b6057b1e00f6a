import type { NormalizedIssue } from "@issuecorpus/shared";

import { deriveTrainingTasks } from "./tasks";

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) return value as Record<string, unknown>;
  return {};
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string" && v.length > 0);
}

function nameOf(value: unknown): string | null {
  return asString(asRecord(value).name);
}

function personOf(value: unknown): string | null {
  const rec = asRecord(value);
  return asString(rec.displayName) ?? asString(rec.name);
}

/**
 * Plain text from an Atlassian Document Format node: text leaves are joined
 * within a block, top-level blocks are separated by newlines.
 */
function adfText(node: unknown): string {
  const rec = asRecord(node);
  if (typeof rec.text === "string") return rec.text;
  if (!Array.isArray(rec.content)) return "";
  return rec.content.map(adfText).join("");
}

/** API v2 sends plain strings; v3 sends ADF documents. */
export function richText(value: unknown): string {
  if (typeof value === "string") return value;
  const doc = asRecord(value);
  if (!Array.isArray(doc.content)) return "";
  return doc.content
    .map(adfText)
    .filter((block) => block.length > 0)
    .join("\n");
}

function extractComments(value: unknown): string[] {
  const comments = asRecord(value).comments;
  if (!Array.isArray(comments)) return [];
  const out: string[] = [];
  for (const c of comments) {
    const body = richText(asRecord(c).body);
    if (body.length > 0) out.push(body);
  }
  return out;
}

/**
 * Map a raw issue (detail endpoint shape) to a corpus record.
 * fallbackKey/fallbackProject fill in when the payload omits them.
 */
export function normalizeJiraIssue(
  raw: Record<string, unknown>,
  fallback: { issueKey?: string; projectKey?: string } = {},
): NormalizedIssue {
  const fields = asRecord(raw.fields);
  const issueKey = asString(raw.key) ?? fallback.issueKey;
  if (!issueKey) {
    throw new Error("Cannot normalize issue without a key");
  }

  const description = richText(fields.description);
  const comments = extractComments(fields.comment);
  const issueType = nameOf(fields.issuetype);

  return {
    issue_key: issueKey,
    title: asString(fields.summary),
    status: nameOf(fields.status),
    project: asString(asRecord(fields.project).key) ?? fallback.projectKey ?? null,
    issue_type: issueType,
    priority: nameOf(fields.priority),
    reporter: personOf(fields.reporter),
    assignee: personOf(fields.assignee),
    created: asString(fields.created),
    updated: asString(fields.updated),
    labels: asStringArray(fields.labels),
    description,
    comments,
    tasks: deriveTrainingTasks({ issueKey, description, comments, issueType }),
  };
}
