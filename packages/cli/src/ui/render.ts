import type { ScrapeRunResult } from "@issuecorpus/pipeline";

function pad(value: string | number, width: number): string {
  return String(value).padEnd(width);
}

export function formatRunSummary(result: ScrapeRunResult): string[] {
  const lines: string[] = [];
  lines.push(`Run ${result.runId}${result.stoppedByBudget ? " (stopped: --max-issues reached)" : ""}`);
  lines.push(
    `${pad("PROJECT", 14)}${pad("STATUS", 9)}${pad("LISTED", 8)}${pad("EMITTED", 9)}${pad("SKIPPED", 9)}FAILED`,
  );
  for (const p of result.perProject) {
    lines.push(
      `${pad(p.project, 14)}${pad(p.status, 9)}${pad(p.listed, 8)}${pad(p.emitted, 9)}${pad(p.skipped, 9)}${p.failed}`,
    );
    if (p.error) lines.push(`  ${p.error.kind}: ${p.error.message}`);
  }
  const t = result.totals;
  lines.push(`Total: ${t.emitted} emitted, ${t.skipped} skipped, ${t.failed} failed, ${t.failedProjects} failed projects`);
  lines.push(`Checkpoint: ${result.checkpointPath}`);
  return lines;
}

export function renderRunSummary(result: ScrapeRunResult): void {
  console.log(`\n${formatRunSummary(result).join("\n")}\n`);
}
