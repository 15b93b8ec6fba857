import { CanceledError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Issue, Severity } from "../types.js";
import { effectiveSeverity, exceedsThreshold } from "./runner.js";
import type { RunSummary } from "./runner.js";

const severityTag: Record<Severity, string> = {
  info: "inf",
  warning: "war",
  error: "err",
};

const INDENT = "    ";

export function formatIssue(issue: Issue, checkSeverity: Severity): string {
  const tag = severityTag[effectiveSeverity(issue, checkSeverity)];
  const where = issue.lineNo != null ? `line ${issue.lineNo}: ` : "";
  // keep multi-line messages under the check heading
  const message = issue.message.split("\n").join(`\n${INDENT}`);
  return `${INDENT}[${tag}] ${where}${message}`;
}

export function formatReport(summary: RunSummary, threshold: Severity): string[] {
  const lines: string[] = [];
  let failures = 0;
  for (const r of summary.results) {
    lines.push(`==> Executing ${r.name} (${Math.round(r.durationMs)}ms)`);
    if (r.error instanceof CanceledError) {
      lines.push(`${INDENT}Canceled`);
      continue;
    }
    if (r.error) {
      lines.push(`${INDENT}[err] ${r.error.message}`);
      failures++;
      continue;
    }
    const issues = r.output?.issues ?? [];
    if (issues.length === 0) {
      lines.push(`${INDENT}Check OK`);
      continue;
    }
    for (const i of issues) lines.push(formatIssue(i, r.severity));
    if (exceedsThreshold([r], threshold)) failures++;
  }
  lines.push("");
  lines.push(`${summary.results.length} check(s) executed, ${failures} failure(s)`);
  return lines;
}

export function printReport(logger: Logger, summary: RunSummary, threshold: Severity) {
  for (const line of formatReport(summary, threshold)) logger.raw(line);
}
