import type { CheckOutput, Issue, Severity } from "../types.js";

export type ReportOptions = {
  severity?: Severity;
  lineNo?: number;
};

export class OutputBuilder {
  private readonly issues: Issue[] = [];

  reportIssue(message: string, opts: ReportOptions = {}): this {
    const issue: Issue = { message };
    if (opts.severity) issue.severity = opts.severity;
    if (opts.lineNo != null) issue.lineNo = opts.lineNo;
    this.issues.push(issue);
    return this;
  }

  output(): CheckOutput {
    return { issues: [...this.issues] };
  }
}
