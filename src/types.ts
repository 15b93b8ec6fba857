export type Severity = "info" | "warning" | "error";

export function severityRank(s: Severity): number {
  if (s === "error") return 2;
  if (s === "warning") return 1;
  return 0;
}

export function meetsThreshold(s: Severity, threshold: Severity): boolean {
  return severityRank(s) >= severityRank(threshold);
}

// One CODEOWNERS line. Later entries override earlier ones on overlapping
// paths; that rule belongs to the loader, not to the checks.
export type OwnershipEntry = {
  pattern: string;
  owners: string[];
  lineNo?: number;
};

export type CheckInput = {
  repoDir: string;
  entries: readonly OwnershipEntry[];
};

export type Issue = {
  message: string;
  // falls back to the severity the runner assigns to the whole check
  severity?: Severity;
  lineNo?: number;
};

export type CheckOutput = {
  issues: Issue[];
};

export interface Check {
  readonly name: string;
  check(input: CheckInput, signal: AbortSignal): Promise<CheckOutput>;
}

export type NotOwnedFileOptions = {
  skipPatterns: string[];
  subdirectories: string[];
  // Registers the repository as git safe.directory before touching it.
  // Needed when the checkout belongs to another uid (e.g. CI containers).
  trustWorkspace: boolean;
};
