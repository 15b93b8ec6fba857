import { CanceledError, toError } from "../errors.js";
import type { Logger } from "../logger.js";
import { meetsThreshold } from "../types.js";
import type { CheckInput, CheckOutput, Issue, Severity } from "../types.js";
import type { ScheduledCheck } from "./registry.js";

export type CheckResult = {
  key: string;
  name: string;
  severity: Severity;
  durationMs: number;
  output?: CheckOutput;
  error?: Error;
};

export type RunSummary = {
  results: CheckResult[];
  canceled: boolean;
  fatalError?: Error;
};

export type CheckRunnerOptions = {
  checks: ScheduledCheck[];
  input: CheckInput;
  failureLevel: Severity;
  logger?: Logger;
  now?: () => number;
};

export function effectiveSeverity(issue: Issue, checkSeverity: Severity): Severity {
  return issue.severity ?? checkSeverity;
}

export function exceedsThreshold(results: readonly CheckResult[], threshold: Severity): boolean {
  return results.some(r =>
    (r.output?.issues ?? []).some(i => meetsThreshold(effectiveSeverity(i, r.severity), threshold)),
  );
}

/**
 * Runs checks one after another against the same input. Checks never overlap,
 * so a check that rewrites the working tree has it to itself until it has
 * restored it. The first hard error ends the run; an abort stops it before
 * the next check.
 */
export class CheckRunner {
  private readonly opts: CheckRunnerOptions;
  private summary: RunSummary = { results: [], canceled: false };

  constructor(opts: CheckRunnerOptions) {
    this.opts = opts;
  }

  async run(signal: AbortSignal): Promise<RunSummary> {
    const { checks, input, logger } = this.opts;
    const now = this.opts.now ?? (() => performance.now());
    const results: CheckResult[] = [];
    let canceled = false;
    let fatalError: Error | undefined;

    for (const sc of checks) {
      if (signal.aborted) { canceled = true; break; }
      const started = now();
      logger?.debug(`running ${sc.key}`, { check: sc.check.name });
      try {
        const output = await sc.check.check(input, signal);
        results.push({ key: sc.key, name: sc.check.name, severity: sc.severity, durationMs: now() - started, output });
      } catch (e) {
        const error = toError(e);
        results.push({ key: sc.key, name: sc.check.name, severity: sc.severity, durationMs: now() - started, error });
        if (signal.aborted || error instanceof CanceledError) {
          canceled = true;
          // cleanup that failed during the abort is still worth surfacing
          if (!(error instanceof CanceledError)) fatalError = error;
        } else {
          fatalError = error;
        }
        break;
      }
    }
    // an abort during the last check still ends the run as interrupted
    if (signal.aborted) canceled = true;

    this.summary = fatalError ? { results, canceled, fatalError } : { results, canceled };
    return this.summary;
  }

  get results(): readonly CheckResult[] {
    return this.summary.results;
  }

  get canceled(): boolean {
    return this.summary.canceled;
  }

  get fatalError(): Error | undefined {
    return this.summary.fatalError;
  }

  shouldFail(): boolean {
    return exceedsThreshold(this.summary.results, this.opts.failureLevel);
  }
}
