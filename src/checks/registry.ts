import { ConfigError } from "../errors.js";
import type { Check, NotOwnedFileOptions, Severity } from "../types.js";
import { duplicatedPatternCheck } from "./rules/duplicatedPattern.js";
import { fileExistCheck } from "./rules/fileExist.js";
import { notOwnedFileCheck } from "./rules/notOwnedFile.js";

// A check plus the severity its issues get when they carry none.
export type ScheduledCheck = {
  key: string;
  check: Check;
  severity: Severity;
};

export type LoadChecksOptions = {
  checks: string[];
  experimentalChecks: string[];
  notOwned: NotOwnedFileOptions;
};

type Factory = (opts: LoadChecksOptions) => Check;

export const STABLE_CHECKS: Record<string, Factory> = {
  files: () => fileExistCheck(),
  duppatterns: () => duplicatedPatternCheck(),
};

export const EXPERIMENTAL_CHECKS: Record<string, Factory> = {
  notowned: (o) => notOwnedFileCheck(o.notOwned),
};

export const STABLE_SEVERITY: Severity = "error";
export const EXPERIMENTAL_SEVERITY: Severity = "warning";

function unknown(kind: string, name: string, known: Record<string, Factory>) {
  return new ConfigError(`unknown ${kind} check ${JSON.stringify(name)} (available: ${Object.keys(known).join(", ")})`);
}

/**
 * Resolves configured names to check instances. No stable names means all
 * stable checks; experimental checks run only when named. Order is stable
 * checks first, each group in configuration order, duplicates dropped.
 */
export function loadChecks(opts: LoadChecksOptions): ScheduledCheck[] {
  const stable = opts.checks.length ? opts.checks : Object.keys(STABLE_CHECKS);
  const out: ScheduledCheck[] = [];
  const seen = new Set<string>();

  for (const name of stable) {
    const factory = STABLE_CHECKS[name];
    if (!factory) throw unknown("stable", name, STABLE_CHECKS);
    if (seen.has(name)) continue;
    seen.add(name);
    out.push({ key: name, check: factory(opts), severity: STABLE_SEVERITY });
  }
  for (const name of opts.experimentalChecks) {
    const factory = EXPERIMENTAL_CHECKS[name];
    if (!factory) throw unknown("experimental", name, EXPERIMENTAL_CHECKS);
    if (seen.has(name)) continue;
    seen.add(name);
    out.push({ key: name, check: factory(opts), severity: EXPERIMENTAL_SEVERITY });
  }
  return out;
}
