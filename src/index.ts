export { runApp, EXIT_OK, EXIT_FATAL, EXIT_INTERRUPTED, EXIT_CHECK_FAILURE } from "./app.js";
export type { AppOptions } from "./app.js";
export { CheckRunner, exceedsThreshold, effectiveSeverity } from "./checks/runner.js";
export type { CheckResult, RunSummary, CheckRunnerOptions } from "./checks/runner.js";
export { loadChecks, STABLE_CHECKS, EXPERIMENTAL_CHECKS } from "./checks/registry.js";
export type { ScheduledCheck, LoadChecksOptions } from "./checks/registry.js";
export { OutputBuilder } from "./checks/output.js";
export { formatReport, printReport } from "./checks/printer.js";
export { notOwnedFileCheck } from "./checks/rules/notOwnedFile.js";
export { duplicatedPatternCheck } from "./checks/rules/duplicatedPattern.js";
export { fileExistCheck } from "./checks/rules/fileExist.js";
export { computeExcludedPatterns } from "./checks/utils/patterns.js";
export { loadEntries, parseEntries, findCodeownersFile } from "./codeowners.js";
export { loadConfig, parseConfig, ConfigSchema } from "./config.js";
export type { Config } from "./config.js";
export { Logger } from "./logger.js";
export * from "./errors.js";
export * from "./types.js";
