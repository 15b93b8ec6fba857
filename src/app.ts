import { loadChecks } from "./checks/registry.js";
import { printReport } from "./checks/printer.js";
import { CheckRunner } from "./checks/runner.js";
import { loadEntries } from "./codeowners.js";
import { loadConfig } from "./config.js";
import type { ConfigLayer } from "./config.js";
import { toErrorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { realpathSafe } from "./utils.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_INTERRUPTED = 2;
export const EXIT_CHECK_FAILURE = 3;

export type AppOptions = {
  signal: AbortSignal;
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  flags?: ConfigLayer;
  // when set, the configured logLevel is ignored
  logger?: Logger;
};

/**
 * Loads configuration and CODEOWNERS, runs the selected checks and maps the
 * outcome to a process exit code. Interruption wins over check failures.
 */
export async function runApp(opts: AppOptions): Promise<number> {
  let logger = opts.logger ?? new Logger();
  try {
    const cfg = await loadConfig({ cwd: opts.cwd, configPath: opts.configPath, env: opts.env, flags: opts.flags });
    if (!opts.logger && cfg.logLevel) logger = new Logger({ level: cfg.logLevel });

    const checks = loadChecks({
      checks: cfg.checks,
      experimentalChecks: cfg.experimentalChecks,
      notOwned: cfg.notOwnedChecker,
    });
    const repoDir = await realpathSafe(cfg.repositoryPath);
    const entries = await loadEntries(repoDir);
    logger.debug("loaded CODEOWNERS", { repoDir, entries: entries.length, checks: checks.map(c => c.key) });

    const runner = new CheckRunner({
      checks,
      input: { repoDir, entries },
      failureLevel: cfg.checkFailureLevel,
      logger,
    });
    const summary = await runner.run(opts.signal);
    printReport(logger, summary, cfg.checkFailureLevel);

    if (runner.canceled) {
      if (runner.fatalError) logger.error(runner.fatalError.message);
      logger.error("Application was interrupted by operating system");
      return EXIT_INTERRUPTED;
    }
    if (runner.fatalError) {
      logger.error(runner.fatalError.message);
      return EXIT_FATAL;
    }
    return runner.shouldFail() ? EXIT_CHECK_FAILURE : EXIT_OK;
  } catch (e) {
    logger.error(toErrorMessage(e));
    return EXIT_FATAL;
  }
}
