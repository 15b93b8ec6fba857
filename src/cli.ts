#!/usr/bin/env node
import * as fss from "node:fs";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { runApp } from "./app.js";
import { flagsFromCli } from "./config.js";
import type { CliOptions } from "./config.js";
import { splitList } from "./utils.js";

// Resolve package version without JSON import attributes
function readVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fss.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

const list = (v: string) => splitList(v) ?? [];

const program = new Command();

program
  .name("codeowners-check")
  .description("Ensures the correctness of your CODEOWNERS file")
  .version(readVersion())
  .option("-r, --repository-path <path>", "repository to check (default: current directory)")
  .option("-c, --config <file>", "YAML config file (default: ./codeowners-config.yaml if present)")
  .option("--checks <names>", "comma-separated stable checks: files,duppatterns", list)
  .option("--experimental-checks <names>", "comma-separated experimental checks: notowned", list)
  .option("--check-failure-level <level>", "info|warning|error")
  .option("--not-owned-skip-patterns <patterns>", "CODEOWNERS patterns not used as ownership by notowned", list)
  .option("--not-owned-subdirectories <dirs>", "restrict notowned to these subdirectories", list)
  .option("--not-owned-trust-workspace", "add the repository to git safe.directory before notowned runs")
  .option("--log-level <level>", "debug|info|warn|error|silent")
  .action(async () => {
    const opts = program.opts<CliOptions>();
    const controller = new AbortController();
    const abort = () => controller.abort();
    process.once("SIGINT", abort);
    process.once("SIGTERM", abort);
    try {
      process.exitCode = await runApp({
        signal: controller.signal,
        configPath: opts.config,
        flags: flagsFromCli(opts),
      });
    } finally {
      process.off("SIGINT", abort);
      process.off("SIGTERM", abort);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error("codeowners-check: fatal", e);
  process.exitCode = 1;
});
