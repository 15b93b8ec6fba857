import { execFileSync } from "node:child_process";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CheckInput, OwnershipEntry } from "../types.js";
import { Logger } from "../logger.js";
import type { LogSink } from "../logger.js";

export function runGit(args: string[], cwd: string) {
  return execFileSync("git", args, { cwd, encoding: "utf8" }).trim();
}

async function writeFiles(dir: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(dir, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }
}

export async function makeTempDir(prefix = "codeowners-check-test-"): Promise<string> {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return fs.realpath(tmp);
}

// Fresh repository with `files` committed on a single commit.
export async function makeTempRepo(files: Record<string, string> = { "README.md": "# temp\n" }): Promise<string> {
  const tmp = await makeTempDir();
  runGit(["init", "-q"], tmp);
  runGit(["config", "user.email", "test@example.com"], tmp);
  runGit(["config", "user.name", "Test User"], tmp);
  runGit(["config", "commit.gpgsign", "false"], tmp);
  await writeFiles(tmp, files);
  runGit(["add", "-A"], tmp);
  runGit(["commit", "-q", "-m", "init"], tmp);
  return tmp;
}

export type RepoState = {
  gitignore: Buffer | null;
  index: string;
  status: string;
};

// What the not-owned check must leave untouched.
export function repoState(repo: string): RepoState {
  const p = path.join(repo, ".gitignore");
  return {
    gitignore: fss.existsSync(p) ? fss.readFileSync(p) : null,
    index: runGit(["ls-files", "-s"], repo),
    status: runGit(["status", "--porcelain"], repo),
  };
}

export function entries(...patterns: string[]): OwnershipEntry[] {
  return patterns.map((pattern, i) => ({ pattern, owners: ["@org/team"], lineNo: i + 1 }));
}

export function input(repoDir: string, ents: OwnershipEntry[]): CheckInput {
  return { repoDir, entries: ents };
}

export function captureLogger(level: "debug" | "info" | "warn" | "error" = "info") {
  const out: string[] = [];
  const err: string[] = [];
  const sink: LogSink = { out: (l) => out.push(l), err: (l) => err.push(l) };
  return { logger: new Logger({ level, format: "json", sink }), out, err };
}

export function signal() {
  return new AbortController().signal;
}
