import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { CanceledError, GitCommandError, MultiError, throwIfAborted, toError } from "../../errors.js";

export const IGNORE_FILE = ".gitignore";

// `git rm --cached` argv batch, keeps well under ARG_MAX
const RM_BATCH = 256;

export type GitOptions = { cwd?: string; signal?: AbortSignal };

/**
 * Runs git and resolves with stdout. A non-zero exit rejects with
 * GitCommandError carrying stderr; an abort kills the child and rejects
 * with CanceledError.
 */
export function git(args: string[], opts: GitOptions = {}): Promise<string> {
  if (opts.signal) throwIfAborted(opts.signal);
  return new Promise((resolve, reject) => {
    execFile(
      "git",
      args,
      { cwd: opts.cwd, encoding: "utf8", signal: opts.signal, maxBuffer: 64 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          if (opts.signal?.aborted) {
            reject(new CanceledError(`git ${args.find(a => !a.startsWith("-")) ?? ""} was interrupted`));
            return;
          }
          const code = typeof error.code === "number" ? error.code : null;
          reject(new GitCommandError(args, code, stderr || error.message, error));
          return;
        }
        resolve(stdout);
      },
    );
  });
}

function splitNul(out: string): string[] {
  return out.split("\u0000").filter(Boolean);
}

export function gitStatusPorcelain(repoDir: string, signal?: AbortSignal) {
  return git(["status", "--porcelain"], { cwd: repoDir, signal });
}

export async function gitTrustDirectory(repoDir: string, signal?: AbortSignal) {
  await git(["config", "--global", "--add", "safe.directory", repoDir], { signal });
}

export async function appendIgnoreRules(repoDir: string, patterns: readonly string[]) {
  // leading newline: the existing file may not end with one
  let content = "\n";
  for (const p of patterns) content += `${p}\n`;
  await fs.appendFile(path.join(repoDir, IGNORE_FILE), content, { encoding: "utf8", mode: 0o644 });
}

// Tracked files that the active ignore rules now match.
export async function gitTrackedIgnoredFiles(repoDir: string, signal?: AbortSignal): Promise<string[]> {
  const out = await git(["ls-files", "-c", "-i", "--exclude-standard", "-z"], { cwd: repoDir, signal });
  return splitNul(out);
}

// Index only; the files stay on disk. Names are literal paths, so a file
// called `:(top)x` is not read as pathspec magic.
export async function gitRemoveCached(repoDir: string, files: readonly string[], signal?: AbortSignal) {
  for (let i = 0; i < files.length; i += RM_BATCH) {
    const batch = files.slice(i, i + RM_BATCH);
    await git(["--literal-pathspecs", "rm", "--cached", "-q", "--", ...batch], { cwd: repoDir, signal });
  }
}

export async function gitRemoveIgnoredFromIndex(repoDir: string, signal?: AbortSignal) {
  const ignored = await gitTrackedIgnoredFiles(repoDir, signal);
  await gitRemoveCached(repoDir, ignored, signal);
  return ignored;
}

export async function gitListFiles(
  repoDir: string,
  subdirectories: readonly string[] = [],
  signal?: AbortSignal,
): Promise<string[]> {
  const args = ["ls-files", "-z"];
  if (subdirectories.length) args.push("--", ...subdirectories);
  return splitNul(await git(args, { cwd: repoDir, signal }));
}

// Deliberately takes no signal: restoration has to finish even after an abort.
export async function gitResetHard(repoDir: string) {
  await git(["reset", "--hard", "-q"], { cwd: repoDir });
}

export type FileSnapshot = {
  path: string;
  content: Buffer | null; // null: the file did not exist
};

export async function snapshotFile(filePath: string): Promise<FileSnapshot> {
  try {
    return { path: filePath, content: await fs.readFile(filePath) };
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return { path: filePath, content: null };
    throw e;
  }
}

export async function restoreFile(snap: FileSnapshot) {
  if (snap.content === null) {
    await fs.rm(snap.path, { force: true });
    return;
  }
  const current = await snapshotFile(snap.path);
  if (current.content !== null && current.content.equals(snap.content)) return;
  await fs.writeFile(snap.path, snap.content);
}

/**
 * Hard reset, then put the snapshotted files back byte for byte. `reset --hard`
 * leaves untracked files alone, so a file created during the check is only
 * removed by its snapshot. Every step runs; failures are collected.
 */
export async function restoreWorkspace(repoDir: string, snapshots: readonly FileSnapshot[]): Promise<Error | undefined> {
  const errors: Error[] = [];
  try {
    await gitResetHard(repoDir);
  } catch (e) {
    errors.push(toError(e));
  }
  for (const snap of snapshots) {
    try {
      await restoreFile(snap);
    } catch (e) {
      errors.push(toError(e));
    }
  }
  return MultiError.combine(...errors);
}

/**
 * Runs `fn` against a working tree that must end up as it started. The
 * listed files are snapshotted first; restoration runs on every exit path,
 * and its failure is combined with the error that ended `fn`.
 */
export async function withRestoredWorkspace<T>(
  repoDir: string,
  files: readonly string[],
  fn: () => Promise<T>,
): Promise<T> {
  const snapshots = await Promise.all(files.map(f => snapshotFile(path.join(repoDir, f))));
  let result: T;
  try {
    result = await fn();
  } catch (e) {
    const failure = toError(e);
    const restoreError = await restoreWorkspace(repoDir, snapshots);
    throw MultiError.combine(failure, restoreError) ?? failure;
  }
  const restoreError = await restoreWorkspace(repoDir, snapshots);
  if (restoreError) throw restoreError;
  return result;
}
