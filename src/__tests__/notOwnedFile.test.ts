import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import path from "node:path";
import {
  DIRTY_TREE_MESSAGE,
  EMPTY_CODEOWNERS_MESSAGE,
  NOT_OWNED_FILE_CHECK_NAME,
  notOwnedFileCheck,
} from "../checks/rules/notOwnedFile.js";
import { CanceledError, GitCommandError } from "../errors.js";
import { entries, input, makeTempDir, makeTempRepo, repoState, runGit, signal } from "./helpers.js";

const abc = { "a.txt": "a\n", "b.txt": "b\n", "c.txt": "c\n" };

describe("not-owned file check", () => {
  it("is flagged as experimental", () => {
    expect(notOwnedFileCheck().name).toBe(NOT_OWNED_FILE_CHECK_NAME);
  });

  it("reports the one tracked file no pattern covers", async () => {
    const repo = await makeTempRepo(abc);
    const out = await notOwnedFileCheck().check(input(repo, entries("a.txt", "b.txt")), signal());
    expect(out.issues).toEqual([
      { message: 'Found 1 not owned files (skipped patterns: ""):\n  * c.txt' },
    ]);
  });

  it("treats skipped patterns as not owning anything", async () => {
    const repo = await makeTempRepo(abc);
    const check = notOwnedFileCheck({ skipPatterns: ["a.txt"] });
    const out = await check.check(input(repo, entries("a.txt", "b.txt")), signal());
    expect(out.issues).toEqual([
      { message: 'Found 2 not owned files (skipped patterns: "a.txt"):\n  * a.txt\n  * c.txt' },
    ]);
  });

  it("drops owned files whose names look like pathspec magic", async () => {
    const repo = await makeTempRepo({ ":(top)z.txt": "z\n", "c.txt": "c\n" });
    const before = repoState(repo);
    const out = await notOwnedFileCheck().check(input(repo, entries(":(top)z.txt")), signal());
    expect(out.issues).toEqual([
      { message: 'Found 1 not owned files (skipped patterns: ""):\n  * c.txt' },
    ]);
    expect(repoState(repo)).toEqual(before);
  });

  it("reports nothing when every file is owned", async () => {
    const repo = await makeTempRepo(abc);
    const out = await notOwnedFileCheck().check(input(repo, entries("*")), signal());
    expect(out.issues).toEqual([]);
  });

  it("removes an ignore file it had to create", async () => {
    const repo = await makeTempRepo(abc);
    const before = repoState(repo);
    await notOwnedFileCheck().check(input(repo, entries("a.txt")), signal());
    expect(fss.existsSync(path.join(repo, ".gitignore"))).toBe(false);
    expect(repoState(repo)).toEqual(before);
  });

  it("restores a tracked ignore file without trailing newline byte for byte", async () => {
    const repo = await makeTempRepo({ ...abc, ".gitignore": "*.log" });
    const before = repoState(repo);
    const out = await notOwnedFileCheck().check(input(repo, entries("a.txt", "b.txt", ".gitignore")), signal());
    expect(out.issues).toEqual([
      { message: 'Found 1 not owned files (skipped patterns: ""):\n  * c.txt' },
    ]);
    const after = repoState(repo);
    expect(after.gitignore?.toString("utf8")).toBe("*.log");
    expect(after).toEqual(before);
  });

  it("only lists the configured subdirectories", async () => {
    const repo = await makeTempRepo({ "src/a.ts": "a", "src/b.ts": "b", "docs/x.md": "x" });
    const check = notOwnedFileCheck({ subdirectories: ["src"] });
    const out = await check.check(input(repo, entries("src/a.ts")), signal());
    expect(out.issues).toEqual([
      { message: 'Found 1 not owned files (skipped patterns: ""):\n  * src/b.ts' },
    ]);
  });

  it("stops on a dirty tree without writing the ignore file", async () => {
    const repo = await makeTempRepo(abc);
    await fs.writeFile(path.join(repo, "new.txt"), "untracked\n");
    const out = await notOwnedFileCheck().check(input(repo, entries("a.txt")), signal());
    expect(out.issues).toEqual([{ message: DIRTY_TREE_MESSAGE }]);
    expect(fss.existsSync(path.join(repo, ".gitignore"))).toBe(false);
    expect(runGit(["status", "--porcelain"], repo)).toBe("?? new.txt");
  });

  it("reports empty ownership without running git", async () => {
    // not a repository: any git call would fail
    const dir = await makeTempDir();
    const out = await notOwnedFileCheck().check(input(path.join(dir, "missing"), []), signal());
    expect(out.issues).toEqual([{ message: EMPTY_CODEOWNERS_MESSAGE }]);
  });

  it("restores the tree when a git command fails after mutating it", async () => {
    const repo = await makeTempRepo(abc);
    const before = repoState(repo);
    const check = notOwnedFileCheck({ subdirectories: [":(bogus)x"] });
    await expect(check.check(input(repo, entries("a.txt")), signal())).rejects.toBeInstanceOf(GitCommandError);
    expect(repoState(repo)).toEqual(before);
  });

  it("fails with the git diagnostics outside a repository", async () => {
    const dir = await makeTempDir();
    const prev = process.env.GIT_CEILING_DIRECTORIES;
    process.env.GIT_CEILING_DIRECTORIES = path.dirname(dir);
    try {
      const err = await notOwnedFileCheck().check(input(dir, entries("a.txt")), signal()).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(GitCommandError);
      expect(err instanceof GitCommandError ? err.args : []).toEqual(["status", "--porcelain"]);
      expect(err instanceof GitCommandError ? err.stderr : "").toMatch(/not a git repository/i);
    } finally {
      if (prev === undefined) delete process.env.GIT_CEILING_DIRECTORIES;
      else process.env.GIT_CEILING_DIRECTORIES = prev;
    }
  });

  it("honours an aborted signal before touching the repository", async () => {
    const repo = await makeTempRepo(abc);
    const ac = new AbortController();
    ac.abort();
    await expect(notOwnedFileCheck().check(input(repo, entries("a.txt")), ac.signal)).rejects.toBeInstanceOf(CanceledError);
    expect(fss.existsSync(path.join(repo, ".gitignore"))).toBe(false);
  });

  describe("trustWorkspace", () => {
    let prevGlobal: string | undefined;

    afterEach(() => {
      if (prevGlobal === undefined) delete process.env.GIT_CONFIG_GLOBAL;
      else process.env.GIT_CONFIG_GLOBAL = prevGlobal;
    });

    it("adds the repository to safe.directory in the global config", async () => {
      const repo = await makeTempRepo(abc);
      const home = await makeTempDir();
      const globalCfg = path.join(home, "gitconfig");
      await fs.writeFile(globalCfg, "");
      prevGlobal = process.env.GIT_CONFIG_GLOBAL;
      process.env.GIT_CONFIG_GLOBAL = globalCfg;

      await notOwnedFileCheck({ trustWorkspace: true }).check(input(repo, entries("*")), signal());

      expect(runGit(["config", "--global", "--get-all", "safe.directory"], repo)).toBe(repo);
    });
  });
});
