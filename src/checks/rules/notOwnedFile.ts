import { throwIfAborted } from "../../errors.js";
import type { Check, NotOwnedFileOptions } from "../../types.js";
import { formatBulletList } from "../../utils.js";
import { OutputBuilder } from "../output.js";
import { computeExcludedPatterns } from "../utils/patterns.js";
import {
  IGNORE_FILE,
  appendIgnoreRules,
  gitListFiles,
  gitRemoveIgnoredFromIndex,
  gitStatusPorcelain,
  gitTrustDirectory,
  withRestoredWorkspace,
} from "../utils/git.js";

export const NOT_OWNED_FILE_CHECK_NAME = "[Experimental] Not Owned File Checker";

export const EMPTY_CODEOWNERS_MESSAGE =
  "The CODEOWNERS file is empty. The files in the repository don't have any owner.";
export const DIRTY_TREE_MESSAGE =
  "git state is dirty: commit all changes before executing this check";

export function notOwnedFilesMessage(files: readonly string[], skipPatterns: readonly string[]) {
  const skipped = JSON.stringify(skipPatterns.join(","));
  return `Found ${files.length} not owned files (skipped patterns: ${skipped}):\n${formatBulletList(files)}`;
}

/**
 * Reports tracked files that no CODEOWNERS pattern covers.
 *
 * Every non-skipped pattern is appended to the ignore file, tracked files
 * matched by it are dropped from the index, and whatever `git ls-files`
 * still lists is not owned. The working tree and index are reset afterwards,
 * so the repository must start clean.
 */
export function notOwnedFileCheck(opts: Partial<NotOwnedFileOptions> = {}): Check {
  const skip = new Set(opts.skipPatterns ?? []);
  const subdirectories = opts.subdirectories ?? [];
  const trustWorkspace = opts.trustWorkspace ?? false;

  return {
    name: NOT_OWNED_FILE_CHECK_NAME,
    async check(input, signal) {
      throwIfAborted(signal);
      const out = new OutputBuilder();

      if (input.entries.length === 0) {
        return out.reportIssue(EMPTY_CODEOWNERS_MESSAGE).output();
      }

      const patterns = computeExcludedPatterns(input.entries, skip);

      if (trustWorkspace) await gitTrustDirectory(input.repoDir, signal);

      const status = await gitStatusPorcelain(input.repoDir, signal);
      if (status.length !== 0) {
        return out.reportIssue(DIRTY_TREE_MESSAGE).output();
      }

      const notOwned = await withRestoredWorkspace(input.repoDir, [IGNORE_FILE], async () => {
        await appendIgnoreRules(input.repoDir, patterns);
        await gitRemoveIgnoredFromIndex(input.repoDir, signal);
        return gitListFiles(input.repoDir, subdirectories, signal);
      });

      if (notOwned.length) {
        out.reportIssue(notOwnedFilesMessage(notOwned, [...skip]));
      }
      return out.output();
    },
  };
}
