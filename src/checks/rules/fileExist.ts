import fg from "fast-glob";
import { throwIfAborted } from "../../errors.js";
import type { Check } from "../../types.js";
import { toPosix } from "../../utils.js";
import { OutputBuilder } from "../output.js";

export const FILE_EXIST_CHECK_NAME = "File Exist Checker";

/**
 * CODEOWNERS pattern -> fast-glob pattern relative to the repository root.
 * Follows gitignore anchoring: a leading or inner slash pins the pattern to
 * the root, otherwise it matches at any depth.
 */
export function toGlob(pattern: string): string {
  let p = toPosix(pattern.trim());
  if (p.endsWith("/")) p = p.slice(0, -1);
  const anchored = p.startsWith("/") || p.includes("/");
  if (p.startsWith("/")) p = p.slice(1);
  if (p === "") return "**";
  return anchored ? p : `**/${p}`;
}

export function fileExistCheck(): Check {
  return {
    name: FILE_EXIST_CHECK_NAME,
    async check(input, signal) {
      const out = new OutputBuilder();
      for (const entry of input.entries) {
        throwIfAborted(signal);
        const matches = await fg(toGlob(entry.pattern), {
          cwd: input.repoDir,
          dot: true,
          onlyFiles: false,
          unique: true,
          suppressErrors: true,
          ignore: [".git", ".git/**"],
        });
        if (matches.length === 0) {
          out.reportIssue(`${JSON.stringify(entry.pattern)} does not match any files in repository`, {
            lineNo: entry.lineNo,
          });
        }
      }
      return out.output();
    },
  };
}
