import { throwIfAborted } from "../../errors.js";
import type { Check, OwnershipEntry } from "../../types.js";
import { formatBulletList } from "../../utils.js";
import { OutputBuilder } from "../output.js";

export const DUPLICATED_PATTERN_CHECK_NAME = "Duplicated Pattern Checker";

function describeEntry(e: OwnershipEntry) {
  const line = e.lineNo != null ? `${e.lineNo}` : "?";
  return `${line}: with owners: ${e.owners.join(" ")}`;
}

// Pure: only looks at the parsed entries.
export function duplicatedPatternCheck(): Check {
  return {
    name: DUPLICATED_PATTERN_CHECK_NAME,
    async check(input, signal) {
      throwIfAborted(signal);
      const byPattern = new Map<string, OwnershipEntry[]>();
      for (const e of input.entries) {
        const list = byPattern.get(e.pattern);
        if (list) list.push(e);
        else byPattern.set(e.pattern, [e]);
      }

      const out = new OutputBuilder();
      for (const [pattern, entries] of byPattern) {
        if (entries.length < 2) continue;
        const msg = `Pattern ${JSON.stringify(pattern)} is defined ${entries.length} times in lines: \n${formatBulletList(entries.map(describeEntry))}`;
        out.reportIssue(msg, { lineNo: entries[0]?.lineNo });
      }
      return out.output();
    },
  };
}
