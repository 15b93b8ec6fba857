import path from "node:path";
import fs from "node:fs/promises";
import { CheckError } from "./errors.js";
import type { OwnershipEntry } from "./types.js";
import { pathExists } from "./utils.js";

// Same lookup order as GitHub.
export const CODEOWNERS_LOCATIONS = [".github/CODEOWNERS", "CODEOWNERS", "docs/CODEOWNERS"];

export async function findCodeownersFile(repoDir: string): Promise<string | null> {
  for (const rel of CODEOWNERS_LOCATIONS) {
    const p = path.join(repoDir, rel);
    if (await pathExists(p)) return p;
  }
  return null;
}

// Line-based reader; no syntax validation.
export function parseEntries(content: string): OwnershipEntry[] {
  const entries: OwnershipEntry[] = [];
  const lines = content.split(/\r?\n/);
  lines.forEach((line, idx) => {
    const hash = line.search(/(^|\s)#/);
    const body = (hash >= 0 ? line.slice(0, hash) : line).trim();
    if (!body) return;
    const [pattern, ...owners] = body.split(/\s+/);
    if (!pattern) return;
    entries.push({ pattern, owners, lineNo: idx + 1 });
  });
  return entries;
}

export async function loadEntries(repoDir: string): Promise<OwnershipEntry[]> {
  const file = await findCodeownersFile(repoDir);
  if (!file) {
    throw new CheckError(`No CODEOWNERS found in ${repoDir} (looked in ${CODEOWNERS_LOCATIONS.join(", ")})`);
  }
  return parseEntries(await fs.readFile(file, "utf8"));
}
