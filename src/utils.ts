import fs from "node:fs/promises";
import YAML from "yaml";

export const DEFAULT_CONFIG_FILENAME = "codeowners-config.yaml";
export const ENV_PREFIX = "CODEOWNERS";

export async function pathExists(p: string) {
  try { await fs.access(p); return true; } catch { return false; }
}

export async function readYaml(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return YAML.parse(raw) ?? {};
}

export async function realpathSafe(p: string) {
  try { return await fs.realpath(p); } catch { return p; }
}

// "a, b,,c" -> ["a", "b", "c"]
export function splitList(s: string | undefined): string[] | undefined {
  if (s == null) return undefined;
  return s.split(",").map(x => x.trim()).filter(Boolean);
}

export function toPosix(p: string) {
  return p.replace(/\\/g, "/");
}

export function formatBulletList(items: readonly string[], indent = "  ") {
  return items.map(i => `${indent}* ${i}`).join("\n");
}
