import path from "node:path";
import { z } from "zod";
import { ConfigError, toErrorMessage } from "./errors.js";
import { DEFAULT_CONFIG_FILENAME, ENV_PREFIX, pathExists, readYaml, splitList } from "./utils.js";

const SeveritySchema = z.enum(["info", "warning", "error"]);
const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const ConfigSchema = z
  .object({
    repositoryPath: z.string().min(1, "repositoryPath cannot be empty").default("."),
    checkFailureLevel: SeveritySchema.default("warning"),
    checks: z.array(z.string().min(1)).default([]),
    experimentalChecks: z.array(z.string().min(1)).default([]),
    notOwnedChecker: z
      .object({
        skipPatterns: z.array(z.string()).default([]),
        subdirectories: z.array(z.string()).default([]),
        trustWorkspace: z.boolean().default(false),
      })
      .strict()
      .default({}),
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigLayer = Record<string, unknown>;

export type LoadConfigOptions = {
  cwd?: string;
  // explicit file: must exist; otherwise codeowners-config.yaml in cwd is optional
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  flags?: ConfigLayer;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const out: ConfigLayer = {};
  for (const layer of layers) {
    for (const [k, v] of Object.entries(layer)) {
      if (v === undefined) continue;
      const prev = out[k];
      out[k] = isRecord(v) ? mergeLayers(isRecord(prev) ? prev : {}, v) : v;
    }
  }
  return out;
}

function parseBool(v: string | undefined): boolean | string | undefined {
  if (v == null) return undefined;
  const s = v.trim().toLowerCase();
  if (s === "true" || s === "1" || s === "yes") return true;
  if (s === "false" || s === "0" || s === "no" || s === "") return false;
  return v; // left for the schema to reject
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const get = (key: string) => env[`${ENV_PREFIX}_${key}`];
  return {
    repositoryPath: get("REPOSITORY_PATH"),
    checkFailureLevel: get("CHECK_FAILURE_LEVEL")?.trim().toLowerCase(),
    checks: splitList(get("CHECKS")),
    experimentalChecks: splitList(get("EXPERIMENTAL_CHECKS")),
    notOwnedChecker: {
      skipPatterns: splitList(get("NOT_OWNED_CHECKER_SKIP_PATTERNS")),
      subdirectories: splitList(get("NOT_OWNED_CHECKER_SUBDIRECTORIES")),
      trustWorkspace: parseBool(get("NOT_OWNED_CHECKER_TRUST_WORKSPACE")),
    },
  };
}

async function configFromFile(cwd: string, configPath?: string): Promise<ConfigLayer> {
  const file = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILENAME);
  if (!(await pathExists(file))) {
    if (configPath) throw new ConfigError(`config file not found: ${file}`);
    return {};
  }
  let data: unknown;
  try {
    data = await readYaml(file);
  } catch (e) {
    throw new ConfigError(`failed to read ${file}: ${toErrorMessage(e)}`, e);
  }
  if (!isRecord(data)) throw new ConfigError(`${file}: expected a mapping at the top level`);
  return data;
}

export function parseConfig(raw: unknown, cwd = process.cwd()): Config {
  const res = ConfigSchema.safeParse(raw);
  if (!res.success) {
    const details = res.error.issues
      .map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration: ${details}`, res.error);
  }
  return { ...res.data, repositoryPath: path.resolve(cwd, res.data.repositoryPath) };
}

/**
 * defaults < YAML file < CODEOWNERS_* environment < command-line flags
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<Config> {
  const cwd = opts.cwd ?? process.cwd();
  const fileLayer = await configFromFile(cwd, opts.configPath);
  const merged = mergeLayers(fileLayer, configFromEnv(opts.env ?? process.env), opts.flags ?? {});
  return parseConfig(merged, cwd);
}

export type CliOptions = {
  repositoryPath?: string;
  config?: string;
  checks?: string[];
  experimentalChecks?: string[];
  checkFailureLevel?: string;
  notOwnedSkipPatterns?: string[];
  notOwnedSubdirectories?: string[];
  notOwnedTrustWorkspace?: boolean;
  logLevel?: string;
};

export function flagsFromCli(o: CliOptions): ConfigLayer {
  return {
    repositoryPath: o.repositoryPath,
    checkFailureLevel: o.checkFailureLevel?.toLowerCase(),
    checks: o.checks,
    experimentalChecks: o.experimentalChecks,
    logLevel: o.logLevel?.toLowerCase(),
    notOwnedChecker: {
      skipPatterns: o.notOwnedSkipPatterns,
      subdirectories: o.notOwnedSubdirectories,
      trustWorkspace: o.notOwnedTrustWorkspace,
    },
  };
}
