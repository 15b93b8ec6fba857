/**
 * Error types shared by the checks, the runner and the CLI.
 */

export class CheckError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "CheckError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class GitCommandError extends CheckError {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: string[], exitCode: number | null, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || `exited with code ${exitCode ?? "unknown"}`;
    super(`git ${args.join(" ")}: ${detail}`, cause);
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class ConfigError extends CheckError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class CanceledError extends CheckError {
  constructor(message = "operation was canceled") {
    super(message);
    this.name = "CanceledError";
  }
}

/**
 * Holds one or more independent failures; the message renders all of them.
 */
export class MultiError extends CheckError {
  readonly errors: readonly Error[];

  constructor(errors: Error[]) {
    super(MultiError.render(errors));
    this.name = "MultiError";
    this.errors = errors;
  }

  private static render(errors: Error[]): string {
    if (errors.length === 1) return `1 error occurred:\n\t* ${errors[0]?.message ?? ""}`;
    const points = errors.map((e) => `\t* ${e.message}`).join("\n");
    return `${errors.length} errors occurred:\n${points}`;
  }

  /**
   * Flattens nested MultiErrors and drops undefined entries.
   * Returns undefined when nothing is left, the error itself when only one is.
   */
  static combine(...errs: Array<Error | undefined>): Error | undefined {
    const flat: Error[] = [];
    for (const e of errs) {
      if (e === undefined) continue;
      if (e instanceof MultiError) flat.push(...e.errors);
      else flat.push(e);
    }
    if (flat.length === 0) return undefined;
    if (flat.length === 1) return flat[0];
    return new MultiError(flat);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(toErrorMessage(value));
}

export function toErrorMessage(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  try {
    return String(value);
  } catch {
    return "Unknown error";
  }
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw new CanceledError();
}
