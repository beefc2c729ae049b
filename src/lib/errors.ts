/**
 * Fatal errors. Anything thrown from here ends the run; per-dot script
 * failures are outcomes, not errors.
 */

export class DotsError extends Error {
  constructor(
    message: string,
    public code?: string,
    public override cause?: unknown
  ) {
    super(message);
    this.name = "DotsError";
  }
}

export class MissingPathError extends DotsError {
  constructor(public path: string, cause?: unknown) {
    super(`No such directory: ${path}`, "ENOENT", cause);
    this.name = "MissingPathError";
  }
}

export class ConfigError extends DotsError {
  constructor(public source: string, message: string, cause?: unknown) {
    super(`${source}: ${message}`, "ECONFIG", cause);
    this.name = "ConfigError";
  }
}

/**
 * Read the `code` of a Node system error, if there is one.
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
