import type { ZodError } from "zod";

/**
 * Malformed or missing timing configuration. Raised while loading policy or
 * timing tables; nothing is started once this is thrown.
 */
export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError" as const;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }

  static fromZod(source: string, error: ZodError): ConfigurationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    return new ConfigurationError(`Invalid ${source}`, issues);
  }
}

/** Unexpected error raised while processing one combatant during a pulse. */
export interface SchedulerFault {
  kind: "SchedulerFault";
  actorId: string;
  serverTimeMs: number;
  error: unknown;
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
