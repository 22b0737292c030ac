/**
 * Newsbrief — Errors
 */

export class NewsbriefError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Configuration failed validation. `issues` holds one line per problem.
 */
export class ConfigError extends NewsbriefError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }
}

/**
 * A call was rejected because the named circuit is open.
 * The wrapped operation was not invoked.
 */
export class CircuitOpenError extends NewsbriefError {
  constructor(
    readonly circuitName: string,
    readonly retryAfterSeconds: number
  ) {
    super(`Circuit ${circuitName} is open`);
  }
}

export class DeliveryError extends NewsbriefError {
  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
