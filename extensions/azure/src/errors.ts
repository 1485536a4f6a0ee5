/**
 * Azure Resource Toolkit — Error Types
 *
 * `NotFoundError` is the only one that is ever turned into a normal value
 * (an absent remote state); everything else reaches the caller.
 */

/** Desired configuration is invalid. Fatal, never retried. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

/** Credential or connectivity failure. */
export class RemoteUnavailableError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "RemoteUnavailableError";
  }
}

/** The remote resource does not exist. */
export class NotFoundError extends Error {
  constructor(public readonly resourceId: string) {
    super(`Resource ${resourceId} was not found`);
    this.name = "NotFoundError";
  }
}

/** A poll loop gave up before the remote state became terminal. */
export class PollTimeoutError<S = unknown> extends Error {
  constructor(
    public readonly lastState: S,
    public readonly attempts: number,
    public readonly elapsedMs: number,
  ) {
    super(`Timed out after ${attempts} poll(s) (${elapsedMs}ms) waiting for a terminal state`);
    this.name = "PollTimeoutError";
  }
}

/** A builder was used outside its state machine. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Whether an error came from the caller's input rather than the platform.
 * Drives the `errorType` telemetry property.
 */
export function isUserError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof UsageError;
}
