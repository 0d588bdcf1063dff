/** A missing/invalid setting or a reference to a step the flow does not declare. */
export class IntakeConfigError extends Error {
  override name = "IntakeConfigError";
}

/**
 * A remote classifier or conflict check could not be completed. The caller should be
 * asked to hold or be called back, not re-asked for the same answer.
 */
export class DependencyUnavailableError extends Error {
  override name = "DependencyUnavailableError";

  constructor(
    readonly dependency: string,
    cause: unknown
  ) {
    super(`${dependency} unavailable: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/** Raised when a function call finishes after its call has hung up. */
export class CallCancelledError extends Error {
  override name = "CallCancelledError";

  constructor(readonly callSid: string) {
    super(`Call ${callSid} was cancelled`);
  }
}
