export type ErrorMetadata = Record<string, unknown>;

/** Base for every error this tool raises on purpose. */
export class DelegationCheckError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = new.target.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Input could not be turned into a valid host name. */
export class InvalidDomainError extends DelegationCheckError {}

/** Explicit parent is not a proper suffix-parent of the subdomain. */
export class InvalidParentError extends DelegationCheckError {}

/** No parent can be inferred: too few labels, or only a public suffix would remain. */
export class InsufficientLabelsError extends DelegationCheckError {}

/**
 * Raised by `withTimeout` when the wrapped promise does not settle in time.
 * Never leaves the resolver adapter; it is mapped to a `Timeout` outcome.
 */
export class QueryTimeoutError extends DelegationCheckError {
  constructor(readonly timeoutMs: number, label?: string) {
    super(label ? `${label} timed out after ${timeoutMs}ms` : `timed out after ${timeoutMs}ms`, { timeoutMs });
  }
}

export function isInputError(err: unknown): err is InvalidDomainError | InvalidParentError | InsufficientLabelsError {
  return (
    err instanceof InvalidDomainError ||
    err instanceof InvalidParentError ||
    err instanceof InsufficientLabelsError
  );
}
