/**
 * Alerting error taxonomy.
 *
 * Only {@link AlertValidationError} is meant to reach producers. Transport
 * and circuit errors are caught by the alert manager and turned into a
 * `failed` outcome; policy results (filtered, rate limited) are never
 * errors at all.
 *
 * @module alerting/errors
 */

/** Raised when an alert cannot be built from the given input. */
export class AlertValidationError extends Error {
  public readonly code = 'ALERT_VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'AlertValidationError';
  }
}

/** Fast-fail raised by an open circuit breaker; the wrapped call was not made. */
export class CircuitOpenError extends Error {
  public readonly code = 'CIRCUIT_OPEN';

  constructor(
    public readonly breakerName: string,
    public readonly retryAfterMs: number,
  ) {
    super(`Circuit breaker "${breakerName}" is open; retry in ${Math.ceil(retryAfterMs / 1000)}s`);
    this.name = 'CircuitOpenError';
  }
}

export type TransportErrorKind =
  | 'timeout'
  | 'connection'
  | 'authentication'
  | 'rejected'
  | 'unavailable';

/** Failure of the outbound transport. See {@link isTransportFailure} for the kinds the breaker counts. */
export class TransportError extends Error {
  public readonly code = 'TRANSPORT_ERROR';

  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export function isTransportError(err: unknown): err is TransportError {
  return err instanceof TransportError;
}

const BREAKER_FAILURE_KINDS: ReadonlySet<TransportErrorKind> = new Set([
  'timeout',
  'connection',
  'authentication',
]);

/**
 * Transport errors that say the mail server itself is unreachable or
 * refusing us. A rejected message ('rejected') concerns that one message
 * and an unconfigured transport ('unavailable') is local; neither counts
 * against the circuit breaker.
 */
export function isTransportFailure(err: unknown): err is TransportError {
  return err instanceof TransportError && BREAKER_FAILURE_KINDS.has(err.kind);
}

/** Normalise anything thrown into an Error for logging. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
