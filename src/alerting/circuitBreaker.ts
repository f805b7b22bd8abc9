/**
 * Circuit Breaker
 *
 * Guards a fallible async call. After `failureThreshold` consecutive
 * counted failures the breaker opens and rejects calls with
 * {@link CircuitOpenError} without invoking them. Once `recoveryTimeoutMs`
 * has passed, the next call becomes the single half-open trial: success
 * closes the breaker, failure reopens it and restarts the timer.
 *
 * Every read and transition of breaker state happens in a synchronous
 * section; the wrapped call runs between sections, never inside one.
 *
 * @module alerting/circuitBreaker
 */

import { CircuitOpenError, isTransportFailure } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  name?: string;
  /** Consecutive failures that open the breaker. Default: 3. */
  failureThreshold?: number;
  /** Time the breaker stays open before a trial call. Default: 5 minutes. */
  recoveryTimeoutMs?: number;
  /**
   * Decides whether a thrown error counts toward the threshold. Errors it
   * rejects propagate untouched. Default: timeout, connection and
   * authentication TransportErrors.
   */
  isFailure?: (err: unknown) => boolean;
  /** Invoked after every state transition. */
  onStateChange?: (change: CircuitStateChange) => void;
  now?: () => number;
}

export interface CircuitStateChange {
  name: string;
  from: CircuitState;
  to: CircuitState;
  failureCount: number;
  at: Date;
}

export interface CircuitBreakerSnapshot {
  readonly name: string;
  readonly state: CircuitState;
  readonly failureCount: number;
  readonly lastFailureAt: Date | null;
  readonly openedAt: Date | null;
  readonly totalCalls: number;
  readonly rejectedCalls: number;
  readonly stateChanges: number;
}

export interface CircuitBreaker {
  readonly name: string;
  /** Current state; an expired open breaker still reports 'open' until the next call. */
  readonly state: CircuitState;
  call<T>(fn: () => Promise<T>): Promise<T>;
  getSnapshot(): CircuitBreakerSnapshot;
  /** Force the breaker closed and clear failure accounting. */
  reset(): void;
}

export const DEFAULT_FAILURE_THRESHOLD = 3;
export const DEFAULT_RECOVERY_TIMEOUT_MS = 5 * 60 * 1000;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

type Admission = { kind: 'normal' } | { kind: 'trial' };

export function createCircuitBreaker(options: CircuitBreakerOptions = {}): CircuitBreaker {
  const name = options.name ?? 'transport';
  const failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
  const recoveryTimeoutMs = options.recoveryTimeoutMs ?? DEFAULT_RECOVERY_TIMEOUT_MS;
  const isFailure = options.isFailure ?? isTransportFailure;
  const now = options.now ?? Date.now;

  if (!Number.isInteger(failureThreshold) || failureThreshold < 1) {
    throw new Error('Circuit breaker failureThreshold must be a positive integer');
  }
  if (recoveryTimeoutMs < 0) {
    throw new Error('Circuit breaker recoveryTimeoutMs must not be negative');
  }

  let state: CircuitState = 'closed';
  let failureCount = 0;
  let lastFailureAt: number | null = null;
  let openedAt: number | null = null;
  let trialInFlight = false;
  let totalCalls = 0;
  let rejectedCalls = 0;
  let stateChanges = 0;

  function transition(to: CircuitState): void {
    const from = state;
    if (from === to) return;
    state = to;
    stateChanges += 1;
    options.onStateChange?.({ name, from, to, failureCount, at: new Date(now()) });
  }

  /** Synchronous gate: decide whether this call may proceed. */
  function admit(): Admission {
    totalCalls += 1;
    if (state === 'closed') return { kind: 'normal' };

    if (state === 'open') {
      const elapsed = now() - (openedAt ?? 0);
      if (elapsed >= recoveryTimeoutMs) {
        transition('half_open');
        trialInFlight = true;
        return { kind: 'trial' };
      }
      rejectedCalls += 1;
      throw new CircuitOpenError(name, recoveryTimeoutMs - elapsed);
    }

    // half_open: only one trial at a time
    if (!trialInFlight) {
      trialInFlight = true;
      return { kind: 'trial' };
    }
    rejectedCalls += 1;
    throw new CircuitOpenError(name, 0);
  }

  function onSuccess(admission: Admission): void {
    if (admission.kind === 'trial') {
      trialInFlight = false;
      failureCount = 0;
      openedAt = null;
      transition('closed');
      return;
    }
    if (state === 'closed') failureCount = 0;
  }

  function onFailure(admission: Admission): void {
    lastFailureAt = now();
    if (admission.kind === 'trial') {
      trialInFlight = false;
      failureCount += 1;
      openedAt = lastFailureAt;
      transition('open');
      return;
    }
    // A normal call that started while closed may finish after the breaker
    // opened; it still counts once but cannot reopen an already-open breaker.
    failureCount += 1;
    if (state === 'closed' && failureCount >= failureThreshold) {
      openedAt = lastFailureAt;
      transition('open');
    }
  }

  function onUncounted(admission: Admission): void {
    // The trial slot must be released even when the error is not a failure.
    if (admission.kind === 'trial') trialInFlight = false;
  }

  return {
    name,

    get state(): CircuitState {
      return state;
    },

    async call<T>(fn: () => Promise<T>): Promise<T> {
      const admission = admit();
      let result: T;
      try {
        result = await fn();
      } catch (err) {
        if (isFailure(err)) {
          onFailure(admission);
        } else {
          onUncounted(admission);
        }
        throw err;
      }
      onSuccess(admission);
      return result;
    },

    getSnapshot(): CircuitBreakerSnapshot {
      return Object.freeze({
        name,
        state,
        failureCount,
        lastFailureAt: lastFailureAt === null ? null : new Date(lastFailureAt),
        openedAt: openedAt === null ? null : new Date(openedAt),
        totalCalls,
        rejectedCalls,
        stateChanges,
      });
    },

    reset(): void {
      failureCount = 0;
      lastFailureAt = null;
      openedAt = null;
      trialInFlight = false;
      transition('closed');
    },
  };
}
