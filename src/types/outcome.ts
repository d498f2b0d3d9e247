/**
 * Failure taxonomy and the result type returned by store, orchestrator
 * and facade operations.
 *
 * Operations that can fail for expected reasons return an `Outcome`
 * rather than throwing, so callers branch on `ok` and `failure.kind`.
 *
 * @module types/outcome
 */

export type FailureKind =
  | 'InvalidInput'
  | 'NotFound'
  | 'DuplicateName'
  | 'StorageError'
  | 'ConfigNotFound'
  | 'AuthFailed'
  | 'EngineError'
  | 'NoActiveConnection'
  | 'AlreadyConnected'
  | 'Cancelled';

export interface Failure {
  kind: FailureKind;
  /** Single human-readable line. */
  message: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: Failure };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: FailureKind, message: string): Outcome<T> {
  return { ok: false, failure: { kind, message } };
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
