import type { FailureKind } from '../types/outcome.js';

export const EXIT_SUCCESS = 0;

/** Usage errors: unknown command, invalid flag or config. */
export const EXIT_USAGE = 2;

/** Process exit status per failure kind. */
export const EXIT_CODES: Record<FailureKind, number> = {
  InvalidInput: 2,
  NotFound: 3,
  DuplicateName: 4,
  StorageError: 5,
  ConfigNotFound: 6,
  AuthFailed: 7,
  EngineError: 8,
  AlreadyConnected: 9,
  // 128 + SIGINT
  Cancelled: 130,
  // Nothing to disconnect is reported as a warning
  NoActiveConnection: 0,
};

export function exitCodeFor(kind: FailureKind): number {
  return EXIT_CODES[kind];
}
