// Errors that are not lifecycle outcomes: bad configuration and failed OS calls.
// Lifecycle results (already running, port conflict, timeout) are StartOutcome values.

export type SupervisorErrorCode =
  | 'INVALID_CONFIG'
  | 'PID_FILE_IO'
  | 'SPAWN_FAILED'
  | 'SIGNAL_FAILED'
  | 'PROBE_FAILED';

export class SupervisorError extends Error {
  readonly code: SupervisorErrorCode;

  constructor(code: SupervisorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SupervisorError';
    this.code = code;
  }
}

export function isSupervisorError(error: unknown): error is SupervisorError {
  return error instanceof SupervisorError;
}

/**
 * Read the errno code off a Node system error
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
