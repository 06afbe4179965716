/**
 * Error taxonomy shared by every package.
 *
 * `kind` is the stable tag surfaced to callers in failure results; `code` is the
 * machine-readable identifier used in logs.
 */
export type ErrorKind = 'validation' | 'not_found' | 'transient' | 'permanent' | 'cancelled';

export class HelixError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;

  public constructor(message: string, options: { code: string; kind: ErrorKind; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'HelixError';
    this.code = options.code;
    this.kind = options.kind;
  }
}

export class InvalidSequenceError extends HelixError {
  public readonly invalidCharacters: string[];

  public constructor(message: string, invalidCharacters: string[] = []) {
    super(message, { code: 'INVALID_SEQUENCE', kind: 'validation' });
    this.name = 'InvalidSequenceError';
    this.invalidCharacters = invalidCharacters;
  }
}

export class InvalidOrfError extends HelixError {
  public constructor(message: string) {
    super(message, { code: 'INVALID_ORF', kind: 'validation' });
    this.name = 'InvalidOrfError';
  }
}

export class SessionNotFoundError extends HelixError {
  public readonly sessionId: string;

  public constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, { code: 'SESSION_NOT_FOUND', kind: 'not_found' });
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/** Resource exhaustion, rate limits, temporary unavailability. Safe to retry. */
export class TransientCollaboratorError extends HelixError {
  public readonly collaborator: string;

  public constructor(collaborator: string, message: string, cause?: unknown) {
    super(`${collaborator}: ${message}`, { code: 'COLLABORATOR_TRANSIENT', kind: 'transient', cause });
    this.name = 'TransientCollaboratorError';
    this.collaborator = collaborator;
  }
}

/** Bad credentials, misconfiguration, malformed requests. Never retried. */
export class PermanentCollaboratorError extends HelixError {
  public readonly collaborator: string;

  public constructor(collaborator: string, message: string, cause?: unknown) {
    super(`${collaborator}: ${message}`, { code: 'COLLABORATOR_PERMANENT', kind: 'permanent', cause });
    this.name = 'PermanentCollaboratorError';
    this.collaborator = collaborator;
  }
}

export class CancelledError extends HelixError {
  public constructor(reason = 'Operation cancelled') {
    super(reason, { code: 'CANCELLED', kind: 'cancelled' });
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
