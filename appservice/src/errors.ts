/**
 * Errors raised by the transport and the intent API.
 *
 * MatrixRequestError is what the homeserver said; the intent errors wrap it
 * (as `cause`) once the single fallback path has been used up.
 */

export class MatrixRequestError extends Error {
  readonly status: number;
  readonly errcode: string;

  constructor(status: number, errcode: string, message: string) {
    super(`${status} ${errcode}: ${message}`);
    this.name = 'MatrixRequestError';
    this.status = status;
    this.errcode = errcode;
  }
}

export class IntentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IntentError';
  }
}

export class InvalidIdentityError extends IntentError {
  readonly mxid: string;

  constructor(mxid: string) {
    super(`Invalid Matrix user ID: "${mxid}" (expected @localpart:domain)`);
    this.name = 'InvalidIdentityError';
    this.mxid = mxid;
  }
}

export class JoinFailedError extends IntentError {
  readonly mxid: string;
  readonly roomId: string;

  constructor(mxid: string, roomId: string, cause: unknown) {
    super(`Failed to join room ${roomId} as ${mxid}`, { cause });
    this.name = 'JoinFailedError';
    this.mxid = mxid;
    this.roomId = roomId;
  }
}

export class InviteFailedError extends IntentError {
  readonly roomId: string;
  readonly target: string;

  constructor(roomId: string, target: string, cause: unknown) {
    super(`Failed to invite ${target} to ${roomId}`, { cause });
    this.name = 'InviteFailedError';
    this.roomId = roomId;
    this.target = target;
  }
}

/** The errcode of a homeserver error, or null for anything else. */
export function matrixErrorCode(err: unknown): string | null {
  return err instanceof MatrixRequestError ? err.errcode : null;
}
