/**
 * validator/errors.ts — Hard failures of session-key validation.
 *
 * Anything thrown here rejects the whole operation and rolls back every
 * accounting update made while validating it. An operator signature that
 * does not verify is not an error: validation returns the failure sentinel.
 */

export type SessionKeyErrorCode =
  // malformed input
  | 'MALFORMED_INPUT'
  | 'INVALID_ARGUMENTS_LENGTH'
  | 'INVALID_CALLDATA_PREFIX'
  | 'INVALID_BATCH_LENGTH'
  | 'INVALID_WALLET_OPERATION'
  // permission violations
  | 'VALUE_MISMATCH'
  | 'INVALID_SESSION'
  | 'INVALID_TO'
  | 'INVALID_SELECTOR'
  | 'CALLDATA_MISMATCH'
  | 'ARGUMENTS_NOT_ALLOWED'
  | 'DELEGATECALL_NOT_ALLOWED'
  | 'INVALID_PAYMASTER'
  | 'GAS_EXCEEDED'
  | 'TIMES_EXHAUSTED'
  | 'SESSION_TIMES_EXHAUSTED'
  | 'TOKEN_OVERSPENDING'
  | 'INVALID_VALIDATION_DURATION'
  | 'PERMIT_NOT_SUDO'
  | 'INVALID_PERMIT_SIGNATURE'
  | 'PERMIT_REVOKED'
  | 'STALE_PERMIT_NONCE';

export class SessionKeyError extends Error {
  readonly code: SessionKeyErrorCode;

  constructor(code: SessionKeyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionKeyError';
    this.code = code;
  }
}

export function isSessionKeyError(error: unknown, code?: SessionKeyErrorCode): error is SessionKeyError {
  return error instanceof SessionKeyError && (code === undefined || error.code === code);
}

/**
 * Run a decoder and turn whatever it throws into MALFORMED_INPUT.
 * Errors that are already SessionKeyErrors pass through untouched.
 */
export function decodeOrThrow<T>(what: string, decode: () => T): T {
  try {
    return decode();
  } catch (error: unknown) {
    if (error instanceof SessionKeyError) throw error;
    const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
    throw new SessionKeyError('MALFORMED_INPUT', `malformed ${what}: ${reason}`, { cause: error });
  }
}
