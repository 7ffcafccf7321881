/**
 * Ledger error taxonomy.
 *
 * Every failed operation throws exactly one LedgerError and leaves no
 * state change behind. Codes are stable; messages are for humans.
 */

export const INVALID_ARGUMENT = "INVALID_ARGUMENT";
export const NOT_FOUND = "NOT_FOUND";
export const UNAUTHORIZED = "UNAUTHORIZED";
export const INVALID_STATE = "INVALID_STATE";
export const PRECONDITION_FAILED = "PRECONDITION_FAILED";
export const CUSTODY_TRANSFER_FAILED = "CUSTODY_TRANSFER_FAILED";

export type LedgerErrorCode =
  | typeof INVALID_ARGUMENT
  | typeof NOT_FOUND
  | typeof UNAUTHORIZED
  | typeof INVALID_STATE
  | typeof PRECONDITION_FAILED
  | typeof CUSTODY_TRANSFER_FAILED;

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}

/** Throw INVALID_ARGUMENT unless `condition` holds. */
export function ensure(condition: boolean, message: string): asserts condition {
  if (!condition) throw new LedgerError(INVALID_ARGUMENT, message);
}
