export type StorefrontErrorCode =
  | 'ALREADY_GRANTED'
  | 'INVALID_SELECTION'
  | 'UNROUTABLE_ACTION'
  | 'PERSISTENCE_FAILURE'
  | 'PAYMENT_INTEGRITY_FAILURE';

/** Base class for every failure a bot turn can surface. None of them is fatal to the process. */
export abstract class StorefrontError extends Error {
  abstract readonly code: StorefrontErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Trial requested by an identity whose trial flag is already set. */
export class AlreadyGrantedError extends StorefrontError {
  readonly code = 'ALREADY_GRANTED' as const;

  constructor(readonly userId: string) {
    super(`Trial already granted for user ${userId}`);
  }
}

/** Plan index, duration, language or payment method outside of what the catalog offers. */
export class InvalidSelectionError extends StorefrontError {
  readonly code = 'INVALID_SELECTION' as const;
}

/** Action token that does not parse or is not available to this identity. */
export class UnroutableActionError extends StorefrontError {
  readonly code = 'UNROUTABLE_ACTION' as const;

  constructor(readonly token: string, reason = 'unknown action') {
    super(`Unroutable action "${token}": ${reason}`);
  }
}

export class PersistenceError extends StorefrontError {
  readonly code = 'PERSISTENCE_FAILURE' as const;
}

/** Gateway payment that could not be recorded together with its subscription. Nothing was committed. */
export class PaymentIntegrityError extends StorefrontError {
  readonly code = 'PAYMENT_INTEGRITY_FAILURE' as const;
}

/** Navigation input errors: the caller keeps the current screen and shows a notice. */
export function isNavigationInputError(error: unknown): error is InvalidSelectionError | UnroutableActionError {
  return error instanceof InvalidSelectionError || error instanceof UnroutableActionError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const maybeMsg = error.message;
    if (typeof maybeMsg === 'string' && maybeMsg.trim()) return maybeMsg;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function getErrorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
