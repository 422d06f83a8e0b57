export enum MintErrorCode {
  SUPPLY_EXCEEDED = 'SUPPLY_EXCEEDED',
  ALREADY_MINTED = 'ALREADY_MINTED',
  BELOW_MINIMUM = 'BELOW_MINIMUM',
  PAYMENT_FAILED = 'PAYMENT_FAILED',
  TRANSFER_BLOCKED = 'TRANSFER_BLOCKED',
  ALREADY_UNLOCKED = 'ALREADY_UNLOCKED',
  REENTRANT = 'REENTRANT',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  TOKEN_NOT_FOUND = 'TOKEN_NOT_FOUND'
}

export enum PaymentErrorCode {
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  AMOUNTS_EXCEED_TOTAL = 'AMOUNTS_EXCEED_TOTAL',
  RESIDUAL_TRANSFER_FAILED = 'RESIDUAL_TRANSFER_FAILED',
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',
  INVALID_AMOUNT = 'INVALID_AMOUNT'
}

export const UNAUTHORIZED = 'UNAUTHORIZED';
export const CONFIG_ERROR = 'CONFIG_ERROR';
export const BAD_REQUEST = 'BAD_REQUEST';

export type ProtocolErrorCode =
  | MintErrorCode
  | PaymentErrorCode
  | typeof UNAUTHORIZED
  | typeof CONFIG_ERROR
  | typeof BAD_REQUEST;

export class ProtocolError extends Error {
  code: ProtocolErrorCode;
  details?: unknown;

  constructor(code: ProtocolErrorCode, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'ProtocolError';
  }
}

export class AuthorizationError extends ProtocolError {
  constructor(message: string, details?: unknown) {
    super(UNAUTHORIZED, message, details);
    this.name = 'AuthorizationError';
  }
}

export class MintError extends ProtocolError {
  code: MintErrorCode;

  constructor(code: MintErrorCode, message: string, details?: unknown) {
    super(code, message, details);
    this.code = code;
    this.name = 'MintError';
  }
}

export class PaymentError extends ProtocolError {
  code: PaymentErrorCode;
  index?: number;

  constructor(code: PaymentErrorCode, message: string, index?: number, details?: unknown) {
    super(code, message, details);
    this.code = code;
    this.index = index;
    this.name = 'PaymentError';
  }
}

/**
 * Raised by a paid mint when fund distribution fails. The underlying
 * PaymentError is kept as `reason`.
 */
export class PaymentFailedError extends MintError {
  reason: PaymentError;

  constructor(reason: PaymentError) {
    super(MintErrorCode.PAYMENT_FAILED, `payment failed: ${reason.message}`, { reason: reason.code });
    this.reason = reason;
    this.name = 'PaymentFailedError';
  }
}

export class ConfigError extends ProtocolError {
  constructor(message: string, details?: unknown) {
    super(CONFIG_ERROR, message, details);
    this.name = 'ConfigError';
  }
}

export class RequestValidationError extends ProtocolError {
  constructor(message: string, details?: unknown) {
    super(BAD_REQUEST, message, details);
    this.name = 'RequestValidationError';
  }
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}
