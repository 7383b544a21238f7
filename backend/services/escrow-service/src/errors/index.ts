/**
 * Error types for the escrow service.
 *
 * Every failure the core surfaces to a caller is one of these classes. Chain
 * reads that may fail transiently (gas estimates, fees, token decimals) are not
 * errors at all: they come back as `Fallback` values, see utils/fallback.ts.
 */

export enum ErrorCode {
  // Authorization
  FORBIDDEN = 'FORBIDDEN',

  // Validation
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_STATE = 'INVALID_STATE',

  // Resource
  NOT_FOUND = 'NOT_FOUND',

  // Chain
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  RECEIPT_TIMEOUT = 'RECEIPT_TIMEOUT',
  RECEIPT_NOT_FOUND = 'RECEIPT_NOT_FOUND',
  TRANSACTION_FAILED = 'TRANSACTION_FAILED',
  WRONG_DESTINATION = 'WRONG_DESTINATION',
  WRONG_SENDER = 'WRONG_SENDER',
  EVENT_NOT_FOUND = 'EVENT_NOT_FOUND',
  TX_HASH_MISMATCH = 'TX_HASH_MISMATCH',
  TX_HASH_REUSED = 'TX_HASH_REUSED',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  DATABASE_ERROR = 'DATABASE_ERROR'
}

/**
 * RFC 7807 Problem Details format
 */
export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
  code?: ErrorCode;
  requestId?: string;
  [key: string]: unknown;
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base Error class with RFC 7807 support
 */
export class BaseError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    statusCode: number = 500,
    context: ErrorContext = {},
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toProblemDetails(requestId?: string, instance?: string): ProblemDetails {
    return {
      type: `urn:escrow-service:errors:${this.code}`,
      title: this.name,
      status: this.statusCode,
      detail: this.message,
      code: this.code,
      instance,
      requestId,
      ...this.context
    };
  }
}

/**
 * Missing or inconsistent configuration: unknown network, undeployed contract,
 * unlisted token, enum table drift. Never recovered from.
 */
export class ConfigError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFIGURATION_ERROR, 500, context, false);
  }

  static unknownNetwork(network: string): ConfigError {
    return new ConfigError(`Unknown blockchain network: ${network}`, { network });
  }

  static contractNotDeployed(network: string, contract: string): ConfigError {
    return new ConfigError(`Contract ${contract} is not deployed on ${network}`, { network, contract });
  }

  static unknownToken(network: string, symbol: string): ConfigError {
    return new ConfigError(`Token ${symbol} is not configured on ${network}`, { network, symbol });
  }
}

/**
 * Node unreachable, or answering for a different chain than configured.
 */
export class ConnectionError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONNECTION_FAILED, 503, context, false);
  }
}

/**
 * A submitted transaction could not be accepted as proof of an on-chain action.
 */
export class VerificationError extends BaseError {
  public readonly txHash: string;

  constructor(message: string, code: ErrorCode, txHash: string, context: ErrorContext = {}) {
    super(message, code, 422, { txHash, ...context });
    this.txHash = txHash;
  }

  static timeout(txHash: string, timeoutSeconds: number): VerificationError {
    return new VerificationError(
      `Transaction ${txHash} was not mined within ${timeoutSeconds}s`,
      ErrorCode.RECEIPT_TIMEOUT,
      txHash,
      { timeoutSeconds }
    );
  }

  static receiptNotFound(txHash: string): VerificationError {
    return new VerificationError(`No receipt found for transaction ${txHash}`, ErrorCode.RECEIPT_NOT_FOUND, txHash);
  }

  static failed(txHash: string): VerificationError {
    return new VerificationError(`Transaction ${txHash} reverted`, ErrorCode.TRANSACTION_FAILED, txHash);
  }

  static wrongDestination(txHash: string, expected: string, actual: string | null): VerificationError {
    return new VerificationError(
      `Transaction ${txHash} was not sent to the escrow contract`,
      ErrorCode.WRONG_DESTINATION,
      txHash,
      { expected, actual }
    );
  }

  static wrongSender(txHash: string, expected: string, actual: string): VerificationError {
    return new VerificationError(
      `Transaction ${txHash} was not sent by ${expected}`,
      ErrorCode.WRONG_SENDER,
      txHash,
      { expected, actual }
    );
  }

  static eventNotFound(txHash: string, action: string, listingId: string): VerificationError {
    return new VerificationError(
      `Transaction ${txHash} does not prove ${action} for listing ${listingId}`,
      ErrorCode.EVENT_NOT_FOUND,
      txHash,
      { action, listingId }
    );
  }

  static hashReused(txHash: string): VerificationError {
    return new VerificationError(
      `Transaction ${txHash} is already recorded for another step`,
      ErrorCode.TX_HASH_REUSED,
      txHash
    );
  }

  static hashMismatch(txHash: string, recorded: string): VerificationError {
    return new VerificationError(
      `Transaction ${txHash} does not match the recorded transaction ${recorded}`,
      ErrorCode.TX_HASH_MISMATCH,
      txHash,
      { recorded }
    );
  }
}

/**
 * Wallet is not allowed to perform the requested action.
 */
export class AuthorizationError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.FORBIDDEN, 403, context);
  }

  static notSeller(resource: string): AuthorizationError {
    return new AuthorizationError(`Only the seller can perform this action on the ${resource}`, { resource });
  }

  static notBuyer(resource: string): AuthorizationError {
    return new AuthorizationError(`Only the buyer can perform this action on the ${resource}`, { resource });
  }

  static notParty(resource: string): AuthorizationError {
    return new AuthorizationError(`Only the buyer or seller can perform this action on the ${resource}`, {
      resource
    });
  }
}

export interface Violation {
  field: string;
  message: string;
}

export class ValidationError extends BaseError {
  public readonly field?: string;
  public readonly violations: Violation[];

  constructor(message: string, violations: Violation[] = [], context: ErrorContext = {}, code?: ErrorCode) {
    super(message, code ?? ErrorCode.VALIDATION_FAILED, 400, { violations, ...context });
    this.violations = violations;
    if (violations.length > 0) {
      this.field = violations[0].field;
    }
  }

  static missingField(field: string): ValidationError {
    return new ValidationError(`Missing required field: ${field}`, [{ field, message: 'Field is required' }]);
  }

  static invalidField(field: string, reason: string): ValidationError {
    return new ValidationError(`Invalid ${field}: ${reason}`, [{ field, message: reason }]);
  }

  static invalidState(resource: string, current: string, expected: readonly string[]): ValidationError {
    return new ValidationError(
      `${resource} is ${current}, expected ${expected.join(' or ')}`,
      [],
      { resource, current, expected },
      ErrorCode.INVALID_STATE
    );
  }

  toProblemDetails(requestId?: string, instance?: string): ProblemDetails {
    return {
      ...super.toProblemDetails(requestId, instance),
      violations: this.violations
    };
  }
}

export class NotFoundError extends BaseError {
  public readonly resource: string;

  constructor(resource: string, context: ErrorContext = {}) {
    super(`${resource} not found`, ErrorCode.NOT_FOUND, 404, { resource, ...context });
    this.resource = resource;
  }
}

export class DatabaseError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.DATABASE_ERROR, 500, context, false);
  }
}

/**
 * Helper to determine if an error is operational (expected) vs programming error
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof BaseError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Wrap unknown errors in a BaseError
 */
export function wrapError(error: unknown): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new BaseError(error.message, ErrorCode.INTERNAL_ERROR, 500, { originalError: error.name }, false);
  }

  return new BaseError(String(error), ErrorCode.INTERNAL_ERROR, 500, {}, false);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
