/**
 * Rubix SDK Error Classes
 *
 * Typed errors for key management, DID registration, transaction signing
 * and node communication.
 */

/**
 * Base error class for all Rubix SDK errors
 */
export class RubixError extends Error {
  public readonly code?: string;
  public readonly status?: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code?: string, status?: number, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RubixError';
    this.code = code;
    this.status = status;
    this.details = details;
    Object.setPrototypeOf(this, RubixError.prototype);
  }

  toString(): string {
    if (this.code) {
      return `[${this.code}] ${this.message}`;
    }
    return this.message;
  }
}

/**
 * Malformed mnemonic: wrong word count, unknown word or bad checksum
 */
export class InvalidMnemonicError extends RubixError {
  constructor(message: string = 'Invalid mnemonic phrase') {
    super(message, 'INVALID_MNEMONIC');
    this.name = 'InvalidMnemonicError';
    Object.setPrototypeOf(this, InvalidMnemonicError.prototype);
  }
}

/**
 * Keystore file unreadable, corrupt or undecryptable
 */
export class StorageError extends RubixError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', undefined, details);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

/**
 * Keystore path exists but the process may not access it
 */
export class PermissionError extends RubixError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERMISSION_ERROR', undefined, details);
    this.name = 'PermissionError';
    Object.setPrototypeOf(this, PermissionError.prototype);
  }
}

/**
 * The node refused to create or register a DID
 */
export class RegistrationError extends RubixError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REGISTRATION_ERROR', undefined, details);
    this.name = 'RegistrationError';
    Object.setPrototypeOf(this, RegistrationError.prototype);
  }
}

export class InvalidAmountError extends RubixError {
  constructor(message: string = 'Amount must be greater than zero') {
    super(message, 'INVALID_AMOUNT');
    this.name = 'InvalidAmountError';
    Object.setPrototypeOf(this, InvalidAmountError.prototype);
  }
}

export class InvalidRecipientError extends RubixError {
  constructor(message: string = 'Receiver DID must not be empty') {
    super(message, 'INVALID_RECIPIENT');
    this.name = 'InvalidRecipientError';
    Object.setPrototypeOf(this, InvalidRecipientError.prototype);
  }
}

/**
 * Network error - the node could not be reached
 */
export class NodeUnreachableError extends RubixError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NODE_UNREACHABLE', undefined, details);
    this.name = 'NodeUnreachableError';
    Object.setPrototypeOf(this, NodeUnreachableError.prototype);
  }
}

export class TimeoutError extends RubixError {
  constructor(message: string = 'Request timeout') {
    super(message, 'TIMEOUT_ERROR', 408);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export class ValidationError extends RubixError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class AuthenticationError extends RubixError {
  constructor(message: string = 'Authentication failed') {
    super(message, 'AUTHENTICATION_ERROR', 401);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class AuthorizationError extends RubixError {
  constructor(message: string = 'Not authorized') {
    super(message, 'AUTHORIZATION_ERROR', 403);
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

export class NotFoundError extends RubixError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends RubixError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class RateLimitError extends RubixError {
  public readonly retryAfter?: number;

  constructor(message: string = 'Rate limit exceeded', retryAfter?: number) {
    super(message, 'RATE_LIMIT_ERROR', 429);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export class InternalServerError extends RubixError {
  constructor(message: string, status: number = 500) {
    super(message, 'INTERNAL_SERVER_ERROR', status);
    this.name = 'InternalServerError';
    Object.setPrototypeOf(this, InternalServerError.prototype);
  }
}

export class ServiceUnavailableError extends RubixError {
  constructor(message: string) {
    super(message, 'SERVICE_UNAVAILABLE', 503);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, ServiceUnavailableError.prototype);
  }
}

/**
 * Transaction error - a signed payload or node exchange was unusable
 */
export class TransactionError extends RubixError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSACTION_ERROR', undefined, details);
    this.name = 'TransactionError';
    Object.setPrototypeOf(this, TransactionError.prototype);
  }
}

/**
 * Query error - the node answered a read request with a failure
 */
export class QueryError extends RubixError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'QUERY_ERROR', undefined, details);
    this.name = 'QueryError';
    Object.setPrototypeOf(this, QueryError.prototype);
  }
}
