export class SimError extends Error {
  code: string;
  details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'SimError';
  }
}

export class ValidationError extends SimError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

export class ExecutionError extends SimError {
  constructor(message: string, details?: unknown) {
    super('EXECUTION_ERROR', message, details);
    this.name = 'ExecutionError';
  }
}

export class AccountNotFoundError extends SimError {
  constructor(address: string) {
    super('ACCOUNT_NOT_FOUND', `account ${address} not found`, { address });
    this.name = 'AccountNotFoundError';
  }
}

export class InsufficientFundsError extends SimError {
  constructor(message: string, details?: unknown) {
    super('INSUFFICIENT_FUNDS', message, details);
    this.name = 'InsufficientFundsError';
  }
}

export class ExecutionRejectedError extends SimError {
  constructor(log: string) {
    super('EXECUTION_REJECTED', log, { log });
    this.name = 'ExecutionRejectedError';
  }
}
