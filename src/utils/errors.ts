/**
 * Error classes for the expense agent
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500);
    this.name = 'ConfigError';
  }
}

export class UnresolvedParticipantError extends AppError {
  constructor(
    public readonly participantName: string,
    public readonly ambiguous: boolean = false,
  ) {
    super(
      ambiguous
        ? `"${participantName}" matches more than one friend`
        : `Could not match participant name: ${participantName}`,
      'UNRESOLVED_PARTICIPANT',
      400,
    );
    this.name = 'UnresolvedParticipantError';
  }
}

export class MissingTotalError extends AppError {
  constructor(message: string = 'No amount found in parsed expense') {
    super(message, 'MISSING_TOTAL', 400);
    this.name = 'MissingTotalError';
  }
}

export class MissingParticipantsError extends AppError {
  constructor(message: string = 'No participants found in parsed expense') {
    super(message, 'MISSING_PARTICIPANTS', 400);
    this.name = 'MissingParticipantsError';
  }
}

export class InvalidSplitError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_SPLIT', 400);
    this.name = 'InvalidSplitError';
  }
}

export class ExpenseParseError extends AppError {
  constructor(message: string) {
    super(message, 'EXPENSE_PARSE_ERROR', 502);
    this.name = 'ExpenseParseError';
  }
}

export class LedgerRequestError extends AppError {
  constructor(
    message: string,
    public readonly ledgerStatusCode?: number,
  ) {
    super(message, 'LEDGER_REQUEST_ERROR', 502);
    this.name = 'LedgerRequestError';
  }
}

export class ExpenseCreationFailed extends AppError {
  constructor(
    message: string,
    public readonly expenseId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'EXPENSE_CREATION_FAILED', 502);
    this.name = 'ExpenseCreationFailed';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class MemoryServiceError extends AppError {
  constructor(
    message: string,
    public readonly serviceStatusCode?: number,
  ) {
    super(message, 'MEMORY_SERVICE_ERROR', 502);
    this.name = 'MemoryServiceError';
  }
}

export class MemoryStoreUnavailable extends AppError {
  constructor(message: string = 'Memory service unavailable for writes') {
    super(message, 'MEMORY_STORE_UNAVAILABLE', 503);
    this.name = 'MemoryStoreUnavailable';
  }
}

export class MemorySearchUnavailable extends AppError {
  constructor(message: string = 'Memory service unavailable for search') {
    super(message, 'MEMORY_SEARCH_UNAVAILABLE', 503);
    this.name = 'MemorySearchUnavailable';
  }
}

/** Extracts a printable message from anything thrown */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
