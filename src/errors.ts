// ============================================================================
// Expense Bot Error Types: Typed errors for every failure a command can hit
// ============================================================================

/**
 * Base error for all expense bot failures.
 * The dispatcher maps each subclass to a localized reply.
 */
export class ExpenseBotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExpenseBotError';
  }
}

/**
 * Thrown when a range, column or environment value is missing or malformed.
 * Fatal at startup; never retried.
 */
export class ConfigurationError extends ExpenseBotError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Configuration invalid:\n${problems.map(p => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/** Operation against the spreadsheet that failed in transport or in the API. */
export type RemoteOperation = 'readFormula' | 'readValue' | 'writeCell' | 'readRange';

/**
 * Thrown when the Sheets API fails reading or writing a cell.
 * Carries the cell reference and the underlying API error as `cause`.
 */
export class RemoteError extends ExpenseBotError {
  readonly operation: RemoteOperation;
  readonly cell: string;

  constructor(operation: RemoteOperation, cell: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Sheets ${operation} failed for ${cell}: ${detail}`, { cause });
    this.name = 'RemoteError';
    this.operation = operation;
    this.cell = cell;
  }
}

/**
 * Thrown when a category is not present in the sheet's category catalog.
 * User-correctable: the reply names the offending category.
 */
export class CategoryNotFoundError extends ExpenseBotError {
  readonly category: string;

  constructor(category: string) {
    super(`Category not found: ${category}`);
    this.name = 'CategoryNotFoundError';
    this.category = category;
  }
}

export type InvalidInputReason = 'usage' | 'amount' | 'paymentMethod';

/**
 * Thrown when a command argument cannot be parsed.
 * The command is rejected before any spreadsheet call is made.
 */
export class InvalidInputError extends ExpenseBotError {
  readonly reason: InvalidInputReason;

  constructor(reason: InvalidInputReason, message: string) {
    super(message);
    this.name = 'InvalidInputError';
    this.reason = reason;
  }
}

/** Thrown when the budget cell is empty or does not hold a number. */
export class ReadError extends ExpenseBotError {
  readonly cell: string;

  constructor(cell: string, message: string) {
    super(message);
    this.name = 'ReadError';
    this.cell = cell;
  }
}

/**
 * Thrown when the chat platform rejects or fails an outbound call.
 * Never carries the bot token.
 */
export class TransportError extends ExpenseBotError {
  readonly method: string;
  readonly statusCode: number;

  constructor(method: string, statusCode: number, description: string) {
    super(`Telegram ${method} failed (${statusCode}): ${description}`);
    this.name = 'TransportError';
    this.method = method;
    this.statusCode = statusCode;
  }
}

/**
 * One-line description of a fatal startup error for the process log.
 */
export function startupFailureMessage(err: unknown): string {
  if (err instanceof ConfigurationError) {
    return `Invalid configuration:\n${err.problems.map(p => `  - ${p}`).join('\n')}`;
  }
  return `Fatal error: ${err instanceof Error ? err.message : String(err)}`;
}
