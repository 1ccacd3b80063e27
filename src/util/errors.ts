// Errors a user can fix by changing their input or flags. The CLI prints their
// message as-is; anything else is reported as an unexpected failure.
export class UserError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidCardCodeError extends UserError {
  readonly code: string;
  readonly reason: string;
  readonly lineNumber?: number;

  constructor(code: string, reason: string, lineNumber?: number) {
    const where = lineNumber === undefined ? '' : ` on line ${lineNumber}`;
    super(`invalid card code "${code}"${where}: ${reason}`);
    this.code = code;
    this.reason = reason;
    this.lineNumber = lineNumber;
  }
}

export class MalformedLineError extends UserError {
  readonly lineNumber: number;
  readonly tokenCount: number;

  constructor(lineNumber: number, tokenCount: number, expected: number) {
    super(`line ${lineNumber} must contain exactly ${expected} cards, found ${tokenCount}`);
    this.lineNumber = lineNumber;
    this.tokenCount = tokenCount;
  }
}

export class ConfigError extends UserError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`invalid configuration (${source}): ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class UsageError extends UserError {}

export class InvalidHandError extends Error {
  constructor(size: number) {
    super(`need 5 cards, got ${size}`);
    this.name = 'InvalidHandError';
  }
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}
