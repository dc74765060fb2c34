// src/utils/errors.ts

export class FeedError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Input errors (raised before any XML parse is attempted)
export class InputError extends FeedError {
  constructor(message: string, code: string = 'INPUT_ERROR', details?: Record<string, unknown>) {
    super(message, code, details);
  }
}

export class XmlSyntaxError extends FeedError {
  constructor(
    message: string,
    public line?: number,
    public column?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'XML_SYNTAX_ERROR', { ...details, line, column });
  }
}

// Structure errors
export class MissingFieldError extends FeedError {
  constructor(
    public element: string,
    message: string = `Missing required <${element}> element`,
    details?: Record<string, unknown>
  ) {
    super(message, 'MISSING_FIELD', { ...details, element });
  }
}

export class ValidationError extends FeedError {
  constructor(
    message: string,
    public invariant: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { ...details, invariant });
  }
}

// Date errors are local to the date helper and never abort a feed parse
export class DateGrammarError extends FeedError {
  constructor(
    message: string,
    public input: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'DATE_GRAMMAR_ERROR', { ...details, input });
  }
}
