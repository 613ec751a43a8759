/**
 * Typed error catalog. Each error carries an HTTP-style status code and a
 * stable machine-readable errorCode so every surface (HTTP, MCP, CLI) can
 * report the same failure the same way.
 */

export class CorpusError extends Error {
  constructor(
    public readonly code: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// 400: malformed input: glob patterns, encoding combinations, line ranges

export class ValidationError extends CorpusError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

// 404: collection, file or source path absent

export class NotFoundError extends CorpusError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(404, 'NOT_FOUND', message, details);
  }
}

// 409: duplicate catalog id

export class ConflictError extends CorpusError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, 'CONFLICT', message, details);
  }
}

// 422: bundle bytes that cannot be decoded

export class DecodeError extends CorpusError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(422, 'DECODE_ERROR', message, details);
  }
}

// 499: caller aborted the operation

export class CancelledError extends CorpusError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(499, 'CANCELLED', message, details);
  }
}

// 500: filesystem-level failure

export class IOError extends CorpusError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(500, 'IO_ERROR', message, details);
  }
}

// 504: read or fetch exceeded its deadline

export class TimeoutError extends CorpusError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(504, 'TIMEOUT', message, details);
  }
}
