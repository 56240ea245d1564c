export class DrillClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthenticationError extends DrillClientError {}

export class NotFoundError extends DrillClientError {
  readonly schema: string;

  constructor(schema: string, options?: { cause?: unknown }) {
    super(`Schema "${schema}" does not exist.`, options);
    this.schema = schema;
  }
}

export class QueryError extends DrillClientError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class ResponseFormatError extends DrillClientError {}

export class TemporalConversionError extends DrillClientError {
  readonly column: string;

  constructor(column: string, value: unknown, reason: string) {
    super(`Cannot convert ${JSON.stringify(value)} in column "${column}": ${reason}`);
    this.column = column;
  }
}

export class SessionClosedError extends DrillClientError {
  constructor() {
    super("Session is closed. Connect again to issue further calls.");
  }
}

export class ConfigurationError extends DrillClientError {}
