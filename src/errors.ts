export class InvalidInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidInputError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Raised when the record store rejects a read or write; never used for summary failures. */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class RecordNotFoundError extends Error {
  constructor(readonly recordId: string) {
    super(`No stored record with id "${recordId}"`);
    this.name = "RecordNotFoundError";
  }
}
