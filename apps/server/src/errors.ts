/**
 * Base class for every failure the dataset pipeline reports.
 * `statusCode` is what the HTTP API answers with.
 */
export class DatasetError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'DatasetError';
  }
}

/**
 * Contradictory or out-of-range options. Raised before anything is removed or written.
 */
export class ConfigurationError extends DatasetError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Malformed or unreadable annotation record.
 */
export class ParseError extends DatasetError {
  constructor(
    public readonly file: string,
    message: string,
    public readonly line?: number
  ) {
    super(422, line !== undefined ? `${file}:${line}: ${message}` : `${file}: ${message}`);
    this.name = 'ParseError';
  }
}

export class SplitError extends DatasetError {
  constructor(message: string) {
    super(422, message);
    this.name = 'SplitError';
  }
}

export class DatasetNotFoundError extends DatasetError {
  constructor(message: string) {
    super(404, message);
    this.name = 'DatasetNotFoundError';
  }
}
