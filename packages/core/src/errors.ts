export type JsonStatErrorKind =
  | 'MalformedDimension'
  | 'MalformedDocument'
  | 'MissingSize'
  | 'ShapeMismatch'
  | 'DuplicateColumn'
  | 'DuplicateRow'
  | 'MalformedTable'
  | 'NoValueColumn'
  | 'UnknownCategory'
  | 'IndexOutOfRange'
  | 'InvalidNamingMode'
  | 'UnsupportedOutputFormat';

export class JsonStatError extends Error {
  readonly kind: JsonStatErrorKind;
  /** Offending dimension id, column name, row number or index. */
  readonly subject?: string | number;

  constructor(kind: JsonStatErrorKind, message: string, subject?: string | number) {
    super(message);
    this.name = 'JsonStatError';
    this.kind = kind;
    this.subject = subject;
  }
}

export function isJsonStatError(error: unknown, kind?: JsonStatErrorKind): error is JsonStatError {
  return error instanceof JsonStatError && (kind === undefined || error.kind === kind);
}

export class FetchError extends Error {
  constructor(message: string, readonly url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export class HttpError extends FetchError {
  constructor(readonly status: number, readonly reason: string, url: string) {
    super(`${status} ${reason} for ${url}`, url);
    this.name = 'HttpError';
  }
}

export class InvalidUrlError extends FetchError {
  constructor(url: string, reason: string) {
    super(`Invalid URL ${url}: ${reason}`, url);
    this.name = 'InvalidUrlError';
  }
}

export class NetworkError extends FetchError {
  constructor(url: string, cause: unknown) {
    super(`Request to ${url} failed: ${cause instanceof Error ? cause.message : 'Unknown error'}`, url, { cause });
    this.name = 'NetworkError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
