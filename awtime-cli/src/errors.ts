/**
 * Error taxonomy
 *
 * Every failure that reaches the CLI carries a kind so callers can tell
 * a missing bucket from a broken database without parsing messages.
 */

export type ErrorKind = 'not_found' | 'validation' | 'store_unavailable' | 'config_corrupt';

export abstract class AwTimeError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown bucket, project or manual tag id */
export class NotFoundError extends AwTimeError {
  readonly kind = 'not_found';
}

/** Malformed time range, bad rule pattern, empty name */
export class ValidationError extends AwTimeError {
  readonly kind = 'validation';
}

/** The ActivityWatch database is missing or unreadable */
export class StoreUnavailableError extends AwTimeError {
  readonly kind = 'store_unavailable';
}

/** The user configuration exists but cannot be parsed */
export class ConfigCorruptError extends AwTimeError {
  readonly kind = 'config_corrupt';

  constructor(
    readonly configPath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function isAwTimeError(value: unknown): value is AwTimeError {
  return value instanceof AwTimeError;
}

export function describeError(error: unknown): { kind: ErrorKind | 'internal'; message: string } {
  if (isAwTimeError(error)) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: 'internal', message: error.message };
  }
  return { kind: 'internal', message: String(error) };
}
