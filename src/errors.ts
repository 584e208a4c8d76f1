export type ErrorCode =
  | "NOT_FOUND"
  | "NO_DATA"
  | "INVALID_ARGUMENT"
  | "CONFLICT"
  | "STORE_UNAVAILABLE"
  | "EXTERNAL_PROVIDER_ERROR";

export class HeatControlError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Room, schedule or owner does not exist (or belongs to someone else). */
export class NotFoundError extends HeatControlError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

/** No sample inside the lookback window. */
export class NoDataError extends HeatControlError {
  constructor(message: string) {
    super("NO_DATA", message);
  }
}

export class InvalidArgumentError extends HeatControlError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class ConflictError extends HeatControlError {
  constructor(message: string) {
    super("CONFLICT", message);
  }
}

export class StoreUnavailableError extends HeatControlError {
  constructor(message: string, cause?: unknown) {
    super("STORE_UNAVAILABLE", message, { cause });
  }
}

export class ExternalProviderError extends HeatControlError {
  constructor(message: string, cause?: unknown) {
    super("EXTERNAL_PROVIDER_ERROR", message, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
