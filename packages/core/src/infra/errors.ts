export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class InvalidArgumentError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "INVALID_ARGUMENT", 2, cause);
    this.name = "InvalidArgumentError";
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORE_UNAVAILABLE", 3, cause);
    this.name = "StoreUnavailableError";
  }
}

export class ChatNotFoundError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CHAT_NOT_FOUND", 4, cause);
    this.name = "ChatNotFoundError";
  }
}

export class ChatAmbiguousError extends AppError {
  constructor(
    message: string,
    public readonly chatIds: readonly number[] = [],
    cause?: unknown,
  ) {
    super(message, "CHAT_AMBIGUOUS", 5, cause);
    this.name = "ChatAmbiguousError";
  }
}

export class SchemaMismatchError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "SCHEMA_MISMATCH", 6, cause);
    this.name = "SchemaMismatchError";
  }
}
