export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/** Bad command-line input. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Checkout or clone failed. Fatal to the scan that needed it.
 */
export class RetrievalError extends Error {
  readonly location: string;

  constructor(location: string, message: string) {
    super(message);
    this.name = 'RetrievalError';
    this.location = location;
  }
}

export class RemoteUnreachableError extends RetrievalError {
  constructor(location: string, detail: string) {
    super(location, `Repository ${location} is unreachable: ${detail}`);
    this.name = 'RemoteUnreachableError';
  }
}

export class RefNotFoundError extends RetrievalError {
  readonly ref: string;

  constructor(location: string, ref: string) {
    super(location, `Ref "${ref}" does not exist in ${location}`);
    this.name = 'RefNotFoundError';
    this.ref = ref;
  }
}

export class CloneTimeoutError extends RetrievalError {
  readonly timeoutMs: number;

  constructor(location: string, timeoutMs: number) {
    super(location, `Cloning ${location} timed out after ${timeoutMs}ms`);
    this.name = 'CloneTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class CheckoutInUseError extends RetrievalError {
  readonly path: string;

  constructor(location: string, path: string) {
    super(location, `Checkout path already in use: ${path}`);
    this.name = 'CheckoutInUseError';
    this.path = path;
  }
}

export class UnsupportedLanguageError extends Error {
  readonly language: string;

  constructor(language: string) {
    super(`Unsupported language: ${language}`);
    this.name = 'UnsupportedLanguageError';
    this.language = language;
  }
}

export class ClassificationError extends Error {
  readonly language: string;

  constructor(language: string, message: string, options?: { cause?: unknown }) {
    super(`${language} classifier failed: ${message}`, options);
    this.name = 'ClassificationError';
    this.language = language;
  }
}

export class PlanValidationError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid edit for ${path}: ${message}`);
    this.name = 'PlanValidationError';
    this.path = path;
  }
}

export class ApplyError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to apply edit to ${path}: ${message}`, options);
    this.name = 'ApplyError';
    this.path = path;
  }
}

export class RequestAlreadySatisfiedError extends Error {
  readonly mode: string;

  constructor(language: string, mode: string) {
    super(`${language} already has everything "${mode}" would add; nothing to generate`);
    this.name = 'RequestAlreadySatisfiedError';
    this.mode = mode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
