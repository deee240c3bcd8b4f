export class ConductorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ConductorError";
  }
}

export class ConfigError extends ConductorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class PreconditionError extends ConductorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PreconditionError";
  }
}

export class GitError extends ConductorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// The git binary could not be started at all (missing, not executable, bad cwd).
export class CommandSpawnError extends GitError {
  constructor(
    public readonly binary: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CommandSpawnError";
  }
}

export class CommandCancelledError extends GitError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CommandCancelledError";
  }
}

export class CommandTimeoutError extends GitError {
  constructor(
    public readonly timeoutMs: number,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CommandTimeoutError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  usage: "USAGE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends ConductorError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
