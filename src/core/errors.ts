export class SchedlogError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SchedlogError";
  }
}

export class ConfigError extends SchedlogError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SourceUnavailableError extends SchedlogError {
  constructor(
    public readonly source: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "SourceUnavailableError";
  }
}

export class ReportError extends SchedlogError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ReportError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  source: "SOURCE_ERROR",
  report: "REPORT_ERROR",
  unknown: "UNKNOWN_ERROR",
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

export class UserFacingError extends SchedlogError {
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
