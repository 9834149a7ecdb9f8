export class GateError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "GateError";
  }
}

export class ConfigError extends GateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends GateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class CommandSpawnError extends GateError {
  constructor(
    message: string,
    public readonly command: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CommandSpawnError";
  }
}

// Resolution exhausted every candidate reference for the project under test.
export class RefNotFoundError extends GateError {
  constructor(
    message: string,
    public readonly project: string,
    public readonly reference: string,
  ) {
    super(message);
    this.name = "RefNotFoundError";
  }
}

// Network failure or timeout while talking to a remote. Retried locally before escalating.
export class RemoteUnreachableError extends GateError {
  constructor(
    message: string,
    public readonly project: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RemoteUnreachableError";
  }
}

export class ConfigurationInconsistentError extends GateError {
  constructor(
    message: string,
    public readonly project: string,
    public readonly requestedBranch: string,
  ) {
    super(message);
    this.name = "ConfigurationInconsistentError";
  }
}

export class HookError extends GateError {
  constructor(
    message: string,
    public readonly hook: string,
    public readonly exitCode: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "HookError";
  }
}

// =============================================================================
// EXIT CODES
// =============================================================================

export const GATE_EXIT_CODES = {
  success: 0,
  failure: 1,
  config: 2,
  refNotFound: 3,
  configurationInconsistent: 4,
  remoteUnreachable: 5,
  git: 6,
} as const;

export function resolveGateExitCode(error: unknown): number {
  const root = error instanceof UserFacingError && error.cause ? error.cause : error;

  if (root instanceof HookError) {
    return root.exitCode === 0 ? GATE_EXIT_CODES.failure : root.exitCode;
  }
  if (root instanceof ConfigError) return GATE_EXIT_CODES.config;
  if (root instanceof RefNotFoundError) return GATE_EXIT_CODES.refNotFound;
  if (root instanceof ConfigurationInconsistentError) {
    return GATE_EXIT_CODES.configurationInconsistent;
  }
  if (root instanceof RemoteUnreachableError) return GATE_EXIT_CODES.remoteUnreachable;
  if (root instanceof GitError || root instanceof CommandSpawnError) return GATE_EXIT_CODES.git;

  if (error instanceof UserFacingError && error.code === USER_FACING_ERROR_CODES.config) {
    return GATE_EXIT_CODES.config;
  }

  return GATE_EXIT_CODES.failure;
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  resolve: "RESOLVE_ERROR",
  hook: "HOOK_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorOptions = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(options: UserFacingErrorOptions) {
    super(options.message);
    this.name = "UserFacingError";
    this.code = options.code;
    this.title = options.title;
    this.hint = options.hint;
    this.next = options.next;
    this.cause = options.cause;
  }
}
