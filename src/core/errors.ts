/*
Purpose: core error types used across the adapter, serializers and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ConfigError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class DocbridgeError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "DocbridgeError";
  }
}

export class ConfigError extends DocbridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class ModelError extends DocbridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ModelError";
  }
}

/** `outside`: not under the components directory; `absolute`: a stored path that is not relative; `missing`: not on disk. */
export type RelativePathFailure = "outside" | "absolute" | "missing";

export class RelativePathError extends DocbridgeError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly componentsDir: string,
    public readonly reason: RelativePathFailure = "outside",
  ) {
    super(message);
    this.name = "RelativePathError";
  }
}

export class DependencyResolutionError extends DocbridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DependencyResolutionError";
  }
}

export class RegistryFrozenError extends DocbridgeError {
  constructor(message: string) {
    super(message);
    this.name = "RegistryFrozenError";
  }
}

export class GeneratorError extends DocbridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GeneratorError";
  }
}

// Raised by model accessors whose host API is missing on older plugin versions.
export class MissingHostApiError extends DocbridgeError {
  constructor(
    public readonly api: string,
    cause?: unknown,
  ) {
    super(`Host API not available: ${api}`, cause);
    this.name = "MissingHostApiError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  model: "MODEL_ERROR",
  path: "PATH_ERROR",
  generator: "GENERATOR_ERROR",
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

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

const RELATIVE_PATH_MESSAGES: Record<
  RelativePathFailure,
  (componentsDir: string) => { title: string; hint: string }
> = {
  outside: (componentsDir) => ({
    title: "File is outside the components directory.",
    hint: `Move the file under ${componentsDir} or point componentsDir at a common parent.`,
  }),
  absolute: () => ({
    title: "Stored plugin parameters contain an absolute path.",
    hint: "Re-run `docbridge configure` to rewrite the plugin parameter files.",
  }),
  missing: (componentsDir) => ({
    title: "File missing from the components directory.",
    hint: `Copy the file into ${componentsDir} or re-run \`docbridge configure\`.`,
  }),
};

export function toUserFacingError(error: unknown): UserFacingError | null {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof RelativePathError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.path,
      ...RELATIVE_PATH_MESSAGES[error.reason](error.componentsDir),
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid docbridge config.",
      message: error.message,
      hint: "Check docbridge.config.json or pass --config.",
      cause: error,
    });
  }

  if (error instanceof ModelError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.model,
      title: "Invalid module model.",
      message: error.message,
      hint: "Re-export the module model from the build and try again.",
      cause: error,
    });
  }

  if (error instanceof GeneratorError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.generator,
      title: "Documentation generator failed.",
      message: error.message,
      hint: "Inspect the generator output in the docbridge log.",
      cause: error,
    });
  }

  return null;
}
