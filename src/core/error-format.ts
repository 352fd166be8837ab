/*
Purpose: render errors as CLI lines, with optional ANSI styling.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); renderErrorLines(lines, createAnsiFormatter(true)).
*/

import { toUserFacingError, USER_FACING_ERROR_CODES, type UserFacingErrorInput } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

// =============================================================================
// ANSI HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(stream: { isTTY?: boolean } = process.stderr): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  return Boolean(stream.isTTY);
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const cause = normalized.cause === undefined ? undefined : formatErrorMessage(normalized.cause);
    if (cause && cause !== normalized.message) {
      lines.push({ kind: "cause", text: cause });
    }

    const stack = error instanceof Error ? error.stack : undefined;
    if (stack) {
      lines.push({ kind: "stack", text: stack });
    }
  }

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string {
  return lines
    .map((line) => {
      switch (line.kind) {
        case "title":
          return format(`Error: ${line.text}`, ["bold", "red"]);
        case "hint":
          return format(`Hint: ${line.text}`, ["yellow"]);
        case "next":
          return `Next: ${line.text}`;
        case "message":
          return line.text;
        default:
          return format(`${line.kind}: ${line.text}`, ["dim"]);
      }
    })
    .join("\n");
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeError(error: unknown): UserFacingErrorInput {
  const userFacing = toUserFacingError(error);
  if (userFacing) {
    return {
      code: userFacing.code,
      title: userFacing.title,
      message: userFacing.message,
      hint: userFacing.hint,
      next: userFacing.next,
      cause: userFacing.cause,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: formatErrorMessage(error),
    cause: error instanceof Error && "cause" in error ? error.cause : undefined,
  };
}
