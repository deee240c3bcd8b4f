import { UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan" | "green";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  cyan: [36, 39],
};

const FALLBACK_TITLE = "Unexpected error";

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.length > 0 ? error.message : error.name;
  }
  if (typeof error === "string") {
    return error;
  }

  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
    if (options.mode === "debug") {
      lines.push({ kind: "code", text: error.code });
    }
  } else {
    lines.push({ kind: "title", text: FALLBACK_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug" || !(error instanceof Error)) {
    return lines;
  }

  lines.push({ kind: "name", text: error.name });
  if (error.cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
  }
  if (error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  // Piped output never gets escape codes, even when asked for.
  if (!options.stream?.isTTY) {
    return false;
  }
  if (options.useColor !== undefined) {
    return options.useColor;
  }

  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}
