/*
Purpose: render errors that escape an operation (bad config, bad flags) for stderr.
Assumptions: operation outcomes themselves go to stdout as JSON; only failures to run one land here.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = {
  label?: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
};

// =============================================================================
// CONSTANTS
// =============================================================================

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

const STACK_INDENT = "  ";

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  const text = style.textStyles.length > 0 ? format(line.text, style.textStyles) : line.text;
  if (!style.label) {
    return text;
  }

  const label = format(style.label, style.labelStyles);
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((stackLine) => `${STACK_INDENT}${stackLine}`)
      .join("\n");
    return `${label}\n${format(indented, style.textStyles)}`;
  }

  return `${label} ${text}`;
}
