/*
Purpose: render gate failures for the operator on stderr.
Assumptions: non-TTY streams (CI consoles) never receive ANSI escapes.
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

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const LINE_LABELS: Partial<Record<ErrorFormatLineKind, { label: string; styles: AnsiStyle[] }>> = {
  hint: { label: "Hint:", styles: ["yellow"] },
  next: { label: "Next:", styles: ["cyan"] },
  code: { label: "Code:", styles: ["dim"] },
  name: { label: "Name:", styles: ["dim"] },
  cause: { label: "Cause:", styles: ["dim"] },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((entry) => `  ${entry}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const labelled = LINE_LABELS[line.kind];
  if (!labelled) return line.text;

  const text = labelled.styles.includes("dim") ? format(line.text, ["dim"]) : line.text;
  return `${format(labelled.label, labelled.styles)} ${text}`;
}
