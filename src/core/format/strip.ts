import {
  discardClose,
  discardOpen,
  entryPointSignature,
  resultClose,
  resultOpen,
  type WrappedCode,
} from "../code/wrap";

const indentUnit = "    ";
const singleLineDiscardRegex = /^let _ = \{ ?(.*?) ?\};$/;
const singleLineResultRegex = /^let result = \{ ?(.*?) ?\};$/;

/**
 * Removes the entry point that `maybeWrap` put around a snippet from a
 * (usually formatted) rendition of it, leaving the snippet body.
 *
 * The wrapper is found by its exact signature on a column-0 line and the
 * last column-0 closing brace. Anything before the signature, such as the
 * prelude a macro expansion prepends, is dropped with it.
 */
export function stripEntryPointBoilerplate(
  formatted: string,
  wrapped: WrappedCode
): string {
  const lines = formatted.split("\n");
  const open = lines.findIndex((line) => line.startsWith(entryPointSignature));
  if (open === -1) {
    return formatted;
  }

  const trailingNewline = formatted.endsWith("\n") ? "\n" : "";
  const openLine = lines[open].trimEnd();

  // `fn main() { ... }` left on one line by an unformatted expansion.
  if (openLine !== entryPointSignature && openLine.endsWith("}")) {
    const inner = openLine
      .slice(entryPointSignature.length, -1)
      .trim();
    return `${stripDiscardLine(inner, wrapped) ?? inner}${trailingNewline}`;
  }

  const close = findClosingBrace(lines, open);
  if (close === -1) {
    return formatted;
  }

  let body = lines.slice(open + 1, close);
  // Raw wrapper text keeps the snippet at column 0; a formatter indents
  // every body line.
  const indented = body.every(
    (line) => line === "" || line.startsWith(indentUnit)
  );
  if (indented) {
    body = dedent(body, indentUnit.length);
  }

  body =
    wrapped.resultHandling === "discard"
      ? stripDiscardLayer(body, indented, wrapped)
      : stripResultLayer(body, indented);

  return `${body.join("\n")}${trailingNewline}`;
}

function findClosingBrace(lines: readonly string[], open: number): number {
  for (let index = lines.length - 1; index > open; index -= 1) {
    if (lines[index].trimEnd() === "}") {
      return index;
    }
  }
  return -1;
}

function stripDiscardLayer(
  body: readonly string[],
  indented: boolean,
  wrapped: WrappedCode
): string[] {
  if (body.length === 1) {
    const inner = stripDiscardLine(body[0], wrapped);
    return inner === null ? [...body] : [inner];
  }

  const first = body[0];
  const last = body.at(-1);
  if (
    first === undefined ||
    last === undefined ||
    first.trim() !== discardOpen ||
    last.trim() !== discardClose
  ) {
    return [...body];
  }

  const inner = body.slice(1, -1);
  return indented ? dedent(inner, indentUnit.length) : inner;
}

/**
 * Keeps what sits between `let result = {` and its column-0 `};`. The
 * print-if-displayable block after it never has a `};` at that depth.
 */
function stripResultLayer(
  body: readonly string[],
  indented: boolean
): string[] {
  const first = body[0];
  if (first === undefined) {
    return [...body];
  }

  const single = singleLineResultRegex.exec(first.trim());
  if (single) {
    return [single[1]];
  }
  if (first.trim() !== resultOpen) {
    return [...body];
  }

  const close = body.lastIndexOf(resultClose);
  if (close <= 0) {
    return [...body];
  }

  const inner = body.slice(1, close);
  return indented ? dedent(inner, indentUnit.length) : inner;
}

function stripDiscardLine(line: string, wrapped: WrappedCode): string | null {
  if (wrapped.resultHandling !== "discard") {
    return null;
  }
  const match = singleLineDiscardRegex.exec(line.trim());
  return match ? match[1] : null;
}

function dedent(lines: readonly string[], width: number): string[] {
  return lines.map((line) => {
    const leading = line.length - line.trimStart().length;
    return line.slice(Math.min(leading, width));
  });
}
