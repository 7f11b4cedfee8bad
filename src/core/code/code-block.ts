const fence = "```";
const languageTagRegex = /^[\w+#-]*$/;

/**
 * Unwraps a Markdown code block. The language tag after an opening fence is
 * dropped; text without fences comes back as is.
 */
export function parseCodeBlock(raw: string): string {
  const trimmed = raw.trim();

  if (trimmed.startsWith(fence)) {
    const body = trimmed.slice(fence.length);
    const closing = body.lastIndexOf(fence);
    const inner = closing === -1 ? body : body.slice(0, closing);
    const newline = inner.indexOf("\n");
    if (newline === -1) {
      return inner.trim();
    }
    const header = inner.slice(0, newline).trim();
    // Anything but a bare tag is code written on the fence line.
    const content = languageTagRegex.test(header)
      ? inner.slice(newline + 1)
      : inner;
    return trimTrailingNewline(content);
  }

  if (trimmed.length >= 2 && trimmed.startsWith("`") && trimmed.endsWith("`")) {
    return trimmed.slice(1, -1);
  }

  return raw;
}

function trimTrailingNewline(value: string): string {
  return value.endsWith("\n") ? value.slice(0, -1) : value;
}
