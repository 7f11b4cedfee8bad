import type { FlagSet } from "../../cli/config/options";
import type { PlayResult } from "../report/types";

export type AssembleReplyInput = {
  result: PlayResult;
  flags: FlagSet;
  flagParseErrors: readonly string[];
  /** False when the backend mixes warnings into the output stream. */
  warnFilterable: boolean;
};

export function assembleReply(input: AssembleReplyInput): string {
  const body = selectBody(input);
  const lines: string[] = [
    "```rust",
    body.trim() === "" ? "(no output)" : body,
    "```",
  ];

  if (input.flagParseErrors.length > 0) {
    lines.push("Flag parsing errors:");
    for (const error of input.flagParseErrors) {
      lines.push(`- ${error}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

function selectBody(input: AssembleReplyInput): string {
  const { result, flags, warnFilterable } = input;
  if (result.success && warnFilterable && !flags.warn) {
    return trimBlankLines(result.stdout);
  }
  return [result.stderr, result.stdout]
    .filter((part) => part.trim() !== "")
    .map(trimBlankLines)
    .join("\n");
}

// Leading indentation of the first non-blank line is kept.
function trimBlankLines(value: string): string {
  return value.replace(/^(?:[ \t]*\n)+/, "").replace(/(?:\n[ \t]*)+$/, "");
}
