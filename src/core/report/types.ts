import type { FlagSet, PlaygroundCommand } from "../../cli/config/options";
import type { CodeBlock } from "../code/wrap";

export type PlayResult = {
  success: boolean;
  stdout: string;
  stderr: string;
};

/**
 * Everything a command hands to the reply sink once the backend has
 * answered.
 */
export type PlayReply = {
  command: PlaygroundCommand;
  result: PlayResult;
  code: CodeBlock;
  flags: FlagSet;
  flagParseErrors: readonly string[];
};

export type ReplySink = (reply: PlayReply) => Promise<void>;

export type GenericHelp = {
  command: PlaygroundCommand;
  description: string;
  modeAndChannel: boolean;
  /** Whether warnings arrive apart from output, so `warn=false` can hide them. */
  warn: boolean;
  exampleCode: string;
};
