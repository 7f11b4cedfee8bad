import type { Edition, PlaygroundCommand } from "../../config/options";
import type { UiLogger } from "../../ui";
import { isWrapped, maybeWrap } from "../../../core/code/wrap";
import { LocalToolError } from "../../../core/errors";
import {
  type FormatStrategy,
  formatWithFallback,
  stripEntryPointBoilerplate,
} from "../../../core/format";
import { type FlagBag, parseFlags } from "../../../core/flags/parse";
import { extractWithMarkers } from "../../../core/output/extract";
import type { PlayResult, ReplySink } from "../../../core/report/types";
import {
  type BackendClient,
  buildClippyRequest,
  buildMacroExpansionRequest,
  buildMiriRequest,
} from "../../../infra/http/backend-client";
import { clippyMarkers, expandMarkers, miriMarkers } from "./markers";

export type CommandInput = {
  flags: FlagBag;
  code: string;
};

export type CommandDeps = {
  client: BackendClient;
  /** Fallback chain used by `fmt`. */
  formatStrategies: readonly FormatStrategy[];
  /** Formatter applied to macro expansions; no remote fallback. */
  expansionFormatter: FormatStrategy;
  logger: UiLogger;
  reply: ReplySink;
};

type CommandHandler = (input: CommandInput, deps: CommandDeps) => Promise<void>;

/** Runs code in Miri to detect undefined behavior. */
export async function runMiri(
  input: CommandInput,
  deps: CommandDeps
): Promise<void> {
  const code = maybeWrap(input.code, "discard");
  const { flags, errors } = parseFlags(input.flags);

  const response = await deps.client.send(
    buildMiriRequest(code.text, flags.edition)
  );
  const result: PlayResult = {
    ...response,
    stderr: extractWithMarkers(response.stderr, miriMarkers),
  };

  await deps.reply({
    command: "miri",
    result,
    code,
    flags,
    flagParseErrors: errors,
  });
}

/** Expands macros to their desugared form. */
export async function runExpand(
  input: CommandInput,
  deps: CommandDeps
): Promise<void> {
  const code = maybeWrap(input.code, "none");
  const { flags, errors } = parseFlags(input.flags);

  const response = await deps.client.send(
    buildMacroExpansionRequest(code.text, flags.edition)
  );
  const result: PlayResult = {
    ...response,
    stderr: extractWithMarkers(response.stderr, expandMarkers),
  };

  if (result.success) {
    result.stdout = await formatExpansion(result.stdout, flags.edition, deps);
    if (isWrapped(code)) {
      result.stdout = stripEntryPointBoilerplate(result.stdout, code);
    }
  }

  await deps.reply({
    command: "expand",
    result,
    code,
    flags,
    flagParseErrors: errors,
  });
}

/** Lints code with Clippy. */
export async function runClippy(
  input: CommandInput,
  deps: CommandDeps
): Promise<void> {
  const code = maybeWrap(input.code, "discard");
  const { flags, errors } = parseFlags(input.flags);

  const response = await deps.client.send(
    buildClippyRequest(code.text, flags.edition)
  );
  const result: PlayResult = {
    ...response,
    stderr: extractWithMarkers(response.stderr, clippyMarkers),
  };

  await deps.reply({
    command: "clippy",
    result,
    code,
    flags,
    flagParseErrors: errors,
  });
}

/** Formats code, preferring a local rustfmt over the playground's. */
export async function runFmt(
  input: CommandInput,
  deps: CommandDeps
): Promise<void> {
  const code = maybeWrap(input.code, "none");
  const { flags, errors } = parseFlags(input.flags);

  const formatted = await formatWithFallback(
    code.text,
    flags.edition,
    deps.formatStrategies,
    deps.logger
  );
  const result: PlayResult = { ...formatted };
  if (result.success && isWrapped(code)) {
    result.stdout = stripEntryPointBoilerplate(result.stdout, code);
  }

  await deps.reply({
    command: "fmt",
    result,
    code,
    flags,
    flagParseErrors: errors,
  });
}

const commandHandlers: Record<PlaygroundCommand, CommandHandler> = {
  miri: runMiri,
  expand: runExpand,
  clippy: runClippy,
  fmt: runFmt,
};

export function runPlaygroundCommand(
  command: PlaygroundCommand,
  input: CommandInput,
  deps: CommandDeps
): Promise<void> {
  return commandHandlers[command](input, deps);
}

async function formatExpansion(
  expanded: string,
  edition: Edition,
  deps: CommandDeps
): Promise<string> {
  try {
    const formatted = await deps.expansionFormatter.format(expanded, edition);
    if (formatted.success) {
      return formatted.stdout;
    }
    deps.logger.warn(
      `rustfmt failed on code that passed macro expansion: ${formatted.stderr}`
    );
  } catch (error: unknown) {
    if (!(error instanceof LocalToolError)) {
      throw error;
    }
    deps.logger.warn(`Couldn't run rustfmt: ${error.message}`);
  }
  return expanded;
}
