export {
  type CrateType,
  defaultEdition,
  type Edition,
  editionValues,
  type FlagSet,
  type PlaygroundCommand,
  type ResultHandling,
} from "./cli/config/options";
export { renderPlayReply, runPlaygroundFlow } from "./cli/flows/playground-flow";
export { type RunCliOptions, runCli } from "./cli/run-cli";
export {
  type CommandDeps,
  type CommandInput,
  runClippy,
  runExpand,
  runFmt,
  runMiri,
  runPlaygroundCommand,
} from "./cli/tasks/playground";
export { commandHelp, renderGenericHelp } from "./cli/tasks/playground/help";
export type { UiLogger, UiSession } from "./cli/ui";
export { parseCodeBlock } from "./core/code/code-block";
export {
  type CodeBlock,
  isWrapped,
  maybeWrap,
  type OriginalCode,
  type WrappedCode,
} from "./core/code/wrap";
export {
  DecodeError,
  isHardError,
  LocalToolError,
  NetworkError,
} from "./core/errors";
export { type FlagBag, type ParsedFlags, parseFlags } from "./core/flags/parse";
export {
  createDefaultFormatStrategies,
  createLocalRustfmtStrategy,
  createRemoteFormatStrategy,
  type FormatStrategy,
  formatWithFallback,
  stripEntryPointBoilerplate,
} from "./core/format";
export {
  extractRelevantLines,
  extractWithMarkers,
  type MarkerSet,
} from "./core/output/extract";
export type {
  GenericHelp,
  PlayReply,
  PlayResult,
  ReplySink,
} from "./core/report/types";
export { assembleReply } from "./core/reply/assemble";
export { loadConfig, type PlaycheckConfig } from "./infra/fs/config";
export {
  type BackendClient,
  type BackendRequest,
  buildClippyRequest,
  buildFormatRequest,
  buildMacroExpansionRequest,
  buildMiriRequest,
  createBackendClient,
  type FetchLike,
  inferCrateType,
} from "./infra/http/backend-client";
export { runLocalRustfmt } from "./infra/rustfmt/local";
