import type { Edition } from "../../cli/config/options";
import { buildFormatRequest, type BackendClient } from "../../infra/http/backend-client";
import { runLocalRustfmt } from "../../infra/rustfmt/local";
import type { FormatStrategy } from "./fallback";

export { formatWithFallback, type FormatStrategy } from "./fallback";
export { stripEntryPointBoilerplate } from "./strip";

export function createLocalRustfmtStrategy(rustfmtPath?: string): FormatStrategy {
  return {
    name: "local rustfmt",
    format: (code: string, edition: Edition) =>
      runLocalRustfmt(code, edition, { rustfmtPath }),
  };
}

export function createRemoteFormatStrategy(client: BackendClient): FormatStrategy {
  return {
    name: "playground rustfmt",
    format: (code: string, edition: Edition) =>
      client.send(buildFormatRequest(code, edition)),
  };
}

/** Local rustfmt first, the playground's formatter when it cannot run. */
export function createDefaultFormatStrategies(options: {
  client: BackendClient;
  rustfmtPath?: string;
}): FormatStrategy[] {
  return [
    createLocalRustfmtStrategy(options.rustfmtPath),
    createRemoteFormatStrategy(options.client),
  ];
}
