import type { PlaygroundCommand } from "../config/options";
import { runPlaygroundCommand } from "../tasks/playground";
import { commandHelp } from "../tasks/playground/help";
import type { UiSession } from "../ui";
import {
  createDefaultFormatStrategies,
  createLocalRustfmtStrategy,
} from "../../core/format";
import type { FlagBag } from "../../core/flags/parse";
import type { PlayReply } from "../../core/report/types";
import { assembleReply } from "../../core/reply/assemble";
import type { PlaycheckConfig } from "../../infra/fs/config";
import {
  createBackendClient,
  type FetchLike,
} from "../../infra/http/backend-client";

export function renderPlayReply(reply: PlayReply): string {
  return assembleReply({
    result: reply.result,
    flags: reply.flags,
    flagParseErrors: reply.flagParseErrors,
    warnFilterable: commandHelp[reply.command].warn,
  });
}

export async function runPlaygroundFlow(options: {
  command: PlaygroundCommand;
  flags: FlagBag;
  code: string;
  config: PlaycheckConfig;
  ui: UiSession;
  fetch?: FetchLike;
}): Promise<void> {
  const client = createBackendClient({
    baseUrl: options.config.playgroundUrl,
    timeoutMs: options.config.timeoutMs,
    fetch: options.fetch,
  });

  const replies: string[] = [];
  await options.ui.runSpinner(`Running ${options.command}…`, () =>
    runPlaygroundCommand(
      options.command,
      { flags: options.flags, code: options.code },
      {
        client,
        formatStrategies: createDefaultFormatStrategies({
          client,
          rustfmtPath: options.config.rustfmtPath,
        }),
        expansionFormatter: createLocalRustfmtStrategy(
          options.config.rustfmtPath
        ),
        logger: options.ui,
        reply: async (reply) => {
          replies.push(renderPlayReply(reply));
        },
      }
    )
  );

  // Printed after the spinner has stopped so the reply is not interleaved.
  for (const text of replies) {
    options.ui.print(text);
  }
}
