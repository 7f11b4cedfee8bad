import fs from "node:fs/promises";
import path from "node:path";

import {
  commandValues,
  isPlaygroundCommand,
  type PlaygroundCommand,
} from "./config/options";
import { runPlaygroundFlow } from "./flows/playground-flow";
import { renderCommandHelp } from "./tasks/playground/help";
import type { UiSession } from "./ui";
import { createClackUi } from "./ui/clack-ui";
import { parseCodeBlock } from "../core/code/code-block";
import { isHardError } from "../core/errors";
import type { FlagBag } from "../core/flags/parse";
import { type Env, loadConfig } from "../infra/fs/config";
import type { FetchLike } from "../infra/http/backend-client";

export const packageVersion = "0.1.0";

export type RunCliOptions = {
  argv: readonly string[];
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  stdin?: NodeJS.ReadableStream & { isTTY?: boolean };
  cwd?: string;
  env?: Env;
  ui?: UiSession;
  fetch?: FetchLike;
};

type CliCommand =
  | { type: "help"; topic: PlaygroundCommand | null }
  | { type: "version" }
  | { type: "run"; command: PlaygroundCommand; rest: readonly string[] }
  | { type: "unknown"; name: string };

type RunArgs = {
  flags: FlagBag;
  file: string | undefined;
};

const HELP_TEXT = `playcheck

Run Rust snippets through the playground's analysis tools.

Usage:
  playcheck <command> [key=value ...] [--file <path>]
  playcheck help [command]
  playcheck --version

Commands:
  ${commandValues.join(", ")}

Code is read from --file or stdin; a Markdown code fence is optional.
`;

function writeLine(stream: NodeJS.WritableStream, line: string): void {
  stream.write(`${line}\n`);
}

function parseCommand(args: readonly string[]): CliCommand {
  const [first, second] = args;

  if (first === undefined || first === "--help" || first === "-h" || first === "help") {
    return {
      type: "help",
      topic: second !== undefined && isPlaygroundCommand(second) ? second : null,
    };
  }

  if (first === "--version" || first === "-v" || first === "version") {
    return { type: "version" };
  }

  if (isPlaygroundCommand(first)) {
    return { type: "run", command: first, rest: args.slice(1) };
  }

  return { type: "unknown", name: first };
}

function parseRunArgs(args: readonly string[]): RunArgs {
  const flags: Record<string, string> = {};
  let file: string | undefined;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === "--file") {
      file = args[index + 1];
      index += 1;
      continue;
    }
    if (arg.startsWith("--file=")) {
      file = arg.slice("--file=".length);
      continue;
    }

    const separator = arg.indexOf("=");
    if (separator === -1) {
      // A bare word has no value; the flag parser reports it as unknown.
      flags[arg] = "";
    } else {
      flags[arg.slice(0, separator)] = arg.slice(separator + 1);
    }
  }

  return { flags, file };
}

async function readCode(
  cwd: string,
  file: string | undefined,
  stdin: NodeJS.ReadableStream & { isTTY?: boolean }
): Promise<string> {
  if (file !== undefined) {
    return fs.readFile(path.resolve(cwd, file), "utf8");
  }
  if (stdin.isTTY) {
    throw new Error("No code given: pass --file <path> or pipe code on stdin");
  }

  let raw = "";
  stdin.setEncoding("utf8");
  for await (const chunk of stdin) {
    raw += typeof chunk === "string" ? chunk : chunk.toString("utf8");
  }
  return raw;
}

/** Resolves with the process exit code. */
export async function runCli(options: RunCliOptions): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const stdin = options.stdin ?? process.stdin;
  const cwd = options.cwd ?? process.cwd();
  const command = parseCommand(options.argv.slice(2));

  if (command.type === "version") {
    writeLine(stdout, `playcheck ${packageVersion}`);
    return 0;
  }

  if (command.type === "help") {
    stdout.write(
      command.topic === null ? HELP_TEXT : renderCommandHelp(command.topic)
    );
    return 0;
  }

  if (command.type === "unknown") {
    writeLine(stderr, `Unknown command: ${command.name}`);
    stderr.write(HELP_TEXT);
    return 1;
  }

  try {
    const { flags, file } = parseRunArgs(command.rest);
    const config = await loadConfig(cwd, options.env);
    const code = parseCodeBlock(await readCode(cwd, file, stdin));
    const ui = options.ui ?? createClackUi({ stdout });
    await runPlaygroundFlow({
      command: command.command,
      flags,
      code,
      config,
      ui,
      fetch: options.fetch,
    });
    return 0;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    writeLine(
      stderr,
      isHardError(error) ? `Request failed: ${message}` : message
    );
    return 1;
  }
}
