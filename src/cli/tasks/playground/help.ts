import {
  defaultEdition,
  editionValues,
  type PlaygroundCommand,
} from "../../config/options";
import type { GenericHelp } from "../../../core/report/types";

export const commandHelp: Record<PlaygroundCommand, GenericHelp> = {
  miri: {
    command: "miri",
    description:
      "Execute this program in the Miri interpreter to detect certain cases of undefined behavior (like out-of-bounds memory access)",
    modeAndChannel: false,
    // Miri warnings, errors and program output share one field.
    warn: false,
    exampleCode: "let v = vec![1, 2, 3];\nv[1]",
  },
  expand: {
    command: "expand",
    description: "Expand macros to their raw desugared form",
    modeAndChannel: false,
    // Expansion and formatting output replaces the code; compiler chatter
    // around it is always shown.
    warn: false,
    exampleCode: 'println!("{}", 1 + 1);',
  },
  clippy: {
    command: "clippy",
    description:
      "Catch common mistakes and improve the code using the Clippy linter",
    modeAndChannel: false,
    // The lints are the output.
    warn: false,
    exampleCode: "let v = vec![1, 2, 3];\nv.len() == 0",
  },
  fmt: {
    command: "fmt",
    description: "Format code using rustfmt",
    modeAndChannel: false,
    warn: false,
    exampleCode: "let x=vec![1,2,\n3];",
  },
};

export function renderGenericHelp(help: GenericHelp): string {
  let usage = `playcheck ${help.command}`;
  if (help.modeAndChannel) {
    usage += " mode={} channel={}";
  }
  usage += " edition={}";
  if (help.warn) {
    usage += " warn={}";
  }
  usage += " < code.rs";

  const lines: string[] = [
    `${help.description}. All code is executed on the Rust playground.`,
    "",
    "Usage:",
    `  ${usage}`,
    "",
    "Example code:",
    ...help.exampleCode.split("\n").map((line) => `  ${line}`),
    "",
    "Optional arguments:",
  ];

  if (help.modeAndChannel) {
    lines.push(
      "- mode: debug, release (default: debug)",
      "- channel: stable, beta, nightly (default: nightly)"
    );
  }
  lines.push(
    `- edition: ${editionValues.join(", ")} (default: ${defaultEdition})`
  );
  if (help.warn) {
    lines.push("- warn: true, false (default: false)");
  }

  return `${lines.join("\n")}\n`;
}

export function renderCommandHelp(command: PlaygroundCommand): string {
  return renderGenericHelp(commandHelp[command]);
}
