import { expect, test, vi } from "vitest";

import { renderPlayReply } from "../src/cli/flows/playground-flow";
import {
  type CommandDeps,
  runClippy,
  runExpand,
  runFmt,
  runMiri,
  runPlaygroundCommand,
} from "../src/cli/tasks/playground";
import { maybeWrap, printIfDisplayable } from "../src/core/code/wrap";
import { LocalToolError, NetworkError } from "../src/core/errors";
import type { FormatStrategy } from "../src/core/format";
import type { PlayReply, PlayResult } from "../src/core/report/types";
import type {
  BackendClient,
  BackendRequest,
} from "../src/infra/http/backend-client";

function createDeps(
  response: PlayResult,
  overrides: Partial<CommandDeps> = {}
) {
  const replies: PlayReply[] = [];
  const send = vi.fn<(request: BackendRequest) => Promise<PlayResult>>(
    async () => response
  );
  const client: BackendClient = { send };
  const logger = { warn: vi.fn<(message: string) => void>() };
  const deps: CommandDeps = {
    client,
    formatStrategies: [],
    expansionFormatter: {
      name: "local rustfmt",
      format: async (code) => ({ success: true, stdout: code, stderr: "" }),
    },
    logger,
    reply: async (reply) => {
      replies.push(reply);
    },
    ...overrides,
  };
  return { deps, send, logger, replies };
}

test("miri wraps a bare expression, discards its value and trims stderr", async () => {
  const { deps, send, replies } = createDeps({
    success: true,
    stdout: "",
    stderr: "Compiling...\nFinished dev [unoptimized] ...\n",
  });

  await runMiri({ flags: {}, code: "1 + 1" }, deps);

  expect(send).toHaveBeenCalledWith({
    kind: "miri",
    code: "fn main() {\nlet _ = {\n1 + 1\n};\n}",
    edition: "2024",
  });
  expect(replies).toHaveLength(1);
  expect(replies[0].code.kind).toBe("wrapped");
  expect(replies[0].result).toEqual({
    success: true,
    stdout: "",
    stderr: "Compiling...\nFinished dev [unoptimized] ...\n",
  });
});

test("a Finished banner on the last line leaves no diagnostics", async () => {
  const { deps, replies } = createDeps({
    success: true,
    stdout: "",
    stderr: "Compiling...\nFinished dev [unoptimized] ...\n",
  });

  await runExpand({ flags: {}, code: "1 + 1" }, deps);

  expect(replies[0].result.stderr).toBe("");
  expect(renderPlayReply(replies[0])).toBe("```rust\n(no output)\n```\n");
});

test("clippy sends code that has an entry point unwrapped, as a binary crate", async () => {
  const { deps, send, replies } = createDeps({
    success: true,
    stdout: "",
    stderr: "    Checking playground v0.0.1 (/playground)\nwarning: empty loop\n\nwarning: 1 warning emitted\n",
  });

  await runClippy(
    { flags: { edition: "2021", colour: "on" }, code: "fn main() { loop {} }" },
    deps
  );

  expect(send).toHaveBeenCalledWith({
    kind: "clippy",
    code: "fn main() { loop {} }",
    edition: "2021",
    crateType: "bin",
  });
  expect(replies[0].result.stderr).toBe("warning: empty loop\n");
  expect(replies[0].flagParseErrors).toEqual(["unknown flag `colour`"]);
  expect(renderPlayReply(replies[0])).toBe(
    "```rust\nwarning: empty loop\n```\nFlag parsing errors:\n- unknown flag `colour`\n"
  );
});

test("clippy wraps bare statements, so they lint as a binary", async () => {
  const { deps, send } = createDeps({ success: true, stdout: "", stderr: "" });

  await runClippy({ flags: {}, code: "let v: Vec<u8> = vec![];" }, deps);

  const [request] = send.mock.calls[0];
  expect(request.kind === "clippy" ? request.crateType : null).toBe("bin");
});

test("expand formats the expansion and strips the synthesized entry point", async () => {
  const expanded = [
    "#![feature(prelude_import)]",
    "#[prelude_import]",
    "use std::prelude::rust_2024::*;",
    "#[macro_use]",
    "extern crate std;",
    "fn main() { 1 + 1 }",
  ].join("\n");
  const formatted = [
    "#![feature(prelude_import)]",
    "#[prelude_import]",
    "use std::prelude::rust_2024::*;",
    "#[macro_use]",
    "extern crate std;",
    "fn main() {",
    "    let result = { 1 + 1 };",
    ...printIfDisplayable.map((line) => `    ${line}`),
    "}",
    "",
  ].join("\n");
  const expansionFormatter: FormatStrategy = {
    name: "local rustfmt",
    format: vi.fn(async () => ({ success: true, stdout: formatted, stderr: "" })),
  };
  const { deps, send, replies } = createDeps(
    { success: true, stdout: expanded, stderr: "" },
    { expansionFormatter }
  );

  await runExpand({ flags: {}, code: "1 + 1" }, deps);

  expect(send).toHaveBeenCalledWith({
    kind: "macroExpansion",
    code: maybeWrap("1 + 1", "none").text,
    edition: "2024",
  });
  expect(expansionFormatter.format).toHaveBeenCalledWith(expanded, "2024");
  expect(replies[0].result.stdout).toBe("1 + 1\n");
});

test("expand keeps the unformatted expansion when rustfmt cannot run", async () => {
  const { deps, logger, replies } = createDeps(
    { success: true, stdout: "fn main() { 1 + 1 }", stderr: "" },
    {
      expansionFormatter: {
        name: "local rustfmt",
        format: async () => {
          throw new LocalToolError("rustfmt", "spawn rustfmt ENOENT");
        },
      },
    }
  );

  await runExpand({ flags: {}, code: "1 + 1" }, deps);

  expect(logger.warn).toHaveBeenCalledWith(
    "Couldn't run rustfmt: spawn rustfmt ENOENT"
  );
  expect(replies[0].result.stdout).toBe("1 + 1");
});

test("expand leaves user code with an entry point as expanded", async () => {
  const { deps, replies } = createDeps({
    success: true,
    stdout: "fn main() {\n    {\n        x();\n    };\n}\n",
    stderr: "",
  });

  await runExpand({ flags: {}, code: "fn main() { x!(); }" }, deps);

  expect(replies[0].code).toEqual({
    kind: "original",
    text: "fn main() { x!(); }",
  });
  expect(replies[0].result.stdout).toBe(
    "fn main() {\n    {\n        x();\n    };\n}\n"
  );
});

test("fmt falls back to the remote formatter and strips the wrapper", async () => {
  const remote = vi.fn(async () => ({
    success: true,
    stdout: [
      "fn main() {",
      "    let result = {",
      "        let x = 1;",
      "    };",
      ...printIfDisplayable.map((line) => `    ${line}`),
      "}",
      "",
    ].join("\n"),
    stderr: "",
  }));
  const { deps, logger, replies } = createDeps(
    { success: true, stdout: "", stderr: "" },
    {
      formatStrategies: [
        {
          name: "local rustfmt",
          format: async () => {
            throw new LocalToolError("rustfmt", "spawn rustfmt ENOENT");
          },
        },
        { name: "playground rustfmt", format: remote },
      ],
    }
  );

  await runFmt({ flags: { edition: "2018" }, code: "let x=1;" }, deps);

  expect(remote).toHaveBeenCalledTimes(1);
  expect(remote).toHaveBeenCalledWith(
    maybeWrap("let x=1;", "none").text,
    "2018"
  );
  expect(logger.warn).toHaveBeenCalledTimes(1);
  expect(replies[0].result).toEqual({
    success: true,
    stdout: "let x = 1;\n",
    stderr: "",
  });
});

test("fmt shows rustfmt diagnostics next to the formatted code", async () => {
  const { deps, replies } = createDeps(
    { success: true, stdout: "", stderr: "" },
    {
      formatStrategies: [
        {
          name: "local rustfmt",
          format: async () => ({
            success: true,
            stdout: "fn main() {}\n",
            stderr: "Warning: unknown configuration option `foo`\n",
          }),
        },
      ],
    }
  );

  await runFmt({ flags: {}, code: "fn main(){}" }, deps);

  expect(renderPlayReply(replies[0])).toBe(
    "```rust\nWarning: unknown configuration option `foo`\nfn main() {}\n```\n"
  );
});

test("fmt reports a formatting failure without stripping", async () => {
  const failure = { success: false, stdout: "", stderr: "error: expected expression" };
  const { deps, replies } = createDeps(
    { success: true, stdout: "", stderr: "" },
    { formatStrategies: [{ name: "local rustfmt", format: async () => failure }] }
  );

  await runFmt({ flags: {}, code: "let x = ;" }, deps);

  expect(replies[0].result).toEqual(failure);
  expect(renderPlayReply(replies[0])).toBe(
    "```rust\nerror: expected expression\n```\n"
  );
});

test("a network failure ends the command without a reply", async () => {
  const { deps, replies } = createDeps({ success: true, stdout: "", stderr: "" });
  deps.client = {
    send: async () => {
      throw new NetworkError("Request to https://playground.test/miri failed");
    },
  };

  await expect(
    runPlaygroundCommand("miri", { flags: {}, code: "1" }, deps)
  ).rejects.toBeInstanceOf(NetworkError);
  expect(replies).toEqual([]);
});
