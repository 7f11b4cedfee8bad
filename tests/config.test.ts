import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { expect, test } from "vitest";

import { defaultConfig, loadConfig } from "../src/infra/fs/config";

async function writeConfig(dir: string, contents: string): Promise<void> {
  await fs.writeFile(path.join(dir, "playcheck.yaml"), contents);
}

test("loadConfig falls back to defaults without a config file", async () => {
  const cwd = await fs.mkdtemp(path.join(os.tmpdir(), "playcheck-"));

  const config = await loadConfig(cwd, {});

  expect(config).toEqual(defaultConfig);
});

test("loadConfig reads playcheck.yaml", async () => {
  const cwd = await fs.mkdtemp(path.join(os.tmpdir(), "playcheck-"));
  await writeConfig(
    cwd,
    [
      "playgroundUrl: http://localhost:5000",
      "rustfmtPath: /opt/rust/bin/rustfmt",
      "timeoutMs: 5000",
    ].join("\n")
  );

  const config = await loadConfig(cwd, {});

  expect(config).toEqual({
    playgroundUrl: "http://localhost:5000",
    rustfmtPath: "/opt/rust/bin/rustfmt",
    timeoutMs: 5000,
  });
});

test("loadConfig lets environment variables win", async () => {
  const cwd = await fs.mkdtemp(path.join(os.tmpdir(), "playcheck-"));
  await writeConfig(cwd, "timeoutMs: 5000\n");

  const config = await loadConfig(cwd, {
    PLAYCHECK_PLAYGROUND_URL: "http://127.0.0.1:8080",
    PLAYCHECK_TIMEOUT_MS: "750",
  });

  expect(config).toEqual({
    playgroundUrl: "http://127.0.0.1:8080",
    rustfmtPath: "rustfmt",
    timeoutMs: 750,
  });
});

test("loadConfig rejects unknown keys", async () => {
  const cwd = await fs.mkdtemp(path.join(os.tmpdir(), "playcheck-"));
  await writeConfig(cwd, "retries: 3\n");

  await expect(loadConfig(cwd, {})).rejects.toThrow(
    `Invalid config at ${path.join(cwd, "playcheck.yaml")}`
  );
});

test("loadConfig rejects a bad timeout override", async () => {
  const cwd = await fs.mkdtemp(path.join(os.tmpdir(), "playcheck-"));

  await expect(
    loadConfig(cwd, { PLAYCHECK_TIMEOUT_MS: "soon" })
  ).rejects.toThrow("Invalid PLAYCHECK_TIMEOUT_MS: soon");
});

test("loadConfig surfaces read errors other than a missing file", async () => {
  const cwd = await fs.mkdtemp(path.join(os.tmpdir(), "playcheck-"));
  await fs.mkdir(path.join(cwd, "playcheck.yaml"));

  await expect(loadConfig(cwd, {})).rejects.toMatchObject({ code: "EISDIR" });
});
