import fs from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const configFileName = "playcheck.yaml";

export type PlaycheckConfig = {
  playgroundUrl: string;
  rustfmtPath: string;
  timeoutMs: number;
};

export const defaultConfig: PlaycheckConfig = {
  playgroundUrl: "https://play.rust-lang.org",
  rustfmtPath: "rustfmt",
  timeoutMs: 30_000,
};

const configFileSchema = z
  .object({
    playgroundUrl: z.string().url().optional(),
    rustfmtPath: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Defaults, then `playcheck.yaml` in `cwd`, then `PLAYCHECK_*` environment
 * variables.
 */
export async function loadConfig(
  cwd: string,
  env: Env = process.env
): Promise<PlaycheckConfig> {
  const configPath = path.resolve(cwd, configFileName);
  const fromFile = await readConfigFile(configPath);

  return {
    ...defaultConfig,
    ...fromFile,
    ...readEnvOverrides(env),
  };
}

async function readConfigFile(configPath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new Error(`Invalid YAML in ${configPath}: ${message}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config at ${configPath}: ${issues}`);
  }
  return result.data;
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

function readEnvOverrides(env: Env): Partial<PlaycheckConfig> {
  const overrides: Partial<PlaycheckConfig> = {};

  const playgroundUrl = env.PLAYCHECK_PLAYGROUND_URL?.trim();
  if (playgroundUrl) {
    overrides.playgroundUrl = playgroundUrl;
  }

  const rustfmtPath = env.PLAYCHECK_RUSTFMT?.trim();
  if (rustfmtPath) {
    overrides.rustfmtPath = rustfmtPath;
  }

  const timeoutMs = env.PLAYCHECK_TIMEOUT_MS?.trim();
  if (timeoutMs) {
    const parsed = Number.parseInt(timeoutMs, 10);
    if (!Number.isSafeInteger(parsed) || parsed <= 0) {
      throw new Error(`Invalid PLAYCHECK_TIMEOUT_MS: ${timeoutMs}`);
    }
    overrides.timeoutMs = parsed;
  }

  return overrides;
}
