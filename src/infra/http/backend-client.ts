import { z } from "zod";

import type { CrateType, Edition } from "../../cli/config/options";
import { hasEntryPoint } from "../../core/code/wrap";
import { DecodeError, NetworkError } from "../../core/errors";
import type { PlayResult } from "../../core/report/types";

export type BackendRequest =
  | { kind: "miri"; code: string; edition: Edition }
  | { kind: "macroExpansion"; code: string; edition: Edition }
  | { kind: "clippy"; code: string; edition: Edition; crateType: CrateType }
  | { kind: "format"; code: string; edition: Edition };

export type BackendKind = BackendRequest["kind"];

export type FetchLike = (
  input: string,
  init: RequestInit
) => Promise<Response>;

export type BackendClient = {
  send(request: BackendRequest): Promise<PlayResult>;
};

export type CreateBackendClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

const endpointPaths: Record<BackendKind, string> = {
  miri: "/miri",
  macroExpansion: "/macro-expansion",
  clippy: "/clippy",
  format: "/format",
};

const playResultSchema = z.object({
  success: z.boolean(),
  stdout: z.string(),
  stderr: z.string(),
});

// The format endpoint returns the formatted source as `code`.
const formatResultSchema = z.object({
  success: z.boolean(),
  code: z.string(),
  stdout: z.string().optional(),
  stderr: z.string(),
});

export function buildMiriRequest(code: string, edition: Edition): BackendRequest {
  return { kind: "miri", code, edition };
}

export function buildMacroExpansionRequest(
  code: string,
  edition: Edition
): BackendRequest {
  return { kind: "macroExpansion", code, edition };
}

/**
 * The crate type is a plain text check for an entry point, not a parse:
 * `bin` when the code mentions `fn main`, `lib` otherwise.
 */
export function buildClippyRequest(code: string, edition: Edition): BackendRequest {
  return {
    kind: "clippy",
    code,
    edition,
    crateType: inferCrateType(code),
  };
}

export function buildFormatRequest(code: string, edition: Edition): BackendRequest {
  return { kind: "format", code, edition };
}

export function inferCrateType(code: string): CrateType {
  return hasEntryPoint(code) ? "bin" : "lib";
}

export function toRequestBody(request: BackendRequest): Record<string, string> {
  switch (request.kind) {
    case "clippy":
      return {
        code: request.code,
        edition: request.edition,
        crateType: request.crateType,
      };
    case "miri":
    case "macroExpansion":
    case "format":
      return { code: request.code, edition: request.edition };
    default:
      return assertNever(request);
  }
}

export function createBackendClient(
  options: CreateBackendClientOptions
): BackendClient {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const baseUrl = options.baseUrl.replace(/\/+$/, "");

  async function send(request: BackendRequest): Promise<PlayResult> {
    const url = `${baseUrl}${endpointPaths[request.kind]}`;
    const raw = await postJson(url, toRequestBody(request));
    return decodeResult(url, request.kind, raw);
  }

  async function postJson(url: string, body: unknown): Promise<string> {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal:
          options.timeoutMs === undefined
            ? undefined
            : AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error: unknown) {
      throw new NetworkError(`Request to ${url} failed: ${describe(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new NetworkError(
        `Request to ${url} failed with status ${response.status}`,
        { status: response.status }
      );
    }

    try {
      return await response.text();
    } catch (error: unknown) {
      throw new NetworkError(
        `Reading the response from ${url} failed: ${describe(error)}`,
        { cause: error }
      );
    }
  }

  return { send };
}

function decodeResult(url: string, kind: BackendKind, raw: string): PlayResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    throw new DecodeError(`Response from ${url} is not valid JSON`, {
      cause: error,
    });
  }

  if (kind === "format") {
    const result = formatResultSchema.safeParse(parsed);
    if (!result.success) {
      throw new DecodeError(
        `Unexpected response from ${url}: ${summarizeIssues(result.error)}`,
        { cause: result.error }
      );
    }
    return {
      success: result.data.success,
      stdout: result.data.code,
      stderr: result.data.stderr,
    };
  }

  const result = playResultSchema.safeParse(parsed);
  if (!result.success) {
    throw new DecodeError(
      `Unexpected response from ${url}: ${summarizeIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

function summarizeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

function assertNever(value: never): never {
  throw new Error(`Unhandled backend request: ${JSON.stringify(value)}`);
}
