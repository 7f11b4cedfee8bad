export type PlaygroundErrorCode =
  | "network_error"
  | "decode_error"
  | "local_tool_error";

type PlaygroundErrorInput = {
  code: PlaygroundErrorCode;
  message: string;
  name: string;
  cause?: unknown;
};

class PlaygroundError extends Error {
  readonly code: PlaygroundErrorCode;

  constructor({ code, message, name, cause }: PlaygroundErrorInput) {
    super(message, { cause });
    this.name = name;
    this.code = code;
  }
}

/**
 * The backend could not be reached, timed out or answered with a
 * non-success status. Ends the invocation.
 */
export class NetworkError extends PlaygroundError {
  readonly status: number | null;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super({
      code: "network_error",
      message,
      name: "NetworkError",
      cause: options.cause,
    });
    this.status = options.status ?? null;
  }
}

/**
 * The backend answered, but the body is not the expected JSON shape.
 * Ends the invocation.
 */
export class DecodeError extends PlaygroundError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super({
      code: "decode_error",
      message,
      name: "DecodeError",
      cause: options.cause,
    });
  }
}

/**
 * A local tool could not be executed at all. Callers log it and move on to
 * the next strategy.
 */
export class LocalToolError extends PlaygroundError {
  readonly tool: string;

  constructor(tool: string, message: string, options: { cause?: unknown } = {}) {
    super({
      code: "local_tool_error",
      message,
      name: "LocalToolError",
      cause: options.cause,
    });
    this.tool = tool;
  }
}

export function isHardError(error: unknown): error is NetworkError | DecodeError {
  return error instanceof NetworkError || error instanceof DecodeError;
}
