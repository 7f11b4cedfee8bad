import { log, spinner } from "@clack/prompts";

import type { UiSession } from "./index";

export type ClackUi = UiSession;

export type CreateClackUiOptions = {
  stdout?: NodeJS.WritableStream;
};

export function createClackUi(options: CreateClackUiOptions = {}): ClackUi {
  const stdout = options.stdout ?? process.stdout;

  function warn(message: string): void {
    log.warn(message);
  }

  async function runSpinner<TResult>(
    title: string,
    work: () => Promise<TResult>
  ): Promise<TResult> {
    const s = spinner();
    s.start(title);
    try {
      const result = await work();
      s.stop("Done");
      return result;
    } catch (caught: unknown) {
      const message =
        caught instanceof Error ? caught.message : "Unknown error";
      s.stop(message, 1);
      throw caught;
    }
  }

  function print(text: string): void {
    stdout.write(text);
    if (!text.endsWith("\n")) {
      stdout.write("\n");
    }
  }

  return {
    warn,
    runSpinner,
    print,
  };
}
