import type { Edition } from "../../cli/config/options";
import type { UiLogger } from "../../cli/ui";
import { LocalToolError } from "../errors";
import type { PlayResult } from "../report/types";

export type FormatStrategy = {
  name: string;
  format(code: string, edition: Edition): Promise<PlayResult>;
};

/**
 * Tries each strategy in order. A strategy whose tool cannot run
 * (`LocalToolError`) is logged and skipped; any other error ends the chain.
 * A reported formatting failure is a result like any other and is returned.
 */
export async function formatWithFallback(
  code: string,
  edition: Edition,
  strategies: readonly FormatStrategy[],
  logger: UiLogger
): Promise<PlayResult> {
  let lastError: LocalToolError | null = null;

  for (const strategy of strategies) {
    try {
      return await strategy.format(code, edition);
    } catch (error: unknown) {
      if (!(error instanceof LocalToolError)) {
        throw error;
      }
      logger.warn(`Error while executing ${strategy.name}: ${error.message}`);
      lastError = error;
    }
  }

  throw lastError ?? new LocalToolError("formatter", "No formatter configured");
}
