/**
 * UI-layer contracts for logging and spinners.
 *
 * `@clack/prompts` is wrapped in `clack-ui.ts`; core code only sees these
 * narrow types so commands stay testable with plain fakes.
 */

export type UiLogger = {
  warn(message: string): void;
};

export type UiSession = UiLogger & {
  runSpinner<TResult>(
    title: string,
    work: () => Promise<TResult>
  ): Promise<TResult>;
  print(text: string): void;
};
