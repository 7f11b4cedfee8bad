import type { ResultHandling } from "../../cli/config/options";

export type OriginalCode = {
  kind: "original";
  text: string;
};

export type WrappedCode = {
  kind: "wrapped";
  text: string;
  resultHandling: ResultHandling;
};

/**
 * Submitted code, tagged with whether an entry point was synthesized around
 * it. Boilerplate stripping only accepts the `wrapped` variant.
 */
export type CodeBlock = OriginalCode | WrappedCode;

export const entryPointSignature = "fn main() {";
export const discardOpen = "let _ = {";
export const discardClose = "};";
export const resultOpen = "let result = {";
export const resultClose = "};";

/**
 * Prints `result` when its type implements `Display` and drops it otherwise.
 * Method lookup tries `Shown<T>` before `&Shown<T>`, so the `Display` impl
 * wins whenever its bound holds.
 */
export const printIfDisplayable: readonly string[] = [
  "{",
  "    struct Shown<T>(T);",
  "    trait ShowDisplay {",
  "        fn show(&self);",
  "    }",
  "    impl<T: std::fmt::Display> ShowDisplay for Shown<T> {",
  "        fn show(&self) {",
  '            println!("{}", self.0);',
  "        }",
  "    }",
  "    trait ShowOther {",
  "        fn show(&self);",
  "    }",
  "    impl<T> ShowOther for &Shown<T> {",
  "        fn show(&self) {}",
  "    }",
  "    (&Shown(result)).show();",
  "}",
];

const entryPointMarker = "fn main";

export function hasEntryPoint(code: string): boolean {
  return code.includes(entryPointMarker);
}

export function maybeWrap(
  code: string,
  resultHandling: ResultHandling
): CodeBlock {
  if (hasEntryPoint(code)) {
    return { kind: "original", text: code };
  }

  return {
    kind: "wrapped",
    text: renderWrapper(code, resultHandling),
    resultHandling,
  };
}

export function isWrapped(code: CodeBlock): code is WrappedCode {
  return code.kind === "wrapped";
}

function renderWrapper(code: string, resultHandling: ResultHandling): string {
  if (resultHandling === "discard") {
    return [entryPointSignature, discardOpen, code, discardClose, "}"].join(
      "\n"
    );
  }
  return [
    entryPointSignature,
    resultOpen,
    code,
    resultClose,
    ...printIfDisplayable,
    "}",
  ].join("\n");
}
