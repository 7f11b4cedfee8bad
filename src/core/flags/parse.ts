import {
  defaultEdition,
  type FlagSet,
  isEdition,
} from "../../cli/config/options";

export type FlagBag = Readonly<Record<string, string>>;

export type ParsedFlags = {
  flags: FlagSet;
  errors: string[];
};

// Build flags of the run commands; none of the analysis backends take them.
const modeAndChannelKeys = new Set(["mode", "channel"]);

/**
 * Reads the recognised flags out of `bag`. Bad values and unknown keys are
 * collected as messages, in encounter order, and never stop parsing.
 */
export function parseFlags(bag: FlagBag): ParsedFlags {
  const flags: FlagSet = {
    edition: defaultEdition,
    warn: false,
  };
  const errors: string[] = [];

  for (const [key, value] of Object.entries(bag)) {
    switch (key) {
      case "edition": {
        if (isEdition(value)) {
          flags.edition = value;
        } else {
          errors.push(`unknown edition \`${value}\``);
        }
        break;
      }
      case "warn": {
        const parsed = parseBoolean(value);
        if (parsed === null) {
          errors.push(
            `invalid value \`${value}\` for flag \`warn\` (expected true or false)`
          );
        } else {
          flags.warn = parsed;
        }
        break;
      }
      default: {
        if (modeAndChannelKeys.has(key)) {
          errors.push(`flag \`${key}\` is not supported by this command`);
        } else {
          errors.push(`unknown flag \`${key}\``);
        }
      }
    }
  }

  return { flags, errors };
}

function parseBoolean(value: string): boolean | null {
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  return null;
}
