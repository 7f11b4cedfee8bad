export const editionValues = ["2015", "2018", "2021", "2024"] as const;
export type Edition = (typeof editionValues)[number];

export const defaultEdition: Edition = "2024";

export const commandValues = ["miri", "expand", "clippy", "fmt"] as const;
export type PlaygroundCommand = (typeof commandValues)[number];

export const resultHandlingValues = ["none", "discard"] as const;
export type ResultHandling = (typeof resultHandlingValues)[number];

export const crateTypeValues = ["bin", "lib"] as const;
export type CrateType = (typeof crateTypeValues)[number];

export type FlagSet = {
  edition: Edition;
  warn: boolean;
};

export function isEdition(value: string): value is Edition {
  return editionValues.some((edition) => edition === value);
}

export function isPlaygroundCommand(
  value: string
): value is PlaygroundCommand {
  return commandValues.some((command) => command === value);
}
