/**
 * Type system options (bit set)
 */

export const TypeSystemOptions = {
  None: 0,
  /** object + DynamicAttribute becomes `dynamic` */
  Dynamic: 1,
  /** ValueTuple + TupleElementNamesAttribute becomes a tuple type */
  Tuple: 2,
  /** ExtensionAttribute marks extension methods */
  ExtensionMethods: 4,
  /** Only types and members visible outside their module */
  OnlyPublicAPI: 8,
  /** Build fresh definition views on every lookup */
  Uncached: 16,
  /** DecimalConstantAttribute yields a decimal constant value */
  DecimalConstants: 32,
  Default: 1 | 2 | 4 | 32,
} as const;

export type TypeSystemOptions = number;

export const hasOption = (options: TypeSystemOptions, flag: number): boolean =>
  (options & flag) === flag;

/** The decompiler settings that shape the type system */
export type TypeSystemSettings = {
  readonly dynamic: boolean;
  readonly tupleTypes: boolean;
  readonly extensionMethods: boolean;
  readonly decimalConstants: boolean;
};

export const typeSystemOptionsFromSettings = (
  settings: TypeSystemSettings
): TypeSystemOptions => {
  let options: TypeSystemOptions = TypeSystemOptions.None;
  if (settings.dynamic) options |= TypeSystemOptions.Dynamic;
  if (settings.tupleTypes) options |= TypeSystemOptions.Tuple;
  if (settings.extensionMethods) options |= TypeSystemOptions.ExtensionMethods;
  if (settings.decimalConstants) options |= TypeSystemOptions.DecimalConstants;
  return options;
};

export const formatTypeSystemOptions = (options: TypeSystemOptions): string => {
  const names = (
    ["Dynamic", "Tuple", "ExtensionMethods", "OnlyPublicAPI", "Uncached", "DecimalConstants"] as const
  ).filter((name) => hasOption(options, TypeSystemOptions[name]));
  return names.length > 0 ? names.join(" | ") : "None";
};
