/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  DEFAULT_RUNTIME_PACK,
  TypeSystemOptions,
  typeSystemOptionsFromSettings,
  error,
  ok,
  type Result,
} from "@dnpeek/frontend";
import { cloneSettings, defaultDecompilerSettings } from "@dnpeek/emitter";
import type {
  CliOptions,
  DecompilerConfig,
  DnpeekConfig,
  ResolvedConfig,
  TypeSystemConfig,
} from "./types.js";

export const CONFIG_FILE_NAME = "dnpeek.json";

type JsonObject = { readonly [key: string]: unknown };

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const optionalBoolean = (
  source: JsonObject,
  key: string,
  scope: string
): Result<boolean | undefined, string> => {
  const value = source[key];
  if (value === undefined || typeof value === "boolean") return ok(value);
  return error(`${scope}: '${key}' must be a boolean`);
};

const parseSection = <K extends string>(
  source: JsonObject,
  section: string,
  keys: readonly K[]
): Result<Partial<Record<K, boolean>> | undefined, string> => {
  const value = source[section];
  if (value === undefined) return ok(undefined);
  if (!isObject(value)) {
    return error(`${CONFIG_FILE_NAME}: '${section}' must be an object`);
  }
  const parsed: Partial<Record<K, boolean>> = {};
  for (const key of keys) {
    const field = optionalBoolean(value, key, `${CONFIG_FILE_NAME}: ${section}`);
    if (!field.ok) return field;
    if (field.value !== undefined) parsed[key] = field.value;
  }
  return ok(parsed);
};

const TYPE_SYSTEM_KEYS = [
  "dynamic",
  "tupleTypes",
  "extensionMethods",
  "decimalConstants",
  "onlyPublicApi",
  "uncached",
] as const satisfies readonly (keyof TypeSystemConfig)[];

const DECOMPILER_KEYS = [
  "decompileMemberBodies",
  "useDebugSymbols",
] as const satisfies readonly (keyof DecompilerConfig)[];

/**
 * Validate parsed JSON as a configuration
 */
export const parseConfig = (json: unknown): Result<DnpeekConfig, string> => {
  if (!isObject(json)) {
    return error(`${CONFIG_FILE_NAME} must contain a JSON object`);
  }

  const searchDirectories = json.searchDirectories;
  if (searchDirectories !== undefined && !isStringArray(searchDirectories)) {
    return error(`${CONFIG_FILE_NAME}: 'searchDirectories' must be an array of strings`);
  }
  const strict = optionalBoolean(json, "strict", CONFIG_FILE_NAME);
  if (!strict.ok) return strict;
  const runtimePack = json.runtimePack;
  if (runtimePack !== undefined && typeof runtimePack !== "string") {
    return error(`${CONFIG_FILE_NAME}: 'runtimePack' must be a string`);
  }
  const typeSystem = parseSection(json, "typeSystem", TYPE_SYSTEM_KEYS);
  if (!typeSystem.ok) return typeSystem;
  const decompiler = parseSection(json, "decompiler", DECOMPILER_KEYS);
  if (!decompiler.ok) return decompiler;

  return ok({
    searchDirectories,
    strict: strict.value,
    runtimePack,
    typeSystem: typeSystem.value,
    decompiler: decompiler.value,
  });
};

/**
 * Load dnpeek.json
 */
export const loadConfig = (configPath: string): Result<DnpeekConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (cause) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${cause instanceof Error ? cause.message : String(cause)}`
    );
  }
  return parseConfig(json);
};

/**
 * Find dnpeek.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const resolveTypeSystemOptions = (config: TypeSystemConfig): TypeSystemOptions => {
  let options = typeSystemOptionsFromSettings({
    dynamic: config.dynamic ?? true,
    tupleTypes: config.tupleTypes ?? true,
    extensionMethods: config.extensionMethods ?? true,
    decimalConstants: config.decimalConstants ?? true,
  });
  if (config.onlyPublicApi) options |= TypeSystemOptions.OnlyPublicAPI;
  if (config.uncached) options |= TypeSystemOptions.Uncached;
  return options;
};

/**
 * Resolve final configuration from file + CLI args
 * @param configDirectory - Directory containing dnpeek.json; config search
 * directories are relative to it
 */
export const resolveConfig = (
  config: DnpeekConfig,
  cliOptions: CliOptions,
  configDirectory?: string
): ResolvedConfig => {
  const configDirectories = (config.searchDirectories ?? []).map((directory) =>
    configDirectory ? resolve(configDirectory, directory) : directory
  );
  const typeSystem = config.typeSystem ?? {};

  return {
    searchDirectories: [...configDirectories, ...(cliOptions.lib ?? [])],
    strict: cliOptions.strict ?? config.strict ?? false,
    runtimePack: cliOptions.runtimePack ?? config.runtimePack ?? DEFAULT_RUNTIME_PACK,
    typeSystemOptions: resolveTypeSystemOptions(typeSystem),
    decompilerSettings: cloneSettings(defaultDecompilerSettings, {
      dynamic: typeSystem.dynamic ?? defaultDecompilerSettings.dynamic,
      tupleTypes: typeSystem.tupleTypes ?? defaultDecompilerSettings.tupleTypes,
      extensionMethods: typeSystem.extensionMethods ?? defaultDecompilerSettings.extensionMethods,
      decimalConstants: typeSystem.decimalConstants ?? defaultDecompilerSettings.decimalConstants,
      decompileMemberBodies:
        config.decompiler?.decompileMemberBodies ?? defaultDecompilerSettings.decompileMemberBodies,
      useDebugSymbols: config.decompiler?.useDebugSymbols ?? defaultDecompilerSettings.useDebugSymbols,
    }),
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
