/**
 * Test helpers for writing module images into temporary directories
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

export type ReferenceImage = {
  readonly name: string;
  readonly version: string;
  readonly culture?: string;
  readonly publicKeyToken?: string;
  readonly isRetargetable?: boolean;
  readonly isWindowsRuntime?: boolean;
};

export type ModuleImage = {
  readonly name: string;
  readonly version: string;
  readonly culture?: string;
  readonly publicKey?: string;
  readonly publicKeyToken?: string;
  readonly runtimeVersion?: string;
  readonly targetFramework?: string;
  readonly internalsVisibleTo?: readonly string[];
  readonly references?: readonly ReferenceImage[];
  readonly exportedTypes?: readonly unknown[];
  readonly types?: readonly unknown[];
};

export const MICROSOFT_TOKEN = "b03f5f7f11d50a3a";
export const ECMA_TOKEN = "b77a5c561934e089";

export const createTempDir = (prefix = "dnpeek-test-"): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), prefix));

export const removeTempDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true });
};

/**
 * Write an image to `<root>/<relativePath>`, creating parent directories.
 * Returns the absolute file path.
 */
export const writeModuleImage = (
  root: string,
  relativePath: string,
  image: ModuleImage
): string => {
  const filePath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify({ types: [], ...image }, null, 2));
  return filePath;
};

/** Write a plain file (e.g. `.deps.json` or a marker) */
export const writeFile = (
  root: string,
  relativePath: string,
  content: string
): string => {
  const filePath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
};

/** Well-known core types as a minimal corlib image would declare them */
export const coreLibraryTypes = (
  names: readonly string[]
): readonly unknown[] =>
  names.map((name) => ({ namespace: "System", name }));
