/**
 * Tests for the resolve command
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as path from "node:path";
import { createTempDir, removeTempDir, writeModuleImage } from "@dnpeek/frontend/testing";
import { resolveConfig } from "../config.js";
import { resolveCommand } from "./resolve.js";

describe("resolveCommand", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  const mainModule = (): string =>
    writeModuleImage(tempDir, "app/Main.exe", {
      name: "Main",
      version: "1.0.0.0",
      references: [{ name: "Widgets", version: "2.0.0.0" }],
    });

  it("should print the file a declared reference resolves to", () => {
    const main = mainModule();
    writeModuleImage(tempDir, "app/Widgets.dll", { name: "Widgets", version: "2.0.0.0" });

    const result = resolveCommand(main, "widgets", resolveConfig({}, {}));

    expect(result).to.deep.equal({
      ok: true,
      value: { lines: [path.join(tempDir, "app", "Widgets.dll")], diagnostics: [] },
    });
  });

  it("should search extra directories", () => {
    const main = mainModule();
    writeModuleImage(tempDir, "lib/Gadgets.dll", { name: "Gadgets", version: "1.0.0.0" });

    const result = resolveCommand(main, "Gadgets", resolveConfig({}, { lib: [path.join(tempDir, "lib")] }));

    expect(result.ok && result.value.lines).to.deep.equal([path.join(tempDir, "lib", "Gadgets.dll")]);
  });

  it("should fail for references that cannot be located", () => {
    const result = resolveCommand(mainModule(), "Missing.Thing", resolveConfig({}, {}));

    expect(result).to.deep.equal({
      ok: false,
      error: {
        kind: "failed",
        message: "Could not resolve Missing.Thing, Version=0.0.0.0, Culture=neutral, PublicKeyToken=null",
      },
    });
  });

  it("should report an unreadable main module", () => {
    const result = resolveCommand(path.join(tempDir, "Nope.exe"), "Widgets", resolveConfig({}, {}));

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.kind).to.equal("unreadable");
      expect(result.error.message).to.equal(`Could not read module ${path.join(tempDir, "Nope.exe")}`);
    }
  });
});
