/**
 * Tests for configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as path from "node:path";
import { TypeSystemOptions } from "@dnpeek/frontend";
import { createTempDir, removeTempDir, writeFile } from "@dnpeek/frontend/testing";
import { findConfig, loadConfig, parseConfig, resolveConfig } from "./config.js";

describe("Config", () => {
  describe("parseConfig", () => {
    it("should accept a complete configuration", () => {
      const result = parseConfig({
        searchDirectories: ["lib"],
        strict: true,
        runtimePack: "Microsoft.AspNetCore.App",
        typeSystem: { dynamic: false, onlyPublicApi: true },
        decompiler: { decompileMemberBodies: false },
      });

      expect(result).to.deep.equal({
        ok: true,
        value: {
          searchDirectories: ["lib"],
          strict: true,
          runtimePack: "Microsoft.AspNetCore.App",
          typeSystem: { dynamic: false, onlyPublicApi: true },
          decompiler: { decompileMemberBodies: false },
        },
      });
    });

    it("should reject a non-object document", () => {
      expect(parseConfig([])).to.deep.equal({
        ok: false,
        error: "dnpeek.json must contain a JSON object",
      });
    });

    it("should reject a non-boolean strict flag", () => {
      expect(parseConfig({ strict: "yes" })).to.deep.equal({
        ok: false,
        error: "dnpeek.json: 'strict' must be a boolean",
      });
    });

    it("should reject search directories that are not strings", () => {
      expect(parseConfig({ searchDirectories: [1] })).to.deep.equal({
        ok: false,
        error: "dnpeek.json: 'searchDirectories' must be an array of strings",
      });
    });

    it("should name the section of an invalid setting", () => {
      expect(parseConfig({ typeSystem: { tupleTypes: 1 } })).to.deep.equal({
        ok: false,
        error: "dnpeek.json: typeSystem: 'tupleTypes' must be a boolean",
      });
    });
  });

  describe("resolveConfig", () => {
    it("should apply defaults to an empty configuration", () => {
      const result = resolveConfig({}, {});
      expect(result.searchDirectories).to.deep.equal([]);
      expect(result.strict).to.equal(false);
      expect(result.runtimePack).to.equal("Microsoft.NETCore.App");
      expect(result.typeSystemOptions).to.equal(TypeSystemOptions.Default);
      expect(result.decompilerSettings.decompileMemberBodies).to.equal(true);
      expect(result.verbose).to.equal(false);
      expect(result.quiet).to.equal(false);
    });

    it("should override config with CLI options", () => {
      const result = resolveConfig(
        { strict: false, runtimePack: "Microsoft.AspNetCore.App" },
        { strict: true, runtimePack: "Microsoft.WindowsDesktop.App", verbose: true }
      );
      expect(result.strict).to.equal(true);
      expect(result.runtimePack).to.equal("Microsoft.WindowsDesktop.App");
      expect(result.verbose).to.equal(true);
    });

    it("should place config directories before CLI directories", () => {
      const result = resolveConfig(
        { searchDirectories: ["lib", "/opt/shared"] },
        { lib: ["extra"] },
        "/work/project"
      );
      expect(result.searchDirectories).to.deep.equal([
        path.resolve("/work/project", "lib"),
        "/opt/shared",
        "extra",
      ]);
    });

    it("should map type system switches onto options", () => {
      const result = resolveConfig(
        { typeSystem: { dynamic: false, decimalConstants: false, onlyPublicApi: true, uncached: true } },
        {}
      );
      expect(result.typeSystemOptions).to.equal(
        TypeSystemOptions.Tuple |
          TypeSystemOptions.ExtensionMethods |
          TypeSystemOptions.OnlyPublicAPI |
          TypeSystemOptions.Uncached
      );
      expect(result.decompilerSettings.dynamic).to.equal(false);
      expect(result.decompilerSettings.decimalConstants).to.equal(false);
    });

    it("should carry decompiler switches into the settings", () => {
      const result = resolveConfig({ decompiler: { useDebugSymbols: false } }, {});
      expect(result.decompilerSettings.useDebugSymbols).to.equal(false);
      expect(result.decompilerSettings.decompileMemberBodies).to.equal(true);
    });
  });

  describe("loadConfig and findConfig", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it("should load a configuration file", () => {
      const configPath = writeFile(tempDir, "dnpeek.json", JSON.stringify({ strict: true }));
      expect(loadConfig(configPath)).to.deep.equal({
        ok: true,
        value: {
          searchDirectories: undefined,
          strict: true,
          runtimePack: undefined,
          typeSystem: undefined,
          decompiler: undefined,
        },
      });
    });

    it("should report a missing file", () => {
      const configPath = path.join(tempDir, "dnpeek.json");
      expect(loadConfig(configPath)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${configPath}`,
      });
    });

    it("should report invalid JSON", () => {
      const configPath = writeFile(tempDir, "dnpeek.json", "{ strict: ");
      const result = loadConfig(configPath);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.startsWith("Failed to parse dnpeek.json: ")).to.equal(true);
      }
    });

    it("should find the configuration in a parent directory", () => {
      const configPath = writeFile(tempDir, "dnpeek.json", "{}");
      writeFile(tempDir, "project/bin/App.json", "{}");
      expect(findConfig(path.join(tempDir, "project", "bin"))).to.equal(configPath);
    });
  });
});
