/**
 * Tests for runtime personality detection
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { detectRuntimePersonality, findSharedRuntimeDirectory } from "./runtime-personality.js";
import { createVersion } from "../metadata/version.js";
import { createTempDir, removeTempDir } from "../testing/module-images.js";

describe("Runtime personality", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it("should detect a dotnet shared runtime from DOTNET_ROOT", () => {
    for (const version of ["6.0.25", "8.0.1"]) {
      fs.mkdirSync(path.join(tempDir, "shared", "Microsoft.NETCore.App", version), { recursive: true });
    }

    const personality = detectRuntimePersonality({
      env: { DOTNET_ROOT: tempDir, MONO_GAC_PREFIX: "/opt/mono" },
      platform: "linux",
      arch: "x64",
      homeDirectory: "/home/tester",
    });

    expect(personality.flavor).to.equal("netCoreApp");
    expect(personality.baseLibraryDirectory).to.equal(
      path.join(tempDir, "shared", "Microsoft.NETCore.App", "8.0.1")
    );
    expect(personality.corlibVersion).to.deep.equal(createVersion(8, 0, 0, 0));
    expect(personality.is64BitOperatingSystem).to.equal(true);
    expect(personality.nugetPackagesDirectory).to.equal(path.join("/home/tester", ".nuget", "packages"));
    expect(personality.monoGacPrefix).to.equal("/opt/mono");
    expect(personality.windowsDirectory).to.equal(undefined);
  });

  it("should honour NUGET_PACKAGES", () => {
    const personality = detectRuntimePersonality({
      env: { DOTNET_ROOT: tempDir, NUGET_PACKAGES: "/cache/nuget" },
      platform: "linux",
      arch: "arm",
      homeDirectory: tempDir,
    });

    expect(personality.nugetPackagesDirectory).to.equal("/cache/nuget");
    expect(personality.is64BitOperatingSystem).to.equal(false);
  });

  it("should fall back to .NET Framework on Windows", () => {
    const personality = detectRuntimePersonality({
      env: { windir: path.join(tempDir, "Windows"), PROCESSOR_ARCHITEW6432: "AMD64" },
      platform: "win32",
      arch: "ia32",
      homeDirectory: tempDir,
    });

    expect(personality.flavor).to.equal("netFramework");
    expect(personality.baseLibraryDirectory).to.equal(undefined);
    expect(personality.is64BitOperatingSystem).to.equal(true);
    expect(personality.systemDirectory).to.equal(path.join(tempDir, "Windows", "System32"));
  });

  it("should find no shared runtime in an empty root", () => {
    expect(findSharedRuntimeDirectory(tempDir)).to.equal(undefined);
  });
});
