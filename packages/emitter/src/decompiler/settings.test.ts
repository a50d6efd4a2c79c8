/**
 * Tests for decompiler settings
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { cloneSettings, defaultDecompilerSettings, windowsFormsSettings } from "./settings.js";

describe("decompiler settings", () => {
  it("should apply overrides to a copy", () => {
    const clone = cloneSettings(defaultDecompilerSettings, { decompileMemberBodies: false });
    expect(clone.decompileMemberBodies).to.equal(false);
    expect(defaultDecompilerSettings.decompileMemberBodies).to.equal(true);
    expect(clone).to.not.equal(defaultDecompilerSettings);
  });

  it("should switch designer-readable output on for forms code", () => {
    const settings = windowsFormsSettings(defaultDecompilerSettings);
    expect(settings.useImplicitMethodGroupConversion).to.equal(false);
    expect(settings.usingDeclarations).to.equal(false);
    expect(settings.namedArguments).to.equal(false);
    expect(settings.alwaysCastTargetsOfExplicitInterfaceImplementationCalls).to.equal(true);
    expect(settings.alwaysQualifyMemberReferences).to.equal(true);
    expect(settings.decompileMemberBodies).to.equal(true);
  });
});
