/**
 * Tests for the stubs command
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { createTempDir, removeTempDir, writeModuleImage } from "@dnpeek/frontend/testing";
import { resolveConfig } from "../config.js";
import { stubsCommand } from "./stubs.js";

describe("stubsCommand", () => {
  let tempDir: string;
  let modulePath: string;

  beforeEach(() => {
    tempDir = createTempDir();
    modulePath = writeModuleImage(tempDir, "Gauges.dll", {
      name: "Gauges",
      version: "1.0.0.0",
      types: [
        {
          namespace: "Contoso",
          name: "Gauge",
          methods: [{ name: "Read", returnType: "System.Int32" }],
        },
        { namespace: "Contoso", name: "Dial", kind: "interface" },
      ],
    });
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it("should print stubs for every type", () => {
    const result = stubsCommand(modulePath, resolveConfig({}, {}));

    expect(result.ok && result.value.lines).to.deep.equal([
      "// Gauges",
      "",
      "namespace Contoso",
      "{",
      "    public class Gauge",
      "    {",
      "        public int Read()",
      "        {",
      "            return default(int);",
      "        }",
      "    }",
      "",
      "    public interface Dial",
      "    {",
      "    }",
      "}",
    ]);
  });

  it("should print a single type", () => {
    const result = stubsCommand(modulePath, resolveConfig({}, {}), "Contoso.Dial");

    expect(result.ok && result.value.lines).to.deep.equal([
      "// Gauges",
      "",
      "namespace Contoso",
      "{",
      "    public interface Dial",
      "    {",
      "    }",
      "}",
    ]);
  });

  it("should fail for an unknown type", () => {
    const result = stubsCommand(modulePath, resolveConfig({}, {}), "Contoso.Missing");

    expect(result).to.deep.equal({
      ok: false,
      error: { kind: "failed", message: "Type not found: Contoso.Missing" },
    });
  });
});
