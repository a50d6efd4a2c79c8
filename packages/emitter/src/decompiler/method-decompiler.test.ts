/**
 * Tests for the batch method decompiler
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { namedType } from "@dnpeek/frontend";
import { methodMetadata, moduleMetadata, typeMetadata } from "@dnpeek/frontend/testing";
import { printMember } from "../syntax/printer.js";
import {
  closureOf,
  FakeReader,
  FakeStatementBuilder,
  handleOf,
  recordingTransform,
} from "../testing/type-systems.js";
import type { TransformContext } from "./collaborators.js";
import { OperationCanceledError } from "./errors.js";
import { MethodDecompiler, type MethodDecompilerOptions } from "./method-decompiler.js";

const typeSystem = closureOf(
  moduleMetadata({
    name: "App",
    types: [
      typeMetadata({
        namespace: "App",
        name: "Worker",
        methods: [
          methodMetadata({ name: "Run" }),
          methodMetadata({ name: "Native", hasBody: false, returnType: namedType("System", "Int32") }),
          methodMetadata({ name: "Shape", isAbstract: true, hasBody: false }),
          methodMetadata({ name: "Broken" }),
        ],
      }),
      typeMetadata({
        namespace: "App",
        name: "Orphan",
        baseType: namedType("Missing", "Base"),
        methods: [methodMetadata({ name: ".ctor", hasBody: false })],
      }),
    ],
  })
);

const handles = ["Run", "Native", "Shape", "Broken"].map((name) => handleOf(typeSystem, "App.Worker", name));

const failOnBroken = recordingTransform("fail-on-broken", [], (fn) => {
  if (fn.method.method.name === "Broken") throw new Error("boom");
});

const decompilerWith = (overrides: Partial<MethodDecompilerOptions> = {}): MethodDecompiler =>
  new MethodDecompiler({
    typeSystem,
    reader: new FakeReader(),
    transforms: [failOnBroken],
    statementBuilder: new FakeStatementBuilder(),
    ...overrides,
  });

describe("MethodDecompiler", () => {
  it("should choose body decompilation or a stub per method and keep going after a failure", () => {
    const results = decompilerWith().decompileMethods(handles);
    expect(results.map((r) => r.kind)).to.deep.equal(["body", "emptyBody", "declaration", "failed"]);
  });

  it("should synthesize a stub for a method without a body", () => {
    const [, native] = decompilerWith().decompileMethods(handles);
    expect(native?.kind).to.equal("emptyBody");
    if (native?.kind !== "emptyBody") return;
    expect(printMember(native.declaration, "")).to.equal("public int Native()\n{\n    return default(int);\n}");
  });

  it("should leave abstract methods without a body", () => {
    const result = decompilerWith().decompileMethod(handleOf(typeSystem, "App.Worker", "Shape"));
    expect(result.kind).to.equal("declaration");
    if (result.kind !== "declaration") return;
    expect(printMember(result.declaration, "")).to.equal("public abstract void Shape();");
  });

  it("should report a failing method with a diagnostic", () => {
    const result = decompilerWith().decompileMethod(handleOf(typeSystem, "App.Worker", "Broken"));
    expect(result.kind).to.equal("failed");
    expect(result.diagnostics).to.deep.equal([
      {
        code: "DNP6001",
        severity: "error",
        message: "Error decompiling App.Worker.Broken: boom",
        location: { file: "/fake/App.dll" },
        hint: undefined,
      },
    ]);
  });

  it("should pass stub diagnostics through", () => {
    const result = decompilerWith().decompileMethod(handleOf(typeSystem, "App.Orphan", ".ctor"));
    expect(result.diagnostics.map((d) => d.code)).to.deep.equal(["DNP6002"]);
  });

  it("should stop the batch on cancellation", () => {
    const controller = new AbortController();
    controller.abort("stopped");
    const decompiler = decompilerWith({ signal: controller.signal });
    expect(() => decompiler.decompileMethods(handles)).to.throw(OperationCanceledError, "stopped");
  });

  it("should stop the batch when a transform aborts mid-pipeline", () => {
    const controller = new AbortController();
    const log: string[] = [];
    const decompiler = decompilerWith({
      signal: controller.signal,
      transforms: [
        recordingTransform("aborting", log, (_fn, context) => {
          controller.abort("stopped");
          context.signal?.throwIfAborted();
        }),
      ],
    });
    expect(() => decompiler.decompileMethods(handles)).to.throw(OperationCanceledError, "stopped");
    expect(log).to.deep.equal(["aborting"]);
  });

  it("should share one run across the batch", () => {
    const seen: TransformContext[] = [];
    const decompiler = decompilerWith({
      transforms: [recordingTransform("capture", [], (_fn, context) => seen.push(context))],
    });
    decompiler.decompileMethods(handles);
    expect(seen).to.have.length(2);
    expect(seen.every((context) => context.run === decompiler.run)).to.equal(true);
  });
});
