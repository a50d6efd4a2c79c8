/**
 * Tests for the type system assembler
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { ModuleMetadata, ModuleReference } from "../types/metadata.js";
import type { Result } from "../types/result.js";
import { createVersion } from "../metadata/version.js";
import { createModuleReference, referenceFullName } from "../metadata/module-reference.js";
import { namedType } from "../metadata/signatures.js";
import { moduleMetadata, typeMetadata } from "../testing/metadata.js";
import type { ResolvedModule, ResolveError } from "../resolver/types.js";
import { assembleTypeSystem, type ModuleResolver } from "./assembler.js";
import { REQUIRED_KNOWN_TYPES } from "./known-types.js";
import { TypeSystemOptions } from "./options.js";

type Outcome = Result<ResolvedModule | null, ResolveError>;

/** Resolver answering by reference name; unknown names are not found */
class FakeResolver implements ModuleResolver {
  readonly requests: string[] = [];

  constructor(private readonly outcomes: ReadonlyMap<string, Outcome>) {}

  resolve(reference: ModuleReference): Outcome {
    this.requests.push(referenceFullName(reference));
    return this.outcomes.get(reference.name) ?? { ok: true, value: null };
  }
}

const loaded = (filePath: string, metadata: ModuleMetadata): Outcome => ({
  ok: true,
  value: { filePath, metadata },
});

const ref = (name: string, version = "4.0.0.0"): ModuleReference => {
  const [major = 0, minor = 0, build = 0, revision = 0] = version.split(".").map(Number);
  return createModuleReference(name, createVersion(major, minor, build, revision));
};

const knownTypes = (skip: readonly string[] = []) =>
  REQUIRED_KNOWN_TYPES.filter((known) => !skip.includes(known.name)).map((known) =>
    typeMetadata({ namespace: known.namespace, name: known.name, kind: known.kind })
  );

const corlib = moduleMetadata({
  name: "System.Private.CoreLib",
  types: [...knownTypes(), typeMetadata({ namespace: "System", name: "ValueTuple`2", kind: "struct" })],
});

const root = (references: readonly ModuleReference[], extra: Partial<ModuleMetadata> = {}): ResolvedModule => ({
  filePath: "/fake/app/App.dll",
  metadata: moduleMetadata({ name: "App", references, ...extra }),
});

describe("assembleTypeSystem", () => {
  it("should put the main module first and resolved modules after it", () => {
    const resolver = new FakeResolver(
      new Map([
        ["System.Private.CoreLib", loaded("/fake/rt/System.Private.CoreLib.dll", corlib)],
        ["Lib", loaded("/fake/app/Lib.dll", moduleMetadata({ name: "Lib" }))],
      ])
    );
    const closure = assembleTypeSystem(
      root([ref("System.Private.CoreLib"), ref("Lib", "1.0.0.0")]),
      resolver
    );

    expect(closure.modules.map((m) => m.name)).to.deep.equal(["App", "System.Private.CoreLib", "Lib"]);
    expect(closure.mainModule.isMainModule).to.equal(true);
    expect(closure.diagnostics).to.deep.equal([]);
    expect(closure.options).to.equal(TypeSystemOptions.Default);
  });

  it("should apply the options to every module", () => {
    const resolver = new FakeResolver(
      new Map([["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", corlib)]])
    );
    const options = TypeSystemOptions.OnlyPublicAPI;
    const closure = assembleTypeSystem(root([ref("System.Private.CoreLib")]), resolver, options);
    expect(closure.modules.map((m) => m.options)).to.deep.equal([options, options]);
  });

  it("should resolve each reference full name once", () => {
    const resolver = new FakeResolver(
      new Map([["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", corlib)]])
    );
    assembleTypeSystem(
      root([ref("System.Private.CoreLib"), ref("System.Private.CoreLib")]),
      resolver
    );
    expect(resolver.requests).to.deep.equal([
      "System.Private.CoreLib, Version=4.0.0.0, Culture=neutral, PublicKeyToken=null",
    ]);
  });

  it("should follow forwarders and load a forwarding target once", () => {
    const facade = moduleMetadata({
      name: "System.Runtime",
      exportedTypes: [
        { namespace: "System", name: "Object", forwardedTo: ref("System.Private.CoreLib", "5.0.0.0") },
        { namespace: "System", name: "String", forwardedTo: ref("System.Private.CoreLib", "5.0.0.0") },
      ],
    });
    const resolver = new FakeResolver(
      new Map([
        ["System.Runtime", loaded("/fake/rt/System.Runtime.dll", facade)],
        ["System.Private.CoreLib", loaded("/fake/rt/System.Private.CoreLib.dll", corlib)],
      ])
    );
    const closure = assembleTypeSystem(
      root([ref("System.Runtime", "4.2.2.0"), ref("System.Private.CoreLib")]),
      resolver
    );

    expect(closure.modules.map((m) => m.name)).to.deep.equal([
      "App",
      "System.Runtime",
      "System.Private.CoreLib",
    ]);
    expect(resolver.requests).to.have.length(3);
    expect(closure.findTypeModule("System.String")?.name).to.equal("System.Private.CoreLib");
  });

  describe("modules reached through several forwarders", () => {
    const forwarding = (name: string, forwards: boolean) =>
      moduleMetadata({
        name,
        exportedTypes: forwards
          ? [{ namespace: "System", name: "Object", forwardedTo: ref("System.Private.CoreLib", "5.0.0.0") }]
          : [],
      });

    const assembleWith = (secondForwards: boolean) => {
      const resolver = new FakeResolver(
        new Map([
          ["System.Runtime", loaded("/fake/rt/System.Runtime.dll", forwarding("System.Runtime", true))],
          ["netstandard", loaded("/fake/rt/netstandard.dll", forwarding("netstandard", secondForwards))],
          ["System.Private.CoreLib", loaded("/fake/rt/System.Private.CoreLib.dll", corlib)],
        ])
      );
      const closure = assembleTypeSystem(
        root([ref("System.Runtime", "4.2.2.0"), ref("netstandard", "2.1.0.0")]),
        resolver
      );
      return { closure, resolver };
    };

    it("should load the shared target once", () => {
      const { closure, resolver } = assembleWith(true);
      expect(closure.modules.map((m) => m.name)).to.deep.equal([
        "App",
        "System.Runtime",
        "netstandard",
        "System.Private.CoreLib",
      ]);
      expect(
        resolver.requests.filter((request) => request.startsWith("System.Private.CoreLib,"))
      ).to.have.length(1);
    });

    it("should keep the same modules when one forwarding edge is removed", () => {
      const both = assembleWith(true).closure.modules.map((m) => m.filePath);
      const one = assembleWith(false).closure.modules.map((m) => m.filePath);
      expect(one).to.deep.equal(both);
    });
  });

  it("should not load the main module a second time", () => {
    const resolver = new FakeResolver(
      new Map([
        ["App", loaded("/fake/app/App.dll", moduleMetadata({ name: "App" }))],
        ["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", corlib)],
      ])
    );
    const closure = assembleTypeSystem(root([ref("App"), ref("System.Private.CoreLib")]), resolver);
    expect(closure.modules.map((m) => m.name)).to.deep.equal(["App", "System.Private.CoreLib"]);
  });

  it("should not follow references of resolved modules", () => {
    const lib = moduleMetadata({ name: "Lib", references: [ref("Transitive")] });
    const resolver = new FakeResolver(
      new Map([
        ["Lib", loaded("/fake/app/Lib.dll", lib)],
        ["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", corlib)],
      ])
    );
    assembleTypeSystem(root([ref("Lib"), ref("System.Private.CoreLib")]), resolver);
    expect(resolver.requests.some((request) => request.startsWith("Transitive"))).to.equal(false);
  });

  it("should drop unresolved references with a warning", () => {
    const resolver = new FakeResolver(
      new Map([["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", corlib)]])
    );
    const closure = assembleTypeSystem(
      root([ref("Missing", "2.0.0.0"), ref("System.Private.CoreLib")]),
      resolver
    );

    expect(closure.modules).to.have.length(2);
    expect(closure.diagnostics).to.deep.equal([
      {
        code: "DNP3001",
        severity: "warning",
        message:
          "Referenced module dropped from the type system: Missing, Version=2.0.0.0, Culture=neutral, PublicKeyToken=null",
        hint: "Module could not be located",
      },
    ]);
  });

  it("should drop references whose resolution failed", () => {
    const resolver = new FakeResolver(
      new Map<string, Outcome>([
        ["mscorlib", { ok: false, error: { kind: "unsupportedRuntimeVersion", version: createVersion(9, 0, 0, 0) } }],
        ["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", corlib)],
      ])
    );
    const closure = assembleTypeSystem(
      root([ref("mscorlib", "9.0.0.0"), ref("System.Private.CoreLib")]),
      resolver
    );
    expect(closure.diagnostics.map((d) => [d.code, d.hint])).to.deep.equal([
      ["DNP3001", "Version not supported: 9.0.0.0"],
    ]);
  });

  describe("well-known types", () => {
    it("should add a fallback corlib with exactly the missing types", () => {
      const partial = moduleMetadata({
        name: "System.Private.CoreLib",
        types: knownTypes(["Decimal", "Type"]),
      });
      const resolver = new FakeResolver(
        new Map([["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", partial)]])
      );
      const closure = assembleTypeSystem(root([ref("System.Private.CoreLib")]), resolver);

      const fallback = closure.modules[2];
      expect(closure.modules).to.have.length(3);
      expect(fallback?.name).to.equal("mscorlib");
      expect(fallback?.isSynthetic).to.equal(true);
      expect(fallback?.typeDefinitions.map((t) => t.fullName)).to.deep.equal([
        "System.Decimal",
        "System.Type",
      ]);
      expect(fallback?.findTypeDefinition("System.Decimal")?.isValueType).to.equal(true);
      expect(closure.diagnostics).to.deep.equal([
        {
          code: "DNP3002",
          severity: "warning",
          message: "Missing well-known types replaced by stubs: System.Decimal, System.Type",
        },
      ]);
    });

    it("should stub every well-known type when no corlib resolves", () => {
      const closure = assembleTypeSystem(root([]), new FakeResolver(new Map()));
      expect(closure.modules[1]?.typeDefinitions).to.have.length(REQUIRED_KNOWN_TYPES.length);
      expect(closure.findType("System.Object")?.baseType).to.equal(undefined);
      expect(closure.findType("System.Int32")?.baseType).to.deep.equal(namedType("System", "ValueType"));
    });

    it("should count types hidden by OnlyPublicAPI as present", () => {
      const internalCorlib = moduleMetadata({
        name: "System.Private.CoreLib",
        types: [
          ...knownTypes(["Void"]),
          typeMetadata({ namespace: "System", name: "Void", kind: "struct", accessibility: "internal" }),
        ],
      });
      const resolver = new FakeResolver(
        new Map([["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", internalCorlib)]])
      );
      const closure = assembleTypeSystem(
        root([ref("System.Private.CoreLib")]),
        resolver,
        TypeSystemOptions.OnlyPublicAPI
      );
      expect(closure.modules).to.have.length(2);
    });
  });

  describe("lookups", () => {
    const app = root([ref("System.Private.CoreLib")], {
      internalsVisibleTo: ["App.Tests"],
      types: [typeMetadata({ namespace: "App", name: "Program" })],
    });
    const build = () =>
      assembleTypeSystem(
        app,
        new FakeResolver(new Map([["System.Private.CoreLib", loaded("/fake/rt/corlib.dll", corlib)]]))
      );

    it("should find types across modules", () => {
      const closure = build();
      expect(closure.findType("App.Program")?.moduleName).to.equal("App");
      expect(closure.findType("System.String")?.moduleName).to.equal("System.Private.CoreLib");
      expect(closure.findType("System.Missing")).to.equal(undefined);
    });

    it("should find modules by matching reference", () => {
      const closure = build();
      expect(closure.findModule(ref("system.private.corelib", "0.0.0.0"))?.name).to.equal(
        "System.Private.CoreLib"
      );
      expect(closure.findModule(ref("Other"))).to.equal(undefined);
    });

    it("should resolve signatures to definitions", () => {
      const closure = build();
      const int32 = namedType("System", "Int32");
      expect(
        closure.resolveTypeDefinition({ kind: "modified", modifier: "System.Runtime.CompilerServices.IsVolatile", isRequired: true, elementType: int32 })?.fullName
      ).to.equal("System.Int32");
      expect(
        closure.resolveTypeDefinition({ kind: "tuple", elements: [{ type: int32 }, { type: int32 }] })?.fullName
      ).to.equal("System.ValueTuple`2");
      expect(closure.resolveTypeDefinition({ kind: "dynamic" })?.fullName).to.equal("System.Object");
      expect(closure.resolveTypeDefinition({ kind: "byRef", elementType: int32 })).to.equal(undefined);
    });

    it("should report friend modules", () => {
      const closure = build();
      const [main, core] = closure.modules;
      expect(main && core && closure.isFriendModule(core, main)).to.equal(false);
      expect(main && closure.isFriendModule(main, main)).to.equal(true);
    });
  });
});
