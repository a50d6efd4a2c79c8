/**
 * Tests for base constructor selection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { namedType, type TypeSignature } from "@dnpeek/frontend";
import {
  methodMetadata,
  moduleMetadata,
  parameterMetadata,
  typeMetadata,
} from "@dnpeek/frontend/testing";
import type { MethodMetadata, ModuleMetadata, TypeMetadata } from "@dnpeek/frontend";
import { closureOf, handleOf } from "../testing/type-systems.js";
import { accessRank, selectBaseConstructor } from "./base-constructor.js";

const int32 = namedType("System", "Int32");
const string = namedType("System", "String");

const ctor = (
  access: MethodMetadata["access"],
  parameters: readonly { readonly name: string; readonly type: TypeSignature; readonly mode?: "ref" }[] = []
): MethodMetadata =>
  methodMetadata({
    name: ".ctor",
    access,
    parameters: parameters.map((p) => parameterMetadata(p)),
  });

const library = (types: readonly TypeMetadata[], internalsVisibleTo: readonly string[] = []): ModuleMetadata =>
  moduleMetadata({ name: "Lib", types, internalsVisibleTo });

const derived = (baseType: TypeSignature): ModuleMetadata =>
  moduleMetadata({
    name: "App",
    types: [
      typeMetadata({
        namespace: "App",
        name: "Gadget",
        baseType,
        methods: [methodMetadata({ name: ".ctor", hasBody: false })],
      }),
    ],
  });

const choose = (lib: ModuleMetadata, baseType: TypeSignature = namedType("Lib", "Widget")) => {
  const typeSystem = closureOf(derived(baseType), [lib]);
  const handle = handleOf(typeSystem, "App.Gadget", ".ctor");
  return selectBaseConstructor(handle.declaringType, typeSystem, handle.module);
};

const widget = (methods: readonly MethodMetadata[]): TypeMetadata =>
  typeMetadata({ namespace: "Lib", name: "Widget", methods });

const internalInt = ctor("assembly", [{ name: "size", type: int32 }]);
const publicRefInt = ctor("public", [{ name: "size", type: { kind: "byRef", elementType: int32 }, mode: "ref" }]);
const publicEmpty = ctor("public");

describe("selectBaseConstructor", () => {
  it("should prefer the public parameterless constructor over internal and by-ref ones", () => {
    const choice = choose(library([widget([internalInt, publicRefInt, publicEmpty])]));
    expect(choice?.constructor.access).to.equal("public");
    expect(choice?.constructor.parameters).to.deep.equal([]);
    expect(choice?.baseType.fullName).to.equal("Lib.Widget");
  });

  it("should not depend on declaration order", () => {
    const choice = choose(library([widget([publicEmpty, publicRefInt, internalInt])]));
    expect(choice?.constructor.parameters).to.deep.equal([]);
  });

  it("should rank internal constructors as accessible from a friend module", () => {
    const types = [widget([ctor("public", [{ name: "size", type: int32 }]), ctor("assembly")])];
    expect(choose(library(types))?.constructor.access).to.equal("public");
    expect(choose(library(types, ["App, PublicKey=0024"]))?.constructor.access).to.equal("assembly");
  });

  it("should keep declaration order on ties", () => {
    const choice = choose(
      library([widget([ctor("public", [{ name: "size", type: int32 }]), ctor("public", [{ name: "name", type: string }])])])
    );
    expect(choice?.parameterTypes).to.deep.equal([int32]);
  });

  it("should rank private above private scope", () => {
    const choice = choose(library([widget([ctor("privateScope"), ctor("private", [{ name: "size", type: int32 }])])]));
    expect(choice?.constructor.access).to.equal("private");
  });

  it("should substitute the base type's generic arguments", () => {
    const box = typeMetadata({
      namespace: "Lib",
      name: "Box`1",
      genericParameters: ["T"],
      methods: [ctor("public", [{ name: "value", type: { kind: "genericParameter", owner: "type", index: 0 } }])],
    });
    const choice = choose(library([box]), namedType("Lib", "Box`1", [int32]));
    expect(choice?.parameterTypes).to.deep.equal([int32]);
  });

  it("should skip static constructors and unresolved base types", () => {
    const onlyStatic = widget([methodMetadata({ name: ".ctor", isStatic: true })]);
    expect(choose(library([onlyStatic]))).to.equal(undefined);
    expect(choose(library([]), namedType("Missing", "Base"))).to.equal(undefined);
  });
});

describe("accessRank", () => {
  it("should rank assembly access by friendship", () => {
    expect(accessRank("familyOrAssembly", false)).to.equal(0);
    expect(accessRank("assembly", true)).to.equal(0);
    expect(accessRank("familyAndAssembly", false)).to.equal(1);
    expect(accessRank("private", true)).to.equal(2);
    expect(accessRank("privateScope", true)).to.equal(3);
  });
});
