/**
 * Tests for type syntax built from signatures
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { namedType } from "@dnpeek/frontend";
import { printType } from "./printer.js";
import { predefinedType, stripArity, typeSyntaxFromSignature } from "./type-factories.js";

const int32 = namedType("System", "Int32");

describe("typeSyntaxFromSignature", () => {
  it("should map core types to keywords", () => {
    expect(typeSyntaxFromSignature(int32)).to.deep.equal(predefinedType("int"));
    expect(typeSyntaxFromSignature(namedType("System", "Object"))).to.deep.equal(
      predefinedType("object")
    );
  });

  it("should strip the arity suffix and keep the namespace", () => {
    const list = namedType("System.Collections.Generic", "List`1", [namedType("System", "String")]);
    expect(typeSyntaxFromSignature(list)).to.deep.equal({
      kind: "identifierType",
      name: "System.Collections.Generic.List",
      typeArguments: [predefinedType("string")],
    });
  });

  it("should name unresolved generic parameters by owner and position", () => {
    expect(printType(typeSyntaxFromSignature({ kind: "genericParameter", owner: "type", index: 1 }))).to.equal("T1");
    expect(printType(typeSyntaxFromSignature({ kind: "genericParameter", owner: "method", index: 0 }))).to.equal("TM0");
    expect(
      printType(typeSyntaxFromSignature({ kind: "genericParameter", owner: "type", index: 0, name: "TKey" }))
    ).to.equal("TKey");
  });

  it("should drop pinned and modifier wrappers", () => {
    const modified = {
      kind: "modified",
      modifier: "System.Runtime.CompilerServices.IsVolatile",
      isRequired: true,
      elementType: { kind: "pinned", elementType: int32 },
    } as const;
    expect(typeSyntaxFromSignature(modified)).to.deep.equal(predefinedType("int"));
  });

  it("should print by-ref, pointer, dynamic and tuple types", () => {
    expect(printType(typeSyntaxFromSignature({ kind: "byRef", elementType: int32 }))).to.equal("ref int");
    expect(printType(typeSyntaxFromSignature({ kind: "pointer", elementType: int32 }))).to.equal("int*");
    expect(printType(typeSyntaxFromSignature({ kind: "dynamic" }))).to.equal("dynamic");
    expect(
      printType(
        typeSyntaxFromSignature({
          kind: "tuple",
          elements: [{ type: int32, name: "count" }, { type: namedType("System", "String") }],
        })
      )
    ).to.equal("(int count, string)");
  });
});

describe("stripArity", () => {
  it("should leave non-generic names alone", () => {
    expect(stripArity("Dictionary`2")).to.equal("Dictionary");
    expect(stripArity("Widget")).to.equal("Widget");
  });
});
