/**
 * Type syntax from metadata type signatures
 */

import { qualifiedName, type TypeSignature } from "@dnpeek/frontend";
import type { TypeSyntax } from "./types.js";

const PREDEFINED_TYPES: ReadonlyMap<string, string> = new Map([
  ["System.Void", "void"],
  ["System.Boolean", "bool"],
  ["System.Char", "char"],
  ["System.SByte", "sbyte"],
  ["System.Byte", "byte"],
  ["System.Int16", "short"],
  ["System.UInt16", "ushort"],
  ["System.Int32", "int"],
  ["System.UInt32", "uint"],
  ["System.Int64", "long"],
  ["System.UInt64", "ulong"],
  ["System.Single", "float"],
  ["System.Double", "double"],
  ["System.Decimal", "decimal"],
  ["System.String", "string"],
  ["System.Object", "object"],
]);

export const predefinedType = (keyword: string): TypeSyntax => ({
  kind: "predefinedType",
  keyword,
});

/** Drop the arity suffix of a generic type name: "List`1" -> "List" */
export const stripArity = (name: string): string => {
  const tick = name.indexOf("`");
  return tick >= 0 ? name.slice(0, tick) : name;
};

const genericParameterName = (owner: "type" | "method", index: number): string =>
  owner === "type" ? `T${index}` : `TM${index}`;

export const typeSyntaxFromSignature = (signature: TypeSignature): TypeSyntax => {
  switch (signature.kind) {
    case "named": {
      const fullName = qualifiedName(signature.namespace, signature.name);
      const keyword = PREDEFINED_TYPES.get(fullName);
      if (keyword && !signature.typeArguments?.length) {
        return predefinedType(keyword);
      }
      const name = qualifiedName(signature.namespace, stripArity(signature.name));
      const typeArguments = signature.typeArguments?.map(typeSyntaxFromSignature);
      return typeArguments && typeArguments.length > 0
        ? { kind: "identifierType", name, typeArguments }
        : { kind: "identifierType", name };
    }
    case "genericParameter":
      return {
        kind: "identifierType",
        name: signature.name ?? genericParameterName(signature.owner, signature.index),
      };
    case "byRef":
      return { kind: "refType", elementType: typeSyntaxFromSignature(signature.elementType) };
    case "array":
      return {
        kind: "arrayType",
        elementType: typeSyntaxFromSignature(signature.elementType),
        rank: signature.rank,
      };
    case "pointer":
      return { kind: "pointerType", elementType: typeSyntaxFromSignature(signature.elementType) };
    case "pinned":
    case "modified":
      return typeSyntaxFromSignature(signature.elementType);
    case "dynamic":
      return predefinedType("dynamic");
    case "tuple":
      return {
        kind: "tupleType",
        elements: signature.elements.map((element) =>
          element.name
            ? { type: typeSyntaxFromSignature(element.type), name: element.name }
            : { type: typeSyntaxFromSignature(element.type) }
        ),
      };
  }
};
