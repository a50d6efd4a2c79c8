/**
 * Decoding of the compiler attributes that change how a signature reads:
 * `dynamic`, tuple element names and decimal constants.
 */

import type {
  AttributeArgument,
  AttributeData,
  TypeSignature,
  TupleElement,
} from "../types/metadata.js";
import { isNamedType } from "../metadata/signatures.js";

export const DYNAMIC_ATTRIBUTE = "System.Runtime.CompilerServices.DynamicAttribute";
export const TUPLE_ELEMENT_NAMES_ATTRIBUTE = "System.Runtime.CompilerServices.TupleElementNamesAttribute";
export const EXTENSION_ATTRIBUTE = "System.Runtime.CompilerServices.ExtensionAttribute";
export const DECIMAL_CONSTANT_ATTRIBUTE = "System.Runtime.CompilerServices.DecimalConstantAttribute";

export const findAttribute = (
  attributes: readonly AttributeData[],
  type: string
): AttributeData | undefined => attributes.find((attribute) => attribute.type === type);

export const hasAttribute = (attributes: readonly AttributeData[], type: string): boolean =>
  findAttribute(attributes, type) !== undefined;

/** Attributes minus those whose type is in `removed` */
export const withoutAttributes = (
  attributes: readonly AttributeData[],
  removed: ReadonlySet<string>
): readonly AttributeData[] =>
  removed.size === 0 ? attributes : attributes.filter((attribute) => !removed.has(attribute.type));

const argumentList = (
  argument: AttributeArgument | undefined
): readonly (string | boolean | null)[] | undefined => {
  if (argument === undefined || argument === null || typeof argument !== "object") {
    return undefined;
  }
  const values: readonly (string | boolean | null)[] = argument;
  return values;
};

/**
 * Transform flags of a DynamicAttribute; the parameterless form marks only
 * the outermost type.
 */
const dynamicFlags = (attributes: readonly AttributeData[]): readonly boolean[] | undefined => {
  const attribute = findAttribute(attributes, DYNAMIC_ATTRIBUTE);
  if (!attribute) return undefined;
  const flags = argumentList(attribute.arguments?.[0]);
  return flags ? flags.map((flag) => flag === true) : [true];
};

const tupleElementNames = (
  attributes: readonly AttributeData[]
): readonly (string | null)[] => {
  const names = argumentList(
    findAttribute(attributes, TUPLE_ELEMENT_NAMES_ATTRIBUTE)?.arguments?.[0]
  );
  return names ? names.map((name) => (typeof name === "string" ? name : null)) : [];
};

const tupleArity = (signature: TypeSignature): number | undefined => {
  if (signature.kind !== "named" || signature.namespace !== "System") return undefined;
  const match = /^ValueTuple`([1-7])$/.exec(signature.name);
  const arity = match ? Number.parseInt(match[1] ?? "0", 10) : undefined;
  return arity !== undefined && signature.typeArguments?.length === arity ? arity : undefined;
};

export type AttributeTypeOptions = {
  readonly dynamic: boolean;
  readonly tuples: boolean;
};

/**
 * Apply DynamicAttribute and TupleElementNamesAttribute to a signature.
 * Both attributes index the type's nodes in pre-order; by-ref, pinned and
 * modifier wrappers do not take an index.
 */
export const applyAttributeTypes = (
  signature: TypeSignature,
  attributes: readonly AttributeData[],
  options: AttributeTypeOptions
): TypeSignature => {
  const flags = options.dynamic ? dynamicFlags(attributes) : undefined;
  const names = options.tuples ? tupleElementNames(attributes) : [];
  let dynamicIndex = 0;
  let nameIndex = 0;

  const visit = (node: TypeSignature): TypeSignature => {
    switch (node.kind) {
      case "byRef":
        return { kind: "byRef", elementType: visit(node.elementType) };
      case "pinned":
        return { kind: "pinned", elementType: visit(node.elementType) };
      case "modified":
        return { ...node, elementType: visit(node.elementType) };
      case "array":
        dynamicIndex++;
        return { ...node, elementType: visit(node.elementType) };
      case "pointer":
        dynamicIndex++;
        return { kind: "pointer", elementType: visit(node.elementType) };
      case "named": {
        const index = dynamicIndex++;
        if (flags?.[index] === true && isNamedType(node, "System", "Object")) {
          return { kind: "dynamic" };
        }

        const arity = options.tuples ? tupleArity(node) : undefined;
        const typeArguments = node.typeArguments ?? [];
        if (arity !== undefined) {
          const elementNames = names.slice(nameIndex, nameIndex + arity);
          nameIndex += arity;
          const elements: TupleElement[] = typeArguments.map((argument, i) => {
            const type = visit(argument);
            const name = elementNames[i];
            return name ? { type, name } : { type };
          });
          return { kind: "tuple", elements };
        }

        return typeArguments.length > 0
          ? { ...node, typeArguments: typeArguments.map(visit) }
          : node;
      }
      case "genericParameter":
      case "dynamic":
      case "tuple":
        dynamicIndex++;
        return node;
    }
  };

  return visit(signature);
};

/**
 * Value of a DecimalConstantAttribute(scale, sign, hi, mid, lo) as decimal
 * literal text, e.g. "-12.50".
 */
export const decimalConstantValue = (
  attributes: readonly AttributeData[]
): string | undefined => {
  const args = findAttribute(attributes, DECIMAL_CONSTANT_ATTRIBUTE)?.arguments;
  if (!args || args.length !== 5) return undefined;

  const numbers: number[] = [];
  for (const arg of args) {
    if (typeof arg !== "number" || !Number.isInteger(arg) || arg < 0) return undefined;
    numbers.push(arg);
  }
  const [scale = 0, sign = 0, hi = 0, mid = 0, lo = 0] = numbers;
  if (scale > 28) return undefined;

  const magnitude = (BigInt(hi) << 64n) | (BigInt(mid) << 32n) | BigInt(lo);
  const digits = magnitude.toString().padStart(scale + 1, "0");
  const text = scale > 0 ? `${digits.slice(0, -scale)}.${digits.slice(-scale)}` : digits;
  return sign !== 0 && magnitude !== 0n ? `-${text}` : text;
};
