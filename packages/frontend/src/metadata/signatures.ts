/**
 * Type signature helpers
 */

import type {
  NamedTypeSignature,
  TypeSignature,
} from "../types/metadata.js";

export const namedType = (
  namespace: string,
  name: string,
  typeArguments?: readonly TypeSignature[],
  isValueType?: boolean
): NamedTypeSignature => ({
  kind: "named",
  namespace,
  name,
  typeArguments,
  isValueType,
});

export const qualifiedName = (namespace: string, name: string): string =>
  namespace.length > 0 ? `${namespace}.${name}` : name;

export const isNamedType = (
  signature: TypeSignature,
  namespace: string,
  name: string
): signature is NamedTypeSignature =>
  signature.kind === "named" &&
  signature.namespace === namespace &&
  signature.name === name;

export const isVoidType = (signature: TypeSignature): boolean =>
  isNamedType(signature, "System", "Void");

/** Strip pinned and custom-modifier wrappers */
export const removePinnedAndModifiers = (
  signature: TypeSignature
): TypeSignature => {
  let current = signature;
  while (current.kind === "pinned" || current.kind === "modified") {
    current = current.elementType;
  }
  return current;
};

/**
 * Parse the textual signature shorthand used by module images:
 * `Namespace.Name`, `!0` / `!!0` for type / method generic parameters,
 * with `&`, `*`, `[]` and `[,]` suffixes.
 */
export const parseSignatureText = (text: string): TypeSignature | undefined => {
  const trimmed = text.trim();
  if (trimmed.length === 0) return undefined;

  if (trimmed.endsWith("&")) {
    const element = parseSignatureText(trimmed.slice(0, -1));
    return element && { kind: "byRef", elementType: element };
  }
  if (trimmed.endsWith("*")) {
    const element = parseSignatureText(trimmed.slice(0, -1));
    return element && { kind: "pointer", elementType: element };
  }
  const arrayMatch = /\[(,*)\]$/.exec(trimmed);
  if (arrayMatch) {
    const element = parseSignatureText(trimmed.slice(0, arrayMatch.index));
    const commas = arrayMatch[1] ?? "";
    return (
      element && { kind: "array", elementType: element, rank: commas.length + 1 }
    );
  }

  const genericMatch = /^(!!?)(\d+)$/.exec(trimmed);
  if (genericMatch) {
    return {
      kind: "genericParameter",
      owner: genericMatch[1] === "!!" ? "method" : "type",
      index: Number.parseInt(genericMatch[2] ?? "0", 10),
    };
  }

  if (!/^[A-Za-z_`0-9.+]+$/.test(trimmed)) return undefined;
  const lastDot = trimmed.lastIndexOf(".");
  return lastDot < 0
    ? namedType("", trimmed)
    : namedType(trimmed.slice(0, lastDot), trimmed.slice(lastDot + 1));
};

/** Display form of a signature, used in diagnostics and logs */
export const formatSignature = (signature: TypeSignature): string => {
  switch (signature.kind) {
    case "named": {
      const base = qualifiedName(signature.namespace, signature.name);
      const args = signature.typeArguments ?? [];
      return args.length > 0
        ? `${base}<${args.map(formatSignature).join(", ")}>`
        : base;
    }
    case "genericParameter":
      return (
        signature.name ??
        `${signature.owner === "method" ? "!!" : "!"}${signature.index}`
      );
    case "byRef":
      return `${formatSignature(signature.elementType)}&`;
    case "array":
      return `${formatSignature(signature.elementType)}[${",".repeat(signature.rank - 1)}]`;
    case "pointer":
      return `${formatSignature(signature.elementType)}*`;
    case "pinned":
      return formatSignature(signature.elementType);
    case "modified":
      return `${formatSignature(signature.elementType)} ${signature.isRequired ? "modreq" : "modopt"}(${signature.modifier})`;
    case "dynamic":
      return "dynamic";
    case "tuple":
      return `(${signature.elements
        .map((element) =>
          element.name
            ? `${formatSignature(element.type)} ${element.name}`
            : formatSignature(element.type)
        )
        .join(", ")})`;
  }
};

/**
 * Rebuild a signature top-down. `visit` may replace a node outright; when it
 * returns undefined the node's children are mapped instead.
 */
export const mapTypeSignature = (
  signature: TypeSignature,
  visit: (node: TypeSignature) => TypeSignature | undefined
): TypeSignature => {
  const replaced = visit(signature);
  if (replaced) return replaced;

  const map = (node: TypeSignature): TypeSignature => mapTypeSignature(node, visit);
  switch (signature.kind) {
    case "named":
      return signature.typeArguments
        ? { ...signature, typeArguments: signature.typeArguments.map(map) }
        : signature;
    case "byRef":
    case "pointer":
    case "pinned":
    case "array":
    case "modified":
      return { ...signature, elementType: map(signature.elementType) };
    case "tuple":
      return {
        kind: "tuple",
        elements: signature.elements.map((element) => ({
          ...element,
          type: map(element.type),
        })),
      };
    case "genericParameter":
    case "dynamic":
      return signature;
  }
};
