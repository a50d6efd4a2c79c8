/**
 * Declaration skeletons for methods
 */

import {
  createGenericContext,
  removePinnedAndModifiers,
  resolveInGenericContext,
  type MemberAccess,
  type ParameterDefinition,
  type TypeSignature,
} from "@dnpeek/frontend";
import type { MemberDeclarationSyntax, ParameterModifier, ParameterSyntax } from "../syntax/types.js";
import { stripArity, typeSyntaxFromSignature } from "../syntax/type-factories.js";
import type { MethodHandle } from "./method-handle.js";

const ACCESS_MODIFIERS: Readonly<Record<MemberAccess, readonly string[]>> = {
  public: ["public"],
  family: ["protected"],
  familyOrAssembly: ["protected", "internal"],
  assembly: ["internal"],
  familyAndAssembly: ["private", "protected"],
  private: ["private"],
  privateScope: [],
};

/** Element type of a by-ref signature, or the signature itself */
export const byRefElementType = (signature: TypeSignature): TypeSignature => {
  const stripped = removePinnedAndModifiers(signature);
  return stripped.kind === "byRef" ? stripped.elementType : stripped;
};

const parameterModifier = (parameter: ParameterDefinition): ParameterModifier | undefined => {
  switch (parameter.mode) {
    case "out":
      return "out";
    case "in":
      return "in";
    case "ref":
      return "ref";
    case "none":
      return removePinnedAndModifiers(parameter.type).kind === "byRef" ? "ref" : undefined;
  }
};

/**
 * The declaration a method's body is attached to: modifiers, return type
 * and parameters resolved through the method's generic context.
 */
export const createMethodDeclaration = (handle: MethodHandle): MemberDeclarationSyntax => {
  const { declaringType, method } = handle;
  const context = createGenericContext(declaringType, method);
  const resolve = (signature: TypeSignature) =>
    typeSyntaxFromSignature(resolveInGenericContext(signature, context));

  const modifiers: string[] =
    method.name === ".cctor" ? [] : [...ACCESS_MODIFIERS[method.access]];
  if (method.isStatic) modifiers.push("static");
  if (method.isAbstract && declaringType.kind !== "interface") modifiers.push("abstract");

  const parameters: ParameterSyntax[] = method.parameters.map((parameter) => {
    const modifier = parameterModifier(parameter);
    const type = resolve(modifier ? byRefElementType(parameter.type) : parameter.type);
    return modifier ? { name: parameter.name, type, modifier } : { name: parameter.name, type };
  });

  if (method.isConstructor) {
    return {
      kind: "constructorDeclaration",
      modifiers,
      name: stripArity(declaringType.name),
      parameters,
    };
  }

  return {
    kind: "methodDeclaration",
    modifiers,
    returnType: resolve(method.returnType),
    name: method.name,
    typeParameters: method.genericParameters,
    parameters,
  };
};
