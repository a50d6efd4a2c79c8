/**
 * Empty-body synthesis
 *
 * Builds a body that compiles and satisfies definite assignment for a method
 * that has nothing to translate: chain to a base constructor, clear the
 * fields of a struct, assign every out parameter and return a default.
 */

import {
  createGenericContext,
  isVoidType,
  removePinnedAndModifiers,
  resolveInGenericContext,
  type Diagnostic,
  type TypeSignature,
  type TypeSystemClosure,
} from "@dnpeek/frontend";
import {
  assign,
  block,
  defaultValue,
  expressionStatement,
  identifier,
  memberAccess,
  nullLiteral,
  returnStatement,
  thisExpression,
  throwStatement,
} from "../syntax/builders.js";
import { typeSyntaxFromSignature } from "../syntax/type-factories.js";
import type {
  BlockStatementSyntax,
  MemberDeclarationSyntax,
  StatementSyntax,
} from "../syntax/types.js";
import { selectBaseConstructor } from "./base-constructor.js";
import { byRefElementType } from "./declarations.js";
import { methodHandleName, type MethodHandle } from "./method-handle.js";

export type EmptyBodyResult = {
  readonly body: BlockStatementSyntax;
  readonly diagnostics: readonly Diagnostic[];
};

export const decompileEmptyBody = (
  handle: MethodHandle,
  typeSystem: TypeSystemClosure,
  declaration?: MemberDeclarationSyntax
): EmptyBodyResult => {
  const { declaringType, method } = handle;
  const context = createGenericContext(declaringType, method);
  const defaultOf = (signature: TypeSignature) =>
    defaultValue(
      typeSyntaxFromSignature(
        resolveInGenericContext(removePinnedAndModifiers(signature), context)
      )
    );

  const statements: StatementSyntax[] = [];
  const diagnostics: Diagnostic[] = [];

  if (method.name === ".ctor" && !method.isStatic) {
    const choice = selectBaseConstructor(declaringType, typeSystem, handle.module);
    if (choice) {
      statements.push(
        expressionStatement({
          kind: "baseConstructorCall",
          arguments: choice.parameterTypes.map(defaultOf),
          target: {
            declaringType: choice.baseType.fullName,
            parameterTypes: choice.parameterTypes,
          },
        })
      );
    } else if (declaringType.baseType && declaringType.kind === "class") {
      diagnostics.push({
        code: "DNP6002",
        severity: "warning",
        message: `No base constructor found for ${methodHandleName(handle)}`,
        hint: "The synthesized constructor does not chain to a base constructor",
      });
    }

    if (declaringType.isValueType && declaringType.kind !== "enum") {
      for (const field of declaringType.fields) {
        if (field.isStatic) continue;
        statements.push(
          expressionStatement(assign(memberAccess(thisExpression(), field.name), defaultOf(field.type)))
        );
      }
    }
  }

  for (const parameter of method.parameters) {
    if (parameter.mode !== "out") continue;
    const name = declaration?.parameters[parameter.index]?.name ?? parameter.name;
    statements.push(
      expressionStatement(assign(identifier(name), defaultOf(byRefElementType(parameter.type))))
    );
  }

  const returnType = removePinnedAndModifiers(method.returnType);
  if (!method.isConstructor && !isVoidType(returnType)) {
    statements.push(
      returnType.kind === "byRef"
        ? throwStatement(nullLiteral())
        : returnStatement(defaultOf(returnType))
    );
  }

  return { body: block(statements), diagnostics };
};
