/**
 * Statement tree node definitions
 *
 * Structured C# syntax nodes produced for decompiled method bodies and
 * empty-body stubs. Nodes are plain immutable data; annotations linking a
 * declaration back to its intermediate representation are optional fields.
 *
 * INVARIANT: No raw text nodes exist apart from comments. Every construct
 * is represented by an explicit node.
 */

import type { TypeSignature } from "@dnpeek/frontend";
import type { FunctionIR, ILVariable } from "../decompiler/function-ir.js";

// ============================================================
// Type syntax
// ============================================================

export type PredefinedTypeSyntax = {
  readonly kind: "predefinedType";
  /** C# keyword: "int", "string", "bool", "object", "void", "dynamic", ... */
  readonly keyword: string;
};

export type IdentifierTypeSyntax = {
  readonly kind: "identifierType";
  /** Possibly qualified name, e.g. "System.Collections.Generic.List" */
  readonly name: string;
  readonly typeArguments?: readonly TypeSyntax[];
};

export type ArrayTypeSyntax = {
  readonly kind: "arrayType";
  readonly elementType: TypeSyntax;
  /** 1 for T[], 2 for T[,] */
  readonly rank: number;
};

export type PointerTypeSyntax = {
  readonly kind: "pointerType";
  readonly elementType: TypeSyntax;
};

export type RefTypeSyntax = {
  readonly kind: "refType";
  readonly elementType: TypeSyntax;
};

export type TupleElementSyntax = {
  readonly type: TypeSyntax;
  readonly name?: string;
};

export type TupleTypeSyntax = {
  readonly kind: "tupleType";
  readonly elements: readonly TupleElementSyntax[];
};

export type TypeSyntax =
  | PredefinedTypeSyntax
  | IdentifierTypeSyntax
  | ArrayTypeSyntax
  | PointerTypeSyntax
  | RefTypeSyntax
  | TupleTypeSyntax;

// ============================================================
// Expression syntax
// ============================================================

export type LiteralExpressionSyntax = {
  readonly kind: "literalExpression";
  /** Token text: "null", "true", "42", `"text"` */
  readonly text: string;
};

export type IdentifierExpressionSyntax = {
  readonly kind: "identifierExpression";
  readonly identifier: string;
};

export type ThisExpressionSyntax = {
  readonly kind: "thisExpression";
};

export type MemberAccessExpressionSyntax = {
  readonly kind: "memberAccessExpression";
  readonly expression: ExpressionSyntax;
  readonly memberName: string;
};

export type InvocationExpressionSyntax = {
  readonly kind: "invocationExpression";
  readonly expression: ExpressionSyntax;
  readonly arguments: readonly ExpressionSyntax[];
};

/** Call of a base class constructor, `base(...)` */
export type BaseConstructorCallSyntax = {
  readonly kind: "baseConstructorCall";
  readonly arguments: readonly ExpressionSyntax[];
  /** Declaring type and signature of the chosen constructor */
  readonly target?: ConstructorTarget;
};

export type ConstructorTarget = {
  readonly declaringType: string;
  readonly parameterTypes: readonly TypeSignature[];
};

export type ObjectCreationExpressionSyntax = {
  readonly kind: "objectCreationExpression";
  readonly type: TypeSyntax;
  readonly arguments: readonly ExpressionSyntax[];
};

export type AssignmentExpressionSyntax = {
  readonly kind: "assignmentExpression";
  /** "=", "+=", ... */
  readonly operatorToken: string;
  readonly left: ExpressionSyntax;
  readonly right: ExpressionSyntax;
};

export type BinaryExpressionSyntax = {
  readonly kind: "binaryExpression";
  readonly operatorToken: string;
  readonly left: ExpressionSyntax;
  readonly right: ExpressionSyntax;
};

export type CastExpressionSyntax = {
  readonly kind: "castExpression";
  readonly type: TypeSyntax;
  readonly expression: ExpressionSyntax;
};

export type DefaultExpressionSyntax = {
  readonly kind: "defaultExpression";
  /** Untyped `default` when absent */
  readonly type?: TypeSyntax;
};

export type ExpressionSyntax =
  | LiteralExpressionSyntax
  | IdentifierExpressionSyntax
  | ThisExpressionSyntax
  | MemberAccessExpressionSyntax
  | InvocationExpressionSyntax
  | BaseConstructorCallSyntax
  | ObjectCreationExpressionSyntax
  | AssignmentExpressionSyntax
  | BinaryExpressionSyntax
  | CastExpressionSyntax
  | DefaultExpressionSyntax;

// ============================================================
// Statement syntax
// ============================================================

export type BlockStatementSyntax = {
  readonly kind: "blockStatement";
  readonly statements: readonly StatementSyntax[];
};

export type ExpressionStatementSyntax = {
  readonly kind: "expressionStatement";
  readonly expression: ExpressionSyntax;
};

export type LocalDeclarationStatementSyntax = {
  readonly kind: "localDeclarationStatement";
  readonly type: TypeSyntax;
  readonly name: string;
  readonly initializer?: ExpressionSyntax;
};

export type IfStatementSyntax = {
  readonly kind: "ifStatement";
  readonly condition: ExpressionSyntax;
  readonly thenStatement: StatementSyntax;
  readonly elseStatement?: StatementSyntax;
};

export type ReturnStatementSyntax = {
  readonly kind: "returnStatement";
  readonly expression?: ExpressionSyntax;
};

export type ThrowStatementSyntax = {
  readonly kind: "throwStatement";
  readonly expression?: ExpressionSyntax;
};

export type YieldReturnStatementSyntax = {
  readonly kind: "yieldReturnStatement";
  readonly expression: ExpressionSyntax;
};

export type YieldBreakStatementSyntax = {
  readonly kind: "yieldBreakStatement";
};

export type CommentStatementSyntax = {
  readonly kind: "commentStatement";
  readonly text: string;
};

export type EmptyStatementSyntax = {
  readonly kind: "emptyStatement";
};

export type StatementSyntax =
  | BlockStatementSyntax
  | ExpressionStatementSyntax
  | LocalDeclarationStatementSyntax
  | IfStatementSyntax
  | ReturnStatementSyntax
  | ThrowStatementSyntax
  | YieldReturnStatementSyntax
  | YieldBreakStatementSyntax
  | CommentStatementSyntax
  | EmptyStatementSyntax;

// ============================================================
// Declaration syntax
// ============================================================

export type ParameterModifier = "ref" | "out" | "in";

/** Links a parameter declaration to its intermediate representation */
export type ParameterAnnotation = {
  readonly variable: ILVariable;
  readonly type: TypeSignature;
};

export type ParameterSyntax = {
  readonly name: string;
  readonly type: TypeSyntax;
  readonly modifier?: ParameterModifier;
  readonly annotation?: ParameterAnnotation;
};

export type MethodDeclarationSyntax = {
  readonly kind: "methodDeclaration";
  readonly modifiers: readonly string[];
  readonly returnType: TypeSyntax;
  readonly name: string;
  readonly typeParameters: readonly string[];
  readonly parameters: readonly ParameterSyntax[];
  readonly body?: BlockStatementSyntax;
  /** Intermediate representation the body was built from */
  readonly function?: FunctionIR;
};

export type ConstructorDeclarationSyntax = {
  readonly kind: "constructorDeclaration";
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly parameters: readonly ParameterSyntax[];
  readonly body?: BlockStatementSyntax;
  readonly function?: FunctionIR;
};

export type MemberDeclarationSyntax = MethodDeclarationSyntax | ConstructorDeclarationSyntax;

export type TypeDeclarationSyntax = {
  readonly kind: "typeDeclaration";
  readonly keyword: "class" | "struct" | "interface" | "enum" | "delegate";
  readonly modifiers: readonly string[];
  readonly name: string;
  readonly typeParameters: readonly string[];
  readonly baseTypes: readonly TypeSyntax[];
  readonly members: readonly MemberDeclarationSyntax[];
};

export type NamespaceDeclarationSyntax = {
  readonly kind: "namespaceDeclaration";
  readonly name: string;
  readonly members: readonly TypeDeclarationSyntax[];
};

export type CompilationUnitSyntax = {
  readonly kind: "compilationUnit";
  readonly headerText?: string;
  readonly members: readonly (NamespaceDeclarationSyntax | TypeDeclarationSyntax)[];
};
