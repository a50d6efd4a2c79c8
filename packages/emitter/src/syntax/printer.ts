/**
 * Statement tree printer
 *
 * Converts syntax nodes into deterministic C# source text.
 * Pure and stateless. Parenthesization is derived from operator precedence.
 */

import type {
  BlockStatementSyntax,
  CompilationUnitSyntax,
  ExpressionSyntax,
  MemberDeclarationSyntax,
  NamespaceDeclarationSyntax,
  ParameterSyntax,
  StatementSyntax,
  TypeDeclarationSyntax,
  TypeSyntax,
} from "./types.js";

const INDENT = "    ";

// ============================================================
// Identifier escaping
// ============================================================

const CSHARP_KEYWORDS = new Set([
  "abstract", "as", "base", "bool", "break", "byte", "case", "catch", "char",
  "checked", "class", "const", "continue", "decimal", "default", "delegate",
  "do", "double", "else", "enum", "event", "explicit", "extern", "false",
  "finally", "fixed", "float", "for", "foreach", "goto", "if", "implicit",
  "in", "int", "interface", "internal", "is", "lock", "long", "namespace",
  "new", "null", "object", "operator", "out", "override", "params", "private",
  "protected", "public", "readonly", "ref", "return", "sbyte", "sealed",
  "short", "sizeof", "stackalloc", "static", "string", "struct", "switch",
  "this", "throw", "true", "try", "typeof", "uint", "ulong", "unchecked",
  "unsafe", "ushort", "using", "virtual", "void", "volatile", "while",
]);

const escapeIdentifier = (name: string): string =>
  CSHARP_KEYWORDS.has(name) ? `@${name}` : name;

const escapeQualifiedName = (name: string): string =>
  name.split(".").map(escapeIdentifier).join(".");

// ============================================================
// Operator precedence
// ============================================================

/** Higher binds tighter */
const getOperatorPrecedence = (op: string): number => {
  switch (op) {
    case "??":
      return 3;
    case "||":
      return 4;
    case "&&":
      return 5;
    case "|":
      return 6;
    case "^":
      return 7;
    case "&":
      return 8;
    case "==":
    case "!=":
      return 9;
    case "<":
    case ">":
    case "<=":
    case ">=":
      return 10;
    case "<<":
    case ">>":
      return 11;
    case "+":
    case "-":
      return 12;
    case "*":
    case "/":
    case "%":
      return 13;
    default:
      return 0;
  }
};

const getExpressionPrecedence = (expr: ExpressionSyntax): number => {
  switch (expr.kind) {
    case "assignmentExpression":
      return 1;
    case "binaryExpression":
      return getOperatorPrecedence(expr.operatorToken);
    case "castExpression":
      return 14;
    case "literalExpression":
    case "identifierExpression":
    case "thisExpression":
    case "memberAccessExpression":
    case "invocationExpression":
    case "baseConstructorCall":
    case "objectCreationExpression":
    case "defaultExpression":
      return 16;
  }
};

const parenthesizeIfNeeded = (
  expr: ExpressionSyntax,
  parentPrecedence: number,
  isRightOperand: boolean
): string => {
  const text = printExpression(expr);
  const childPrecedence = getExpressionPrecedence(expr);
  const needsParens =
    childPrecedence < parentPrecedence ||
    (childPrecedence === parentPrecedence && isRightOperand);
  return needsParens ? `(${text})` : text;
};

// ============================================================
// Type printer
// ============================================================

export const printType = (type: TypeSyntax): string => {
  switch (type.kind) {
    case "predefinedType":
      return type.keyword;

    case "identifierType": {
      const name = escapeQualifiedName(type.name);
      if (!type.typeArguments || type.typeArguments.length === 0) {
        return name;
      }
      return `${name}<${type.typeArguments.map(printType).join(", ")}>`;
    }

    case "arrayType":
      return `${printType(type.elementType)}[${",".repeat(type.rank - 1)}]`;

    case "pointerType":
      return `${printType(type.elementType)}*`;

    case "refType":
      return `ref ${printType(type.elementType)}`;

    case "tupleType": {
      const elements = type.elements
        .map((e) => (e.name ? `${printType(e.type)} ${e.name}` : printType(e.type)))
        .join(", ");
      return `(${elements})`;
    }
  }
};

// ============================================================
// Expression printer
// ============================================================

const printArguments = (args: readonly ExpressionSyntax[]): string =>
  args.map(printExpression).join(", ");

/** Expression in a primary position (before `.member` or `(args)`) */
const printPrimaryExpression = (expr: ExpressionSyntax): string => {
  const text = printExpression(expr);
  return getExpressionPrecedence(expr) >= 15 ? text : `(${text})`;
};

export const printExpression = (expr: ExpressionSyntax): string => {
  switch (expr.kind) {
    case "literalExpression":
      return expr.text;

    case "identifierExpression":
      return escapeIdentifier(expr.identifier);

    case "thisExpression":
      return "this";

    case "memberAccessExpression":
      return `${printPrimaryExpression(expr.expression)}.${escapeIdentifier(expr.memberName)}`;

    case "invocationExpression":
      return `${printPrimaryExpression(expr.expression)}(${printArguments(expr.arguments)})`;

    case "baseConstructorCall":
      return `base(${printArguments(expr.arguments)})`;

    case "objectCreationExpression":
      return `new ${printType(expr.type)}(${printArguments(expr.arguments)})`;

    case "assignmentExpression":
      return `${printExpression(expr.left)} ${expr.operatorToken} ${printExpression(expr.right)}`;

    case "binaryExpression": {
      const precedence = getOperatorPrecedence(expr.operatorToken);
      const left = parenthesizeIfNeeded(expr.left, precedence, false);
      const right = parenthesizeIfNeeded(expr.right, precedence, true);
      return `${left} ${expr.operatorToken} ${right}`;
    }

    case "castExpression": {
      const operand = printExpression(expr.expression);
      const wrapped =
        getExpressionPrecedence(expr.expression) < 14 || operand.startsWith("-")
          ? `(${operand})`
          : operand;
      return `(${printType(expr.type)})${wrapped}`;
    }

    case "defaultExpression":
      return expr.type ? `default(${printType(expr.type)})` : "default";
  }
};

// ============================================================
// Statement printer
// ============================================================

export const printStatement = (stmt: StatementSyntax, indent: string): string => {
  switch (stmt.kind) {
    case "blockStatement":
      return printBlockStatement(stmt, indent);

    case "expressionStatement":
      return `${indent}${printExpression(stmt.expression)};`;

    case "localDeclarationStatement": {
      const init = stmt.initializer ? ` = ${printExpression(stmt.initializer)}` : "";
      return `${indent}${printType(stmt.type)} ${escapeIdentifier(stmt.name)}${init};`;
    }

    case "ifStatement": {
      const head = `${indent}if (${printExpression(stmt.condition)})\n${printStatement(stmt.thenStatement, indent)}`;
      return stmt.elseStatement
        ? `${head}\n${indent}else\n${printStatement(stmt.elseStatement, indent)}`
        : head;
    }

    case "returnStatement":
      return stmt.expression
        ? `${indent}return ${printExpression(stmt.expression)};`
        : `${indent}return;`;

    case "throwStatement":
      return stmt.expression
        ? `${indent}throw ${printExpression(stmt.expression)};`
        : `${indent}throw;`;

    case "yieldReturnStatement":
      return `${indent}yield return ${printExpression(stmt.expression)};`;

    case "yieldBreakStatement":
      return `${indent}yield break;`;

    case "commentStatement":
      return `${indent}// ${stmt.text}`;

    case "emptyStatement":
      return `${indent};`;
  }
};

const printBlockStatement = (block: BlockStatementSyntax, indent: string): string => {
  if (block.statements.length === 0) {
    return `${indent}{\n${indent}}`;
  }
  const inner = indent + INDENT;
  const stmts = block.statements.map((s) => printStatement(s, inner)).join("\n");
  return `${indent}{\n${stmts}\n${indent}}`;
};

// ============================================================
// Declaration printer
// ============================================================

const printParameter = (param: ParameterSyntax): string => {
  const modifier = param.modifier ? `${param.modifier} ` : "";
  return `${modifier}${printType(param.type)} ${escapeIdentifier(param.name)}`;
};

const printModifiers = (modifiers: readonly string[]): string =>
  modifiers.length > 0 ? `${modifiers.join(" ")} ` : "";

const printBodyOrSemicolon = (
  body: BlockStatementSyntax | undefined,
  indent: string
): string => (body ? `\n${printBlockStatement(body, indent)}` : ";");

export const printMember = (member: MemberDeclarationSyntax, indent: string): string => {
  const params = member.parameters.map(printParameter).join(", ");
  const mods = printModifiers(member.modifiers);

  switch (member.kind) {
    case "methodDeclaration": {
      const typeParams =
        member.typeParameters.length > 0 ? `<${member.typeParameters.join(", ")}>` : "";
      return `${indent}${mods}${printType(member.returnType)} ${escapeIdentifier(member.name)}${typeParams}(${params})${printBodyOrSemicolon(member.body, indent)}`;
    }

    case "constructorDeclaration": {
      // A leading base constructor call becomes the constructor initializer
      const [first, ...rest] = member.body?.statements ?? [];
      const baseCall =
        first?.kind === "expressionStatement" && first.expression.kind === "baseConstructorCall"
          ? first.expression
          : undefined;
      const initializer = baseCall ? ` : ${printExpression(baseCall)}` : "";
      const body = baseCall && member.body ? { ...member.body, statements: rest } : member.body;
      return `${indent}${mods}${escapeIdentifier(member.name)}(${params})${initializer}${printBodyOrSemicolon(body, indent)}`;
    }
  }
};

export const printTypeDeclaration = (decl: TypeDeclarationSyntax, indent: string): string => {
  const typeParams =
    decl.typeParameters.length > 0 ? `<${decl.typeParameters.join(", ")}>` : "";
  const baseClause =
    decl.baseTypes.length > 0 ? ` : ${decl.baseTypes.map(printType).join(", ")}` : "";
  const inner = indent + INDENT;
  const members = decl.members.map((m) => printMember(m, inner)).join("\n\n");
  const body = members.length > 0 ? `\n${members}` : "";
  return `${indent}${printModifiers(decl.modifiers)}${decl.keyword} ${escapeIdentifier(decl.name)}${typeParams}${baseClause}\n${indent}{${body}\n${indent}}`;
};

const printNamespaceDeclaration = (ns: NamespaceDeclarationSyntax): string => {
  const members = ns.members.map((m) => printTypeDeclaration(m, INDENT)).join("\n\n");
  return `namespace ${escapeQualifiedName(ns.name)}\n{\n${members}\n}`;
};

export const printCompilationUnit = (unit: CompilationUnitSyntax): string => {
  const members = unit.members
    .map((m) =>
      m.kind === "namespaceDeclaration" ? printNamespaceDeclaration(m) : printTypeDeclaration(m, "")
    )
    .join("\n\n");
  const parts = [unit.headerText ?? "", members].filter((p) => p.length > 0);
  return parts.join("\n\n") + "\n";
};
