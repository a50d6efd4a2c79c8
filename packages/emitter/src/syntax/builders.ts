/**
 * Builders for statement tree nodes.
 */

import type {
  BlockStatementSyntax,
  ExpressionSyntax,
  StatementSyntax,
  TypeSyntax,
} from "./types.js";

export const block = (statements: readonly StatementSyntax[] = []): BlockStatementSyntax => ({
  kind: "blockStatement",
  statements,
});

export const expressionStatement = (expression: ExpressionSyntax): StatementSyntax => ({
  kind: "expressionStatement",
  expression,
});

export const identifier = (name: string): ExpressionSyntax => ({
  kind: "identifierExpression",
  identifier: name,
});

export const thisExpression = (): ExpressionSyntax => ({ kind: "thisExpression" });

export const memberAccess = (expression: ExpressionSyntax, memberName: string): ExpressionSyntax => ({
  kind: "memberAccessExpression",
  expression,
  memberName,
});

export const defaultValue = (type?: TypeSyntax): ExpressionSyntax =>
  type ? { kind: "defaultExpression", type } : { kind: "defaultExpression" };

export const nullLiteral = (): ExpressionSyntax => ({ kind: "literalExpression", text: "null" });

export const assign = (left: ExpressionSyntax, right: ExpressionSyntax): ExpressionSyntax => ({
  kind: "assignmentExpression",
  operatorToken: "=",
  left,
  right,
});

export const returnStatement = (expression?: ExpressionSyntax): StatementSyntax =>
  expression ? { kind: "returnStatement", expression } : { kind: "returnStatement" };

export const throwStatement = (expression?: ExpressionSyntax): StatementSyntax =>
  expression ? { kind: "throwStatement", expression } : { kind: "throwStatement" };

export const yieldReturn = (expression: ExpressionSyntax): StatementSyntax => ({
  kind: "yieldReturnStatement",
  expression,
});

export const yieldBreak = (): StatementSyntax => ({ kind: "yieldBreakStatement" });

export const comment = (text: string): StatementSyntax => ({ kind: "commentStatement", text });

/**
 * Insert `statement` directly after `anchor` (or at the start when the
 * anchor is undefined). Returns the new block.
 */
export const insertAfter = (
  body: BlockStatementSyntax,
  anchor: StatementSyntax | undefined,
  statement: StatementSyntax
): BlockStatementSyntax => {
  const index = anchor === undefined ? -1 : body.statements.indexOf(anchor);
  return {
    ...body,
    statements: [
      ...body.statements.slice(0, index + 1),
      statement,
      ...body.statements.slice(index + 1),
    ],
  };
};
