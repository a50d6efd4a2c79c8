/**
 * Statement tree - public API
 */

export * from "./types.js";
export * from "./builders.js";
export { printType, printExpression, printStatement, printMember, printTypeDeclaration, printCompilationUnit } from "./printer.js";
export { typeSyntaxFromSignature, predefinedType, stripArity } from "./type-factories.js";
