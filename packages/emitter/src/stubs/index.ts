/**
 * Module stubs - public API
 */

export { createStubCompilationUnit } from "./type-stubs.js";
export type { StubOptions, StubResult } from "./type-stubs.js";
