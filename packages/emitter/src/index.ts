/**
 * dnpeek emitter - statement trees and method decompilation
 */

export * from "./syntax/index.js";
export * from "./decompiler/index.js";
export * from "./stubs/index.js";
