/**
 * IR node types for generated programs.
 * Uses discriminated unions with a `kind` field so every consumer
 * (generator, eliminator, interpreter, emitters) matches exhaustively.
 */

export * from "./identifiers";
export * from "./types";
export * from "./instructions";
export * from "./function";
export * from "./program";
