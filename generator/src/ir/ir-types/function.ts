import type { FuncOrdinal, LocalId } from "./identifiers";
import type { Inst } from "./instructions";
import type { Type } from "./types";

// ─── Names ───────────────────────────────────────────────────────────────────

/** A typed binding: a parameter or the result of an instruction. */
export interface Name {
  id: LocalId;
  ident: string;
  type: Type;
}

// ─── Function ────────────────────────────────────────────────────────────────

/**
 * A generated function. `names` is the arena every handle in `params` and
 * `body` indexes into; the body is straight-line code ending in exactly
 * one `return`.
 */
export interface Func {
  ordinal: FuncOrdinal;
  name: string;
  returnType: Type;
  params: LocalId[];
  names: Name[];
  body: Inst[];
}

/** Signature of a function, known to every body before bodies are generated. */
export interface FuncSignature {
  ordinal: FuncOrdinal;
  name: string;
  returnType: Type;
  params: Type[];
}
