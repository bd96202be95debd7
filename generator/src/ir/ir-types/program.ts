import type { Func } from "./function";
import type { InstKind } from "./instructions";
import type { StructType } from "./types";

// ─── Program ─────────────────────────────────────────────────────────────────

/** Top-level unit handed from the generator to the validator and emitters. */
export interface Program {
  structs: StructDecl[];
  /** `functions[0]` is the entry point `f0`. */
  functions: Func[];
  meta: ProgramMeta;
}

/** Named struct declaration; structs only reference those declared before them. */
export interface StructDecl {
  name: string;
  type: StructType;
}

/** Diagnostic counters recorded by the validator. */
export interface ProgramMeta {
  /** Executed instructions per kind. */
  opCounts: Record<InstKind, number>;
  /** Total executed instructions, callees included. */
  totalCount: number;
  /** Canonical text of the entry result, i.e. the first line every target prints. */
  result: string | null;
}
