import type { FuncOrdinal, LocalId } from "./identifiers";

// ─── Instructions ────────────────────────────────────────────────────────────

/** Union of all instructions a function body can contain. */
export type Inst =
  // Arithmetic
  | BinaryInst
  // Control
  | ReturnInst
  | CallInst
  // Locals
  | VarInst
  | AssignInst
  // Arrays
  | NewArrayInst
  | ArrayGetInst
  | ArraySetInst
  // Structs
  | NewStructInst
  | StructGetInst
  | StructSetInst;

export type InstKind = Inst["kind"];

/** Instruction kinds the generator samples; a `return` is only ever appended. */
export const GENERATED_INST_KINDS = [
  "call",
  "binary",
  "var",
  "assign",
  "new_array",
  "array_get",
  "array_set",
  "new_struct",
  "struct_get",
  "struct_set",
] as const satisfies readonly InstKind[];

export type GeneratedInstKind = (typeof GENERATED_INST_KINDS)[number];

/** Every instruction kind, in the order weight tables and counters list them. */
export const INST_KINDS = [...GENERATED_INST_KINDS, "return"] as const satisfies readonly InstKind[];

// ── Arithmetic ───────────────────────────────────────────────────────────────

export const BINARY_OPS = ["+", "-", "*", "/"] as const;

export type BinaryOp = (typeof BINARY_OPS)[number];

/** `dest = lhs op rhs` over scalars. */
export interface BinaryInst {
  kind: "binary";
  dest: LocalId;
  op: BinaryOp;
  lhs: LocalId;
  rhs: LocalId;
}

// ── Control ──────────────────────────────────────────────────────────────────

/** Final instruction of every body. */
export interface ReturnInst {
  kind: "return";
  value: LocalId;
}

/** Call a function with a strictly higher ordinal. */
export interface CallInst {
  kind: "call";
  dest: LocalId;
  callee: FuncOrdinal;
  args: LocalId[];
}

// ── Locals ───────────────────────────────────────────────────────────────────

/** Declare a mutable local initialised with a copy of `value`. */
export interface VarInst {
  kind: "var";
  dest: LocalId;
  value: LocalId;
}

/** Overwrite a mutable local with a different name of the same type. */
export interface AssignInst {
  kind: "assign";
  target: LocalId;
  value: LocalId;
}

// ── Arrays ───────────────────────────────────────────────────────────────────

export interface NewArrayInst {
  kind: "new_array";
  dest: LocalId;
  elements: LocalId[];
}

export interface ArrayGetInst {
  kind: "array_get";
  dest: LocalId;
  array: LocalId;
  index: number;
}

/** In-place element write; `array` is always a mutable local. */
export interface ArraySetInst {
  kind: "array_set";
  array: LocalId;
  index: number;
  value: LocalId;
}

// ── Structs ──────────────────────────────────────────────────────────────────

export interface NewStructInst {
  kind: "new_struct";
  dest: LocalId;
  values: LocalId[];
}

export interface StructGetInst {
  kind: "struct_get";
  dest: LocalId;
  struct: LocalId;
  index: number;
}

/** In-place property write; `struct` is always a mutable local. */
export interface StructSetInst {
  kind: "struct_set";
  struct: LocalId;
  index: number;
  value: LocalId;
}
