// ─── Types ───────────────────────────────────────────────────────────────────

/** Union of all value types a generated program can mention. */
export type Type = ScalarType | ArrayType | StructType;

/** 64-bit floating-point number, the only primitive. */
export interface ScalarType {
  kind: "scalar";
}

/** Fixed-length array; the length is known at generation time. */
export interface ArrayType {
  kind: "array";
  element: Type;
  length: number;
}

/**
 * Nominal product type. Properties may only mention structs declared
 * earlier, so struct declarations never form a cycle.
 */
export interface StructType {
  kind: "struct";
  name: string;
  properties: Type[];
}

export type TypeKind = Type["kind"];

export const TYPE_KINDS = ["scalar", "array", "struct"] as const satisfies readonly TypeKind[];
