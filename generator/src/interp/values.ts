/**
 * Runtime values. Values are immutable: an in-place write in the IR
 * rebinds the target to an updated copy, which matches the value
 * semantics every emitted target has.
 */

import { GenerationError } from "../errors/index.ts";
import type { Type } from "../ir/ir-types/index.ts";

export type ScalarValue = number;
export type ArrayValue = readonly Value[];

export interface StructValue {
  readonly struct: string;
  readonly values: readonly Value[];
}

export type Value = ScalarValue | ArrayValue | StructValue;

export function isScalarValue(v: Value): v is ScalarValue {
  return typeof v === "number";
}

export function isArrayValue(v: Value): v is ArrayValue {
  return Array.isArray(v);
}

export function isStructValue(v: Value): v is StructValue {
  return typeof v === "object" && !Array.isArray(v);
}

/**
 * Canonical inputs for a parameter list: scalar slots are numbered
 * `0.0, 1.0, 2.0, …` depth first across every parameter, and aggregates
 * are built around them.
 */
export function initialValues(types: readonly Type[]): Value[] {
  let counter = 0;
  const build = (type: Type): Value => {
    switch (type.kind) {
      case "scalar":
        return counter++;
      case "array": {
        const elements: Value[] = [];
        for (let i = 0; i < type.length; i++) elements.push(build(type.element));
        return elements;
      }
      case "struct":
        return { struct: type.name, values: type.properties.map(build) };
    }
  };
  return types.map(build);
}

/**
 * Shortest round-trip spelling of a double, always with a fractional
 * part or exponent: `0.0`, `2.5`, `-0.0`, `1e+21`, `inf`, `nan`.
 */
export function formatScalar(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (Object.is(n, -0)) return "-0.0";
  const text = String(n);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/** Walk a value and collect the names of every struct it contains. */
export function collectValueStructs(value: Value, into: Set<string>): void {
  if (isScalarValue(value)) return;
  if (isArrayValue(value)) {
    for (const v of value) collectValueStructs(v, into);
    return;
  }
  into.add(value.struct);
  for (const v of value.values) collectValueStructs(v, into);
}

export function expectScalar(v: Value | undefined, what: string): number {
  if (v === undefined || !isScalarValue(v)) {
    throw new GenerationError(`${what} is not a scalar`);
  }
  return v;
}

export function expectArray(v: Value | undefined, what: string): ArrayValue {
  if (v === undefined || !isArrayValue(v)) {
    throw new GenerationError(`${what} is not an array`);
  }
  return v;
}

export function expectStruct(v: Value | undefined, what: string): StructValue {
  if (v === undefined || !isStructValue(v)) {
    throw new GenerationError(`${what} is not a struct`);
  }
  return v;
}

/** Element `index` of a tuple, or a GenerationError when out of range. */
export function elementAt(values: readonly Value[], index: number, what: string): Value {
  const v = values[index];
  if (v === undefined) {
    throw new GenerationError(`${what} has no element ${index}`);
  }
  return v;
}

/** Copy of `values` with one element replaced. */
export function replaceAt(values: readonly Value[], index: number, value: Value, what: string): Value[] {
  if (index < 0 || index >= values.length) {
    throw new GenerationError(`${what} has no element ${index}`);
  }
  const copy = values.slice();
  copy[index] = value;
  return copy;
}
