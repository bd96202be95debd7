/**
 * Discrete-distribution sampling over ordered weight tables.
 */

import { GenerationError } from "../errors/index.ts";
import type { Random } from "./rng.ts";

/** Ordered `[option, weight]` pairs; order fixes which bucket each draw lands in. */
export type WeightTable<T> = ReadonlyArray<readonly [T, number]>;

/**
 * Return one option with probability `weight / total`.
 *
 * Draws a uniform integer in `[0, total)` and subtracts weights in table
 * order until the remainder falls inside a bucket. Options with weight 0
 * own an empty bucket and can never be returned.
 */
export function weightedPick<T>(rng: Random, table: WeightTable<T>): T {
  if (table.length === 0) {
    throw new GenerationError("weighted pick from an empty table");
  }
  let total = 0;
  for (const [, weight] of table) {
    if (!Number.isInteger(weight) || weight < 0) {
      throw new GenerationError(`invalid weight ${weight}`);
    }
    total += weight;
  }
  if (total <= 0) {
    throw new GenerationError("weighted pick needs a positive total weight");
  }

  let bucket = rng.nextInt(0, total);
  for (const [option, weight] of table) {
    if (bucket < weight) return option;
    bucket -= weight;
  }
  throw new GenerationError("weighted pick fell through every bucket");
}

/** Copy of `table` without the given options. */
export function withoutOptions<T>(table: WeightTable<T>, options: Iterable<T>): WeightTable<T> {
  const drop = new Set(options);
  return table.filter(([option]) => !drop.has(option));
}

/** Copy of `table` with one option's weight replaced. */
export function withWeight<T>(table: WeightTable<T>, option: T, weight: number): WeightTable<T> {
  return table.map(([o, w]) => [o, o === option ? weight : w] as const);
}


/** Weight of `option`, or 0 when the table does not list it. */
export function weightOf<T>(table: WeightTable<T>, option: T): number {
  for (const [o, w] of table) {
    if (o === option) return w;
  }
  return 0;
}
