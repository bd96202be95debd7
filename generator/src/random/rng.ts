/**
 * Seedable random stream threaded through every generation decision.
 *
 * A candidate program is a pure function of the stream it was generated
 * from, so a seed reproduces it exactly and independent attempts can run
 * on forked streams without sharing state.
 */

import { GenerationError } from "../errors/index.ts";

export type Seed = string | number;

export class Random {
  private state: number;

  private constructor(state: number) {
    this.state = state >>> 0;
  }

  /** Create a stream from a string or numeric seed. */
  static fromSeed(seed: Seed): Random {
    return new Random(hashSeed(String(seed)));
  }

  /** Next 32-bit unsigned integer (mulberry32). */
  nextU32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Uniform float in [0, 1). */
  nextFloat(): number {
    return this.nextU32() / 0x1_0000_0000;
  }

  /** Uniform integer in [min, max). */
  nextInt(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max <= min) {
      throw new GenerationError(`empty integer range [${min}, ${max})`);
    }
    return min + Math.floor(this.nextFloat() * (max - min));
  }

  /** Uniform element of a non-empty list. */
  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new GenerationError("cannot pick from an empty list");
    }
    return items[this.nextInt(0, items.length)];
  }

  /** Independent child stream; advances this stream by one draw. */
  fork(): Random {
    return new Random(this.nextU32() ^ 0x9e3779b9);
  }
}

/** xmur3 string hash, folded to a single 32-bit state. */
function hashSeed(text: string): number {
  let h = 1779033703 ^ text.length;
  for (let i = 0; i < text.length; i++) {
    h = Math.imul(h ^ text.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  h = Math.imul(h ^ (h >>> 16), 2246822507);
  h = Math.imul(h ^ (h >>> 13), 3266489909);
  return (h ^ (h >>> 16)) >>> 0;
}
