import { describe, expect, test } from "vitest";
import { GenerationError } from "../../src/errors/index.ts";
import { Random } from "../../src/random/rng.ts";

function draws(rng: Random, n: number): number[] {
  return Array.from({ length: n }, () => rng.nextU32());
}

describe("random", () => {
  test("same seed, same stream", () => {
    expect(draws(Random.fromSeed("abc"), 16)).toEqual(draws(Random.fromSeed("abc"), 16));
    expect(draws(Random.fromSeed(42), 16)).toEqual(draws(Random.fromSeed("42"), 16));
  });

  test("different seeds diverge", () => {
    expect(draws(Random.fromSeed("abc"), 16)).not.toEqual(draws(Random.fromSeed("abd"), 16));
  });

  test("nextInt stays in its half-open range", () => {
    const rng = Random.fromSeed("range");
    const seen = new Set<number>();
    for (let i = 0; i < 2000; i++) {
      const n = rng.nextInt(3, 7);
      expect(n).toBeGreaterThanOrEqual(3);
      expect(n).toBeLessThan(7);
      seen.add(n);
    }
    expect([...seen].sort()).toEqual([3, 4, 5, 6]);
  });

  test("nextFloat is in [0, 1)", () => {
    const rng = Random.fromSeed("float");
    for (let i = 0; i < 1000; i++) {
      const x = rng.nextFloat();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  test("empty choices are generation faults", () => {
    const rng = Random.fromSeed(1);
    expect(() => rng.nextInt(5, 5)).toThrow(GenerationError);
    expect(() => rng.nextInt(0, 1.5)).toThrow(GenerationError);
    expect(() => rng.pick([])).toThrow(GenerationError);
  });

  test("forks are reproducible and independent of later parent draws", () => {
    const a = Random.fromSeed("fork");
    const b = Random.fromSeed("fork");
    const childA = a.fork();
    const childB = b.fork();
    b.nextU32();
    expect(draws(childA, 8)).toEqual(draws(childB, 8));
    expect(draws(a.fork(), 8)).not.toEqual(draws(Random.fromSeed("fork").fork(), 8));
  });
});
