/**
 * Command-line plumbing kept apart from the entry script so it can be
 * exercised in process: argument parsing and the corpus writer.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type DialectId, DIALECT_IDS, DIALECTS, emitAll, isDialectId } from "./backend/index.ts";
import type { GeneratorConfig } from "./config/index.ts";
import type { Program } from "./ir/ir-types/index.ts";
import { type AttemptOutcome, generateValidProgram } from "./interp/index.ts";
import type { Random, Seed } from "./random/rng.ts";

export const VERSION = "0.1.0";

export interface CliOptions {
  seed: Seed | null;
  count: number;
  out: string;
  prefix: string;
  config: string | null;
  emit: DialectId | null;
  ir: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export const DEFAULT_CLI_OPTIONS: CliOptions = {
  seed: null,
  count: 1,
  out: path.join("out", "src"),
  prefix: "gen",
  config: null,
  emit: null,
  ir: false,
  verbose: false,
  help: false,
  version: false,
};

/** Thrown for malformed command lines; the entry script prints it with usage. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "UsageError";
  }
}

/** Digit strings that survive the trip through a number unchanged. */
function isIntegerSeed(value: string): boolean {
  return /^-?\d+$/.test(value) && Number.isSafeInteger(Number(value)) && String(Number(value)) === value;
}

const VALUE_FLAGS = new Set(["--seed", "--count", "--out", "--prefix", "--config", "--emit"]);

export function parseArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = { ...DEFAULT_CLI_OPTIONS };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      opts.help = true;
      continue;
    }
    if (arg === "--version" || arg === "-V") {
      opts.version = true;
      continue;
    }
    if (arg === "--ir") {
      opts.ir = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      opts.verbose = true;
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) {
      throw new UsageError(`unknown flag '${arg}'`);
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`${arg} needs a value`);
    }
    i++;

    switch (arg) {
      case "--seed":
        opts.seed = isIntegerSeed(value) ? Number(value) : value;
        break;
      case "--count": {
        const count = Number(value);
        if (!Number.isInteger(count) || count < 1) {
          throw new UsageError(`--count must be a positive integer, got '${value}'`);
        }
        opts.count = count;
        break;
      }
      case "--out":
        opts.out = value;
        break;
      case "--prefix":
        opts.prefix = value;
        break;
      case "--config":
        opts.config = value;
        break;
      case "--emit":
        if (!isDialectId(value)) {
          throw new UsageError(`--emit must be one of ${DIALECT_IDS.join(", ")}, got '${value}'`);
        }
        opts.emit = value;
        break;
    }
  }

  return opts;
}

/** Report each rejected candidate on stderr, at debug verbosity only. */
export function attemptLogger(verbose: boolean): ((outcome: AttemptOutcome) => void) | undefined {
  if (!verbose) return undefined;
  return ({ attempt, result }) => {
    if (!result.ok) {
      console.error(`  attempt ${attempt}: rejected (${result.reason} after ${result.totalCount} instructions)`);
    }
  };
}

/** First `<prefix><i>` (i = 1, 2, …) whose metadata file is not yet present. */
export function nextFreePrefix(dir: string, prefix: string, start = 1): { name: string; index: number } {
  for (let i = start; ; i++) {
    const name = `${prefix}${i}`;
    if (!fs.existsSync(path.join(dir, `${name}.json`))) return { name, index: i };
  }
}

/** Metadata record written beside the sources. */
export function metadataJson(program: Program, seed: Seed, attempts: number, iterations: number): string {
  const record = {
    seed,
    attempts,
    iterations,
    result: program.meta.result,
    totalCount: program.meta.totalCount,
    opCounts: program.meta.opCounts,
    functions: program.functions.length,
    structs: program.structs.length,
  };
  return `${JSON.stringify(record, null, 2)}\n`;
}

/** Write `<name>.json` and one source file per dialect; returns the paths written. */
export function writeProgramFiles(
  dir: string,
  name: string,
  program: Program,
  seed: Seed,
  attempts: number,
  iterations: number
): string[] {
  fs.mkdirSync(dir, { recursive: true });
  const written: string[] = [];
  const write = (file: string, text: string): void => {
    const target = path.join(dir, file);
    fs.writeFileSync(target, text);
    written.push(target);
  };

  write(`${name}.json`, metadataJson(program, seed, attempts, iterations));
  const sources = emitAll(program, { iterations });
  for (const id of DIALECT_IDS) {
    write(`${name}.${DIALECTS[id].extension}`, sources[id]);
  }
  return written;
}

/**
 * Generate `count` programs into `dir`, skipping names already taken.
 * Program `k` is drawn from the k-th fork of `rng`.
 */
export function generateCorpus(
  rng: Random,
  seed: Seed,
  config: GeneratorConfig,
  opts: Pick<CliOptions, "count" | "out" | "prefix" | "verbose">
): string[] {
  const written: string[] = [];
  let index = 1;
  for (let k = 0; k < opts.count; k++) {
    const slot = nextFreePrefix(opts.out, opts.prefix, index);
    index = slot.index + 1;
    console.log(`Generating ${slot.name}`);
    const { program, attempts } = generateValidProgram(rng.fork(), config, {
      onAttempt: attemptLogger(opts.verbose),
    });
    written.push(...writeProgramFiles(opts.out, slot.name, program, seed, attempts, config.benchmarkIterations));
    console.log(
      `  ${slot.name}: ${program.functions.length} functions, ${program.meta.totalCount} instructions, ` +
        `result ${program.meta.result} (${attempts} attempt${attempts !== 1 ? "s" : ""})`
    );
  }
  return written;
}
