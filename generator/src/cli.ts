#!/usr/bin/env -S npx tsx
import { DIALECTS, emitProgram } from "./backend/index.ts";
import { type GeneratorConfig, DEFAULT_CONFIG, configFromFile } from "./config/index.ts";
import { generateCorpus, attemptLogger, parseArgs, UsageError, VERSION, type CliOptions } from "./driver.ts";
import { GenBenchError } from "./errors/index.ts";
import { generateValidProgram } from "./interp/index.ts";
import { printProgram } from "./ir/printer.ts";
import { Random } from "./random/rng.ts";

function printHelp(): void {
  console.log(`genbench ${VERSION}: random benchmark program generator

Usage: genbench [options]

Options:
  --seed <s>        Seed for the random stream (default: current time)
  --count <n>       Number of programs to generate (default: 1)
  --out <dir>       Output directory (default: out/src)
  --prefix <p>      File name prefix (default: gen)
  --config <file>   JSON file overriding generator settings
  --emit <dialect>  Print one program in cpp, scala, swift or mvs to stdout
  --ir              Print one program's IR to stdout
  --verbose, -v     Report every rejected candidate
  --help, -h        Show this help message
  --version, -V     Show the version

Without --emit or --ir, each program is written as <prefix><i>.json plus
one source file per dialect, skipping names that already exist.

Examples:
  genbench --seed 42 --count 10     Write ten programs to out/src
  genbench --seed 7 --emit cpp      Print a C++ program
  genbench --seed 7 --ir            Print the IR of the same program`);
}

// ─── Argument parsing ────────────────────────────────────────────────────────

let opts: CliOptions;
try {
  opts = parseArgs(process.argv.slice(2));
} catch (error) {
  if (!(error instanceof UsageError)) throw error;
  console.error(`error: ${error.message}`);
  console.error("Run with --help to see available options.\n");
  process.exit(1);
}

if (opts.help) {
  printHelp();
  process.exit(0);
}

if (opts.version) {
  console.log(`genbench ${VERSION}`);
  process.exit(0);
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

try {
  const config: GeneratorConfig = opts.config === null ? DEFAULT_CONFIG : configFromFile(opts.config);
  const seed = opts.seed ?? Date.now();
  const rng = Random.fromSeed(seed);

  if (opts.emit !== null || opts.ir) {
    const { program } = generateValidProgram(rng.fork(), config, { onAttempt: attemptLogger(opts.verbose) });
    if (opts.ir) console.log(printProgram(program));
    if (opts.emit !== null) {
      process.stdout.write(emitProgram(program, DIALECTS[opts.emit], { iterations: config.benchmarkIterations }));
    }
  } else {
    console.log(`seed ${seed}`);
    generateCorpus(rng, seed, config, opts);
  }
} catch (error) {
  if (error instanceof GenBenchError) {
    console.error(`error[${error.code}]: ${error.message}`);
    process.exit(1);
  }
  throw error;
}
