// Generator configuration: weight tables, size limits and budgets.
// Defaults reproduce the distribution the benchmark corpus was built with.

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors/index.ts";
import {
  GENERATED_INST_KINDS,
  TYPE_KINDS,
  type GeneratedInstKind,
  type TypeKind,
} from "../ir/ir-types/index.ts";
import type { WeightTable } from "../random/weighted.ts";

// =========================================================================
// Configuration Types
// =========================================================================

export type GeneratorConfig = {
  /** Relative frequency of each instruction kind, before legality pruning. */
  instWeights: WeightTable<GeneratedInstKind>;
  /** Relative frequency of each type variant, before pruning. */
  typeWeights: WeightTable<TypeKind>;
  /** Distribution of function parameter counts. */
  paramCountWeights: WeightTable<number>;
  /** Distribution of struct property counts. */
  propertyCountWeights: WeightTable<number>;
  /** Distribution of the return value's offset from the end of the size-sorted candidates. */
  returnOffsetWeights: WeightTable<number>;
  /** Executed-instruction ceiling for a single validation run. */
  opLimit: number;
  /** A run executing this many instructions or fewer is too trivial to keep. */
  minOps: number;
  /** Instructions generated per body are drawn from [instMin, instLimit). */
  instMin: number;
  instLimit: number;
  /** Function count is drawn from [1, functionLimit). */
  functionLimit: number;
  /** Struct count is drawn from [0, structLimit). */
  structLimit: number;
  /** Array budget for generated types; array literal lengths are drawn from [1, arrayLimit). */
  arrayLimit: number;
  /** Entry invocations inside the timed region of every emitted harness. */
  benchmarkIterations: number;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: GeneratorConfig = {
  instWeights: [
    ["call", 10],
    ["binary", 1],
    ["var", 10],
    ["assign", 1],
    ["new_array", 1],
    ["array_get", 10],
    ["array_set", 5],
    ["new_struct", 1],
    ["struct_get", 10],
    ["struct_set", 5],
  ],
  typeWeights: [
    ["scalar", 1],
    ["array", 50],
    ["struct", 50],
  ],
  paramCountWeights: [
    [1, 100],
    [2, 80],
    [3, 40],
    [4, 20],
    [5, 10],
    [6, 5],
    [7, 3],
    [8, 1],
  ],
  propertyCountWeights: [
    [1, 40],
    [2, 1000],
    [3, 80],
    [4, 40],
    [5, 20],
    [6, 10],
    [7, 5],
    [8, 5],
  ],
  returnOffsetWeights: [
    [-1, 100],
    [-2, 50],
    [-3, 25],
    [-4, 10],
    [-5, 5],
    [-6, 3],
    [-7, 2],
    [-8, 1],
  ],
  opLimit: 5000,
  minOps: 10,
  instMin: 8,
  instLimit: 256,
  functionLimit: 128,
  structLimit: 16,
  arrayLimit: 8,
  benchmarkIterations: 1000,
};

// =========================================================================
// Schema
// =========================================================================

const ALWAYS_LEGAL: ReadonlySet<GeneratedInstKind> = new Set(["var", "new_array"]);

const Weight = z.number().int().nonnegative();

const PartialConfigSchema = z
  .object({
    instWeights: z.array(z.tuple([z.enum(GENERATED_INST_KINDS), Weight])).nonempty(),
    typeWeights: z.array(z.tuple([z.enum(TYPE_KINDS), Weight])).nonempty(),
    paramCountWeights: z.array(z.tuple([z.number().int().positive(), Weight])).nonempty(),
    propertyCountWeights: z.array(z.tuple([z.number().int().positive(), Weight])).nonempty(),
    returnOffsetWeights: z.array(z.tuple([z.number().int().negative(), Weight])).nonempty(),
    opLimit: z.number().int().positive(),
    minOps: z.number().int().nonnegative(),
    instMin: z.number().int().nonnegative(),
    instLimit: z.number().int().positive(),
    functionLimit: z.number().int().min(2),
    structLimit: z.number().int().positive(),
    arrayLimit: z.number().int().min(2),
    benchmarkIterations: z.number().int().positive(),
  })
  .partial()
  .strict();

export type PartialGeneratorConfig = z.infer<typeof PartialConfigSchema>;

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Merge configs with later ones overriding earlier ones. Inputs are taken
 * as already validated; `configFromObject` runs the schema and `checkConfig`.
 */
export function mergeConfigs(...configs: PartialGeneratorConfig[]): GeneratorConfig {
  let result: GeneratorConfig = { ...DEFAULT_CONFIG };
  for (const cfg of configs) {
    result = { ...result, ...stripUndefined(cfg) };
  }
  return result;
}

/** Validate a plain object (e.g. parsed JSON) and merge it onto the defaults. */
export function configFromObject(data: unknown, source = "<object>"): GeneratorConfig {
  const parsed = PartialConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  const config = mergeConfigs(parsed.data);
  const issues = checkConfig(config);
  if (issues.length > 0) {
    throw new ConfigError(source, issues);
  }
  return config;
}

/** Load a JSON configuration file. */
export function configFromFile(filePath: string): GeneratorConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(filePath, ["file not found"]);
  }
  if (path.extname(filePath).toLowerCase() !== ".json") {
    throw new ConfigError(filePath, [`unsupported config file format: ${path.extname(filePath)}`]);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(filePath, [message]);
  }
  return configFromObject(data, filePath);
}

/** Cross-field constraints. Returns one message per violation. */
export function checkConfig(config: GeneratorConfig): string[] {
  const issues: string[] = [];
  if (config.instMin >= config.instLimit) {
    issues.push(`instMin (${config.instMin}) must be below instLimit (${config.instLimit})`);
  }
  if (config.minOps >= config.opLimit) {
    issues.push(`minOps (${config.minOps}) must be below opLimit (${config.opLimit})`);
  }
  const tables = {
    instWeights: config.instWeights,
    typeWeights: config.typeWeights,
    paramCountWeights: config.paramCountWeights,
    propertyCountWeights: config.propertyCountWeights,
    returnOffsetWeights: config.returnOffsetWeights,
  };
  for (const [name, table] of Object.entries(tables)) {
    if (table.every(([, weight]) => weight === 0)) {
      issues.push(`${name} needs at least one positive weight`);
    }
  }
  if (!config.typeWeights.some(([kind, weight]) => kind === "scalar" && weight > 0)) {
    issues.push("typeWeights must give scalar a positive weight");
  }
  // The last function has no callee, so it needs a kind that is legal everywhere.
  if (!config.instWeights.some(([kind, weight]) => ALWAYS_LEGAL.has(kind) && weight > 0)) {
    issues.push("instWeights must give var or new_array a positive weight");
  }
  return issues;
}

function stripUndefined(cfg: PartialGeneratorConfig): Partial<GeneratorConfig> {
  const out: Partial<GeneratorConfig> = {};
  for (const [key, value] of Object.entries(cfg)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
