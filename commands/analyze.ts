/**
 * CLI: analyze one lot and print the development potential as JSON.
 *
 *   tsx commands/analyze.ts "RL2-0 SP:1" --area 900 --frontage 25 [--depth 36]
 *     [--height 7.5] [--corner] [--garage]
 */

import { fileURLToPath } from "node:url";
import { z } from "zod";

import {
  loadEnvConfig,
  logger,
  setLogDestination,
  setLogLevel,
  ValidationError,
} from "@oakville-zoning/shared";
import {
  analyzeDevelopmentPotential,
  parseLotGeometry,
  type AnalysisRequest,
  type DevelopmentPotential,
  type RegulationRepository,
} from "@oakville-zoning/zoning";

const BOOLEAN_FLAGS = new Set(["--corner", "--garage"]);

const CommandOptionsSchema = z.object({
  zoneCode: z.string().trim().min(1, "zone code is required"),
  buildingHeight: z.number().finite().positive().optional(),
});

function toNumber(option: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (value.trim() === "") {
    throw new ValidationError("Invalid arguments", [`${option}: value must not be blank`]);
  }
  return Number(value);
}

/** Turn argv (without node and script) into a validated analysis request. */
export function parseArgs(argv: string[]): AnalysisRequest {
  const options = new Map<string, string>();
  const flags = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const val = argv[i];
    if (val === undefined) continue;
    if (!val.startsWith("--")) {
      positionals.push(val);
      continue;
    }
    if (BOOLEAN_FLAGS.has(val)) {
      flags.add(val);
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new ValidationError("Invalid arguments", [`${val}: missing value`]);
    }
    options.set(val, next);
    i += 1;
  }

  const parsed = CommandOptionsSchema.safeParse({
    zoneCode: positionals.join(" "),
    buildingHeight: toNumber("--height", options.get("--height")),
  });
  if (!parsed.success) {
    throw new ValidationError(
      "Invalid arguments",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const lot = parseLotGeometry({
    area: toNumber("--area", options.get("--area")),
    frontage: toNumber("--frontage", options.get("--frontage")),
    depth: toNumber("--depth", options.get("--depth")),
    isCorner: flags.has("--corner"),
    hasGarage: flags.has("--garage"),
  });

  return { ...parsed.data, lot };
}

/**
 * Run one analysis from argv and print the result on stdout. stdout carries
 * only the JSON document; log events go to stderr.
 */
export function runAnalyze(
  argv: string[],
  repository?: RegulationRepository,
): DevelopmentPotential {
  setLogDestination("stderr");
  const request = parseArgs(argv);
  const result = analyzeDevelopmentPotential(request, repository);
  logger.info("runAnalyze", {
    zoneCode: result.zoneCode,
    meetsMinimumRequirements: result.meetsMinimumRequirements,
  });
  console.log(JSON.stringify(result, null, 2));
  return result;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  try {
    setLogLevel(loadEnvConfig().logLevel);
    runAnalyze(process.argv.slice(2));
  } catch (error) {
    logger.error("runAnalyze failed", {
      error: String(error),
      issues: error instanceof ValidationError ? error.issues : undefined,
    });
    process.exit(1);
  }
}
