#!/usr/bin/env tsx
// ABOUTME: CLI entry point for valref.
// ABOUTME: Parses arguments, loads and resolves documents, and outputs results.

import type { Delimiters, OutputFormat } from "./types.ts";
import process from "node:process";
import { InvalidArgumentError, program } from "commander";
import { loadConfig } from "./config.ts";
import { loadAll } from "./parser.ts";
import { processDocuments } from "./processor.ts";
import { format } from "./reporters/index.ts";
import { scanDocuments } from "./scanner.ts";

interface CliOptions {
  config?: string;
  maxDepth?: number;
  delimiters?: Delimiters;
  resolve?: boolean;
  output?: OutputFormat;
  strict?: boolean;
  verbose?: boolean;
}

const pkg = { version: "0.1.0", name: "valref" };

const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json", "yaml"];

function parseMaxDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return depth;
}

function parseDelimiters(value: string): Delimiters {
  const [open, close, ...rest] = value.split(",");
  if (!open || !close || rest.length > 0) {
    throw new InvalidArgumentError("Expected two comma-separated delimiters, e.g. \"{{,}}\".");
  }
  return [open, close];
}

function parseOutput(value: string): OutputFormat {
  const match = OUTPUT_FORMATS.find(f => f === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(", ")}.`);
  }
  return match;
}

program
  .name(pkg.name)
  .version(pkg.version)
  .description("Resolve self-referencing values in YAML and JSON configuration documents")
  .argument("[glob]", "Documents to resolve (defaults to the configured include patterns)")
  .option("-c, --config <path>", "Path to config file")
  .option("--max-depth <n>", "Maximum length of a reference chain", parseMaxDepth)
  .option("--delimiters <open,close>", "Expression delimiters", parseDelimiters)
  .option("--no-resolve", "Pass documents through without resolving references")
  .option("-o, --output <format>", "Output format: terminal, json, yaml", parseOutput)
  .option("--strict", "Fail when a document cannot be loaded")
  .option("-v, --verbose", "Show dependency edges, resolution order, and depths")
  // Usage errors share the configuration exit code
  .exitOverride(err => {
    process.exit(err.exitCode === 0 ? 0 : 2);
  })
  .action(async (glob: string | undefined, options: CliOptions) => {
    try {
      await run(glob, options);
    }
    catch (error) {
      console.error("Error:", error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });

async function run(glob: string | undefined, options: CliOptions): Promise<void> {
  const config = await loadConfig({
    configPath: options.config,
    cliOptions: {
      maxDepth: options.maxDepth,
      delimiters: options.delimiters,
      // commander defaults --no-resolve to true; only an explicit flag overrides the file
      resolve: options.resolve === false ? false : undefined,
      output: options.output,
      strict: options.strict,
    },
  });

  const includePatterns = glob ? [glob] : config.include;
  const found = await scanDocuments({
    include: includePatterns,
    exclude: config.exclude,
  });
  const files = [...found.yaml, ...found.json];

  if (files.length === 0) {
    console.error(`No documents matched: ${includePatterns.join(", ")}`);
    process.exit(2);
  }

  const { documents, loadErrors } = await loadAll(files);

  if (config.strict && loadErrors.length > 0) {
    console.error("Load errors in strict mode:");
    for (const { file, error } of loadErrors) {
      console.error(`  ${file}: ${error}`);
    }
    process.exit(2);
  }

  const summary = processDocuments({ documents, config, loadErrors });

  const output = format(summary, config.output, { verbose: options.verbose });
  console.log(output);

  process.exit(summary.passed ? 0 : 1);
}

await program.parseAsync();
