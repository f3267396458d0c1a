// ABOUTME: Config loader using cosmiconfig, validated with zod.
// ABOUTME: Searches for valref.config.json, .valrefrc, and package.json#valref.

import type { CosmiconfigResult } from "cosmiconfig";
import type { ValrefConfig } from "./types.ts";
import process from "node:process";
import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";
import { ConfigError } from "./errors.ts";
import { DEFAULT_CONFIG } from "./types.ts";

export interface LoadConfigOptions {
  cwd?: string;
  configPath?: string;
  cliOptions?: Partial<ValrefConfig>;
}

export const fileConfigSchema = z.object({
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  maxDepth: z.number().int().positive().optional(),
  delimiters: z.tuple([z.string().min(1), z.string().min(1)]).optional(),
  resolve: z.boolean().optional(),
  output: z.enum(["terminal", "json", "yaml"]).optional(),
  strict: z.boolean().optional(),
}).strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function parseFileConfig(raw: unknown, file?: string): FileConfig {
  const result = fileConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const [issue] = result.error.issues;
    const where = issue && issue.path.length > 0 ? `'${issue.path.join(".")}': ` : "";
    throw new ConfigError(`Invalid configuration ${where}${issue?.message ?? "unknown error"}`, file);
  }
  return result.data;
}

export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<ValrefConfig> {
  const { cwd = process.cwd(), configPath, cliOptions = {} } = options;

  const explorer = cosmiconfig("valref", {
    searchPlaces: [
      "valref.config.json",
      "valref.config.js",
      ".valrefrc",
      ".valrefrc.json",
      ".valrefrc.js",
      "package.json",
    ],
  });

  let fileConfig: FileConfig = {};

  let result: CosmiconfigResult;
  try {
    result = configPath
      ? await explorer.load(configPath)
      : await explorer.search(cwd);
  }
  catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot load configuration: ${msg}`, configPath);
  }

  if (result && !result.isEmpty) {
    fileConfig = parseFileConfig(result.config, result.filepath);
  }

  // Merge: defaults < file config < CLI options
  return {
    include: cliOptions.include ?? fileConfig.include ?? DEFAULT_CONFIG.include,
    exclude: cliOptions.exclude ?? fileConfig.exclude ?? DEFAULT_CONFIG.exclude,
    maxDepth: cliOptions.maxDepth ?? fileConfig.maxDepth ?? DEFAULT_CONFIG.maxDepth,
    delimiters: cliOptions.delimiters ?? fileConfig.delimiters ?? DEFAULT_CONFIG.delimiters,
    resolve: cliOptions.resolve ?? fileConfig.resolve ?? DEFAULT_CONFIG.resolve,
    output: cliOptions.output ?? fileConfig.output ?? DEFAULT_CONFIG.output,
    strict: cliOptions.strict ?? fileConfig.strict ?? DEFAULT_CONFIG.strict,
  };
}
