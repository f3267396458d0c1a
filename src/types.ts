// ABOUTME: Core type definitions for valref.
// ABOUTME: Defines configuration values, CLI configuration, resolver defaults, and run results.

import type { ResolutionError } from "./errors.ts";
import type { ResolutionReport } from "./resolver/types.ts";

export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMap;

export interface ConfigMap {
  [key: string]: ConfigValue;
}

export type Delimiters = readonly [open: string, close: string];

export type OutputFormat = "terminal" | "json" | "yaml";

export interface ValrefConfig {
  include: string[];
  exclude: string[];
  maxDepth: number;
  delimiters: Delimiters;
  resolve: boolean;
  output: OutputFormat;
  strict: boolean;
}

export const DEFAULT_MAX_DEPTH = 10;

export const DEFAULT_DELIMITERS: Delimiters = ["{{", "}}"];

export const DEFAULT_CONFIG: ValrefConfig = {
  include: ["**/*.{yml,yaml,json}"],
  exclude: ["**/node_modules/**", "**/package.json", "**/package-lock.json", "**/tsconfig.json"],
  maxDepth: DEFAULT_MAX_DEPTH,
  delimiters: DEFAULT_DELIMITERS,
  resolve: true,
  output: "terminal",
  strict: false,
};

export function isConfigMap(value: ConfigValue | undefined): value is ConfigMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Defines an own entry, so keys such as "__proto__" stay plain data
export function setEntry(map: ConfigMap, key: string, value: ConfigValue): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

export function isConfigScalar(value: ConfigValue): value is ConfigScalar {
  return value === null || typeof value !== "object";
}

export interface ResolvedDocument {
  file: string;
  ok: true;
  tree: ConfigValue;
  report: ResolutionReport;
}

export interface FailedDocument {
  file: string;
  ok: false;
  error: ResolutionError;
}

export type DocumentOutcome = ResolvedDocument | FailedDocument;

export interface RunSummary {
  documents: DocumentOutcome[];
  resolvedCount: number;
  failedCount: number;
  loadErrors: Array<{ file: string; error: string }>;
  passed: boolean;
}
