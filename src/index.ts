// ABOUTME: Public library API for valref.
// ABOUTME: Re-exports the resolver, document loading, configuration, and error types.

export * from "./resolver/index.ts";

export { fileConfigSchema, loadConfig, parseFileConfig } from "./config.ts";
export {
  AmbiguousPathError,
  CircularDependencyError,
  ConfigError,
  DocumentLoadError,
  ErrorCodes,
  isResolutionError,
  MaxDepthExceededError,
  NonStringifiableValueError,
  ReferenceNotFoundError,
  ResolutionError,
  TemplateSyntaxError,
} from "./errors.ts";
export { detectFormat, loadAll, loadDocument, parseDocument } from "./parser.ts";
export { processDocuments } from "./processor.ts";
export { format, formatDiagnostics, formatJson, formatTerminal, formatYaml } from "./reporters/index.ts";
export { scanDocuments } from "./scanner.ts";
export { DEFAULT_CONFIG, DEFAULT_DELIMITERS, DEFAULT_MAX_DEPTH, isConfigMap, isConfigScalar, setEntry } from "./types.ts";

export type { FileConfig, LoadConfigOptions } from "./config.ts";
export type { ErrorCode, ResolutionErrorJson } from "./errors.ts";
export type { DocumentFormat, LoadAllResult, LoadError } from "./parser.ts";
export type { ProcessOptions } from "./processor.ts";
export type { FormatOptions } from "./reporters/index.ts";
export type { ScanOptions as DocumentScanOptions, ScanResult } from "./scanner.ts";
export type {
  ConfigMap,
  ConfigScalar,
  ConfigValue,
  Delimiters,
  DocumentOutcome,
  FailedDocument,
  OutputFormat,
  ResolvedDocument,
  RunSummary,
  ValrefConfig,
} from "./types.ts";
