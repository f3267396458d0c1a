// ABOUTME: Resolves every loaded document and summarises the outcome of a run.
// ABOUTME: A resolution error fails its own document without stopping the others.

import type { ConfigMap, DocumentOutcome, RunSummary, ValrefConfig } from "./types.ts";
import { isResolutionError } from "./errors.ts";
import { resolve } from "./resolver/index.ts";

export interface ProcessOptions {
  documents: Map<string, ConfigMap>;
  config: Pick<ValrefConfig, "maxDepth" | "delimiters" | "resolve">;
  loadErrors?: Array<{ file: string; error: string }>;
}

export function processDocuments(options: ProcessOptions): RunSummary {
  const { documents, config, loadErrors = [] } = options;
  const outcomes: DocumentOutcome[] = [];

  for (const [file, tree] of documents) {
    try {
      const { tree: resolved, report } = resolve(tree, {
        maxDepth: config.maxDepth,
        delimiters: config.delimiters,
        enabled: config.resolve,
      });
      outcomes.push({ file, ok: true, tree: resolved, report });
    }
    catch (error) {
      if (!isResolutionError(error)) {
        throw error;
      }
      outcomes.push({ file, ok: false, error });
    }
  }

  const failedCount = outcomes.filter(o => !o.ok).length;
  return {
    documents: outcomes,
    resolvedCount: outcomes.length - failedCount,
    failedCount,
    loadErrors,
    passed: failedCount === 0,
  };
}
