// ABOUTME: Output reporters for valref results.
// ABOUTME: Supports terminal, JSON, and YAML output formats.

import type { ResolutionReport } from "../resolver/types.ts";
import type { OutputFormat, RunSummary } from "../types.ts";
import * as yaml from "js-yaml";

export interface FormatOptions {
  verbose?: boolean;
}

function dumpYaml(value: unknown): string {
  return yaml.dump(value, { noRefs: true, lineWidth: -1 }).trimEnd();
}

function indent(text: string, prefix: string): string[] {
  return text.split("\n").map(line => `${prefix}${line}`);
}

export function formatDiagnostics(report: ResolutionReport): string[] {
  if (!report.enabled) {
    return ["Resolution disabled: document passed through unchanged"];
  }

  const lines: string[] = [];
  const edges = Object.entries(report.edges);
  lines.push(`Dependency graph: ${edges.length} node(s)`);
  for (const [node, references] of edges) {
    lines.push(`  ${node} depends on: ${references.join(", ")}`);
  }
  lines.push(`Resolution order: ${report.order.length > 0 ? report.order.join(" → ") : "(none)"}`);
  for (const path of report.order) {
    lines.push(`  ${path}: depth ${report.depths[path] ?? 0}`);
  }
  lines.push(`Resolution completed in ${report.passes} pass(es)`);
  return lines;
}

export function formatTerminal(summary: RunSummary, options: FormatOptions = {}): string {
  const lines: string[] = [];
  const { documents, resolvedCount, failedCount, loadErrors, passed } = summary;
  const { verbose } = options;

  lines.push(`valref - Resolution Report`);
  lines.push(`${"─".repeat(50)}`);
  lines.push(``);
  lines.push(`Documents: ${documents.length}  Resolved: ${resolvedCount}  Failed: ${failedCount}`);
  if (loadErrors.length > 0) {
    lines.push(`Skipped: ${loadErrors.length} document(s) could not be loaded`);
    for (const { file, error } of loadErrors) {
      lines.push(`  ${file}: ${error}`);
    }
  }
  lines.push(``);

  for (const outcome of documents) {
    lines.push(outcome.file);
    if (outcome.ok) {
      lines.push(...indent(dumpYaml(outcome.tree), "  "));
      if (verbose) {
        lines.push(``);
        lines.push(...indent(formatDiagnostics(outcome.report).join("\n"), "  "));
      }
    }
    else {
      lines.push(`  ✗ ${outcome.error.code}: ${outcome.error.message}`);
    }
    lines.push(``);
  }

  lines.push(`${"─".repeat(50)}`);
  lines.push(passed ? `PASS: All documents resolved` : `FAIL: ${failedCount} document(s) could not be resolved`);

  return lines.join("\n");
}

export function formatJson(summary: RunSummary): string {
  const documents = summary.documents.map(outcome =>
    outcome.ok
      ? { file: outcome.file, resolved: outcome.tree, report: outcome.report }
      : { file: outcome.file, error: outcome.error.toJSON() },
  );
  return JSON.stringify(
    {
      documents,
      resolved: summary.resolvedCount,
      failed: summary.failedCount,
      loadErrors: summary.loadErrors,
      passed: summary.passed,
    },
    null,
    2,
  );
}

export function formatYaml(summary: RunSummary): string {
  return summary.documents
    .map(outcome =>
      outcome.ok
        ? `# ${outcome.file}\n${dumpYaml(outcome.tree)}`
        : `# ${outcome.file}\n# error: ${outcome.error.message}`,
    )
    .join("\n---\n");
}

export function format(
  summary: RunSummary,
  outputFormat: OutputFormat,
  options: FormatOptions = {},
): string {
  switch (outputFormat) {
    case "json":
      return formatJson(summary);
    case "yaml":
      return formatYaml(summary);
    case "terminal":
    default:
      return formatTerminal(summary, options);
  }
}
