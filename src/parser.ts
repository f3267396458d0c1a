// ABOUTME: Loads configuration documents from YAML and JSON files.
// ABOUTME: Converts parsed content into configuration trees and collects per-file load errors.

import type { ConfigMap, ConfigValue } from "./types.ts";
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import * as yaml from "js-yaml";
import { DocumentLoadError } from "./errors.ts";
import { isConfigMap, setEntry } from "./types.ts";

export type DocumentFormat = "yaml" | "json" | "auto";

export interface LoadError {
  file: string;
  error: string;
}

export interface LoadAllResult {
  documents: Map<string, ConfigMap>;
  loadErrors: LoadError[];
}

function toConfigValue(value: unknown, file: string, at: string): ConfigValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new DocumentLoadError(file, `non-finite number at '${at}'`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toConfigValue(item, file, at ? `${at}.${index}` : `${index}`));
  }
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    const map: ConfigMap = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(map, key, toConfigValue(item, file, at ? `${at}.${key}` : key));
    }
    return map;
  }
  throw new DocumentLoadError(file, `unsupported value at '${at}' (${Object.prototype.toString.call(value)})`);
}

function parseYaml(text: string, file: string): unknown {
  try {
    return yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: file });
  }
  catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError(file, `invalid YAML: ${msg}`);
  }
}

function parseJson(text: string, file: string): unknown {
  try {
    return JSON.parse(text);
  }
  catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError(file, `invalid JSON: ${msg}`);
  }
}

export function detectFormat(file: string): DocumentFormat {
  const ext = extname(file).toLowerCase();
  if (ext === ".yml" || ext === ".yaml")
    return "yaml";
  if (ext === ".json")
    return "json";
  return "auto";
}

export function parseDocument(text: string, format: DocumentFormat = "auto", file = "<input>"): ConfigMap {
  let parsed: unknown;
  if (format === "json") {
    parsed = parseJson(text, file);
  }
  else if (format === "yaml") {
    parsed = parseYaml(text, file);
  }
  else {
    // YAML first, then JSON
    try {
      parsed = parseYaml(text, file);
    }
    catch (yamlError) {
      try {
        parsed = parseJson(text, file);
      }
      catch {
        throw yamlError;
      }
    }
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  const tree = toConfigValue(parsed, file, "");
  if (!isConfigMap(tree)) {
    throw new DocumentLoadError(file, "document root must be a map of keys to values");
  }
  return tree;
}

export async function loadDocument(file: string): Promise<ConfigMap> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  }
  catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError(file, `cannot read file: ${msg}`);
  }
  return parseDocument(text, detectFormat(file), file);
}

export async function loadAll(files: string[]): Promise<LoadAllResult> {
  const documents = new Map<string, ConfigMap>();
  const loadErrors: LoadError[] = [];

  for (const file of files) {
    try {
      documents.set(file, await loadDocument(file));
    }
    catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      loadErrors.push({ file, error: msg });
    }
  }

  return { documents, loadErrors };
}
