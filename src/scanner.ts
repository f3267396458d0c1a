// ABOUTME: Document scanner that discovers YAML and JSON configuration files using glob patterns.
// ABOUTME: Uses fast-glob to find files while respecting ignore patterns.

import process from "node:process";
import fg from "fast-glob";

export interface ScanOptions {
  include: string[];
  exclude: string[];
  cwd?: string;
}

export interface ScanResult {
  yaml: string[];
  json: string[];
}

const YAML_EXTENSIONS = [".yml", ".yaml"];
const JSON_EXTENSIONS = [".json"];

export async function scanDocuments(options: ScanOptions): Promise<ScanResult> {
  const { include, exclude, cwd = process.cwd() } = options;

  const files = await fg(include, {
    cwd,
    ignore: exclude,
    absolute: true,
    onlyFiles: true,
  });
  files.sort();

  const yaml: string[] = [];
  const json: string[] = [];

  for (const file of files) {
    const ext = file.slice(file.lastIndexOf(".")).toLowerCase();
    if (YAML_EXTENSIONS.includes(ext)) {
      yaml.push(file);
    }
    else if (JSON_EXTENSIONS.includes(ext)) {
      json.push(file);
    }
  }

  return { yaml, json };
}
