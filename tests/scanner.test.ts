// ABOUTME: Unit tests for document scanner.
// ABOUTME: Tests glob-based discovery of YAML and JSON documents.

import { mkdir, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { scanDocuments } from "../src/scanner.ts";
import { DEFAULT_CONFIG } from "../src/types.ts";

const TEST_DIR = join(dirname(fileURLToPath(import.meta.url)), "fixtures/scanner-test");

beforeAll(async () => {
  await mkdir(join(TEST_DIR, "services"), { recursive: true });
  await mkdir(join(TEST_DIR, "node_modules/pkg"), { recursive: true });

  await writeFile(join(TEST_DIR, "app.yaml"), "name: app\n");
  await writeFile(join(TEST_DIR, "services/api.yml"), "port: 8080\n");
  await writeFile(join(TEST_DIR, "services/worker.json"), "{\"queue\": \"jobs\"}");
  await writeFile(join(TEST_DIR, "README.md"), "# docs\n");
  await writeFile(join(TEST_DIR, "package.json"), "{\"name\": \"fixture\"}");
  await writeFile(join(TEST_DIR, "node_modules/pkg/config.yml"), "ignored: true\n");
});

afterAll(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("scanDocuments", () => {
  test("finds YAML and JSON documents", async () => {
    const result = await scanDocuments({
      include: DEFAULT_CONFIG.include,
      exclude: DEFAULT_CONFIG.exclude,
      cwd: TEST_DIR,
    });

    expect(result.yaml).toEqual([
      join(TEST_DIR, "app.yaml"),
      join(TEST_DIR, "services/api.yml"),
    ]);
    expect(result.json).toEqual([join(TEST_DIR, "services/worker.json")]);
  });

  test("respects exclude patterns", async () => {
    const result = await scanDocuments({
      include: ["**/*.yml"],
      exclude: ["**/services/**"],
      cwd: TEST_DIR,
    });

    expect(result.yaml).toEqual([join(TEST_DIR, "node_modules/pkg/config.yml")]);
    expect(result.json).toEqual([]);
  });

  test("returns empty results when nothing matches", async () => {
    const result = await scanDocuments({
      include: ["**/*.toml"],
      exclude: [],
      cwd: TEST_DIR,
    });

    expect(result).toEqual({ yaml: [], json: [] });
  });
});
