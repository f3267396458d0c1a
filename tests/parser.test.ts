// ABOUTME: Unit tests for document loading.
// ABOUTME: Tests YAML and JSON parsing, value conversion, and load error collection.

import { mkdir, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { DocumentLoadError } from "../src/errors.ts";
import { detectFormat, loadAll, loadDocument, parseDocument } from "../src/parser.ts";

const TEST_DIR = join(dirname(fileURLToPath(import.meta.url)), "fixtures/parser-test");

beforeAll(async () => {
  await mkdir(TEST_DIR, { recursive: true });

  await writeFile(
    join(TEST_DIR, "app.yaml"),
    "app:\n  name: shop\n  url: \"https://{{ values.app.name }}.example.com\"\n",
  );
  await writeFile(join(TEST_DIR, "app.json"), "{\"port\": 8080, \"tags\": [\"a\", \"b\"]}");
  await writeFile(join(TEST_DIR, "broken.json"), "{\"port\": ");
  await writeFile(join(TEST_DIR, "list.yml"), "- one\n- two\n");
});

afterAll(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("detectFormat", () => {
  test("detects format from extension", () => {
    expect(detectFormat("a.yml")).toBe("yaml");
    expect(detectFormat("a.YAML")).toBe("yaml");
    expect(detectFormat("a.json")).toBe("json");
    expect(detectFormat("a.conf")).toBe("auto");
  });
});

describe("parseDocument", () => {
  test("parses YAML maps", () => {
    expect(parseDocument("a: 1\nb:\n  - x\n  - true\n  - null\n", "yaml")).toEqual({
      a: 1,
      b: ["x", true, null],
    });
  });

  test("keeps template text verbatim", () => {
    expect(parseDocument("a: \"{{ values.b | upper }}\"\nb: x\n", "yaml")).toEqual({
      a: "{{ values.b | upper }}",
      b: "x",
    });
  });

  test("does not turn timestamps into dates", () => {
    expect(parseDocument("released: 2024-01-15\n", "yaml")).toEqual({ released: "2024-01-15" });
  });

  test("parses JSON", () => {
    expect(parseDocument("{\"a\": {\"b\": 2}}", "json")).toEqual({ a: { b: 2 } });
  });

  test("auto format accepts YAML and JSON", () => {
    expect(parseDocument("a: 1\n")).toEqual({ a: 1 });
    expect(parseDocument("{\"a\": 1}")).toEqual({ a: 1 });
  });

  test("treats an empty document as an empty map", () => {
    expect(parseDocument("", "yaml")).toEqual({});
    expect(parseDocument("# only a comment\n", "yaml")).toEqual({});
  });

  test("rejects a root that is not a map", () => {
    expect(() => parseDocument("- a\n- b\n", "yaml", "list.yml")).toThrow(
      "list.yml: document root must be a map of keys to values",
    );
    expect(() => parseDocument("42", "json")).toThrow(DocumentLoadError);
  });

  test("keeps a __proto__ key as data", () => {
    const tree = parseDocument("{\"__proto__\": {\"x\": 1}, \"y\": 2}", "json");

    expect(Object.keys(tree)).toEqual(["__proto__", "y"]);
    expect(Object.getPrototypeOf(tree)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(tree, "__proto__")?.value).toEqual({ x: 1 });
  });

  test("rejects non-finite numbers", () => {
    expect(() => parseDocument("a:\n  b: .inf\n", "yaml", "inf.yml")).toThrow(
      "inf.yml: non-finite number at 'a.b'",
    );
  });

  test("reports invalid JSON", () => {
    expect(() => parseDocument("{", "json", "bad.json")).toThrow(/^bad\.json: invalid JSON: /);
  });

  test("reports invalid YAML", () => {
    expect(() => parseDocument("a: [1, 2\n", "yaml", "bad.yml")).toThrow(/^bad\.yml: invalid YAML: /);
  });
});

describe("loadDocument", () => {
  test("loads a YAML file", async () => {
    const tree = await loadDocument(join(TEST_DIR, "app.yaml"));
    expect(tree).toEqual({
      app: { name: "shop", url: "https://{{ values.app.name }}.example.com" },
    });
  });

  test("reports unreadable files", async () => {
    const file = join(TEST_DIR, "missing.yml");
    await expect(loadDocument(file)).rejects.toThrow(`${file}: cannot read file: `);
  });
});

describe("loadAll", () => {
  test("collects documents and load errors", async () => {
    const files = ["app.yaml", "app.json", "broken.json", "list.yml"].map(f => join(TEST_DIR, f));
    const { documents, loadErrors } = await loadAll(files);

    expect([...documents.keys()]).toEqual([join(TEST_DIR, "app.yaml"), join(TEST_DIR, "app.json")]);
    expect(documents.get(join(TEST_DIR, "app.json"))).toEqual({ port: 8080, tags: ["a", "b"] });
    expect(loadErrors.map(e => e.file)).toEqual([join(TEST_DIR, "broken.json"), join(TEST_DIR, "list.yml")]);
    expect(loadErrors[1]?.error).toBe(`${join(TEST_DIR, "list.yml")}: document root must be a map of keys to values`);
  });
});
