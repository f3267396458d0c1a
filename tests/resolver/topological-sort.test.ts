// ABOUTME: Tests for topological-sort.ts
// ABOUTME: Verifies dependency order and deterministic tie-breaking.

import { describe, expect, test } from "vitest";
import { CircularDependencyError } from "../../src/errors.ts";
import { topologicalSort } from "../../src/resolver/topological-sort.ts";

describe("topologicalSort", () => {
  test("places dependencies before dependents", () => {
    const order = topologicalSort(new Map([
      ["c", ["b"]],
      ["b", ["a"]],
      ["a", []],
    ]));

    expect(order).toEqual(["a", "b", "c"]);
  });

  test("picks the earliest discovered node among those ready", () => {
    const order = topologicalSort(new Map([
      ["z", []],
      ["y", ["x"]],
      ["x", []],
      ["w", []],
    ]));

    expect(order).toEqual(["z", "x", "y", "w"]);
  });

  test("prefers an earlier node that becomes ready later", () => {
    const order = topologicalSort(new Map([
      ["first", ["last"]],
      ["middle", []],
      ["last", []],
    ]));

    expect(order).toEqual(["middle", "last", "first"]);
  });

  test("refuses cyclic input", () => {
    expect(() => topologicalSort(new Map([["a", ["b"]], ["b", ["a"]]]))).toThrow(CircularDependencyError);
  });
});
