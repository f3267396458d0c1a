// ABOUTME: Tests for depth-guard.ts
// ABOUTME: Verifies longest-chain computation and the maximum depth check.

import { describe, expect, test } from "vitest";
import { MaxDepthExceededError } from "../../src/errors.ts";
import { assertDepth, computeDepths } from "../../src/resolver/depth-guard.ts";

function chain(length: number): Map<string, string[]> {
  const map = new Map<string, string[]>();
  for (let i = 1; i <= length; i++) {
    map.set(`l${i}`, i === 1 ? [] : [`l${i - 1}`]);
  }
  return map;
}

describe("computeDepths", () => {
  test("gives depth 1 to nodes without node dependencies", () => {
    expect(computeDepths(new Map([["a", []]]))).toEqual(new Map([["a", 1]]));
  });

  test("takes the longest branch", () => {
    const depths = computeDepths(new Map([
      ["d", ["b", "c"]],
      ["a", []],
      ["b", ["a"]],
      ["c", []],
    ]));

    expect(depths.get("d")).toBe(3);
    expect(depths.get("b")).toBe(2);
    expect(depths.get("c")).toBe(1);
  });

  test("counts every level of a chain", () => {
    expect(computeDepths(chain(11)).get("l11")).toBe(11);
  });
});

describe("assertDepth", () => {
  test("accepts chains up to the maximum", () => {
    expect(() => assertDepth(computeDepths(chain(10)), 10)).not.toThrow();
  });

  test("rejects the deepest node beyond the maximum", () => {
    try {
      assertDepth(computeDepths(chain(11)), 10);
      expect.unreachable();
    }
    catch (error) {
      expect(error).toBeInstanceOf(MaxDepthExceededError);
      if (error instanceof MaxDepthExceededError) {
        expect(error.path).toBe("l11");
        expect(error.depth).toBe(11);
        expect(error.maxDepth).toBe(10);
      }
    }
  });
});
