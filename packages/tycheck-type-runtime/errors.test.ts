// packages/tycheck-type-runtime/errors.test.ts
import { expect, test } from "vitest";
import {
  buildPath,
  NotImplementedCheckError,
  TypeMismatchError,
  wrapMismatch,
} from "./errors.ts";

test("buildPath - names and indexes", () => {
  expect(buildPath([])).toBe("");
  expect(buildPath(["user", "tags", 2])).toBe("user.tags[2]");
  expect(buildPath([0, "name"])).toBe("[0].name");
  expect(buildPath([1, 1])).toBe("[1][1]");
});

test("TypeMismatchError - is a TypeError with a name", () => {
  const err = new TypeMismatchError("bad");
  expect(err).toBeInstanceOf(TypeError);
  expect(err.name).toBe("TypeMismatchError");
  expect(err.segment).toBeUndefined();
  expect(err.chain).toEqual([err]);
  expect(err.rootCause).toBe(err);
  expect(err.path).toBe("");
});

test("wrapMismatch - chains mismatches with their segment", () => {
  const root = new TypeMismatchError("root");
  const middle = wrapMismatch(root, "middle", "items");
  const outer = wrapMismatch(middle, "outer", 0);

  expect(outer).toBeInstanceOf(TypeMismatchError);
  if (outer instanceof TypeMismatchError) {
    expect(outer.segment).toBe(0);
    expect(outer.chain.map((e) => e.message)).toEqual(["outer", "middle", "root"]);
    expect(outer.rootCause).toBe(root);
    expect(outer.path).toBe("[0].items");
    expect(outer.describe()).toBe(
      "outer\n  caused by: middle\n    caused by: root",
    );
  }
});

test("wrapMismatch - other errors pass through untouched", () => {
  const boom = new Error("boom");
  expect(wrapMismatch(boom, "context", "x")).toBe(boom);
  const unsupported = new NotImplementedCheckError("nope");
  expect(wrapMismatch(unsupported, "context")).toBe(unsupported);
  expect(unsupported.name).toBe("NotImplementedCheckError");
});
