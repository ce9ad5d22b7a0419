// packages/tycheck-type-runtime/compiler.test.ts
import { expect, test } from "vitest";
import {
  annotate,
  d,
  defineRecord,
  Dict,
  InvalidDescriptorError,
  NotImplementedCheckError,
  TypeChecker,
  TypeMismatchError,
} from "./mod.ts";
import type { NewTypeDescriptor } from "../tycheck-type-spec/src/mod.ts";

const checker = new TypeChecker({ debug: false });

class Base {}
class Derived extends Base {}

class Point {
  constructor(public x: unknown, public y: unknown = 0) {}
}
annotate(Point, { x: d.int(), y: d.int() });

// ============================================================================
// Unparameterized containers
// ============================================================================

test("generic - unparameterized containers accept any elements", () => {
  expect(checker.isInstance([1, "a", null], d.list())).toBe(true);
  expect(checker.isInstance(new Set([1, "a"]), d.set())).toBe(true);
  expect(checker.isInstance({ a: 1, b: "x" }, d.mapping())).toBe(true);
  expect(checker.isInstance(new Map<unknown, unknown>([[1, "a"], ["b", 2]]), d.map())).toBe(true);
  expect(checker.isInstance("abc", d.sequence())).toBe(true);
});

test("generic - unparameterized containers still check the container", () => {
  expect(checker.isInstance({}, d.list())).toBe(false);
  expect(checker.isInstance(new Map(), d.dict())).toBe(false);
});

// ============================================================================
// Unions
// ============================================================================

test("union - Union[Int, String] accepts members, rejects 3.1", () => {
  const hint = d.union(d.int(), d.str());
  expect(checker.isInstance("a", hint)).toBe(true);
  expect(checker.isInstance(3, hint)).toBe(true);

  const result = checker.checkSafe(3.1, hint);
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toBe(
      "Instance of: 3.1 does not belong to: Union[Int, String].",
    );
    expect(result.error.cause).toBeUndefined();
  }
});

test("union - optional accepts null and undefined", () => {
  const hint = d.optional(d.str());
  expect(checker.isInstance(null, hint)).toBe(true);
  expect(checker.isInstance(undefined, hint)).toBe(true);
  expect(checker.isInstance(1, hint)).toBe(false);
});

test("union - non-mismatch errors propagate", () => {
  const hint = d.union(d.iterable(d.int()), d.str());
  expect(() => checker.checkType("a", hint)).toThrow(NotImplementedCheckError);
});

test("union - subtype check", () => {
  const validator = checker.compile(d.union(Base, String));
  expect(() => validator.checkSubtype(Derived)).not.toThrow();
  expect(() => validator.checkSubtype(Number)).toThrow(
    "Type: Number does not belong to: Union[Base, String].",
  );
});

// ============================================================================
// Tuples
// ============================================================================

test("tuple - fixed arity", () => {
  const hint = d.tuple(d.int(), d.str());
  expect(checker.isInstance([1, "a"], hint)).toBe(true);
  expect(() => checker.checkType([1], hint)).toThrow(
    "'Tuple[Int, String]' expects a tuple of len: 2. Tuple: [ 1 ] has len: 1.",
  );
  expect(() => checker.checkType([1, "a", "b"], hint)).toThrow(
    "'Tuple[Int, String]' expects a tuple of len: 2. Tuple: [ 1, 'a', 'b' ] has len: 3.",
  );
});

test("tuple - arity is checked before elements", () => {
  const hint = d.tuple(d.int(), d.str());
  expect(() => checker.checkType(["x"], hint)).toThrow("expects a tuple of len: 2");
});

test("tuple - element failure names the index", () => {
  const result = checker.checkSafe([1, 2], d.tuple(d.int(), d.str()));
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toBe(
      "Item: 1 of tuple: [ 1, 2 ] with value: 2 has wrong type.",
    );
    expect(result.error.path).toBe("[1]");
    expect(result.error.rootCause.message).toBe(
      "Type: 'number' is not consistent with expected type: 'String'.",
    );
  }
});

test("tuple - empty tuple accepts length 0 or 1", () => {
  const hint = d.tuple();
  expect(checker.isInstance([], hint)).toBe(true);
  expect(checker.isInstance([1], hint)).toBe(true);
  expect(() => checker.checkType([1, 2], hint)).toThrow(
    "'Tuple[()]' expects a tuple of len: 0 or 1. Tuple: [ 1, 2 ] has len: 2.",
  );
});

test("tuple - variadic accepts any length", () => {
  const hint = d.tupleOf(d.int());
  expect(checker.isInstance([], hint)).toBe(true);
  expect(checker.isInstance([1, 2, 3], hint)).toBe(true);
  expect(() => checker.checkType([1, "a"], hint)).toThrow(
    "Item: 'a' at index: 1 of collection: [ 1, 'a' ] has wrong type.",
  );
});

test("tuple - must be an array", () => {
  expect(() => checker.checkType("ab", d.tuple(d.str(), d.str()))).toThrow(
    "Type: 'string' is not consistent with expected type: 'Array'.",
  );
});

// ============================================================================
// Collections and mappings
// ============================================================================

test("collection - nested failure builds a path", () => {
  const result = checker.checkSafe([[1], [2, "x"]], d.list(d.list(d.int())));
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.path).toBe("[1][1]");
    expect(result.error.chain.length).toBe(3);
    expect(result.error.message).toBe(
      "Item: [ 2, 'x' ] at index: 1 of collection: [ [ 1 ], [ 2, 'x' ] ] has wrong type.",
    );
    expect(result.error.inner?.message).toBe(
      "Item: 'x' at index: 1 of collection: [ 2, 'x' ] has wrong type.",
    );
  }
});

test("collection - sets", () => {
  expect(checker.isInstance(new Set([1, 2]), d.set(d.int()))).toBe(true);
  expect(checker.isInstance(new Set([1, "2"]), d.set(d.int()))).toBe(false);
  expect(checker.isInstance([1], d.set(d.int()))).toBe(false);
});

test("mapping - Mapping[String, Int]", () => {
  const hint = d.mapping(d.str(), d.int());
  expect(checker.isInstance({ a: 1 }, hint)).toBe(true);
  expect(() => checker.checkType(new Map([[1, 1]]), hint)).toThrow(
    "Key: 1 of mapping: Map(1) { 1 => 1 } has wrong type.",
  );

  const result = checker.checkSafe({ a: "a" }, hint);
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toBe(
      "Value: 'a' of key: 'a' in mapping: { a: 'a' } has wrong type.",
    );
    expect(result.error.path).toBe("a");
  }
});

test("mapping - dict rejects Map instances", () => {
  expect(() => checker.checkType(new Map(), d.dict(d.str(), d.int()))).toThrow(
    "Type: 'Map' is not consistent with expected type: 'Dict'.",
  );
});

test("mapping - subtype check uses the origin", () => {
  const validator = checker.compile(d.mapping(d.str(), d.int()));
  expect(() => validator.checkSubtype(Map)).not.toThrow();
  expect(() => validator.checkSubtype(Dict)).not.toThrow();
  expect(() => validator.checkSubtype(Array)).toThrow(TypeMismatchError);
});

test("mapping - wrong number of type arguments", () => {
  expect(() => checker.compile(d.generic(Map, d.str()))).toThrow(
    "Map[String] takes 0 or 2 type arguments. Got 1.",
  );
});

// ============================================================================
// Records
// ============================================================================

const Pair = defineRecord("Pair", { a: d.str(), b: d.int() });

test("record - total record accepts exact keys", () => {
  expect(checker.isInstance({ a: "x", b: 1 }, Pair)).toBe(true);
});

test("record - total record rejects missing keys", () => {
  expect(() => checker.checkType({ a: "x" }, Pair)).toThrow(
    "Keys: [ 'b' ] of typed dict: 'Pair' are not set in { a: 'x' }.",
  );
});

test("record - rejects unknown keys", () => {
  expect(() => checker.checkType({ a: "x", b: 1, c: 2 }, Pair)).toThrow(
    "Keys: [ 'c' ] of dict: { a: 'x', b: 1, c: 2 } are not part of typed dict: 'Pair'.",
  );
});

test("record - field failure names the field", () => {
  const result = checker.checkSafe({ a: 1, b: 1 }, Pair);
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toBe(
      "Key: 'a' of typed dict: { a: 1, b: 1 } with value: 1 has wrong type.",
    );
    expect(result.error.path).toBe("a");
  }
});

test("record - partial record allows missing keys", () => {
  const Loose = defineRecord("Loose", { a: d.str(), b: d.int() }, { total: false });
  expect(checker.isInstance({ a: "x" }, Loose)).toBe(true);
  expect(checker.isInstance({}, Loose)).toBe(true);
  expect(checker.isInstance({ b: "x" }, Loose)).toBe(false);
});

test("record - partial record still rejects unknown keys", () => {
  const Loose = defineRecord("Loose", { a: d.str(), b: d.int() }, { total: false });
  expect(checker.isInstance({ a: "x", z: 1 }, Loose)).toBe(false);
  expect(() => checker.checkType({ a: "x", z: 1 }, Loose)).toThrow(
    "Keys: [ 'z' ] of dict: { a: 'x', z: 1 } are not part of typed dict: 'Loose'.",
  );
});

test("record - must be a plain object", () => {
  expect(() => checker.checkType(new Map(), Pair)).toThrow(
    "Type: 'Map' is not consistent with expected type: 'Pair'.",
  );
});

test("record - subtype check", () => {
  const validator = checker.compile(Pair);
  expect(() => validator.checkSubtype(Pair)).not.toThrow();
  expect(() => validator.checkSubtype(Dict)).not.toThrow();
  expect(() => validator.checkSubtype(Object)).not.toThrow();
  expect(() => validator.checkSubtype(Map)).toThrow(
    "Type: 'Map' is not consistent with expected type: 'Pair'.",
  );
});

test("record - without fields cannot be compiled", () => {
  expect(() => checker.compile(defineRecord("Opaque", undefined))).toThrow(
    "Record type 'Opaque' declares no fields.",
  );
});

// ============================================================================
// Declared attributes
// ============================================================================

test("concrete - declared attribute with wrong type fails", () => {
  const point = new Point("1");
  expect(point instanceof Point).toBe(true);

  const result = checker.checkSafe(point, Point);
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toBe(
      "Attribute: 'x' of instance: Point { x: '1', y: 0 } with value: '1' has wrong type.",
    );
    expect(result.error.path).toBe("x");
  }
});

test("concrete - valid attributes pass", () => {
  expect(checker.isInstance(new Point(1, 2), Point)).toBe(true);
});

test("concrete - class-scoped attribute is read from the class", () => {
  class Settings {
    static version: unknown = "1";
  }
  annotate(Settings, { version: d.classVar(d.int()) });

  expect(() => checker.checkType(new Settings(), Settings)).toThrow(
    "Attribute: 'version' of instance: Settings {} with value: '1' has wrong type.",
  );
  Settings.version = 2;
  const fresh = new TypeChecker();
  expect(fresh.isInstance(new Settings(), Settings)).toBe(true);
});

test("concrete - class-scoped attribute follows the instance's own class", () => {
  class Release {
    static version: unknown = "1";
  }
  annotate(Release, { version: d.classVar(d.int()) });
  class Patched extends Release {
    static version = 2;
  }

  expect(checker.isInstance(new Patched(), Release)).toBe(true);
  expect(checker.isInstance(new Release(), Release)).toBe(false);
});

test("concrete - later annotations replace the compiled attributes", () => {
  class Gauge {
    level: unknown = "high";
  }
  annotate(Gauge, { level: d.str() });
  expect(checker.isInstance(new Gauge(), Gauge)).toBe(true);

  annotate(Gauge, { level: d.int() });
  expect(() => checker.checkType(new Gauge(), Gauge)).toThrow(
    "Attribute: 'level' of instance: Gauge { level: 'high' } with value: 'high' has wrong type.",
  );
});

test("concrete - cyclic instances terminate", () => {
  class Ring {
    peer: unknown = null;
  }
  annotate(Ring, { peer: d.optional(Ring) });
  const ring = new Ring();
  ring.peer = ring;
  expect(checker.isInstance(ring, Ring)).toBe(true);
});

test("concrete - subtype check has no attribute recursion", () => {
  const validator = checker.compile(Point);
  expect(() => validator.checkSubtype(Point)).not.toThrow();
  expect(() => validator.checkSubtype(Base)).toThrow(
    "Type: 'Base' is not consistent with expected type: 'Point'.",
  );
});

// ============================================================================
// Literals, callables, Type[X]
// ============================================================================

test("literal - Literal[1, 2, 3]", () => {
  const hint = d.literal(1, 2, 3);
  expect(checker.isInstance(1, hint)).toBe(true);
  expect(() => checker.checkType(4, hint)).toThrow(
    "Value: 4 is not in the list of literals: [ 1, 2, 3 ].",
  );
  expect(checker.isInstance("1", hint)).toBe(false);
});

test("literal - NaN matches NaN", () => {
  expect(checker.isInstance(NaN, d.literal(NaN))).toBe(true);
});

test("literal - subtype check is not implemented", () => {
  expect(() => checker.compile(d.literal(1)).checkSubtype(Number)).toThrow(
    "LiteralValidator does not implement 'checkSubtype'.",
  );
});

test("callable - only callability is checked", () => {
  const hint = d.callable([d.int()], d.str());
  expect(checker.isInstance(() => 1, hint)).toBe(true);
  expect(checker.isInstance(Base, hint)).toBe(true);
  expect(() => checker.checkType(1, hint)).toThrow(
    "Callable type: 'Callable[[Int], String]' expects a callable. 1 isn't.",
  );
  expect(() => checker.compile(hint).checkSubtype(Function)).toThrow(
    NotImplementedCheckError,
  );
});

test("typeOf - value is a subclass", () => {
  const hint = d.typeOf(Base);
  expect(checker.isInstance(Derived, hint)).toBe(true);
  expect(checker.isInstance(Base, hint)).toBe(true);
  expect(() => checker.checkType(String, hint)).toThrow(
    "Type: 'String' is not consistent with expected type: 'Base'.",
  );
  expect(checker.isInstance(new Derived(), hint)).toBe(false);
  expect(() => checker.compile(hint).checkSubtype(Base)).toThrow(
    "TypeOfValidator does not implement 'checkSubtype'.",
  );
});

// ============================================================================
// Generics, type variables, new types
// ============================================================================

test("generic - user class checks the origin only", () => {
  class Box {
    constructor(public item: unknown) {}
  }
  const hint = d.generic(Box, d.int());
  expect(checker.isInstance(new Box("not an int"), hint)).toBe(true);
  expect(() => checker.checkType({}, hint)).toThrow(
    "Type: 'Object' is not consistent with expected type: 'Box'.",
  );
});

test("generic - unexpected origin errors become not implemented", () => {
  class Weird {
    static [Symbol.hasInstance](): boolean {
      throw new Error("boom");
    }
  }
  let caught: unknown;
  try {
    checker.checkType({}, d.generic(Weird));
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(NotImplementedCheckError);
  if (caught instanceof NotImplementedCheckError) {
    expect(caught.message).toBe(
      "Could not check: {} against generic type: 'Weird'.",
    );
    expect(caught.cause).toBeInstanceOf(Error);
  }
});

test("generic - exhausting iterables are not supported", () => {
  expect(() => checker.compile(d.iterable(d.int()))).toThrow(
    "No validator is set up for iterables that exhaust: 'Iterable[Int]'.",
  );
});

test("typeVar - bound, constraints, unconstrained", () => {
  const bounded = d.typeVar("T", { bound: d.str() });
  expect(checker.isInstance("a", bounded)).toBe(true);
  expect(() => checker.checkType(1, bounded)).toThrow(
    "Type: 'number' is not consistent with expected type: 'String'.",
  );

  const constrained = d.typeVar("N", { constraints: [d.str(), d.num()] });
  expect(checker.isInstance(1, constrained)).toBe(true);
  expect(() => checker.checkType(true, constrained)).toThrow(
    "Instance of: true does not belong to: Union[String, Number].",
  );

  expect(checker.isInstance(Symbol("s"), d.typeVar("U"))).toBe(true);
});

test("newType - checks the supertype", () => {
  const UserId = d.newType("UserId", d.int());
  expect(checker.isInstance(5, UserId)).toBe(true);
  expect(checker.isInstance(5.5, UserId)).toBe(false);
});

test("newType - requires a supertype", () => {
  const orphan: NewTypeDescriptor = { kind: "newType", name: "Orphan" };
  expect(() => checker.compile(orphan)).toThrow(
    "No supertype for new type: Orphan. This is not allowed.",
  );
});

test("classVar - rejected in argument position", () => {
  const hint = d.classVar(d.int());
  expect(() => checker.checkType(3, hint)).toThrow(InvalidDescriptorError);
  expect(() => checker.checkType(3, hint, { isArgument: false })).not.toThrow();
});

test("any - accepts everything", () => {
  const validator = checker.compile(d.any());
  expect(validator.isValid(undefined)).toBe(true);
  expect(() => validator.checkSubtype(Base)).not.toThrow();
});
