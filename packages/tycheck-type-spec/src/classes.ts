// packages/tycheck-type-spec/src/classes.ts
// Class references: constructors plus structural classes (protocol-like targets
// that decide membership with a predicate instead of the prototype chain).

import type { TypeHint } from "./descriptor.ts";

/**
 * Any function usable as a class: ES classes, function constructors, and the
 * `BigInt` / `Symbol` factories (which have a prototype but no `new`).
 */
export type Constructor = Function;

export type ContainerShape = "mapping" | "collection" | "iterable" | "scalar";

export const STRUCTURAL = Symbol.for("tycheck.structural");
export const RECORD = Symbol.for("tycheck.record");

export interface StructuralClass {
  readonly [STRUCTURAL]: true;
  readonly name: string;
  readonly shape: ContainerShape;
  instanceCheck(value: unknown): boolean;
  subclassCheck(candidate: unknown): boolean;
}

/**
 * Fixed-key mapping type (a typed dict). Instances are plain objects.
 * `fields` is only ever undefined for records assembled from external data;
 * compiling such a record fails.
 */
export interface RecordType extends StructuralClass {
  readonly [RECORD]: true;
  readonly fields: Readonly<Record<string, TypeHint>> | undefined;
  readonly total: boolean;
}

export type ClassRef = Constructor | StructuralClass;

export function isStructural(x: unknown): x is StructuralClass {
  return typeof x === "object" && x !== null && STRUCTURAL in x;
}

export function isRecordType(x: unknown): x is RecordType {
  return isStructural(x) && RECORD in x;
}

/** A function with an object prototype; arrow functions and methods are not classes. */
export function isConstructor(x: unknown): x is Constructor {
  if (typeof x !== "function") return false;
  const proto: unknown = x.prototype;
  return typeof proto === "object" && proto !== null;
}

export function isClassRef(x: unknown): x is ClassRef {
  return isStructural(x) || isConstructor(x);
}

export function defineStructural(spec: {
  name: string;
  shape: ContainerShape;
  instanceCheck: (value: unknown) => boolean;
  subclassCheck: (candidate: unknown) => boolean;
}): StructuralClass {
  return Object.freeze({ [STRUCTURAL]: true as const, ...spec });
}

// ============================================================================
// Prototype-chain helpers
// ============================================================================

/** `candidate` is `base` or a class whose prototype chain reaches `base.prototype`. */
export function extendsClass(candidate: unknown, base: Constructor): boolean {
  if (typeof candidate !== "function") return false;
  if (candidate === base) return true;
  const proto: unknown = candidate.prototype;
  return proto instanceof base;
}

const TypedArray: Constructor = Object.getPrototypeOf(Int8Array);

function isTypedArray(value: unknown): boolean {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isIterable(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return true;
  return (typeof value === "object" || typeof value === "function") &&
    Symbol.iterator in value;
}

// ============================================================================
// Built-in structural classes
// ============================================================================

export const None: StructuralClass = defineStructural({
  name: "None",
  shape: "scalar",
  instanceCheck: (value) => value === null || value === undefined,
  subclassCheck: (candidate) => candidate === None,
});

export const Int: StructuralClass = defineStructural({
  name: "Int",
  shape: "scalar",
  instanceCheck: (value) => typeof value === "number" && Number.isInteger(value),
  subclassCheck: (candidate) => candidate === Int,
});

export const Dict: StructuralClass = defineStructural({
  name: "Dict",
  shape: "mapping",
  instanceCheck: isPlainObject,
  subclassCheck: (candidate) =>
    candidate === Dict || candidate === Object || isRecordType(candidate),
});

export const Mapping: StructuralClass = defineStructural({
  name: "Mapping",
  shape: "mapping",
  instanceCheck: (value) => value instanceof Map || isPlainObject(value),
  subclassCheck: (candidate) =>
    candidate === Mapping || Dict.subclassCheck(candidate) ||
    extendsClass(candidate, Map),
});

export const Sequence: StructuralClass = defineStructural({
  name: "Sequence",
  shape: "collection",
  instanceCheck: (value) =>
    Array.isArray(value) || typeof value === "string" ||
    value instanceof String || isTypedArray(value),
  subclassCheck: (candidate) =>
    candidate === Sequence || extendsClass(candidate, Array) ||
    extendsClass(candidate, String) || extendsClass(candidate, TypedArray),
});

export const Collection: StructuralClass = defineStructural({
  name: "Collection",
  shape: "collection",
  instanceCheck: (value) =>
    Sequence.instanceCheck(value) || value instanceof Set ||
    value instanceof Map,
  subclassCheck: (candidate) =>
    candidate === Collection || Sequence.subclassCheck(candidate) ||
    extendsClass(candidate, Set) || Mapping.subclassCheck(candidate),
});

export const Iterable: StructuralClass = defineStructural({
  name: "Iterable",
  shape: "iterable",
  instanceCheck: isIterable,
  subclassCheck: (candidate) => {
    if (isStructural(candidate)) return candidate.shape !== "scalar";
    if (typeof candidate !== "function") return false;
    const proto: unknown = candidate.prototype;
    return isIterable(proto);
  },
});

export const Callable: StructuralClass = defineStructural({
  name: "Callable",
  shape: "scalar",
  instanceCheck: (value) => typeof value === "function",
  subclassCheck: (candidate) => candidate === Callable || candidate === Function,
});

export function defineRecord(
  name: string,
  fields: Readonly<Record<string, TypeHint>> | undefined,
  options: { total?: boolean } = {},
): RecordType {
  const record: RecordType = Object.freeze({
    [STRUCTURAL]: true as const,
    [RECORD]: true as const,
    name,
    shape: "mapping" as const,
    fields: fields === undefined ? undefined : Object.freeze({ ...fields }),
    total: options.total ?? true,
    instanceCheck: isPlainObject,
    subclassCheck: (candidate: unknown) =>
      candidate === record || Dict.subclassCheck(candidate),
  });
  return record;
}

// ============================================================================
// Instance / subclass tests over any ClassRef
// ============================================================================

// Boxed-primitive constructors also accept the matching primitive.
const PRIMITIVE_TYPEOF = new Map<Constructor, string>([
  [String, "string"],
  [Number, "number"],
  [Boolean, "boolean"],
  [BigInt, "bigint"],
  [Symbol, "symbol"],
]);

export function isInstance(value: unknown, target: ClassRef): boolean {
  if (isStructural(target)) return target.instanceCheck(value);
  if (target === Object) return value !== null && value !== undefined;
  if (target === Function) return typeof value === "function";
  const primitive = PRIMITIVE_TYPEOF.get(target);
  if (primitive !== undefined && typeof value === primitive) return true;
  return value instanceof target;
}

export function isSubclass(candidate: unknown, target: ClassRef): boolean {
  if (isStructural(target)) return target.subclassCheck(candidate);
  if (isStructural(candidate)) return target === Object;
  return extendsClass(candidate, target);
}

/** Decides which validator a parameterized origin compiles to. */
export function classifyOrigin(origin: ClassRef): ContainerShape {
  if (isStructural(origin)) return origin.shape;
  if (extendsClass(origin, Map)) return "mapping";
  const proto: unknown = origin.prototype;
  if (typeof proto !== "object" || proto === null || !(Symbol.iterator in proto)) {
    return "scalar";
  }
  return "size" in proto || "length" in proto ? "collection" : "iterable";
}

/** Runtime class name of a value, for messages. */
export function typeNameOf(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object" && typeof value !== "function") {
    return typeof value;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null) return "Object";
  const ctor: unknown = Reflect.get(Object(proto), "constructor");
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
}
