// packages/tycheck-type-spec/src/descriptor.ts
// Descriptor model: a closed, `kind`-tagged union with nested payloads.

import {
  Callable,
  type ClassRef,
  Collection,
  Dict,
  Int,
  Iterable,
  Mapping,
  None,
  Sequence,
} from "./classes.ts";
import type { Namespace } from "./namespace.ts";

export type LiteralValue =
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined;

export interface AnyDescriptor {
  readonly kind: "any";
}

export interface ClassDescriptor {
  readonly kind: "class";
  readonly target: ClassRef;
}

export interface UnionDescriptor {
  readonly kind: "union";
  readonly members: readonly TypeHint[];
}

export interface LiteralDescriptor {
  readonly kind: "literal";
  readonly values: readonly LiteralValue[];
}

/**
 * Fixed tuple (N elements), variadic tuple (`variadic` with one element
 * repeated) or the empty tuple (no elements).
 */
export interface TupleDescriptor {
  readonly kind: "tuple";
  readonly elements: readonly TypeHint[];
  readonly variadic: boolean;
}

export interface GenericDescriptor {
  readonly kind: "generic";
  readonly origin: ClassRef;
  readonly args: readonly TypeHint[];
}

export interface TypeOfDescriptor {
  readonly kind: "typeOf";
  readonly inner: TypeHint;
}

export interface NewTypeDescriptor {
  readonly kind: "newType";
  readonly name: string;
  readonly supertype?: TypeHint;
}

export interface ClassVarDescriptor {
  readonly kind: "classVar";
  readonly inner: TypeHint;
}

export interface TypeVarDescriptor {
  readonly kind: "typeVar";
  readonly name: string;
  readonly bound?: TypeHint;
  readonly constraints: readonly TypeHint[];
}

export interface ForwardRefDescriptor {
  readonly kind: "forwardRef";
  readonly name: string;
  readonly scope?: Namespace;
}

/** Parameter and return hints are informational; only callability is checked. */
export interface CallableDescriptor {
  readonly kind: "callable";
  readonly params?: readonly TypeHint[] | "...";
  readonly returns?: TypeHint;
}

export type Descriptor =
  | AnyDescriptor
  | ClassDescriptor
  | UnionDescriptor
  | LiteralDescriptor
  | TupleDescriptor
  | GenericDescriptor
  | TypeOfDescriptor
  | NewTypeDescriptor
  | ClassVarDescriptor
  | TypeVarDescriptor
  | ForwardRefDescriptor
  | CallableDescriptor;

export type DescriptorKind = Descriptor["kind"];

/**
 * Anything accepted where a type is expected: a descriptor, a class, a
 * name to resolve later, or `null` for None.
 */
export type TypeHint = Descriptor | ClassRef | string | null;

const KINDS: ReadonlySet<string> = new Set<DescriptorKind>([
  "any",
  "class",
  "union",
  "literal",
  "tuple",
  "generic",
  "typeOf",
  "newType",
  "classVar",
  "typeVar",
  "forwardRef",
  "callable",
]);

export function isDescriptor(x: unknown): x is Descriptor {
  if (typeof x !== "object" || x === null || !("kind" in x)) return false;
  return typeof x.kind === "string" && KINDS.has(x.kind);
}

const ANY: AnyDescriptor = Object.freeze({ kind: "any" });

function generic(origin: ClassRef, ...args: TypeHint[]): GenericDescriptor {
  return Object.freeze({ kind: "generic", origin, args: Object.freeze(args) });
}

function cls(target: ClassRef): ClassDescriptor {
  return Object.freeze({ kind: "class", target });
}

function union(...members: TypeHint[]): UnionDescriptor {
  return Object.freeze({ kind: "union", members: Object.freeze(members) });
}

function present(...hints: (TypeHint | undefined)[]): TypeHint[] {
  return hints.filter((h): h is TypeHint => h !== undefined);
}

/**
 * Descriptor builders.
 *
 * @example
 * ```ts
 * const Point = d.tuple(d.int(), d.int());
 * const Scores = d.mapping(d.str(), d.list(d.num()));
 * const MaybeName = d.optional(d.str());
 * ```
 */
export const d = {
  any: (): AnyDescriptor => ANY,
  cls,

  // primitives
  str: (): ClassDescriptor => cls(String),
  num: (): ClassDescriptor => cls(Number),
  int: (): ClassDescriptor => cls(Int),
  bool: (): ClassDescriptor => cls(Boolean),
  bigint: (): ClassDescriptor => cls(BigInt),
  none: (): ClassDescriptor => cls(None),

  union,
  optional: (hint: TypeHint): UnionDescriptor => union(hint, null),
  literal: (...values: LiteralValue[]): LiteralDescriptor =>
    Object.freeze({ kind: "literal", values: Object.freeze(values) }),

  // tuples
  tuple: (...elements: TypeHint[]): TupleDescriptor =>
    Object.freeze({
      kind: "tuple",
      elements: Object.freeze(elements),
      variadic: false,
    }),
  tupleOf: (element: TypeHint): TupleDescriptor =>
    Object.freeze({
      kind: "tuple",
      elements: Object.freeze([element]),
      variadic: true,
    }),

  // parameterized containers; an omitted argument means Any
  generic,
  list: (item?: TypeHint): GenericDescriptor => generic(Array, ...present(item)),
  set: (item?: TypeHint): GenericDescriptor => generic(Set, ...present(item)),
  map: (key?: TypeHint, value?: TypeHint): GenericDescriptor =>
    generic(Map, ...present(key, value)),
  dict: (key?: TypeHint, value?: TypeHint): GenericDescriptor =>
    generic(Dict, ...present(key, value)),
  mapping: (key?: TypeHint, value?: TypeHint): GenericDescriptor =>
    generic(Mapping, ...present(key, value)),
  sequence: (item?: TypeHint): GenericDescriptor =>
    generic(Sequence, ...present(item)),
  collection: (item?: TypeHint): GenericDescriptor =>
    generic(Collection, ...present(item)),
  iterable: (item?: TypeHint): GenericDescriptor =>
    generic(Iterable, ...present(item)),

  typeOf: (inner: TypeHint): TypeOfDescriptor =>
    Object.freeze({ kind: "typeOf", inner }),
  newType: (name: string, supertype: TypeHint): NewTypeDescriptor =>
    Object.freeze({ kind: "newType", name, supertype }),
  classVar: (inner: TypeHint): ClassVarDescriptor =>
    Object.freeze({ kind: "classVar", inner }),
  typeVar: (
    name: string,
    options: { bound?: TypeHint; constraints?: readonly TypeHint[] } = {},
  ): TypeVarDescriptor =>
    Object.freeze({
      kind: "typeVar",
      name,
      ...(options.bound !== undefined ? { bound: options.bound } : {}),
      constraints: Object.freeze([...(options.constraints ?? [])]),
    }),
  ref: (name: string, scope?: Namespace): ForwardRefDescriptor =>
    Object.freeze({
      kind: "forwardRef",
      name,
      ...(scope !== undefined ? { scope } : {}),
    }),
  callable: (
    params?: readonly TypeHint[] | "...",
    returns?: TypeHint,
  ): CallableDescriptor =>
    Object.freeze({
      kind: "callable",
      ...(params !== undefined ? { params } : {}),
      ...(returns !== undefined ? { returns } : {}),
    }),
  function: (): ClassDescriptor => cls(Callable),
};
