// packages/tycheck-type-spec/src/namespace.ts
// Name scopes for forward references, and the declared-attribute registry.

import { match, P } from "ts-pattern";
import {
  Callable,
  type Constructor,
  Collection,
  Dict,
  Int,
  Iterable,
  Mapping,
  None,
  Sequence,
} from "./classes.ts";
import {
  d,
  type Descriptor,
  isDescriptor,
  type TypeHint,
} from "./descriptor.ts";

/**
 * A lookup scope for forward references. Lookups fall through to the parent
 * and finally to {@link builtins}.
 */
export class Namespace {
  readonly name: string;
  readonly parent: Namespace | null;
  private readonly entries = new Map<string, TypeHint>();

  constructor(
    name: string,
    entries: Readonly<Record<string, TypeHint>> = {},
    parent: Namespace | null = builtins,
  ) {
    this.name = name;
    this.parent = parent;
    for (const [key, hint] of Object.entries(entries)) {
      this.entries.set(key, hint);
    }
  }

  define(name: string, hint: TypeHint): this {
    this.entries.set(name, hint);
    return this;
  }

  /**
   * Define a class under its own name and record its attribute hints, with
   * this namespace as the scope its string hints resolve in.
   */
  register<C extends Constructor>(
    cls: C,
    hints: Readonly<Record<string, TypeHint>> = {},
  ): C {
    this.define(cls.name, cls);
    return annotate(cls, hints, this);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** `undefined` when the name is unknown; `null` is a valid hint (None). */
  lookup(name: string): TypeHint | undefined {
    if (this.entries.has(name)) return this.entries.get(name);
    return this.parent?.lookup(name);
  }

  toString(): string {
    return `Namespace(${this.name})`;
  }
}

// Root of every lookup chain; the only namespace without a parent.
export const builtins: Namespace = new Namespace("builtins", {
  Any: d.any(),
  None: null,
  null: null,
  undefined: null,
  string: String,
  String,
  number: Number,
  Number,
  int: Int,
  Int,
  boolean: Boolean,
  Boolean,
  bigint: BigInt,
  BigInt,
  symbol: Symbol,
  Symbol,
  object: Object,
  Object,
  Function,
  Callable,
  Array,
  Map,
  Set,
  WeakMap,
  WeakSet,
  Date,
  RegExp,
  Error,
  Promise,
  Dict,
  Mapping,
  Sequence,
  Collection,
  Iterable,
}, null);

// ============================================================================
// Declared attributes
// ============================================================================

const attributeRegistry = new WeakMap<
  Constructor,
  Readonly<Record<string, TypeHint>>
>();
const namespaceRegistry = new WeakMap<Constructor, Namespace>();
let revision = 0;

/** Bumped by every {@link annotate} call; compiled attribute tables key on it. */
export function attributeRevision(): number {
  return revision;
}

/**
 * Pin every name in `hint` (bare strings and unscoped forward references, at
 * any depth) to `scope`.
 */
export function bindScope(hint: TypeHint, scope: Namespace): TypeHint {
  if (typeof hint === "string") return d.ref(hint, scope);
  if (!isDescriptor(hint)) return hint;
  const bind = (h: TypeHint): TypeHint => bindScope(h, scope);
  return match<Descriptor, TypeHint>(hint)
    .with({ kind: "forwardRef" }, (f) => f.scope ? f : d.ref(f.name, scope))
    .with({ kind: "union" }, (u) => d.union(...u.members.map(bind)))
    .with({ kind: "tuple" }, (t) =>
      Object.freeze({ ...t, elements: Object.freeze(t.elements.map(bind)) }))
    .with({ kind: "generic" }, (g) =>
      Object.freeze({ ...g, args: Object.freeze(g.args.map(bind)) }))
    .with(
      { kind: P.union("typeOf", "classVar") },
      (w) => Object.freeze({ ...w, inner: bind(w.inner) }),
    )
    .with({ kind: "newType" }, (n) =>
      n.supertype === undefined
        ? n
        : Object.freeze({ ...n, supertype: bind(n.supertype) }))
    .with({ kind: "typeVar" }, (v) =>
      Object.freeze({
        ...v,
        ...(v.bound !== undefined ? { bound: bind(v.bound) } : {}),
        constraints: Object.freeze(v.constraints.map(bind)),
      }))
    .with({ kind: P.union("any", "class", "literal", "callable") }, (leaf) => leaf)
    .exhaustive();
}

/**
 * Declare attribute hints for a class. Instances of the class (and of its
 * subclasses) get each declared attribute checked after the instance test.
 * With a `namespace`, names inside the hints resolve there.
 *
 * @example
 * ```ts
 * class Point { x = 0; y = 0; }
 * annotate(Point, { x: d.num(), y: d.num() });
 * ```
 */
export function annotate<C extends Constructor>(
  cls: C,
  hints: Readonly<Record<string, TypeHint>>,
  namespace?: Namespace,
): C {
  const declared: Record<string, TypeHint> = {};
  for (const [name, hint] of Object.entries(hints)) {
    declared[name] = namespace ? bindScope(hint, namespace) : hint;
  }
  attributeRegistry.set(cls, Object.freeze(declared));
  revision += 1;
  if (namespace) namespaceRegistry.set(cls, namespace);
  return cls;
}

function classChain(cls: Constructor): Constructor[] {
  const chain: Constructor[] = [];
  let current: unknown = cls;
  while (typeof current === "function" && current !== Function.prototype) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

/** Declared attribute hints along the class chain, base classes first. */
export function getAttributeHints(cls: Constructor): ReadonlyMap<string, TypeHint> {
  const merged = new Map<string, TypeHint>();
  for (const klass of classChain(cls).reverse()) {
    const hints = attributeRegistry.get(klass);
    if (!hints) continue;
    for (const [name, hint] of Object.entries(hints)) {
      merged.set(name, hint);
    }
  }
  return merged;
}

/**
 * The namespace a class (or an instance's class) was annotated in, searching
 * base classes too.
 */
export function namespaceOf(valueOrType: unknown): Namespace | undefined {
  let cls: unknown = valueOrType;
  if (typeof valueOrType === "object" && valueOrType !== null) {
    const proto: unknown = Object.getPrototypeOf(valueOrType);
    cls = proto === null ? undefined : Reflect.get(Object(proto), "constructor");
  }
  if (typeof cls !== "function") return undefined;
  for (const klass of classChain(cls)) {
    const ns = namespaceRegistry.get(klass);
    if (ns) return ns;
  }
  return undefined;
}
