// packages/tycheck-type-runtime/validators.ts
// Validator tree: the compiled counterpart of a descriptor.

import {
  attributeRevision,
  type ClassRef,
  type Constructor,
  describeValue,
  type ForwardRefDescriptor,
  getAttributeHints,
  isDescriptor,
  isInstance,
  isPlainObject,
  isStructural,
  isSubclass,
  type LiteralValue,
  type RecordType,
  type TypeHint,
  typeNameOf,
  typeRepr,
} from "../tycheck-type-spec/src/mod.ts";
import {
  InvalidDescriptorError,
  NotImplementedCheckError,
  type PathSegment,
  type Result,
  TypeMismatchError,
  wrapMismatch,
} from "./errors.ts";

/**
 * What a validator needs from the checker that built it: compiling child
 * hints on demand and resolving forward references.
 */
export interface CompileContext {
  compile(hint: TypeHint, isArgument: boolean): Validator;
  resolveForwardRef(ref: ForwardRefDescriptor, trigger: unknown): TypeHint;
}

// ============================================================================
// Abstract Base Validator
// ============================================================================

export abstract class Validator {
  /** Validator kind discriminator */
  abstract readonly kind: string;

  /** The hint this validator was compiled from */
  readonly hint: TypeHint;

  /** Rendered hint, used in messages */
  readonly repr: string;

  constructor(hint: TypeHint) {
    this.hint = hint;
    this.repr = typeRepr(hint);
  }

  // ══════════════════════════════════════════════════════════════════════════
  // Instance and subtype checks
  // ══════════════════════════════════════════════════════════════════════════

  /**
   * @throws TypeMismatchError if the value does not conform
   * @throws NotImplementedCheckError for unsupported shapes
   * @throws InvalidDescriptorError if a forward reference cannot be resolved
   */
  abstract check(value: unknown): void;

  /** Same contract as {@link check}, for a class instead of a value. */
  abstract checkSubtype(candidate: unknown): void;

  /** Mismatches come back as a Result; every other error still throws. */
  checkSafe(value: unknown): Result<void, TypeMismatchError> {
    try {
      this.check(value);
      return { ok: true, value: undefined };
    } catch (err) {
      if (err instanceof TypeMismatchError) return { ok: false, error: err };
      throw err;
    }
  }

  isValid(value: unknown): boolean {
    return this.checkSafe(value).ok;
  }

  toString(): string {
    return `${this.constructor.name}(${this.repr})`;
  }

  protected inconsistent(value: unknown): TypeMismatchError {
    return new TypeMismatchError(
      `Type: '${typeNameOf(value)}' is not consistent with expected type: '${this.repr}'.`,
    );
  }

  protected notSubtype(candidate: unknown): TypeMismatchError {
    return new TypeMismatchError(
      `Type: '${typeRepr(candidate)}' is not consistent with expected type: '${this.repr}'.`,
    );
  }

  protected unsupported(method: string): NotImplementedCheckError {
    return new NotImplementedCheckError(
      `${this.constructor.name} does not implement '${method}'.`,
    );
  }
}

// ============================================================================
// Leaf validators
// ============================================================================

export class AnyValidator extends Validator {
  readonly kind = "any" as const;

  check(_value: unknown): void {}

  checkSubtype(_candidate: unknown): void {}
}

interface AttributeValidator {
  readonly validator: Validator;
  /** Class-scoped attributes are read from the class, not the instance */
  readonly fromClass: boolean;
}

/**
 * Instance / subclass test against one class. After the instance test, every
 * declared attribute of the class is checked as well.
 */
export class ConcreteValidator extends Validator {
  readonly kind = "concrete" as const;
  readonly target: ClassRef;
  private readonly context: CompileContext;
  private attributes:
    | { readonly revision: number; readonly table: ReadonlyMap<string, AttributeValidator> }
    | undefined;
  private readonly inProgress = new WeakSet<object>();

  constructor(hint: TypeHint, target: ClassRef, context: CompileContext) {
    super(hint);
    this.target = target;
    this.context = context;
  }

  check(value: unknown): void {
    if (!isInstance(value, this.target)) throw this.inconsistent(value);
    if (isStructural(this.target)) return;
    if (typeof value !== "object" || value === null) return;

    const attributes = this.attributeValidators(this.target);
    if (attributes.size === 0 || this.inProgress.has(value)) return;

    this.inProgress.add(value);
    try {
      for (const [name, { validator, fromClass }] of attributes) {
        const attr: unknown = Reflect.get(fromClass ? this.classOf(value) : value, name);
        try {
          validator.check(attr);
        } catch (err) {
          throw wrapMismatch(
            err,
            `Attribute: '${name}' of instance: ${describeValue(value)} with value: ${
              describeValue(attr)
            } has wrong type.`,
            name,
          );
        }
      }
    } finally {
      this.inProgress.delete(value);
    }
  }

  checkSubtype(candidate: unknown): void {
    if (!isSubclass(candidate, this.target)) throw this.notSubtype(candidate);
  }

  // The instance's own class, so a subclass overriding a class-scoped
  // attribute is judged on its own value.
  private classOf(value: object): object {
    const proto = Reflect.getPrototypeOf(value);
    const cls: unknown = proto === null ? undefined : Reflect.get(proto, "constructor");
    return typeof cls === "function" ? cls : this.target;
  }

  // Compiled on first use so a class may declare attributes of its own type;
  // recompiled after any later `annotate` call.
  private attributeValidators(
    target: Constructor,
  ): ReadonlyMap<string, AttributeValidator> {
    const revision = attributeRevision();
    if (this.attributes && this.attributes.revision === revision) {
      return this.attributes.table;
    }
    const compiled = new Map<string, AttributeValidator>();
    for (const [name, hint] of getAttributeHints(target)) {
      compiled.set(name, {
        validator: this.context.compile(hint, false),
        fromClass: isDescriptor(hint) && hint.kind === "classVar",
      });
    }
    this.attributes = { revision, table: compiled };
    return compiled;
  }
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export class LiteralValidator extends Validator {
  readonly kind = "literal" as const;
  readonly values: readonly LiteralValue[];

  constructor(hint: TypeHint, values: readonly LiteralValue[]) {
    super(hint);
    this.values = values;
  }

  check(value: unknown): void {
    if (this.values.some((v) => sameValueZero(v, value))) return;
    throw new TypeMismatchError(
      `Value: ${describeValue(value)} is not in the list of literals: ${
        describeValue(this.values)
      }.`,
    );
  }

  checkSubtype(_candidate: unknown): void {
    throw this.unsupported("checkSubtype");
  }
}

/** Checks callability only; parameter and return hints are not enforced. */
export class CallableValidator extends Validator {
  readonly kind = "callable" as const;

  check(value: unknown): void {
    if (typeof value === "function") return;
    throw new TypeMismatchError(
      `Callable type: '${this.repr}' expects a callable. ${describeValue(value)} isn't.`,
    );
  }

  checkSubtype(_candidate: unknown): void {
    throw this.unsupported("checkSubtype");
  }
}

/** `Type[X]`: the value is itself a class that must be a subclass of X. */
export class TypeOfValidator extends Validator {
  readonly kind = "typeOf" as const;
  readonly inner: Validator;

  constructor(hint: TypeHint, inner: Validator) {
    super(hint);
    this.inner = inner;
  }

  check(value: unknown): void {
    this.inner.checkSubtype(value);
  }

  checkSubtype(_candidate: unknown): void {
    throw this.unsupported("checkSubtype");
  }
}

// ============================================================================
// Container validators
// ============================================================================

function isIterableObject(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null &&
    Symbol.iterator in value && typeof value[Symbol.iterator] === "function";
}

function elementsOf(value: unknown): Iterable<unknown> {
  if (typeof value === "string") return value;
  if (isIterableObject(value)) return value;
  throw new TypeMismatchError(`Value: ${describeValue(value)} is not iterable.`);
}

function entriesOf(value: unknown): Iterable<readonly [unknown, unknown]> {
  if (value instanceof Map) return value.entries();
  if (typeof value === "object" && value !== null) return Object.entries(value);
  throw new TypeMismatchError(`Value: ${describeValue(value)} has no entries.`);
}

function keySegment(key: unknown): PathSegment {
  return typeof key === "string" || typeof key === "number" ? key : describeValue(key);
}

/** Container check, then every element against one item validator. */
export class CollectionValidator extends Validator {
  readonly kind = "collection" as const;
  readonly container: Validator;
  readonly item: Validator;

  constructor(hint: TypeHint, container: Validator, item: Validator) {
    super(hint);
    this.container = container;
    this.item = item;
  }

  check(value: unknown): void {
    this.container.check(value);
    let index = 0;
    for (const element of elementsOf(value)) {
      try {
        this.item.check(element);
      } catch (err) {
        throw wrapMismatch(
          err,
          `Item: ${describeValue(element)} at index: ${index} of collection: ${
            describeValue(value)
          } has wrong type.`,
          index,
        );
      }
      index++;
    }
  }

  checkSubtype(candidate: unknown): void {
    this.container.checkSubtype(candidate);
  }
}

/** Container check, then every key and value. */
export class MappingValidator extends Validator {
  readonly kind = "mapping" as const;
  readonly container: Validator;
  readonly key: Validator;
  readonly value: Validator;

  constructor(
    hint: TypeHint,
    container: Validator,
    key: Validator,
    value: Validator,
  ) {
    super(hint);
    this.container = container;
    this.key = key;
    this.value = value;
  }

  check(mapping: unknown): void {
    this.container.check(mapping);
    for (const [key, value] of entriesOf(mapping)) {
      try {
        this.key.check(key);
      } catch (err) {
        throw wrapMismatch(
          err,
          `Key: ${describeValue(key)} of mapping: ${describeValue(mapping)} has wrong type.`,
          keySegment(key),
        );
      }
      try {
        this.value.check(value);
      } catch (err) {
        throw wrapMismatch(
          err,
          `Value: ${describeValue(value)} of key: ${describeValue(key)} in mapping: ${
            describeValue(mapping)
          } has wrong type.`,
          keySegment(key),
        );
      }
    }
  }

  checkSubtype(candidate: unknown): void {
    this.container.checkSubtype(candidate);
  }
}

/**
 * Fixed-arity tuple. With no items this is the empty tuple, which accepts
 * arrays of length 0 or 1.
 */
export class TupleValidator extends Validator {
  readonly kind = "tuple" as const;
  readonly container: Validator;
  readonly items: readonly Validator[];

  constructor(hint: TypeHint, container: Validator, items: readonly Validator[]) {
    super(hint);
    this.container = container;
    this.items = items;
  }

  check(value: unknown): void {
    this.container.check(value);
    if (!Array.isArray(value)) throw this.inconsistent(value);

    if (this.items.length === 0) {
      if (value.length <= 1) return;
      throw new TypeMismatchError(
        `'${this.repr}' expects a tuple of len: 0 or 1. Tuple: ${
          describeValue(value)
        } has len: ${value.length}.`,
      );
    }

    if (value.length !== this.items.length) {
      throw new TypeMismatchError(
        `'${this.repr}' expects a tuple of len: ${this.items.length}. Tuple: ${
          describeValue(value)
        } has len: ${value.length}.`,
      );
    }

    this.items.forEach((item, index) => {
      const element: unknown = value[index];
      try {
        item.check(element);
      } catch (err) {
        throw wrapMismatch(
          err,
          `Item: ${index} of tuple: ${describeValue(value)} with value: ${
            describeValue(element)
          } has wrong type.`,
          index,
        );
      }
    });
  }

  checkSubtype(candidate: unknown): void {
    this.container.checkSubtype(candidate);
  }
}

/** Fixed-key plain object; unknown keys are rejected, missing keys when total. */
export class RecordValidator extends Validator {
  readonly kind = "record" as const;
  readonly record: RecordType;
  readonly fields: ReadonlyMap<string, Validator>;

  constructor(
    hint: TypeHint,
    record: RecordType,
    fields: ReadonlyMap<string, Validator>,
  ) {
    super(hint);
    this.record = record;
    this.fields = fields;
  }

  check(value: unknown): void {
    if (!isPlainObject(value)) throw this.inconsistent(value);

    const unknownKeys = Object.keys(value).filter((k) => !this.fields.has(k));
    if (unknownKeys.length > 0) {
      throw new TypeMismatchError(
        `Keys: ${describeValue(unknownKeys)} of dict: ${
          describeValue(value)
        } are not part of typed dict: '${this.repr}'.`,
      );
    }

    if (this.record.total) {
      const missing = [...this.fields.keys()].filter((k) => !hasOwn(value, k));
      if (missing.length > 0) {
        throw new TypeMismatchError(
          `Keys: ${describeValue(missing)} of typed dict: '${this.repr}' are not set in ${
            describeValue(value)
          }.`,
        );
      }
    }

    for (const [name, validator] of this.fields) {
      if (!hasOwn(value, name)) continue;
      const field = value[name];
      try {
        validator.check(field);
      } catch (err) {
        throw wrapMismatch(
          err,
          `Key: '${name}' of typed dict: ${describeValue(value)} with value: ${
            describeValue(field)
          } has wrong type.`,
          name,
        );
      }
    }
  }

  checkSubtype(candidate: unknown): void {
    if (!this.record.subclassCheck(candidate)) throw this.notSubtype(candidate);
  }
}

function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

// ============================================================================
// Combinators
// ============================================================================

/** First member that does not report a mismatch wins. */
export class UnionValidator extends Validator {
  readonly kind = "union" as const;
  readonly members: readonly Validator[];

  constructor(hint: TypeHint, members: readonly Validator[]) {
    super(hint);
    this.members = members;
  }

  check(value: unknown): void {
    for (const member of this.members) {
      try {
        member.check(value);
        return;
      } catch (err) {
        if (!(err instanceof TypeMismatchError)) throw err;
      }
    }
    throw new TypeMismatchError(
      `Instance of: ${describeValue(value)} does not belong to: ${this.repr}.`,
    );
  }

  checkSubtype(candidate: unknown): void {
    for (const member of this.members) {
      try {
        member.checkSubtype(candidate);
        return;
      } catch (err) {
        if (!(err instanceof TypeMismatchError)) throw err;
      }
    }
    throw new TypeMismatchError(
      `Type: ${typeRepr(candidate)} does not belong to: ${this.repr}.`,
    );
  }
}

/**
 * User-defined parameterized class. Only the origin is checked; type
 * arguments are not enforced.
 */
export class GenericValidator extends Validator {
  readonly kind = "generic" as const;
  readonly origin: Validator;

  constructor(hint: TypeHint, origin: Validator) {
    super(hint);
    this.origin = origin;
  }

  check(value: unknown): void {
    this.guard(value, () => this.origin.check(value));
  }

  checkSubtype(candidate: unknown): void {
    this.guard(candidate, () => this.origin.checkSubtype(candidate));
  }

  private guard(subject: unknown, run: () => void): void {
    try {
      run();
    } catch (err) {
      if (
        err instanceof TypeMismatchError ||
        err instanceof NotImplementedCheckError ||
        err instanceof InvalidDescriptorError
      ) {
        throw err;
      }
      throw new NotImplementedCheckError(
        `Could not check: ${describeValue(subject)} against generic type: '${this.repr}'.`,
        { cause: err },
      );
    }
  }
}
