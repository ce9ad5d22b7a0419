// packages/tycheck-type-runtime/compiler.ts
// Descriptor -> validator compiler. Dispatch order is significant: the first
// matching arm wins.

import { match, P } from "ts-pattern";
import {
  type ClassRef,
  classifyOrigin,
  type ContainerShape,
  d,
  describeValue,
  type GenericDescriptor,
  InvalidDescriptorError,
  isRecordType,
  normalize,
  type RecordType,
  type TypeHint,
  typeRepr,
} from "../tycheck-type-spec/src/mod.ts";
import { NotImplementedCheckError } from "./errors.ts";
import { ForwardRefValidator } from "./forward-ref.ts";
import {
  AnyValidator,
  CallableValidator,
  CollectionValidator,
  type CompileContext,
  ConcreteValidator,
  GenericValidator,
  LiteralValidator,
  MappingValidator,
  RecordValidator,
  TupleValidator,
  TypeOfValidator,
  UnionValidator,
  type Validator,
} from "./validators.ts";

function hasShape(shape: ContainerShape) {
  return (origin: ClassRef): boolean => classifyOrigin(origin) === shape;
}

function originValidator(origin: ClassRef, context: CompileContext): Validator {
  return new ConcreteValidator(origin, origin, context);
}

// Child hints compile in value position; only the top-level hint and forward
// references keep the caller's flag.
function child(hint: TypeHint, context: CompileContext): Validator {
  return context.compile(hint, false);
}

function compileMapping(
  hint: TypeHint,
  g: GenericDescriptor,
  context: CompileContext,
): Validator {
  const container = originValidator(g.origin, context);
  if (g.args.length === 0) {
    const any = new AnyValidator(d.any());
    return new MappingValidator(hint, container, any, any);
  }
  const [key, value] = g.args;
  if (g.args.length !== 2 || key === undefined || value === undefined) {
    throw new InvalidDescriptorError(
      `${typeRepr(g)} takes 0 or 2 type arguments. Got ${g.args.length}.`,
    );
  }
  return new MappingValidator(hint, container, child(key, context), child(value, context));
}

function compileCollection(
  hint: TypeHint,
  g: GenericDescriptor,
  context: CompileContext,
): Validator {
  const container = originValidator(g.origin, context);
  if (g.args.length === 0) {
    return new CollectionValidator(hint, container, new AnyValidator(d.any()));
  }
  const [item] = g.args;
  if (g.args.length !== 1 || item === undefined) {
    throw new InvalidDescriptorError(
      `${typeRepr(g)} takes 0 or 1 type arguments. Got ${g.args.length}.`,
    );
  }
  return new CollectionValidator(hint, container, child(item, context));
}

function compileRecord(
  hint: TypeHint,
  record: RecordType,
  context: CompileContext,
): Validator {
  if (record.fields === undefined) {
    throw new InvalidDescriptorError(
      `Record type '${record.name}' declares no fields.`,
    );
  }
  const fields = new Map<string, Validator>();
  for (const [name, field] of Object.entries(record.fields)) {
    fields.set(name, child(field, context));
  }
  return new RecordValidator(hint, record, fields);
}

/**
 * Compile one hint. Children are compiled through `context`, which memoizes.
 *
 * @throws InvalidDescriptorError for malformed hints
 * @throws NotImplementedCheckError for shapes that are not checked
 */
export function compileHint(
  hint: TypeHint,
  isArgument: boolean,
  context: CompileContext,
): Validator {
  const desc = normalize(hint, isArgument);

  return match(desc)
    .with({ kind: "any" }, () => new AnyValidator(hint))
    .with({ kind: "typeOf" }, (t) => new TypeOfValidator(hint, child(t.inner, context)))
    .with({ kind: "literal" }, (l) => new LiteralValidator(hint, l.values))
    .with(
      { kind: "generic", origin: P.when(hasShape("mapping")) },
      (g) => compileMapping(hint, g, context),
    )
    .with(
      { kind: "generic", origin: P.when(hasShape("collection")) },
      (g) => compileCollection(hint, g, context),
    )
    .with({ kind: "generic", origin: P.when(hasShape("iterable")) }, (g) => {
      throw new NotImplementedCheckError(
        `No validator is set up for iterables that exhaust: '${typeRepr(g)}'.`,
      );
    })
    .with(
      { kind: "generic" },
      (g) => new GenericValidator(hint, originValidator(g.origin, context)),
    )
    .with({ kind: "tuple", variadic: true }, (t) => {
      const [element = d.any()] = t.elements;
      return new CollectionValidator(
        hint,
        originValidator(Array, context),
        child(element, context),
      );
    })
    .with({ kind: "tuple" }, (t) =>
      new TupleValidator(
        hint,
        originValidator(Array, context),
        t.elements.map((e) => child(e, context)),
      ))
    .with({ kind: "callable" }, () => new CallableValidator(hint))
    .with(
      { kind: "class", target: P.when(isRecordType) },
      (c) => compileRecord(hint, c.target, context),
    )
    .with({ kind: "class" }, (c) => new ConcreteValidator(hint, c.target, context))
    .with(
      { kind: "union" },
      (u) => new UnionValidator(hint, u.members.map((m) => child(m, context))),
    )
    .with({ kind: "typeVar" }, (v) => {
      if (v.bound !== undefined) return child(v.bound, context);
      if (v.constraints.length > 0) {
        return new UnionValidator(
          d.union(...v.constraints),
          v.constraints.map((c) => child(c, context)),
        );
      }
      return new AnyValidator(hint);
    })
    .with({ kind: "newType" }, (n) => {
      if (n.supertype === undefined) {
        throw new InvalidDescriptorError(
          `No supertype for new type: ${n.name}. This is not allowed.`,
        );
      }
      return child(n.supertype, context);
    })
    .with(
      { kind: "forwardRef" },
      (f) => new ForwardRefValidator(hint, f, isArgument, context),
    )
    .with({ kind: "classVar" }, (c) => child(c.inner, context))
    .otherwise((unmatched) => {
      throw new NotImplementedCheckError(
        `No validator is set up for: ${describeValue(unmatched)}.`,
      );
    });
}
