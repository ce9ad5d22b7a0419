// packages/tycheck-type-spec/src/normalize.ts
// Shallow well-formedness pass: classify a hint into exactly one descriptor.
// Child hints are not visited; the compiler normalizes them as it recurses.

import { match, P } from "ts-pattern";
import { isClassRef } from "./classes.ts";
import { d, type Descriptor, isDescriptor, type LiteralValue } from "./descriptor.ts";
import { InvalidDescriptorError } from "./errors.ts";
import { describeValue, typeRepr } from "./repr.ts";

function invalid(message: string): never {
  throw new InvalidDescriptorError(message);
}

function isLiteralValue(value: unknown): value is LiteralValue {
  return value === null || value === undefined ||
    ["string", "number", "boolean", "bigint"].includes(typeof value);
}

function isHintList(value: unknown): boolean {
  return Array.isArray(value);
}

function validateDescriptor(desc: Descriptor, isArgument: boolean): Descriptor {
  return match(desc)
    .with({ kind: "union" }, (u) => {
      if (!isHintList(u.members) || u.members.length === 0) {
        invalid("Cannot take a Union of no types.");
      }
      return u;
    })
    .with({ kind: "literal" }, (l) => {
      if (!isHintList(l.values) || l.values.length === 0) {
        invalid("Literal requires at least one value.");
      }
      const bad = l.values.find((v) => !isLiteralValue(v));
      if (bad !== undefined) {
        invalid(`Literal values must be primitives. Got ${describeValue(bad)}.`);
      }
      return l;
    })
    .with({ kind: "tuple" }, (t) => {
      if (!isHintList(t.elements)) invalid("Tuple elements must be a list.");
      if (t.variadic && t.elements.length !== 1) {
        invalid("Variadic tuple takes exactly one element type.");
      }
      return t;
    })
    .with({ kind: "generic" }, (g) => {
      if (!isClassRef(g.origin)) {
        invalid(`Generic origin must be a class. Got ${describeValue(g.origin)}.`);
      }
      if (!isHintList(g.args)) invalid("Generic arguments must be a list.");
      return g;
    })
    .with({ kind: "class" }, (c) => {
      if (!isClassRef(c.target)) {
        invalid(`Invalid type. Got ${describeValue(c.target)}.`);
      }
      return c;
    })
    .with({ kind: "classVar" }, (c) => {
      if (isArgument) invalid(`${typeRepr(c)} is not valid as type argument.`);
      return c;
    })
    .with({ kind: "typeVar" }, (v) => {
      if (v.bound !== undefined && v.constraints.length > 0) {
        invalid(`Constraints cannot be combined with bound=${typeRepr(v.bound)}.`);
      }
      if (v.constraints.length === 1) {
        invalid(`A single constraint is not allowed (${typeRepr(v)}).`);
      }
      return v;
    })
    .with({ kind: "forwardRef" }, (f) => {
      if (f.name.length === 0) invalid("Forward reference must name a type.");
      return f;
    })
    .with(
      { kind: P.union("any", "typeOf", "newType", "callable") },
      (other) => other,
    )
    .exhaustive();
}

/**
 * Validate a hint and return its descriptor.
 *
 * Strings become forward references, `null` becomes None, classes become
 * class descriptors. `ClassVar` is rejected in argument position.
 *
 * @throws InvalidDescriptorError when the hint is not a type
 */
export function normalize(hint: unknown, isArgument = true): Descriptor {
  if (hint === null) return d.none();
  if (typeof hint === "string") {
    return hint.length > 0 ? d.ref(hint) : invalid("Forward reference must name a type.");
  }
  if (isClassRef(hint)) return d.cls(hint);
  if (isDescriptor(hint)) return validateDescriptor(hint, isArgument);
  return invalid(`Invalid type. Got ${describeValue(hint)}.`);
}
