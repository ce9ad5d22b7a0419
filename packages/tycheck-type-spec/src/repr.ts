// packages/tycheck-type-spec/src/repr.ts
// Text rendering of type hints and values for error messages.

import { inspect } from "node:util";
import { match } from "ts-pattern";
import { isStructural } from "./classes.ts";
import { type Descriptor, isDescriptor, type TypeHint } from "./descriptor.ts";

/** One-line rendering of an arbitrary runtime value. */
export function describeValue(value: unknown): string {
  return inspect(value, { depth: 2, breakLength: Infinity });
}

function list(hints: readonly TypeHint[]): string {
  return hints.map(typeRepr).join(", ");
}

function descriptorRepr(desc: Descriptor): string {
  return match(desc)
    .with({ kind: "any" }, () => "Any")
    .with({ kind: "class" }, ({ target }) => typeRepr(target))
    .with({ kind: "union" }, ({ members }) => `Union[${list(members)}]`)
    .with(
      { kind: "literal" },
      ({ values }) => `Literal[${values.map(describeValue).join(", ")}]`,
    )
    .with({ kind: "tuple" }, ({ elements, variadic }) => {
      if (variadic) return `Tuple[${list(elements)}, ...]`;
      return elements.length === 0 ? "Tuple[()]" : `Tuple[${list(elements)}]`;
    })
    .with({ kind: "generic" }, ({ origin, args }) =>
      args.length === 0 ? typeRepr(origin) : `${typeRepr(origin)}[${list(args)}]`)
    .with({ kind: "typeOf" }, ({ inner }) => `Type[${typeRepr(inner)}]`)
    .with({ kind: "newType" }, ({ name }) => name)
    .with({ kind: "classVar" }, ({ inner }) => `ClassVar[${typeRepr(inner)}]`)
    .with({ kind: "typeVar" }, ({ name }) => `~${name}`)
    .with({ kind: "forwardRef" }, ({ name }) => `ForwardRef('${name}')`)
    .with({ kind: "callable" }, ({ params, returns }) => {
      if (params === undefined && returns === undefined) return "Callable";
      const args = params === "..." ? "..." : `[${list(params ?? [])}]`;
      return `Callable[${args}, ${returns === undefined ? "Any" : typeRepr(returns)}]`;
    })
    .exhaustive();
}

/**
 * Render a type hint the way it reads in source: `Union[Int, String]`,
 * `Tuple[Int, ...]`, `Map[String, Number]`. Non-hints fall back to
 * {@link describeValue}.
 */
export function typeRepr(hint: unknown): string {
  if (hint === null) return "None";
  if (typeof hint === "string") return `ForwardRef('${hint}')`;
  if (typeof hint === "function") return hint.name || "<anonymous>";
  if (isStructural(hint)) return hint.name;
  if (isDescriptor(hint)) return descriptorRepr(hint);
  return describeValue(hint);
}
