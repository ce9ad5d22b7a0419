// packages/tycheck-type-runtime/signature.ts
// Function signatures: parameter hints and positional argument binding.

import {
  d,
  InvalidDescriptorError,
  type TypeHint,
} from "../tycheck-type-spec/src/mod.ts";

/**
 * `positional` takes the argument at its index, `rest` takes every remaining
 * argument, `keywords` is a trailing options bag.
 */
export type ParameterKind = "positional" | "rest" | "keywords";

export interface ParameterSpec {
  readonly name: string;
  /** Omitted means Any; `null` means None */
  readonly type?: TypeHint;
  readonly kind?: ParameterKind;
}

export interface SignatureSpec {
  readonly params: readonly ParameterSpec[];
  readonly returns?: TypeHint;
}

export const RETURN_KEY = "return";

function parameterHint(param: ParameterSpec): TypeHint {
  const hint = param.type === undefined ? d.any() : param.type;
  switch (param.kind ?? "positional") {
    case "rest":
      return d.sequence(hint);
    case "keywords":
      return d.mapping(d.str(), hint);
    default:
      return hint;
  }
}

function validateSignature(signature: SignatureSpec): void {
  const seen = new Set<string>();
  signature.params.forEach((param, index) => {
    if (param.name === RETURN_KEY) {
      throw new InvalidDescriptorError(`Parameter name '${RETURN_KEY}' is reserved.`);
    }
    if (seen.has(param.name)) {
      throw new InvalidDescriptorError(`Duplicate parameter '${param.name}'.`);
    }
    seen.add(param.name);
    if (param.kind === "rest" && index !== signature.params.length - 1) {
      throw new InvalidDescriptorError(
        `Rest parameter '${param.name}' must be the last parameter.`,
      );
    }
  });
}

/**
 * Name -> hint for every parameter, plus `"return"`. Undeclared types are
 * Any; a rest parameter becomes `Sequence[T]` and an options bag
 * `Mapping[String, T]`.
 *
 * @example
 * ```ts
 * getSignatureHints({
 *   params: [{ name: "a", type: d.int() }, { name: "rest", type: d.str(), kind: "rest" }],
 *   returns: d.bool(),
 * });
 * // Map { "a" => Int, "rest" => Sequence[String], "return" => Boolean }
 * ```
 */
export function getSignatureHints(
  signature: SignatureSpec,
): ReadonlyMap<string, TypeHint> {
  validateSignature(signature);
  const hints = new Map<string, TypeHint>();
  for (const param of signature.params) {
    hints.set(param.name, parameterHint(param));
  }
  hints.set(
    RETURN_KEY,
    signature.returns === undefined ? d.any() : signature.returns,
  );
  return hints;
}

/** Pair each passed argument with its parameter name. Unpassed parameters are left out. */
export function bindArguments(
  signature: SignatureSpec,
  args: readonly unknown[],
): Map<string, unknown> {
  const bound = new Map<string, unknown>();
  signature.params.forEach((param, index) => {
    if (param.kind === "rest") {
      bound.set(param.name, args.slice(index));
    } else if (index < args.length) {
      bound.set(param.name, args[index]);
    }
  });
  return bound;
}
