// packages/tycheck-type-runtime/decorators.ts
// Call-boundary wrappers for functions and classes.

import { d, describeValue, type TypeHint } from "../tycheck-type-spec/src/mod.ts";
import { defaultChecker, type TypeChecker } from "./checker.ts";
import { wrapMismatch } from "./errors.ts";
import {
  bindArguments,
  getSignatureHints,
  RETURN_KEY,
  type SignatureSpec,
} from "./signature.ts";
import type { Validator } from "./validators.ts";

/**
 * Wrap `fn` so every passed argument is checked before the call and the
 * return value after it. Validators are compiled once, up front.
 *
 * @example
 * ```ts
 * const add = checkTypes((a: number, b: number) => a + b, {
 *   params: [{ name: "a", type: d.int() }, { name: "b", type: d.int() }],
 *   returns: d.int(),
 * });
 * add(1, 2);   // 3
 * add(1, 2.5); // TypeMismatchError: Argument: 'b' of: 'add' ...
 * ```
 */
export function checkTypes<A extends unknown[], R>(
  fn: (...args: A) => R,
  signature: SignatureSpec,
  checker: TypeChecker = defaultChecker,
): (...args: A) => R {
  const hints = getSignatureHints(signature);
  const label = fn.name || "<anonymous>";

  const argumentValidators = new Map<string, Validator>();
  let returnHint: TypeHint = d.any();
  for (const [name, hint] of hints) {
    if (name === RETURN_KEY) {
      returnHint = hint;
    } else {
      argumentValidators.set(name, checker.compile(hint, true));
    }
  }
  const returnValidator = checker.compile(returnHint, false);

  const wrapped = function (this: unknown, ...args: A): R {
    for (const [name, value] of bindArguments(signature, args)) {
      const validator = argumentValidators.get(name);
      if (!validator) continue;
      try {
        validator.check(value);
      } catch (err) {
        throw wrapMismatch(
          err,
          `Argument: '${name}' of: '${label}' with value: ${
            describeValue(value)
          } has wrong type.`,
          name,
        );
      }
    }

    const result = fn.apply(this, args);

    try {
      returnValidator.check(result);
    } catch (err) {
      throw wrapMismatch(
        err,
        `Return value of: '${label}' with value: ${describeValue(result)} has wrong type.`,
        RETURN_KEY,
      );
    }
    return result;
  };
  Object.defineProperty(wrapped, "name", { value: label });
  return wrapped;
}

/**
 * Proxy `cls` so each new instance is checked against it, declared
 * attributes included.
 *
 * @example
 * ```ts
 * class Point { constructor(public x: unknown) {} }
 * annotate(Point, { x: d.int() });
 * const CheckedPoint = checkClass(Point);
 * new CheckedPoint("1"); // TypeMismatchError: Attribute: 'x' ...
 * ```
 */
export function checkClass<C extends new (...args: never[]) => object>(
  cls: C,
  checker: TypeChecker = defaultChecker,
): C {
  const validator = checker.compile(cls, false);
  return new Proxy(cls, {
    construct(target, args, newTarget) {
      const instance: object = Reflect.construct(target, args, newTarget);
      validator.check(instance);
      return instance;
    },
  });
}
