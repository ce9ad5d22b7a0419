// packages/tycheck-type-runtime/checker.ts
// Checker context: owns the compile cache, configuration and resolver.

import {
  type ForwardRefDescriptor,
  type Namespace,
  type TypeHint,
  typeRepr,
} from "../tycheck-type-spec/src/mod.ts";
import { CompileCache } from "./cache.ts";
import { compileHint } from "./compiler.ts";
import {
  type CheckerOptions,
  type Logger,
  resolveOptions,
  type ResolvedOptions,
} from "./config.ts";
import type { Result, TypeMismatchError } from "./errors.ts";
import type { ForwardRefResolver } from "./forward-ref.ts";
import type { CompileContext, Validator } from "./validators.ts";

export interface CheckOptions {
  /** Hint appears in argument position, where `ClassVar` is rejected (default true) */
  isArgument?: boolean;
}

/**
 * Compiles hints into validators and memoizes them. Independent checkers
 * share nothing.
 *
 * @example
 * ```ts
 * const checker = new TypeChecker({ maxCacheSize: 256 });
 * checker.checkType([1, "a"], d.tuple(d.int(), d.str()));
 * checker.isInstance(3.1, d.union(d.int(), d.str())); // false
 * ```
 */
export class TypeChecker implements CompileContext {
  readonly options: ResolvedOptions;
  readonly cache: CompileCache;
  readonly resolver: ForwardRefResolver;
  readonly namespace: Namespace;
  private readonly logger: Logger;
  private warnedFull = false;

  constructor(options: CheckerOptions = {}) {
    this.options = resolveOptions(options);
    this.logger = this.options.logger;
    this.resolver = this.options.resolver;
    this.namespace = this.options.namespace;
    this.cache = new CompileCache(this.options.maxCacheSize, (hint) => {
      if (!this.warnedFull) {
        this.warnedFull = true;
        this.logger.warn(
          `compile cache is full (${this.options.maxCacheSize} entries); evicting least recently used validators`,
        );
      }
      this.logger.debug(`evicted ${typeRepr(hint)}`);
    });
  }

  /** Same (hint, flag) pair returns the same validator while it stays cached. */
  compile(hint: TypeHint, isArgument = false): Validator {
    const cached = this.cache.get(hint, isArgument);
    if (cached) return cached;
    const validator = compileHint(hint, isArgument, this);
    this.cache.set(hint, isArgument, validator);
    this.logger.debug(`compiled ${validator}`);
    return validator;
  }

  resolveForwardRef(ref: ForwardRefDescriptor, trigger: unknown): TypeHint {
    const hint = this.resolver.resolve(ref, trigger, this.namespace);
    this.logger.debug(`resolved ForwardRef('${ref.name}') -> ${typeRepr(hint)}`);
    return hint;
  }

  /**
   * @throws TypeMismatchError if the value does not conform
   * @throws InvalidDescriptorError if the hint is malformed
   * @throws NotImplementedCheckError if the hint's shape is not checked
   */
  checkType(value: unknown, hint: TypeHint, options: CheckOptions = {}): void {
    this.compile(hint, options.isArgument ?? true).check(value);
  }

  checkSafe(value: unknown, hint: TypeHint): Result<void, TypeMismatchError> {
    return this.compile(hint, true).checkSafe(value);
  }

  isInstance(value: unknown, hint: TypeHint): boolean {
    return this.compile(hint, false).isValid(value);
  }
}

export const defaultChecker: TypeChecker = new TypeChecker();

export function compileChecker(hint: TypeHint, isArgument = false): Validator {
  return defaultChecker.compile(hint, isArgument);
}

export function checkType(
  value: unknown,
  hint: TypeHint,
  options: CheckOptions = {},
): void {
  defaultChecker.checkType(value, hint, options);
}
