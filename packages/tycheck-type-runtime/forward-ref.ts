// packages/tycheck-type-runtime/forward-ref.ts
// Lazy forward references: a name resolved against a namespace on first use.

import {
  type ForwardRefDescriptor,
  InvalidDescriptorError,
  type Namespace,
  namespaceOf,
  type TypeHint,
} from "../tycheck-type-spec/src/mod.ts";
import { type CompileContext, Validator } from "./validators.ts";

/** Turns a forward reference into the hint it names. */
export interface ForwardRefResolver {
  /**
   * @param trigger - the value (or class) whose check caused the lookup
   * @param fallback - the checker's default namespace
   * @throws InvalidDescriptorError if the name is unknown
   */
  resolve(ref: ForwardRefDescriptor, trigger: unknown, fallback: Namespace): TypeHint;
}

/**
 * Looks the name up in the reference's own scope, else in the namespace the
 * triggering value's class was registered in, else in the fallback. Each
 * namespace falls through to its parents.
 */
export class NamespaceResolver implements ForwardRefResolver {
  resolve(ref: ForwardRefDescriptor, trigger: unknown, fallback: Namespace): TypeHint {
    const scope = ref.scope ?? namespaceOf(trigger) ?? fallback;
    const hint = scope.lookup(ref.name);
    if (hint === undefined) {
      throw new InvalidDescriptorError(
        `Forward reference '${ref.name}' is not defined in ${scope}.`,
      );
    }
    return hint;
  }
}

type ForwardRefState =
  | {
    readonly status: "unresolved";
    readonly name: string;
    readonly scope: Namespace | undefined;
  }
  | { readonly status: "resolved"; readonly delegate: Validator };

/**
 * Validator for a name that is resolved on the first check, then compiled
 * with the same argument flag and reused. A failed lookup leaves the
 * validator unresolved.
 */
export class ForwardRefValidator extends Validator {
  readonly kind = "forwardRef" as const;
  private state: ForwardRefState;
  private readonly ref: ForwardRefDescriptor;
  private readonly isArgument: boolean;
  private readonly context: CompileContext;

  constructor(
    hint: TypeHint,
    ref: ForwardRefDescriptor,
    isArgument: boolean,
    context: CompileContext,
  ) {
    super(hint);
    this.ref = ref;
    this.isArgument = isArgument;
    this.context = context;
    this.state = { status: "unresolved", name: ref.name, scope: ref.scope };
  }

  get resolved(): boolean {
    return this.state.status === "resolved";
  }

  check(value: unknown): void {
    this.delegateFor(value).check(value);
  }

  checkSubtype(candidate: unknown): void {
    this.delegateFor(candidate).checkSubtype(candidate);
  }

  private delegateFor(trigger: unknown): Validator {
    if (this.state.status === "resolved") return this.state.delegate;
    const target = this.context.resolveForwardRef(this.ref, trigger);
    const delegate = this.context.compile(target, this.isArgument);
    if (delegate === this) {
      throw new InvalidDescriptorError(
        `Forward reference '${this.state.name}' resolves to itself.`,
      );
    }
    if (this.leadsBack(delegate)) {
      throw new InvalidDescriptorError(
        `Forward reference '${this.state.name}' is cyclic.`,
      );
    }
    this.state = { status: "resolved", delegate };
    return delegate;
  }

  // Follows resolved forward references from `delegate`; an alias chain that
  // comes back here would delegate forever.
  private leadsBack(delegate: Validator): boolean {
    const seen = new Set<Validator>();
    let next: Validator = delegate;
    while (next instanceof ForwardRefValidator && next.state.status === "resolved") {
      if (seen.has(next)) return false;
      seen.add(next);
      next = next.state.delegate;
      if (next === this) return true;
    }
    return false;
  }
}
