// packages/tycheck-type-runtime/errors.ts
// Error taxonomy and the error chain builder.

export { InvalidDescriptorError } from "../tycheck-type-spec/src/mod.ts";

// Result type for functional error handling
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// Index into a tuple/collection, or a key, field or attribute name
export type PathSegment = string | number;

// Build path string from segments: `user.tags[2]`
export function buildPath(segments: readonly PathSegment[]): string {
  if (segments.length === 0) return "";
  let path = "";
  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i];
    if (typeof seg === "number") {
      path += `[${seg}]`;
    } else {
      path += i === 0 ? seg : `.${seg}`;
    }
  }
  return path;
}

/**
 * The value (or type) does not conform to the hint.
 *
 * A failure deep inside a container is rethrown once per enclosing layer;
 * each layer names its own `segment` and keeps the inner failure as `cause`.
 */
export class TypeMismatchError extends TypeError {
  readonly segment: PathSegment | undefined;

  constructor(
    message: string,
    options: { cause?: TypeMismatchError; segment?: PathSegment } = {},
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "TypeMismatchError";
    this.segment = options.segment;
  }

  get inner(): TypeMismatchError | undefined {
    return this.cause instanceof TypeMismatchError ? this.cause : undefined;
  }

  /** This error followed by every nested cause, outermost first. */
  get chain(): TypeMismatchError[] {
    const chain: TypeMismatchError[] = [];
    let current: TypeMismatchError | undefined = this;
    while (current) {
      chain.push(current);
      current = current.inner;
    }
    return chain;
  }

  get rootCause(): TypeMismatchError {
    const chain = this.chain;
    return chain[chain.length - 1] ?? this;
  }

  /** Location of the innermost failure, e.g. `items[1].name`. */
  get path(): string {
    const segments: PathSegment[] = [];
    for (const err of this.chain) {
      if (err.segment !== undefined) segments.push(err.segment);
    }
    return buildPath(segments);
  }

  describe(): string {
    return this.chain
      .map((err, depth) =>
        depth === 0 ? err.message : `${"  ".repeat(depth)}caused by: ${err.message}`
      )
      .join("\n");
  }
}

/** The hint uses a shape the checker deliberately does not support. */
export class NotImplementedCheckError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotImplementedCheckError";
  }
}

/**
 * Error chain builder: give a nested mismatch the context of the enclosing
 * layer. Anything that is not a mismatch is returned untouched so the caller
 * rethrows it as-is.
 */
export function wrapMismatch(
  error: unknown,
  message: string,
  segment?: PathSegment,
): unknown {
  if (!(error instanceof TypeMismatchError)) return error;
  return new TypeMismatchError(message, { cause: error, segment });
}
