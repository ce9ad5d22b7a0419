// packages/tycheck-type-spec/src/errors.ts

/**
 * Raised when a type hint is itself malformed: a value that is not a type,
 * a union with no members, a new type without a supertype, a forward
 * reference whose name cannot be found.
 */
export class InvalidDescriptorError extends TypeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidDescriptorError";
  }
}
