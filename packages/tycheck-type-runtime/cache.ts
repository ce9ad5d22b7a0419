// packages/tycheck-type-runtime/cache.ts
// Bounded LRU of compiled validators, keyed by hint identity and argument flag.

import type { TypeHint } from "../tycheck-type-spec/src/mod.ts";
import type { Validator } from "./validators.ts";

export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
  readonly size: number;
  readonly maxSize: number;
}

export class CompileCache {
  readonly maxSize: number;
  // One map per argument flag; Map keeps insertion order, oldest first.
  private readonly asArgument = new Map<TypeHint, Validator>();
  private readonly asValue = new Map<TypeHint, Validator>();
  private readonly onEvict: ((hint: TypeHint) => void) | undefined;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(maxSize: number, onEvict?: (hint: TypeHint) => void) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new RangeError(`Cache size must be a positive integer. Got ${maxSize}.`);
    }
    this.maxSize = maxSize;
    this.onEvict = onEvict;
  }

  get(hint: TypeHint, isArgument: boolean): Validator | undefined {
    const entries = this.entries(isArgument);
    const validator = entries.get(hint);
    if (validator === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    // Move to the most recently used end.
    entries.delete(hint);
    entries.set(hint, validator);
    return validator;
  }

  set(hint: TypeHint, isArgument: boolean, validator: Validator): void {
    const entries = this.entries(isArgument);
    entries.delete(hint);
    entries.set(hint, validator);
    while (entries.size > this.maxSize) {
      const oldest = entries.keys().next();
      if (oldest.done) break;
      entries.delete(oldest.value);
      this.evictions++;
      this.onEvict?.(oldest.value);
    }
  }

  has(hint: TypeHint, isArgument: boolean): boolean {
    return this.entries(isArgument).has(hint);
  }

  clear(): void {
    this.asArgument.clear();
    this.asValue.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  get size(): number {
    return this.asArgument.size + this.asValue.size;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.size,
      maxSize: this.maxSize,
    };
  }

  private entries(isArgument: boolean): Map<TypeHint, Validator> {
    return isArgument ? this.asArgument : this.asValue;
  }
}
