// packages/tycheck-type-runtime/config.ts
// Checker options, environment overrides and the console logger.

import { builtins, type Namespace } from "../tycheck-type-spec/src/mod.ts";
import { type ForwardRefResolver, NamespaceResolver } from "./forward-ref.ts";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

const LOG_PREFIX = "[tycheck]";

/**
 * Prefixing logger over `sink`. Debug output is dropped unless `enabled`;
 * warnings always go through.
 */
export function createLogger(enabled: boolean, sink: Logger = console): Logger {
  return {
    debug: (message, ...details) => {
      if (enabled) sink.debug(`${LOG_PREFIX} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      sink.warn(`${LOG_PREFIX} ${message}`, ...details);
    },
  };
}

export interface CheckerOptions {
  /** Upper bound on cached validators per argument flag (default 4096) */
  maxCacheSize?: number;
  /** Where forward references resolve when nothing closer names them */
  namespace?: Namespace;
  debug?: boolean;
  logger?: Logger;
  resolver?: ForwardRefResolver;
}

export interface ResolvedOptions {
  readonly maxCacheSize: number;
  readonly namespace: Namespace;
  readonly debug: boolean;
  readonly logger: Logger;
  readonly resolver: ForwardRefResolver;
}

export const DEFAULT_MAX_CACHE_SIZE = 4096;

export type Env = Readonly<Record<string, string | undefined>>;

function envFlag(raw: string | undefined): boolean {
  return raw !== undefined && ["1", "true"].includes(raw.trim().toLowerCase());
}

function envCacheSize(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

/**
 * Fill in defaults. `TYCHECK_CACHE_SIZE` and `TYCHECK_DEBUG` apply unless the
 * matching option is given explicitly.
 *
 * @throws RangeError if the cache size is not a positive integer
 */
export function resolveOptions(
  options: CheckerOptions = {},
  env: Env = process.env,
): ResolvedOptions {
  const maxCacheSize = options.maxCacheSize ??
    envCacheSize(env.TYCHECK_CACHE_SIZE) ?? DEFAULT_MAX_CACHE_SIZE;
  if (!Number.isInteger(maxCacheSize) || maxCacheSize <= 0) {
    throw new RangeError(
      `maxCacheSize must be a positive integer. Got ${maxCacheSize}.`,
    );
  }

  const debug = options.debug ?? envFlag(env.TYCHECK_DEBUG);

  return {
    maxCacheSize,
    namespace: options.namespace ?? builtins,
    debug,
    logger: createLogger(debug, options.logger),
    resolver: options.resolver ?? new NamespaceResolver(),
  };
}
