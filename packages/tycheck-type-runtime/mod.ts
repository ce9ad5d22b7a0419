// packages/tycheck-type-runtime/mod.ts
// Runtime type checking: compile type hints into validators, then check
// values (and classes) against them.
//
// Re-exports the descriptor vocabulary so callers need a single import.

export {
  annotate,
  builtins,
  Callable,
  type ClassRef,
  Collection,
  d,
  defineRecord,
  type Descriptor,
  describeValue,
  Dict,
  getAttributeHints,
  Int,
  InvalidDescriptorError,
  Iterable,
  Mapping,
  Namespace,
  namespaceOf,
  None,
  normalize,
  type RecordType,
  Sequence,
  type TypeHint,
  typeRepr,
} from "../tycheck-type-spec/src/mod.ts";

export { type CacheStats, CompileCache } from "./cache.ts";

export {
  type CheckOptions,
  checkType,
  compileChecker,
  defaultChecker,
  TypeChecker,
} from "./checker.ts";

export { compileHint } from "./compiler.ts";

export {
  type CheckerOptions,
  createLogger,
  DEFAULT_MAX_CACHE_SIZE,
  type Env,
  type Logger,
  resolveOptions,
  type ResolvedOptions,
} from "./config.ts";

export { checkClass, checkTypes } from "./decorators.ts";

export {
  buildPath,
  NotImplementedCheckError,
  type PathSegment,
  type Result,
  TypeMismatchError,
  wrapMismatch,
} from "./errors.ts";

export {
  type ForwardRefResolver,
  ForwardRefValidator,
  NamespaceResolver,
} from "./forward-ref.ts";

export {
  bindArguments,
  getSignatureHints,
  type ParameterKind,
  type ParameterSpec,
  RETURN_KEY,
  type SignatureSpec,
} from "./signature.ts";

export {
  AnyValidator,
  CallableValidator,
  CollectionValidator,
  type CompileContext,
  ConcreteValidator,
  GenericValidator,
  LiteralValidator,
  MappingValidator,
  RecordValidator,
  TupleValidator,
  TypeOfValidator,
  UnionValidator,
  Validator,
} from "./validators.ts";
