// packages/tycheck-type-spec/src/mod.ts
// Type descriptors: the declarative side of tycheck. Descriptors are plain,
// frozen, `kind`-tagged objects with nested payloads; classes and strings are
// accepted wherever a descriptor is.

export {
  Callable,
  type ClassRef,
  classifyOrigin,
  Collection,
  type Constructor,
  type ContainerShape,
  defineRecord,
  defineStructural,
  Dict,
  extendsClass,
  Int,
  isClassRef,
  isConstructor,
  isInstance,
  isPlainObject,
  isRecordType,
  isStructural,
  isSubclass,
  Iterable,
  Mapping,
  None,
  type RecordType,
  Sequence,
  type StructuralClass,
  typeNameOf,
} from "./classes.ts";

export {
  type AnyDescriptor,
  type CallableDescriptor,
  type ClassDescriptor,
  type ClassVarDescriptor,
  d,
  type Descriptor,
  type DescriptorKind,
  type ForwardRefDescriptor,
  type GenericDescriptor,
  isDescriptor,
  type LiteralDescriptor,
  type LiteralValue,
  type NewTypeDescriptor,
  type TupleDescriptor,
  type TypeHint,
  type TypeOfDescriptor,
  type TypeVarDescriptor,
  type UnionDescriptor,
} from "./descriptor.ts";

export { InvalidDescriptorError } from "./errors.ts";

export {
  annotate,
  attributeRevision,
  bindScope,
  builtins,
  getAttributeHints,
  Namespace,
  namespaceOf,
} from "./namespace.ts";

export { normalize } from "./normalize.ts";

export { describeValue, typeRepr } from "./repr.ts";
