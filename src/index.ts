export { attribute, describeType, mergeSchemas } from './AttributeSchema';
export type {
  AttributeOptions,
  AttributeSchema,
  DefaultFactory,
  DuplicateHandler,
  ExpectedType,
  PrimitiveTypeTag,
  ValueClass,
} from './AttributeSchema';
export { formatScalar } from './AttributeValue';
export type { AttributeValue, ClassifiedValue, FormattedValue, ScalarValue } from './AttributeValue';
export { configure, getConfig, loadConfig, resetConfig } from './Config';
export type { EngineConfig } from './Config';
export { Entity, classifyValue, describeValue, matchesType, schemaOf, tagOf } from './Entity';
export type { EntityType, EntityValues } from './Entity';
export {
  DuplicateSchemaNameError,
  MissingRequiredAttributeError,
  SceneMarkupError,
  TypeMismatchError,
  UnresolvedReferenceError,
} from './Errors';
export { MarkupSerializer, serialize } from './MarkupSerializer';
export type { SerializationStats } from './MarkupSerializer';
export { MarkupWriter } from './MarkupWriter';
export type { WriteOptions } from './MarkupWriter';
export { toExternalName, wrapperName } from './Naming';
export { Reference } from './Reference';

export * from './document/Color';
export * from './document/Coordinates';
export * from './document/ObjectAttributes';
export * from './document/Composition';
export * from './document/Storyboard';
