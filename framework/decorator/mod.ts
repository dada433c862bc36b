/**
 * Decorator Layer
 *
 * Presentation decorators over domain objects and collections.
 */

export { Decorator } from './decorator.ts';
export {
  CollectionDecorator,
  type CollectionOptions,
  type DecorateCollectionOptions,
} from './collection.ts';
export {
  DecoratedAssociation,
  type AssociationOptions,
  type AssociationOwner,
  type AssociationScope,
} from './association.ts';
export { Decoratable } from './decoratable.ts';
export { HelperProxy } from './helper_proxy.ts';
export {
  DecoratorRegistry,
  getRegistry,
  setRegistry,
  isDecoratorClass,
  isCollectionDecoratorClass,
} from './registry.ts';
export {
  ConfigurationError,
  UninferrableSourceError,
  UninferrableDecoratorError,
  NoMethodError,
} from './errors.ts';
export { assertValidKeys, DECORATOR_OPTIONS, COLLECTION_OPTIONS, ASSOCIATION_OPTIONS } from './options.ts';
export {
  DECORATED,
  COLLECTION_DECORATED,
  isDecorated,
  isDecoratable,
  isCollection,
  isEqual,
  type AnyClass,
  type Decorated,
  type DecoratableSource,
  type DecorateOptions,
  type DecoratorContext,
} from './types.ts';
