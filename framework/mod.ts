/**
 * mantle
 *
 * Presentation decorators for TypeScript web applications.
 *
 * @module mantle
 */

// Configuration
export { Config, loadConfig, getConfig, setConfig, type ConfigOptions } from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  isOTELEnabled,
  getOTELTracer,
  getActiveSpan,
  addSpanEvent,
  withSpanSync,
} from './telemetry/mod.ts';

// View helpers
export {
  ViewHelpers,
  SafeHtml,
  escape,
  raw,
  contentTag,
  linkTo,
  truncate,
  getViewHelpers,
  setViewHelpers,
  withViewHelpers,
  type TagAttributes,
  type TruncateOptions,
  type LocalizeOptions,
  type Translations,
  type ViewHelpersOptions,
} from './view/mod.ts';

// Decorators
export {
  Decorator,
  CollectionDecorator,
  DecoratedAssociation,
  Decoratable,
  HelperProxy,
  DecoratorRegistry,
  getRegistry,
  setRegistry,
  ConfigurationError,
  UninferrableSourceError,
  UninferrableDecoratorError,
  NoMethodError,
  DECORATED,
  COLLECTION_DECORATED,
  isDecorated,
  isDecoratable,
  isCollection,
  isEqual,
  type AnyClass,
  type AssociationOptions,
  type CollectionOptions,
  type DecorateCollectionOptions,
  type Decorated,
  type DecoratableSource,
  type DecorateOptions,
  type DecoratorContext,
} from './decorator/mod.ts';

// In-memory models
export { Model, Relation, type ModelClass, type ModelDefinition, type FieldDefinition } from './orm/mod.ts';
