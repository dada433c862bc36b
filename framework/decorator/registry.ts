/**
 * Inference Registry
 *
 * Pairs source classes with decorator classes by name. Classes are
 * registered at startup under their qualified name (`namespace` static plus
 * class name); inference then becomes a lookup:
 *
 *   Product          <-> ProductDecorator
 *   Admin.Product    <-> Admin.ProductDecorator
 *   ProductDecorator  -> ProductsDecorator (collection)
 */

import pluralize from 'pluralize';
import { getConfig } from '../config/config.ts';
import { UninferrableDecoratorError, UninferrableSourceError } from './errors.ts';
import { COLLECTION_DECORATED, DECORATED, type AnyClass } from './types.ts';
import type { Decorator } from './decorator.ts';
import type { CollectionDecorator } from './collection.ts';

function brandedWith(value: AnyClass, brand: symbol): boolean {
  const prototype: unknown = value.prototype;
  return typeof prototype === 'object' && prototype !== null && brand in prototype;
}

export function isDecoratorClass(value: AnyClass): value is typeof Decorator {
  return brandedWith(value, DECORATED) && !brandedWith(value, COLLECTION_DECORATED);
}

export function isCollectionDecoratorClass(value: AnyClass): value is typeof CollectionDecorator {
  return brandedWith(value, COLLECTION_DECORATED);
}

function namespaceOf(cls: AnyClass): string | undefined {
  const namespace: unknown = Reflect.get(cls, 'namespace');
  return typeof namespace === 'string' && namespace.length > 0 ? namespace : undefined;
}

/**
 * Name-based registry of sources and decorators
 */
export class DecoratorRegistry {
  private classes = new Map<string, AnyClass>();
  private names = new Map<AnyClass, string>();
  private readonly configuredSuffix?: string;

  constructor(options: { suffix?: string } = {}) {
    this.configuredSuffix = options.suffix;
  }

  /**
   * Class-name suffix marking decorators (config `decorators.suffix`)
   */
  get suffix(): string {
    return this.configuredSuffix ?? getConfig().get<string>('decorators.suffix', 'Decorator');
  }

  /**
   * Register classes under their qualified names
   */
  register(...classes: AnyClass[]): this {
    for (const cls of classes) {
      this.registerAs(this.qualifiedName(cls), cls);
    }
    return this;
  }

  /**
   * Register a class under an explicit name
   */
  registerAs(name: string, cls: AnyClass): this {
    if (name.length === 0) {
      throw new Error('Anonymous classes cannot be registered without a name');
    }
    this.classes.set(name, cls);
    this.names.set(cls, name);
    return this;
  }

  has(cls: AnyClass): boolean {
    return this.names.has(cls);
  }

  /**
   * Name the class is known by: its registered name, else namespace + name
   */
  qualifiedName(cls: AnyClass): string {
    const registered = this.names.get(cls);
    if (registered !== undefined) return registered;

    const namespace = namespaceOf(cls);
    return namespace ? `${namespace}.${cls.name}` : cls.name;
  }

  resolve(name: string): AnyClass | undefined {
    return this.classes.get(name);
  }

  findDecorator(name: string): typeof Decorator | undefined {
    const cls = this.resolve(name);
    return cls && isDecoratorClass(cls) ? cls : undefined;
  }

  findCollectionDecorator(name: string): typeof CollectionDecorator | undefined {
    const cls = this.resolve(name);
    return cls && isCollectionDecoratorClass(cls) ? cls : undefined;
  }

  /**
   * Decorator for a source class: `<prefix><suffix>`, where the prefix is
   * the source's qualified name unless one is given
   */
  decoratorFor(sourceClass: AnyClass, prefix = this.qualifiedName(sourceClass)): typeof Decorator {
    const decorator = prefix ? this.findDecorator(`${prefix}${this.suffix}`) : undefined;
    if (!decorator) {
      throw new UninferrableDecoratorError(sourceClass);
    }
    return decorator;
  }

  /**
   * Source class for a decorator, by stripping the suffix from its name
   */
  sourceFor(decoratorClass: AnyClass): AnyClass {
    const stem = this.stem(decoratorClass);
    const source = stem === undefined ? undefined : this.resolve(stem);
    if (!source || isDecoratorClass(source) || isCollectionDecoratorClass(source)) {
      throw new UninferrableSourceError(decoratorClass);
    }
    return source;
  }

  /**
   * Conventional collection decorator for a decorator class
   * (ProductDecorator -> ProductsDecorator), if one is registered
   */
  collectionDecoratorFor(decoratorClass: AnyClass): typeof CollectionDecorator | undefined {
    const stem = this.stem(decoratorClass);
    if (stem === undefined) return undefined;

    const segments = stem.split('.');
    const last = segments.pop() ?? '';
    const plural = [...segments, pluralize(last)].join('.');
    return this.findCollectionDecorator(`${plural}${this.suffix}`);
  }

  clear(): void {
    this.classes.clear();
    this.names.clear();
  }

  private stem(decoratorClass: AnyClass): string | undefined {
    const name = this.qualifiedName(decoratorClass);
    const suffix = this.suffix;
    const shortName = name.split('.').pop() ?? '';

    if (!name.endsWith(suffix) || shortName.length <= suffix.length) {
      return undefined;
    }
    return name.slice(0, -suffix.length);
  }
}

let defaultRegistry: DecoratorRegistry | null = null;

/**
 * Get the process-default registry
 */
export function getRegistry(): DecoratorRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new DecoratorRegistry();
  }
  return defaultRegistry;
}

/**
 * Replace the process-default registry. Passing null starts a fresh one.
 */
export function setRegistry(registry: DecoratorRegistry | null): void {
  defaultRegistry = registry;
}
