/**
 * Collection Decorator
 *
 * Decorates each item of an iterable source on first access. The source is
 * kept as given, so relations and other lazy collections are not loaded
 * until something reads the decorated items.
 */

import { ConfigurationError, UninferrableDecoratorError } from './errors.ts';
import { COLLECTION_OPTIONS, assertValidKeys } from './options.ts';
import { getRegistry, isDecoratorClass } from './registry.ts';
import {
  COLLECTION_DECORATED,
  DECORATED,
  classOf,
  infersDecorator,
  isCollection,
  isEqual,
  type AnyClass,
  type Decorated,
  type DecoratorContext,
} from './types.ts';
import type { Decorator } from './decorator.ts';

export interface CollectionOptions {
  /** Item decorator, or 'infer' to let each item pick its own */
  with?: typeof Decorator | 'infer';
  context?: DecoratorContext;
}

export interface DecorateCollectionOptions {
  with?: typeof Decorator | typeof CollectionDecorator | 'infer';
  context?: DecoratorContext;
}

export class CollectionDecorator implements Iterable<Decorator>, Decorated {
  /** Item decorator used when no `with` option is given */
  static itemDecorator?: typeof Decorator;
  static namespace?: string;

  readonly source: Iterable<unknown>;

  private currentContext: DecoratorContext;
  private readonly strategy: typeof Decorator | 'infer';
  private readonly ownClass: typeof CollectionDecorator;
  private items?: Decorator[];

  constructor(source: Iterable<unknown>, options: CollectionOptions = {}) {
    assertValidKeys(options, COLLECTION_OPTIONS);
    if (!(source instanceof CollectionDecorator) && !isCollection(source)) {
      throw new ConfigurationError(`${new.target.name || 'CollectionDecorator'} requires an iterable source`);
    }

    this.source = source;
    this.currentContext = options.context ?? {};
    this.ownClass = new.target;
    this.strategy = options.with ?? new.target.itemDecorator ?? 'infer';
  }

  static decorate<C extends CollectionDecorator>(
    this: new (source: Iterable<unknown>, options?: CollectionOptions) => C,
    source: Iterable<unknown>,
    options?: CollectionOptions
  ): C {
    return new this(source, options);
  }

  get [DECORATED](): true {
    return true;
  }

  get [COLLECTION_DECORATED](): true {
    return true;
  }

  get context(): DecoratorContext {
    return this.currentContext;
  }

  /**
   * Replacing the context also updates items that are already decorated
   */
  set context(context: DecoratorContext) {
    this.currentContext = context;
    for (const item of this.items ?? []) {
      item.context = context;
    }
  }

  /**
   * The decorated items, built on first call
   */
  decorated(): Decorator[] {
    if (!this.items) {
      this.items = Array.from(this.source, (item) => this.decorateItem(item));
    }
    return this.items;
  }

  isLoaded(): boolean {
    return this.items !== undefined;
  }

  get length(): number {
    return this.decorated().length;
  }

  [Symbol.iterator](): Iterator<Decorator> {
    return this.decorated()[Symbol.iterator]();
  }

  at(index: number): Decorator | undefined {
    return this.decorated().at(index);
  }

  map<T>(fn: (item: Decorator, index: number) => T): T[] {
    return this.decorated().map((item, index) => fn(item, index));
  }

  forEach(fn: (item: Decorator, index: number) => void): void {
    this.decorated().forEach((item, index) => fn(item, index));
  }

  filter(fn: (item: Decorator, index: number) => boolean): Decorator[] {
    return this.decorated().filter((item, index) => fn(item, index));
  }

  find(fn: (item: Decorator, index: number) => boolean): Decorator | undefined {
    return this.decorated().find((item, index) => fn(item, index));
  }

  some(fn: (item: Decorator, index: number) => boolean): boolean {
    return this.decorated().some((item, index) => fn(item, index));
  }

  every(fn: (item: Decorator, index: number) => boolean): boolean {
    return this.decorated().every((item, index) => fn(item, index));
  }

  toArray(): Decorator[] {
    return [...this.decorated()];
  }

  /**
   * Element-wise equality against another collection, decorated or not
   */
  equals(other: unknown): boolean {
    if (other === this) return true;

    let others: unknown[];
    if (other instanceof CollectionDecorator) {
      others = other.decorated();
    } else if (isCollection(other)) {
      others = Array.from(other);
    } else {
      return false;
    }

    const items = this.decorated();
    return items.length === others.length && items.every((item, index) => isEqual(item, others[index]));
  }

  isDecorated(): true {
    return true;
  }

  appliedDecorators(): AnyClass[] {
    return [this.ownClass];
  }

  decoratedWith(decoratorClass: AnyClass): boolean {
    return decoratorClass === this.ownClass;
  }

  toJSON(): unknown[] {
    return this.decorated().map((item) => item.toJSON());
  }

  private decorateItem(item: unknown): Decorator {
    if (typeof item !== 'object' || item === null) {
      throw new ConfigurationError(
        `${this.ownClass.name || 'CollectionDecorator'} cannot decorate a ${item === null ? 'null' : typeof item} item`
      );
    }
    const decorator = this.strategy === 'infer' ? inferDecorator(item) : this.strategy;
    return new decorator(item, { context: this.currentContext });
  }
}

/**
 * The item's own choice of decorator, else the registry's
 */
function inferDecorator(item: object): typeof Decorator {
  if (infersDecorator(item)) {
    const decorator = item.decoratorClass();
    if (!isDecoratorClass(decorator)) {
      throw new UninferrableDecoratorError(classOf(item));
    }
    return decorator;
  }
  return getRegistry().decoratorFor(classOf(item));
}
