/**
 * Decoratable
 *
 * Base class for sources that know their decorator. Instances decorate
 * themselves, compare equal to decorators that wrap them, and pass
 * `instanceof` checks made against the decorated value.
 */

import { UninferrableDecoratorError } from './errors.ts';
import { getRegistry } from './registry.ts';
import {
  COLLECTION_DECORATED,
  isClass,
  isDecorated,
  isEqual,
  type AnyClass,
  type DecoratableSource,
  type DecorateOptions,
} from './types.ts';
import type { Decorator } from './decorator.ts';

const hasInstance = Function.prototype[Symbol.hasInstance];

export class Decoratable implements DecoratableSource {
  /** Name used for decorator lookup instead of the class name */
  static modelName?: string;
  static namespace?: string;

  /**
   * The decorator class for this class: `<qualified name><suffix>`, looked
   * up on each ancestor in turn
   */
  static decoratorClass(): typeof Decorator {
    return lookupDecorator(this, this);
  }

  /**
   * Decorators pretend to be instances of the class they wrap
   */
  static [Symbol.hasInstance](instance: unknown): boolean {
    if (hasInstance.call(this, instance)) return true;
    return (
      isDecorated(instance) &&
      !(COLLECTION_DECORATED in instance) &&
      instance.source !== instance &&
      this[Symbol.hasInstance](instance.source)
    );
  }

  decorate(options?: DecorateOptions): Decorator {
    return this.decoratorClass().decorate(this, options);
  }

  decoratorClass(): typeof Decorator {
    return (this.constructor as typeof Decoratable).decoratorClass();
  }

  isDecorated(): boolean {
    return false;
  }

  appliedDecorators(): AnyClass[] {
    return [];
  }

  decoratedWith(_decoratorClass: AnyClass): boolean {
    return false;
  }

  /**
   * Same object, or a decorator chain wrapping an equal source
   */
  equals(other: unknown): boolean {
    return this === other || (isDecorated(other) && isEqual(this, other.source));
  }
}

function isDecoratableClass(value: unknown): value is typeof Decoratable {
  return isClass(value) && (value === Decoratable || value.prototype instanceof Decoratable);
}

function lookupDecorator(cls: typeof Decoratable, calledOn: AnyClass): typeof Decorator {
  const registry = getRegistry();
  const prefix = Object.hasOwn(cls, 'modelName') && cls.modelName ? cls.modelName : registry.qualifiedName(cls);
  const decorator = registry.findDecorator(`${prefix}${registry.suffix}`);
  if (decorator) return decorator;

  const parent: unknown = Object.getPrototypeOf(cls);
  if (parent !== Decoratable && isDecoratableClass(parent)) {
    return lookupDecorator(parent, calledOn);
  }
  throw new UninferrableDecoratorError(calledOn);
}
