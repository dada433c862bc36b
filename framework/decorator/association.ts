/**
 * Decorated Association
 *
 * Loads an association of a decorator's source, optionally scopes it, and
 * decorates the result. The decorated value is computed once per owner.
 */

import { getLogger } from '../telemetry/logger.ts';
import { withSpanSync } from '../telemetry/otel.ts';
import { CollectionDecorator } from './collection.ts';
import { describeReceiver, forwardCall, invokeMember } from './delegation.ts';
import { ConfigurationError, NoMethodError, UninferrableDecoratorError } from './errors.ts';
import { ASSOCIATION_OPTIONS, assertValidKeys } from './options.ts';
import { isCollectionDecoratorClass, isDecoratorClass } from './registry.ts';
import {
  classOf,
  infersDecorator,
  isCollection,
  type Decorated,
  type DecoratorContext,
} from './types.ts';
import type { Decorator } from './decorator.ts';

export type AssociationScope = string | ((value: unknown) => unknown);

export interface AssociationOptions {
  /** Decorator (or collection decorator) for the associated value */
  with?: typeof Decorator | typeof CollectionDecorator;
  /** Method name called on the associated value, or a function applied to it */
  scope?: AssociationScope;
  /** Context for the associated decorator, or a function of the owner's context */
  context?: DecoratorContext | ((context: DecoratorContext) => DecoratorContext);
}

export interface AssociationOwner {
  readonly source: object;
  readonly context: DecoratorContext;
}

type Realized = { value: Decorated | null };

export class DecoratedAssociation {
  private realized?: Realized;

  constructor(
    private readonly owner: AssociationOwner,
    readonly association: string,
    private readonly options: AssociationOptions = {}
  ) {
    assertValidKeys(options, ASSOCIATION_OPTIONS);
  }

  /**
   * The decorated association, or null when the source has none
   */
  call(): Decorated | null {
    if (!this.realized) {
      getLogger().debug('Decorating association', {
        owner: describeReceiver(this.owner),
        association: this.association,
      });
      this.realized = {
        value: withSpanSync('decorator.association', () => this.decorate(), {
          attributes: {
            'decorator.owner': describeReceiver(this.owner),
            'decorator.association': this.association,
          },
        }),
      };
    }
    return this.realized.value;
  }

  /**
   * Context handed to the associated decorator. Read on each call, so it
   * follows the owner's current context.
   */
  context(): DecoratorContext {
    const context = this.options.context;
    if (typeof context === 'function') {
      return context(this.owner.context);
    }
    return context ?? this.owner.context;
  }

  private decorate(): Decorated | null {
    const source = this.owner.source;
    if (!(this.association in source)) {
      throw new NoMethodError(this.association, describeReceiver(source));
    }
    const value = this.scoped(invokeMember(source, this.association));
    if (value === null || value === undefined) return null;

    const options = { context: this.context() };
    const decorator = this.options.with;

    if (decorator && isCollectionDecoratorClass(decorator)) {
      return decorator.decorate(this.collection(value), options);
    }
    if (decorator && isDecoratorClass(decorator)) {
      return isCollection(value)
        ? decorator.decorateCollection(value, options)
        : new decorator(this.object(value), options);
    }

    if (isCollection(value)) {
      if (infersDecorator(value)) {
        const inferred = value.decoratorClass();
        if (isCollectionDecoratorClass(inferred)) return inferred.decorate(value, options);
        if (isDecoratorClass(inferred)) return inferred.decorateCollection(value, options);
      }
      return CollectionDecorator.decorate(value, { ...options, with: 'infer' });
    }

    const object = this.object(value);
    const inferred = infersDecorator(object) ? object.decoratorClass() : undefined;
    if (!inferred || !isDecoratorClass(inferred)) {
      throw new UninferrableDecoratorError(classOf(object));
    }
    return new inferred(object, options);
  }

  private scoped(value: unknown): unknown {
    const scope = this.options.scope;
    if (scope === undefined || value === null || value === undefined) return value;
    if (typeof scope === 'function') return scope(value);
    if (typeof value !== 'object' && typeof value !== 'function') {
      throw new ConfigurationError(`Cannot apply scope '${scope}' to ${typeof value} association '${this.association}'`);
    }
    return forwardCall(value, scope, [], describeReceiver(value));
  }

  private object(value: unknown): object {
    if (typeof value !== 'object' || value === null) {
      throw new ConfigurationError(
        `Association '${this.association}' must be an object to be decorated, got ${typeof value}`
      );
    }
    return value;
  }

  private collection(value: unknown): Iterable<unknown> {
    if (!isCollection(value)) {
      throw new ConfigurationError(`Association '${this.association}' is not a collection`);
    }
    return value;
  }
}
