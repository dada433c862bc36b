/**
 * Shared decoration types, brands and the cross-wrapper equality rule.
 */

/**
 * Presentation parameters threaded through a decoration chain.
 * `role` and `locale` are read by the bundled helpers; applications add
 * their own keys.
 */
export interface DecoratorContext {
  /** Role of the current viewer, e.g. 'admin' */
  role?: string;
  /** Locale used by helper proxies */
  locale?: string;
  [key: string]: unknown;
}

export interface DecorateOptions {
  context?: DecoratorContext;
}

/** Any class, abstract or not, whatever its constructor takes */
export type AnyClass = abstract new (...args: never[]) => object;

/** Marks decorator instances (singular and collection) */
export const DECORATED: unique symbol = Symbol.for('mantle.decorated');

/** Marks collection decorator instances */
export const COLLECTION_DECORATED: unique symbol = Symbol.for('mantle.collection-decorated');

/**
 * What every decorator, singular or collection, exposes
 */
export interface Decorated {
  readonly [DECORATED]: true;
  readonly source: unknown;
  context: DecoratorContext;
  equals(other: unknown): boolean;
  isDecorated(): true;
  appliedDecorators(): AnyClass[];
  decoratedWith(decoratorClass: AnyClass): boolean;
}

/**
 * A source that knows how to decorate itself
 */
export interface DecoratableSource {
  decorate(options?: DecorateOptions): Decorated;
  decoratorClass(): AnyClass;
  isDecorated(): boolean;
}

export function isDecorated(value: unknown): value is Decorated {
  return typeof value === 'object' && value !== null && DECORATED in value;
}

/**
 * Whether `value` can name its own decorator class (models, relations)
 */
export function infersDecorator(value: unknown): value is { decoratorClass(): AnyClass } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'decoratorClass' in value &&
    typeof value.decoratorClass === 'function'
  );
}

export function isDecoratable(value: unknown): value is DecoratableSource {
  return infersDecorator(value) && 'decorate' in value && typeof value.decorate === 'function';
}

export function isClass(value: unknown): value is AnyClass {
  return typeof value === 'function' && 'prototype' in value;
}

/**
 * The constructor an object was built by
 */
export function classOf(value: object): AnyClass {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return isClass(ctor) ? ctor : Object;
}

interface Equatable {
  equals(other: unknown): boolean;
}

function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

/**
 * Equality that sees through decoration on either side.
 *
 * Each step unwraps one decorator, so comparison of finite chains
 * terminates.
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (isDecorated(a)) return a.equals(b);
  if (isDecorated(b)) return b.equals(a);
  if (isEquatable(a)) return a.equals(b);
  if (isEquatable(b)) return b.equals(a);
  return false;
}

/**
 * Arrays and other non-string iterables are treated as collections
 */
export function isCollection(value: unknown): value is Iterable<unknown> {
  if (Array.isArray(value)) return true;
  return (
    typeof value === 'object' &&
    value !== null &&
    !isDecorated(value) &&
    Symbol.iterator in value
  );
}
