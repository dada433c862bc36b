/**
 * Decorator
 *
 * Wraps a single source object with presentation logic. Decorators can be
 * stacked; each one keeps a reference to what it wraps, and equality sees
 * through every layer.
 *
 * @example
 * ```ts
 * class ProductDecorator extends Decorator {
 *   declare readonly source: Product;
 *
 *   get price(): string {
 *     return this.localize(this.source.price, { numberFormat: { style: 'currency', currency: 'EUR' } });
 *   }
 * }
 *
 * ProductDecorator.delegateAll();
 * ProductDecorator.decoratesAssociation('reviews');
 * ```
 */

import { fileURLToPath } from 'node:url';
import { getConfig } from '../config/config.ts';
import { getLogger } from '../telemetry/logger.ts';
import { addSpanEvent } from '../telemetry/otel.ts';
import { getViewHelpers } from '../view/context.ts';
import type { LocalizeOptions } from '../view/helpers.ts';
import { DecoratedAssociation, type AssociationOptions } from './association.ts';
import {
  CollectionDecorator,
  type CollectionOptions,
  type DecorateCollectionOptions,
} from './collection.ts';
import {
  definesMember,
  describeReceiver,
  forwardCall,
  invokeMember,
  isPrivateMember,
  lookupPublicMember,
  type MemberLookup,
} from './delegation.ts';
import { ConfigurationError, NoMethodError, UninferrableSourceError } from './errors.ts';
import { HelperProxy } from './helper_proxy.ts';
import { ASSOCIATION_OPTIONS, COLLECTION_OPTIONS, DECORATOR_OPTIONS, assertValidKeys } from './options.ts';
import { getRegistry, isCollectionDecoratorClass } from './registry.ts';
import {
  COLLECTION_DECORATED,
  DECORATED,
  isDecorated,
  isEqual,
  type AnyClass,
  type Decorated,
  type DecorateOptions,
  type DecoratorContext,
} from './types.ts';

const MODULE_PATH = fileURLToPath(import.meta.url);

// Probed by await and promise resolution; answering undefined keeps
// delegating decorators from looking like thenables.
const PROBED_MEMBERS = new Set(['then']);

/**
 * Base class for single-object decorators
 */
export class Decorator implements Decorated {
  /** Namespace used when inferring names, e.g. 'Admin' */
  static namespace?: string;

  private static delegatesAllMembers = false;
  private static declaredSource?: AnyClass | string;

  readonly source: object;
  context: DecoratorContext;

  private readonly ownClass: typeof Decorator;
  private helperProxy?: HelperProxy;
  private readonly forwarders = new Map<string, (...args: unknown[]) => unknown>();
  private readonly associations = new Map<string, DecoratedAssociation>();

  constructor(source: object, options: DecorateOptions = {}) {
    assertValidKeys(options, DECORATOR_OPTIONS);
    if (source === null || source === undefined) {
      throw new ConfigurationError(`${new.target.name || 'Decorator'} requires a source object`);
    }

    this.ownClass = new.target;
    this.source = source;
    this.context = options.context ?? {};

    if (redecorates(source, new.target)) {
      this.source = source.source;
      if (!('context' in options)) {
        this.context = source.context;
      }
    } else if (isDecorated(source) && source.appliedDecorators().includes(new.target)) {
      warnRedecoration(new.target);
    }

    if (new.target.delegatesAllMembers) {
      return this.delegating();
    }
  }

  get [DECORATED](): true {
    return true;
  }

  /**
   * Decorate `source`, or another decorator, with this class
   */
  static decorate<D extends Decorator>(
    this: new (source: object, options?: DecorateOptions) => D,
    source: D['source'] | Decorated,
    options?: DecorateOptions
  ): D {
    return new this(source, options);
  }

  /**
   * Decorate every item of `sources`. Items are decorated with this class
   * unless `with` names another decorator, a collection decorator class or
   * 'infer'.
   */
  static decorateCollection(
    sources: Iterable<unknown>,
    options: DecorateCollectionOptions = {}
  ): CollectionDecorator {
    assertValidKeys(options, COLLECTION_OPTIONS);

    const strategy = options.with ?? this;
    const itemOptions: CollectionOptions = {};
    if ('context' in options) {
      itemOptions.context = options.context;
    }

    if (strategy !== 'infer' && isCollectionDecoratorClass(strategy)) {
      return strategy.decorate(sources, itemOptions);
    }
    itemOptions.with = strategy;
    return this.collectionDecoratorClass().decorate(sources, itemOptions);
  }

  /**
   * Collection decorator used by `decorateCollection`: the conventionally
   * named one (ProductDecorator -> ProductsDecorator) when registered
   */
  static collectionDecoratorClass(): typeof CollectionDecorator {
    return getRegistry().collectionDecoratorFor(this) ?? CollectionDecorator;
  }

  /**
   * Declare the source class explicitly, as a class or a registered name
   * ('product', 'admin/product')
   */
  static decorates(source: AnyClass | string): void {
    this.declaredSource = source;
  }

  static sourceClass(): AnyClass {
    const declared = this.declaredSource;
    if (typeof declared === 'string') {
      const resolved = getRegistry().resolve(camelize(declared));
      if (!resolved) {
        throw new UninferrableSourceError(this);
      }
      return resolved;
    }
    if (declared) return declared;

    if (this === Decorator || !this.name) {
      throw new UninferrableSourceError(this);
    }
    return getRegistry().sourceFor(this);
  }

  static hasSourceClass(): boolean {
    try {
      this.sourceClass();
      return true;
    } catch (error) {
      if (error instanceof UninferrableSourceError) return false;
      throw error;
    }
  }

  /**
   * Forward every public member of the source that the decorator itself
   * does not define
   */
  static delegateAll(): void {
    this.delegatesAllMembers = true;
  }

  /**
   * Forward the named members to the source, or to another member given
   * as `{ to: 'name' }`
   */
  static delegate(...members: Array<string | { to: string }>): void {
    let target = 'source';
    const names: string[] = [];
    for (const member of members) {
      if (typeof member === 'string') {
        names.push(member);
      } else {
        target = member.to;
      }
    }

    for (const name of names) {
      Object.defineProperty(this.prototype, name, {
        configurable: true,
        get(this: object): unknown {
          const receiver = delegationTarget(this, target, name);
          const member: unknown = Reflect.get(receiver, name);
          return typeof member === 'function' ? member.bind(receiver) : member;
        },
        set(this: object, value: unknown) {
          Reflect.set(delegationTarget(this, target, name), name, value);
        },
      });
    }
  }

  /**
   * Expose `association` of the source as a decorated, memoized accessor
   */
  static decoratesAssociation(association: string, options: AssociationOptions = {}): void {
    assertValidKeys(options, ASSOCIATION_OPTIONS);

    Object.defineProperty(this.prototype, association, {
      configurable: true,
      get(this: Decorator): unknown {
        return this.decoratedAssociation(association, options).call();
      },
    });
  }

  /**
   * `decoratesAssociation` for several names sharing one options object
   */
  static decoratesAssociations(
    ...args: [...associations: string[], options: AssociationOptions] | string[]
  ): void {
    const last = args[args.length - 1];
    const options = typeof last === 'object' ? last : {};
    for (const association of args) {
      if (typeof association === 'string') {
        this.decoratesAssociation(association, options);
      }
    }
  }

  /**
   * Symmetric equality that sees through decoration on either side
   */
  static isEqual(a: unknown, b: unknown): boolean {
    return isEqual(a, b);
  }

  static respondTo(name: string): boolean {
    if (!isPrivateMember(name) && name in this) return true;
    return (
      this.delegatesAllMembers &&
      this.hasSourceClass() &&
      lookupPublicMember(this.sourceClass(), name).found
    );
  }

  /**
   * Call a class-level member, falling through to the source class for
   * delegating decorators
   */
  static invoke(name: string, ...args: unknown[]): unknown {
    if (!isPrivateMember(name) && name in this) {
      return invokeMember(this, name, args);
    }
    if (this.delegatesAllMembers && this.hasSourceClass()) {
      const sourceClass = this.sourceClass();
      if (lookupPublicMember(sourceClass, name).found) {
        return invokeMember(sourceClass, name, args);
      }
    }
    throw new NoMethodError(name, describeReceiver(this));
  }

  static get helpers(): HelperProxy {
    return new HelperProxy(getViewHelpers);
  }

  static get h(): HelperProxy {
    return this.helpers;
  }

  get helpers(): HelperProxy {
    if (!this.helperProxy) {
      this.helperProxy = new HelperProxy(getViewHelpers, this);
    }
    return this.helperProxy;
  }

  get h(): HelperProxy {
    return this.helpers;
  }

  localize(value: Date | number | string, options?: LocalizeOptions): string {
    return this.helpers.localize(value, options);
  }

  l(value: Date | number | string, options?: LocalizeOptions): string {
    return this.localize(value, options);
  }

  get model(): this['source'] {
    return this.source;
  }

  toSource(): this['source'] {
    return this.source;
  }

  toModel(): this {
    return this;
  }

  /**
   * URL parameter of the source: its `toParam()`, else its id
   */
  toParam(): string | undefined {
    const toParam = lookupPublicMember(this.source, 'toParam');
    if (toParam.found && typeof toParam.value === 'function') {
      return String(Reflect.apply(toParam.value, this.source, []));
    }
    const id = lookupPublicMember(this.source, 'id');
    return id.found && id.value !== null && id.value !== undefined ? String(id.value) : undefined;
  }

  isDecorated(): true {
    return true;
  }

  /**
   * Decorator classes in the chain, innermost first
   */
  appliedDecorators(): AnyClass[] {
    const inner = isDecorated(this.source) ? this.source.appliedDecorators() : [];
    return [...inner, this.ownClass];
  }

  decoratedWith(decoratorClass: AnyClass): boolean {
    return this.appliedDecorators().includes(decoratorClass);
  }

  equals(other: unknown): boolean {
    return other === this || isEqual(this.source, other);
  }

  respondTo(name: string, includePrivate = false): boolean {
    if (definesMember(this, name)) {
      return includePrivate || !isPrivateMember(name);
    }
    return this.ownClass.delegatesAllMembers && lookupPublicMember(this.source, name).found;
  }

  /**
   * Call a member by name, delegated or not
   */
  invoke(name: string, ...args: unknown[]): unknown {
    if (!this.respondTo(name)) {
      throw new NoMethodError(name, describeReceiver(this));
    }
    return invokeMember(this, name, args);
  }

  /**
   * The source's serialized form, with keys this decorator's subclasses
   * define replaced by their decorated values
   */
  serializableHash(): Record<string, unknown> {
    const hash = serializedSource(this.source);
    const prototype: unknown = Object.getPrototypeOf(this);
    if (typeof prototype !== 'object' || prototype === null) return hash;

    for (const key of Object.keys(hash)) {
      if (!definesMember(prototype, key, Decorator.prototype)) continue;
      const value: unknown = Reflect.get(this, key);
      hash[key] = typeof value === 'function' && value.length === 0 ? Reflect.apply(value, this, []) : value;
    }
    return hash;
  }

  toJSON(): Record<string, unknown> {
    return this.serializableHash();
  }

  private decoratedAssociation(association: string, options: AssociationOptions): DecoratedAssociation {
    let decorated = this.associations.get(association);
    if (!decorated) {
      decorated = new DecoratedAssociation(this, association, options);
      this.associations.set(association, decorated);
    }
    return decorated;
  }

  private delegatedMember(name: string): MemberLookup {
    const member = lookupPublicMember(this.source, name);
    if (!member.found || typeof member.value !== 'function') return member;

    let forwarder = this.forwarders.get(name);
    if (!forwarder) {
      const source = this.source;
      const receiver = describeReceiver(source);
      forwarder = (...args: unknown[]) => forwardCall(source, name, args, receiver);
      this.forwarders.set(name, forwarder);
    }
    return { found: true, value: forwarder };
  }

  private delegating(): this {
    return new Proxy(this, {
      get: (target, prop, receiver) => {
        if (typeof prop === 'symbol' || prop in target) {
          return Reflect.get(target, prop, receiver);
        }
        const member = target.delegatedMember(prop);
        if (member.found) return member.value;
        if (PROBED_MEMBERS.has(prop)) return undefined;
        throw new NoMethodError(prop, describeReceiver(target));
      },
      set: (target, prop, value, receiver) => {
        if (typeof prop === 'string' && !(prop in target) && lookupPublicMember(target.source, prop).found) {
          return Reflect.set(target.source, prop, value);
        }
        return Reflect.set(target, prop, value, receiver);
      },
      has: (target, prop) => {
        if (typeof prop === 'symbol') return Reflect.has(target, prop);
        if (isPrivateMember(prop)) return false;
        return Reflect.has(target, prop) || lookupPublicMember(target.source, prop).found;
      },
    });
  }
}

function redecorates(source: object, decoratorClass: typeof Decorator): source is Decorator {
  return (
    isDecorated(source) &&
    !(COLLECTION_DECORATED in source) &&
    source.appliedDecorators().at(-1) === decoratorClass
  );
}

function delegationTarget(owner: object, target: string, name: string): object {
  const receiver: unknown = Reflect.get(owner, target);
  if (receiver === null || receiver === undefined) {
    throw new NoMethodError(name, String(receiver));
  }
  if (typeof receiver !== 'object' && typeof receiver !== 'function') {
    throw new NoMethodError(name, describeReceiver(receiver));
  }
  return receiver;
}

function serializedSource(source: object): Record<string, unknown> {
  const toJSON: unknown = Reflect.get(source, 'toJSON');
  if (typeof toJSON === 'function') {
    const json: unknown = Reflect.apply(toJSON, source, []);
    if (typeof json === 'object' && json !== null && !Array.isArray(json)) {
      return { ...json };
    }
  }
  return { ...source };
}

function warnRedecoration(decoratorClass: typeof Decorator): void {
  if (!getConfig().get<boolean>('decorators.warnOnRedecoration', true)) return;

  const name = getRegistry().qualifiedName(decoratorClass);
  const caller = callerLocation();
  getLogger().warn(
    `Reapplying ${name} decorator to target that is already decorated with it. Call stack:\n${caller}`,
    { decorator: name, caller }
  );
  addSpanEvent('decorator.redecorated', { 'decorator.class': name });
}

/**
 * First stack frame outside this module and outside constructors
 */
function callerLocation(): string {
  const frames = (new Error().stack ?? '').split('\n').slice(1).map((frame) => frame.trim());
  const caller = frames.find(
    (frame) =>
      !frame.includes(MODULE_PATH) &&
      !frame.includes(import.meta.url) &&
      !frame.startsWith('at new ')
  );
  return caller ?? 'unknown location';
}

/**
 * 'product' -> 'Product', 'admin/line_item' -> 'Admin.LineItem'
 */
function camelize(name: string): string {
  return name
    .split('/')
    .map((segment) =>
      segment
        .split('_')
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join('')
    )
    .join('.');
}
