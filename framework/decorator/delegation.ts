/**
 * Member resolution for decorators that fall through to their source.
 *
 * Visibility rule: names starting with an underscore are private. Private
 * members of a source are never delegated; private members of a decorator
 * only answer `respondTo(name, true)`.
 */

import { NoMethodError } from './errors.ts';

export type MemberLookup =
  | { found: true; value: unknown }
  | { found: false };

const NOT_FOUND: MemberLookup = { found: false };

export function isPrivateMember(name: string): boolean {
  return name.startsWith('_');
}

/**
 * Find a public member on `target`, own or inherited
 */
export function lookupPublicMember(target: unknown, name: string): MemberLookup {
  if (isPrivateMember(name)) return NOT_FOUND;
  if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
    return NOT_FOUND;
  }
  if (!(name in target)) return NOT_FOUND;

  return { found: true, value: Reflect.get(target, name) };
}

/**
 * Whether `obj` itself defines `name` somewhere on its prototype chain.
 * Walks descriptors instead of using `in`, so a delegating proxy answers
 * for its own members only.
 */
export function definesMember(obj: object, name: PropertyKey, stopAt: object | null = null): boolean {
  for (
    let current: object | null = obj;
    current !== null && current !== stopAt;
    current = Object.getPrototypeOf(current)
  ) {
    if (Object.prototype.hasOwnProperty.call(current, name)) return true;
  }
  return false;
}

/**
 * Call `name` on `target` with `args`, resolving the member at call time
 */
export function forwardCall(target: object, name: string, args: unknown[], receiver: string): unknown {
  const member: unknown = Reflect.get(target, name);
  if (typeof member !== 'function') {
    throw new NoMethodError(name, receiver);
  }
  return Reflect.apply(member, target, args);
}

/**
 * Read a member, calling it with `args` when it is a method
 */
export function invokeMember(target: object, name: string, args: unknown[] = []): unknown {
  const member: unknown = Reflect.get(target, name);
  return typeof member === 'function' ? Reflect.apply(member, target, args) : member;
}

/**
 * Describe a receiver for error messages
 */
export function describeReceiver(value: unknown): string {
  if (typeof value === 'function') {
    return value.name ? `class ${value.name}` : 'anonymous class';
  }
  if (typeof value === 'object' && value !== null) {
    const name: unknown = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof name === 'string' && name.length > 0 ? `an instance of ${name}` : 'an object';
  }
  return typeof value;
}
