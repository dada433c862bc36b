/**
 * Option validation shared by decorators, collection decorators and
 * decorated associations.
 */

import { ConfigurationError } from './errors.ts';

export const DECORATOR_OPTIONS = ['context'] as const;
export const COLLECTION_OPTIONS = ['with', 'context'] as const;
export const ASSOCIATION_OPTIONS = ['with', 'scope', 'context'] as const;

/**
 * Throw a ConfigurationError naming every key of `options` outside `validKeys`
 */
export function assertValidKeys(options: object, validKeys: readonly string[]): void {
  const unknownKeys = Object.keys(options).filter((key) => !validKeys.includes(key));
  if (unknownKeys.length > 0) {
    throw ConfigurationError.unknownKeys(unknownKeys, validKeys);
  }
}
