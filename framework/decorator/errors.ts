/**
 * Decoration errors. All of them propagate to the caller untouched.
 */

import type { AnyClass } from './types.ts';

function describe(cls: AnyClass): string {
  return cls.name || 'anonymous class';
}

/**
 * Unknown option keys, or a decorator built without a source
 */
export class ConfigurationError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.keys = keys;
  }

  static unknownKeys(keys: string[], validKeys: readonly string[]): ConfigurationError {
    const label = keys.length === 1 ? 'Unknown key' : 'Unknown keys';
    return new ConfigurationError(
      `${label}: ${keys.join(', ')}. Valid keys are: ${validKeys.join(', ')}`,
      keys
    );
  }
}

/**
 * A decorator class whose source class cannot be worked out
 */
export class UninferrableSourceError extends Error {
  readonly decoratorClass: AnyClass;

  constructor(decoratorClass: AnyClass) {
    super(`Could not infer a source for ${describe(decoratorClass)}.`);
    this.name = 'UninferrableSourceError';
    this.decoratorClass = decoratorClass;
  }
}

/**
 * A source class whose decorator class cannot be worked out
 */
export class UninferrableDecoratorError extends Error {
  readonly sourceClass: AnyClass;

  constructor(sourceClass: AnyClass) {
    super(`Could not infer a decorator for ${describe(sourceClass)}.`);
    this.name = 'UninferrableDecoratorError';
    this.sourceClass = sourceClass;
  }
}

/**
 * A member that neither the decorator nor its source exposes
 */
export class NoMethodError extends Error {
  readonly member: string;
  readonly receiver: string;

  constructor(member: string, receiver: string) {
    super(`undefined method '${member}' for ${receiver}`);
    this.name = 'NoMethodError';
    this.member = member;
    this.receiver = receiver;
  }
}
