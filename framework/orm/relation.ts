/**
 * Relation
 *
 * Ordered, chainable record set over already-loaded models. Each step
 * returns a new relation; named scopes are methods on subclasses that build
 * on `where`, `filter` and `orderBy`.
 */

import type { CollectionDecorator, DecorateCollectionOptions } from '../decorator/collection.ts';
import type { Decorator } from '../decorator/decorator.ts';
import type { Model } from './model.ts';

export type ModelClass<M extends Model> = (abstract new (...args: never[]) => M) & {
  decoratorClass(): typeof Decorator;
};

export type SortDirection = 'asc' | 'desc';

export class Relation<M extends Model> implements Iterable<M> {
  constructor(
    readonly modelClass: ModelClass<M>,
    private readonly records: readonly M[]
  ) {}

  /**
   * Keep records whose fields equal every given value
   */
  where(conditions: Record<string, unknown>): Relation<M> {
    const entries = Object.entries(conditions);
    return this.filter((record) => entries.every(([field, value]) => record.attribute(field) === value));
  }

  filter(fn: (record: M) => boolean): Relation<M> {
    return this.spawn(this.records.filter(fn));
  }

  orderBy(field: string, direction: SortDirection = 'asc'): Relation<M> {
    const sign = direction === 'asc' ? 1 : -1;
    const sorted = [...this.records].sort((a, b) => {
      const left = a.attribute(field);
      const right = b.attribute(field);
      if (left === right) return 0;
      if (left === undefined || left === null) return sign;
      if (right === undefined || right === null) return -sign;
      const order =
        typeof left === 'number' && typeof right === 'number'
          ? left - right
          : String(left).localeCompare(String(right));
      return order * sign;
    });
    return this.spawn(sorted);
  }

  limit(count: number): Relation<M> {
    return this.spawn(this.records.slice(0, count));
  }

  first(): M | undefined {
    return this.records[0];
  }

  get length(): number {
    return this.records.length;
  }

  toArray(): M[] {
    return [...this.records];
  }

  [Symbol.iterator](): Iterator<M> {
    return this.records[Symbol.iterator]();
  }

  decoratorClass(): typeof Decorator {
    return this.modelClass.decoratorClass();
  }

  /**
   * Decorate the records with the model's decorator
   */
  decorate(options?: DecorateCollectionOptions): CollectionDecorator {
    return this.decoratorClass().decorateCollection(this, options);
  }

  protected spawn(records: readonly M[]): Relation<M> {
    return new Relation(this.modelClass, records);
  }
}
