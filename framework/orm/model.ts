/**
 * Model Definition
 *
 * In-memory model base used as a decoratable source. Records live in a
 * per-class store for the life of the process; relations read from it.
 */

import { randomUUID } from 'node:crypto';
import type { CollectionDecorator, DecorateCollectionOptions } from '../decorator/collection.ts';
import { Decoratable } from '../decorator/decoratable.ts';
import type { AnyClass } from '../decorator/types.ts';
import { Relation, type ModelClass } from './relation.ts';

export interface FieldDefinition {
  type: 'string' | 'number' | 'boolean' | 'date' | 'json' | 'array';
  required?: boolean;
  default?: unknown;
}

export interface ModelDefinition {
  name: string;
  fields: Record<string, FieldDefinition>;
}

const store = new Map<AnyClass, Model[]>();

function storedRecords<M extends Model>(modelClass: ModelClass<M>): M[] {
  return (store.get(modelClass) ?? []).filter((record): record is M => record instanceof modelClass);
}

/**
 * Base Model class
 */
export abstract class Model<T extends Record<string, unknown> = Record<string, unknown>> extends Decoratable {
  protected static definition: ModelDefinition = { name: 'Model', fields: {} };

  id: string;

  protected data: Partial<T>;

  constructor(data: Partial<T> = {}) {
    super();
    this.data = this.applyDefaults(data);
    const id = data.id;
    this.id = typeof id === 'string' || typeof id === 'number' ? String(id) : randomUUID();
  }

  /**
   * Get the model definition
   */
  static getDefinition(): ModelDefinition {
    return this.definition;
  }

  /**
   * Every saved record of this class, in insertion order
   */
  static all<M extends Model>(this: ModelClass<M>): Relation<M> {
    return new Relation(this, storedRecords(this));
  }

  static where<M extends Model>(this: ModelClass<M>, conditions: Record<string, unknown>): Relation<M> {
    return new Relation(this, storedRecords(this)).where(conditions);
  }

  /**
   * Decorate every saved record with the inferred decorator
   */
  static decorate<M extends Model>(this: ModelClass<M>, options?: DecorateCollectionOptions): CollectionDecorator {
    return new Relation(this, storedRecords(this)).decorate(options);
  }

  /**
   * Forget every saved record of this class
   */
  static deleteAll(): void {
    store.delete(this);
  }

  /**
   * Apply default values to data
   */
  private applyDefaults(data: Partial<T>): Partial<T> {
    const def = (this.constructor as typeof Model).definition;
    const defaults: Record<string, unknown> = {};

    for (const [field, fieldDef] of Object.entries(def.fields)) {
      if (data[field] === undefined && fieldDef.default !== undefined) {
        defaults[field] = typeof fieldDef.default === 'function' ? fieldDef.default() : fieldDef.default;
      }
    }

    return { ...data, ...defaults };
  }

  /**
   * Read a field by name
   */
  attribute(field: string): unknown {
    return field === 'id' ? this.id : Reflect.get(this.data, field);
  }

  /**
   * Merge new values into the record
   */
  assign(values: Partial<T>): this {
    this.data = { ...this.data, ...values };
    return this;
  }

  /**
   * Validate the model data
   */
  validate(): string[] {
    const def = (this.constructor as typeof Model).definition;
    const errors: string[] = [];

    for (const [field, fieldDef] of Object.entries(def.fields)) {
      const value: unknown = this.data[field];

      if (fieldDef.required && (value === undefined || value === null)) {
        errors.push(`${field} is required`);
        continue;
      }
      if (value === undefined || value === null) continue;

      if (fieldDef.type === 'date' && !(value instanceof Date)) {
        errors.push(`${field} must be a Date`);
      } else if (fieldDef.type === 'array' && !Array.isArray(value)) {
        errors.push(`${field} must be an array`);
      } else if (
        fieldDef.type !== 'date' &&
        fieldDef.type !== 'array' &&
        fieldDef.type !== 'json' &&
        typeof value !== fieldDef.type
      ) {
        errors.push(`${field} must be a ${fieldDef.type}`);
      }
    }

    return errors;
  }

  /**
   * Validate and add the record to its class's store
   */
  save(): this {
    const errors = this.validate();
    if (errors.length > 0) {
      throw new Error(`Validation failed: ${errors.join(', ')}`);
    }

    const modelClass = this.constructor as typeof Model;
    const records = store.get(modelClass) ?? [];
    if (!records.includes(this)) {
      records.push(this);
    }
    store.set(modelClass, records);
    return this;
  }

  toParam(): string {
    return this.id;
  }

  /**
   * Convert to plain object
   */
  toJSON(): Partial<T> & { id: string } {
    return { ...this.data, id: this.id };
  }
}
