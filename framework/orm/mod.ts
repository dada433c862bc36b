/**
 * ORM Layer
 *
 * In-memory models and relations: the data the decorator layer wraps.
 */

export { Model, type ModelDefinition, type FieldDefinition } from './model.ts';
export { Relation, type ModelClass, type SortDirection } from './relation.ts';
