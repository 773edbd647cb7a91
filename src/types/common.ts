/**
 * Shared utility types.
 */

export type FieldType = 'string' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** For arrays: maximum number of items. */
  maxItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;

export type MaybePromise<T> = T | Promise<T>;
