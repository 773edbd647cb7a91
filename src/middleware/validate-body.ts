/**
 * Body validation middleware.
 * Parses the JSON body once, checks it against a schema and hands it to the
 * handler as `ctx.body`. Failures throw ValidationError listing every field.
 */

import { ValidationError } from '../errors.js';
import type { BodySchema, FieldSchema, FieldType } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const TYPE_CHECKS: Record<FieldType, (value: unknown) => boolean> = {
  string: (value) => typeof value === 'string',
  array: (value) => Array.isArray(value),
  object: isRecord,
};

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      let parsed: unknown;
      try {
        parsed = await req.json();
      } catch {
        throw new ValidationError('Request body must be valid JSON');
      }

      if (!isRecord(parsed)) {
        throw new ValidationError('Request body must be a JSON object');
      }
      const body = parsed;

      const errors = Object.entries(schema).flatMap(([field, fieldSchema]) =>
        fieldErrors(field, body[field], fieldSchema)
      );
      if (errors.length > 0) {
        throw new ValidationError(errors.join('; '), { fields: errors });
      }

      return next(req, { ...ctx, body });
    };
  };
}

function fieldErrors(field: string, value: unknown, schema: FieldSchema): string[] {
  if (value === undefined || value === null) {
    return schema.required ? [`${field} is required`] : [];
  }
  if (!TYPE_CHECKS[schema.type](value)) {
    return [`${field} must be ${schema.type === 'array' ? 'an' : 'a'} ${schema.type}`];
  }
  if (Array.isArray(value) && schema.maxItems !== undefined && value.length > schema.maxItems) {
    return [`${field} must have at most ${schema.maxItems} items`];
  }
  return [];
}
