// Entity record validation
//
// zod schemas for records arriving from outside the process (API bodies,
// imports, rows read back from storage). Failures are reported as a
// field -> messages map, the same shape ValidationResponse carries.

import { z } from 'zod';
import type { EntityRecord } from '../types/entities.js';
import type { Result } from '../types/common.js';
import type { ValidationErrorMap } from '../types/responses.js';
import { ok, fail } from '../types/common.js';

export const IdSchema = z.string().min(1, 'must not be empty');

export const ActorIdSchema = IdSchema.nullable();

export const TimestampSchema = z.string().datetime({ offset: true });

export const EntityStateSchema = z.enum([
  'created',
  'inactive',
  'active',
  'effective',
  'terminated',
]);

export const EntityRecordSchema = z
  .object({
    id: IdSchema,
    kind: z.string().min(1, 'must not be empty'),
    attributes: z.record(z.unknown()),
    createdAt: TimestampSchema.optional(),
    updatedAt: TimestampSchema.optional(),
    state: EntityStateSchema.optional(),
    createdBy: ActorIdSchema.optional(),
    updatedBy: ActorIdSchema.optional(),
    ownerId: ActorIdSchema.optional(),
  })
  .superRefine((record, ctx) => {
    if ((record.createdAt === undefined) !== (record.updatedAt === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [record.createdAt === undefined ? 'createdAt' : 'updatedAt'],
        message: 'createdAt and updatedAt must be set together',
      });
      return;
    }

    if (
      record.createdAt !== undefined &&
      record.updatedAt !== undefined &&
      Date.parse(record.updatedAt) < Date.parse(record.createdAt)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['updatedAt'],
        message: 'updatedAt must not precede createdAt',
      });
    }

    if ((record.createdBy === undefined) !== (record.updatedBy === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [record.createdBy === undefined ? 'createdBy' : 'updatedBy'],
        message: 'createdBy and updatedBy must be set together',
      });
    }
  });

/**
 * Collect zod issues into a field -> messages map.
 * Issues without a path are filed under `_root`.
 */
export function toValidationErrorMap(error: z.ZodError): ValidationErrorMap {
  const map: ValidationErrorMap = {};

  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '_root';
    (map[field] ??= []).push(issue.message);
  }

  return map;
}

/**
 * Validate an unknown value as an EntityRecord.
 */
export function validateEntityRecord(input: unknown): Result<EntityRecord, ValidationErrorMap> {
  const parsed = EntityRecordSchema.safeParse(input);
  if (!parsed.success) {
    return fail(toValidationErrorMap(parsed.error));
  }
  return ok(parsed.data);
}
