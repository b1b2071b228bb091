export {
  IdSchema,
  ActorIdSchema,
  TimestampSchema,
  EntityStateSchema,
  EntityRecordSchema,
  toValidationErrorMap,
  validateEntityRecord,
} from './entities.js';
