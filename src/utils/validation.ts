import Joi from 'joi';
import {
  TASK_STATUSES,
  TERMINAL_TASK_STATUSES,
  TaskCompleteInput,
  TaskCreateInput,
  TaskData,
  TaskFilters,
  TaskStatus,
  TerminalTaskStatus
} from '../types/index.js';
import { ValidationError } from '../types/errors.js';

/**
 * Common validation schemas for the coordinator
 */

const identifierPattern = /^[a-zA-Z0-9_.-]+$/;

export const taskTypeSchema = Joi.string()
  .min(1)
  .max(100)
  .pattern(identifierPattern)
  .required()
  .messages({
    'string.pattern.base': 'Task type can only contain letters, numbers, dots, hyphens, and underscores',
  });

export const agentIdSchema = Joi.string()
  .min(1)
  .max(100)
  .pattern(/^[a-zA-Z0-9_.:@-]+$/)
  .required()
  .messages({
    'string.pattern.base': 'Agent id can only contain letters, numbers, and the characters _ . : @ -',
  });

// Ids are opaque to callers; only shape-check them
export const taskIdSchema = Joi.string()
  .min(1)
  .max(200)
  .required();

// Plain JSON objects; "__proto__" is refused as a field name
export const taskDataSchema = Joi.object<TaskData>()
  .unknown(true)
  .custom((value: TaskData, helpers) =>
    Object.prototype.hasOwnProperty.call(value, '__proto__') ? helpers.error('object.protoKey') : value
  )
  .messages({
    'object.protoKey': '{{#label}} cannot contain a "__proto__" field',
  });

export const taskStatusSchema = Joi.string<TaskStatus>().valid(...TASK_STATUSES);

export const terminalStatusSchema = Joi.string<TerminalTaskStatus>()
  .valid(...TERMINAL_TASK_STATUSES)
  .default('completed')
  .messages({
    'any.only': 'Completion status must be one of completed, failed, cancelled',
  });

// Item schema is optional: a required item would make Joi reject []
export const taskTypesFilterSchema = Joi.array<string[]>().items(taskTypeSchema.optional()).unique();

export const createTaskSchema = Joi.object<TaskCreateInput>({
  type: taskTypeSchema,
  data: taskDataSchema.default({}),
  parentId: taskIdSchema.optional().allow(null),
});

export const completeTaskSchema = Joi.object<TaskCompleteInput>({
  taskId: taskIdSchema,
  agentId: agentIdSchema,
  status: terminalStatusSchema,
  result: taskDataSchema.optional(),
});

export const taskFiltersSchema = Joi.object<TaskFilters>({
  type: Joi.string().min(1).max(100).optional(),
  status: taskStatusSchema.optional(),
});

/**
 * Validate data against a schema, throwing a ValidationError with every
 * failing field
 */
export function validate<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    stripUnknown: false,
    allowUnknown: false,
  });

  if (error) {
    const details = error.details.map(detail => ({
      field: detail.path.join('.') || 'value',
      message: detail.message,
      value: detail.context?.value,
    }));

    const message = `Validation failed: ${details.map(d => `${d.field}: ${d.message}`).join(', ')}`;
    throw new ValidationError(message, details);
  }

  return value;
}

/**
 * Check if an error is a validation error
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
