import Joi from 'joi';
import {
  Task,
  TaskData,
  TaskStatus,
  TASK_STATUSES,
  WorkflowMetadata,
  StateCorruptedError
} from '../types/index.js';

/**
 * On-disk shape of the state document. Keys are snake_case and timestamps
 * are ISO-8601 strings; `Task` is the in-memory view with Date fields.
 */
export interface TaskRecord {
  type: string;
  status: TaskStatus;
  parent_id: string | null;
  locked_by: string | null;
  locked_at: string | null;
  task_started_at?: string;
  completed_at: string | null;
  created_at: string;
  updated_at?: string;
  data: TaskData;
}

export interface StateDocument {
  workflow_type: string;
  metadata: WorkflowMetadata;
  tasks: Record<string, TaskRecord>;
}

const timestamp = Joi.string().isoDate();

const taskRecordSchema = Joi.object<TaskRecord>({
  type: Joi.string().required(),
  status: Joi.string().valid(...TASK_STATUSES).required(),
  parent_id: Joi.string().allow(null).required(),
  locked_by: Joi.string().allow(null).required(),
  locked_at: timestamp.allow(null).required(),
  task_started_at: timestamp.optional(),
  completed_at: timestamp.allow(null).required(),
  created_at: timestamp.required(),
  updated_at: timestamp.optional(),
  data: Joi.object().unknown(true).required(),
});

const stateDocumentSchema = Joi.object<StateDocument>({
  workflow_type: Joi.string().required(),
  metadata: Joi.object({
    initialized_at: timestamp.required(),
    last_updated: timestamp.required(),
  }).unknown(true).required(),
  tasks: Joi.object().pattern(Joi.string(), taskRecordSchema).required(),
}).unknown(true);

// Metadata keys the store stamps itself; callers cannot overwrite them
export const STORE_MANAGED_METADATA_KEYS: readonly string[] = ['initialized_at', 'last_updated'];

/**
 * Shallow-merge caller fields into a stored object. Keys are defined rather
 * than assigned, so a `__proto__` field is stored like any other.
 */
export function mergeFields(target: TaskData, fields: TaskData, skip: readonly string[] = []): string[] {
  const skipped: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (skip.includes(key)) {
      skipped.push(key);
      continue;
    }
    Object.defineProperty(target, key, {
      value: structuredClone(value),
      enumerable: true,
      writable: true,
      configurable: true
    });
  }
  return skipped;
}

export function createStateDocument(workflowType: string, now: Date): StateDocument {
  const iso = now.toISOString();
  return {
    workflow_type: workflowType,
    metadata: {
      initialized_at: iso,
      last_updated: iso,
    },
    tasks: {},
  };
}

/**
 * Parse and shape-check a state document. Anything unreadable is fatal:
 * the coordinator never repairs persisted state.
 */
export function parseStateDocument(content: string, statePath: string): StateDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new StateCorruptedError(statePath, error instanceof Error ? error.message : String(error));
  }

  // convert: false keeps timestamps and caller data exactly as stored
  const { error, value } = stateDocumentSchema.validate(parsed, { convert: false, abortEarly: true });
  if (error) {
    throw new StateCorruptedError(statePath, error.message);
  }
  return value;
}

export function serializeStateDocument(state: StateDocument): string {
  return JSON.stringify(state, null, 2);
}

/**
 * Snapshot a stored record as a Task. The snapshot shares nothing with the
 * document, so callers cannot mutate state behind the lock.
 */
export function toTask(id: string, record: TaskRecord): Task {
  const task: Task = {
    id,
    type: record.type,
    status: record.status,
    parentId: record.parent_id,
    lockedBy: record.locked_by,
    lockedAt: record.locked_at === null ? null : new Date(record.locked_at),
    completedAt: record.completed_at === null ? null : new Date(record.completed_at),
    createdAt: new Date(record.created_at),
    data: structuredClone(record.data),
  };

  if (record.task_started_at !== undefined) {
    task.taskStartedAt = new Date(record.task_started_at);
  }
  if (record.updated_at !== undefined) {
    task.updatedAt = new Date(record.updated_at);
  }
  return task;
}
