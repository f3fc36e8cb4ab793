import {
  Task,
  TaskCompleteInput,
  TaskCreateInput,
  TaskData,
  TaskFilters
} from '../types/index.js';
import { StorageProvider } from '../storage/index.js';
import {
  validate,
  agentIdSchema,
  completeTaskSchema,
  createTaskSchema,
  taskDataSchema,
  taskFiltersSchema,
  taskIdSchema,
  taskTypesFilterSchema
} from '../utils/validation.js';

/**
 * Service for the task lifecycle. Validates caller input, then delegates
 * to the storage provider's atomic operations.
 *
 * Ownership mismatches and unknown ids are routine outcomes and come back
 * as `false` / `null`; only bad input and lock timeouts throw.
 */
export class TaskService {
  constructor(private storage: StorageProvider) {}

  /**
   * Create a pending task and return its id. The parent id is not checked.
   */
  async createTask(input: TaskCreateInput): Promise<string> {
    const validatedInput = validate(createTaskSchema, input);
    return this.storage.createTask(validatedInput);
  }

  /**
   * Claim the first pending task (in creation order) whose type is in
   * `taskTypes`, reclaiming timed-out claims first
   */
  async getNextTask(agentId: string, taskTypes?: string[]): Promise<Task | null> {
    const validatedAgentId = validate(agentIdSchema, agentId);
    const validatedTypes = taskTypes === undefined ? undefined : validate(taskTypesFilterSchema, taskTypes);
    return this.storage.getNextTask(validatedAgentId, validatedTypes);
  }

  /**
   * Move a held task to a terminal status. `false` when the task is unknown
   * or not held by `agentId`.
   */
  async completeTask(input: TaskCompleteInput): Promise<boolean> {
    const validatedInput = validate(completeTaskSchema, input);
    return this.storage.completeTask(validatedInput);
  }

  /**
   * Hand a held task back to the queue. `false` when the task is unknown
   * or not held by `agentId`.
   */
  async releaseTask(taskId: string, agentId: string): Promise<boolean> {
    return this.storage.releaseTask(
      validate(taskIdSchema, taskId),
      validate(agentIdSchema, agentId)
    );
  }

  async getTask(taskId: string): Promise<Task | null> {
    return this.storage.getTask(validate(taskIdSchema, taskId));
  }

  async getTaskChildren(parentId: string): Promise<Task[]> {
    return this.storage.getTaskChildren(validate(taskIdSchema, parentId));
  }

  async listTasks(filters?: TaskFilters): Promise<Task[]> {
    const validatedFilters = filters === undefined ? undefined : validate(taskFiltersSchema, filters);
    return this.storage.listTasks(validatedFilters);
  }

  /**
   * Shallow-merge `data` into the task's data. No ownership check.
   */
  async updateTaskData(taskId: string, data: TaskData): Promise<boolean> {
    return this.storage.updateTaskData(
      validate(taskIdSchema, taskId),
      validate(taskDataSchema.required(), data)
    );
  }

  /**
   * Run timeout reclamation without claiming anything
   */
  async reclaimExpiredTasks(): Promise<string[]> {
    return this.storage.reclaimExpiredTasks();
  }
}
