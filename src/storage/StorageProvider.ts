import {
  Task,
  TaskCreateInput,
  TaskCompleteInput,
  TaskData,
  TaskFilters,
  StatusSummary
} from '../types/index.js';

/**
 * Storage provider interface for the task coordinator.
 * Every mutating call is one critical section over the whole collection:
 * no other mutation can interleave with it.
 */
export interface StorageProvider {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;

  // Task lifecycle (atomic)
  createTask(input: TaskCreateInput): Promise<string>;
  getNextTask(agentId: string, taskTypes?: string[]): Promise<Task | null>;
  completeTask(input: TaskCompleteInput): Promise<boolean>;
  releaseTask(taskId: string, agentId: string): Promise<boolean>;
  updateTaskData(taskId: string, data: TaskData): Promise<boolean>;
  reclaimExpiredTasks(): Promise<string[]>;

  // Reads (no lock)
  getTask(taskId: string): Promise<Task | null>;
  getTaskChildren(parentId: string): Promise<Task[]>;
  listTasks(filters?: TaskFilters): Promise<Task[]>;

  // Workflow
  getStatusSummary(): Promise<StatusSummary>;
  updateWorkflowMetadata(metadata: TaskData): Promise<void>;

  // Health
  healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}

/**
 * Base class for storage providers with common lifecycle handling
 */
export abstract class BaseStorageProvider implements StorageProvider {
  protected initialized = false;

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.doInitialize();
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.doClose();
    this.initialized = false;
  }

  protected ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Storage provider not initialized. Call initialize() first.');
    }
  }

  protected abstract doInitialize(): Promise<void>;
  protected abstract doClose(): Promise<void>;

  abstract createTask(input: TaskCreateInput): Promise<string>;
  abstract getNextTask(agentId: string, taskTypes?: string[]): Promise<Task | null>;
  abstract completeTask(input: TaskCompleteInput): Promise<boolean>;
  abstract releaseTask(taskId: string, agentId: string): Promise<boolean>;
  abstract updateTaskData(taskId: string, data: TaskData): Promise<boolean>;
  abstract reclaimExpiredTasks(): Promise<string[]>;

  abstract getTask(taskId: string): Promise<Task | null>;
  abstract getTaskChildren(parentId: string): Promise<Task[]>;
  abstract listTasks(filters?: TaskFilters): Promise<Task[]>;

  abstract getStatusSummary(): Promise<StatusSummary>;
  abstract updateWorkflowMetadata(metadata: TaskData): Promise<void>;

  abstract healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}
