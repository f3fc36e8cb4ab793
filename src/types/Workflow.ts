import { JsonValue, TaskStatus } from './Task.js';

/**
 * Free-form workflow settings kept beside the task collection.
 * `initialized_at` and `last_updated` are managed by the store.
 */
export interface WorkflowMetadata {
  initialized_at: string;
  last_updated: string;
  [key: string]: JsonValue;
}

export interface CompletionRate {
  completed: number;
  total: number;
}

export interface StatusSummary {
  workflowType: string;
  totalTasks: number;
  statusCounts: Record<TaskStatus, number>;
  typeCounts: Record<string, number>;
  completionRates: Record<string, CompletionRate>;
  metadata: WorkflowMetadata;
}
