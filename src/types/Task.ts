export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'failed', 'cancelled'] as const;
export const TERMINAL_TASK_STATUSES = ['completed', 'failed', 'cancelled'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];
export type TerminalTaskStatus = typeof TERMINAL_TASK_STATUSES[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Caller-owned payload of a task. The coordinator only ever shallow-merges it.
 */
export type TaskData = { [key: string]: JsonValue };

export interface Task {
  id: string;  // "{type}_{8 hex chars}"
  type: string;
  status: TaskStatus;
  parentId: string | null;  // Lookup key only, never checked for existence
  lockedBy: string | null;  // Agent id, set only while in_progress
  lockedAt: Date | null;  // Most recent claim
  taskStartedAt?: Date;  // First claim; survives release, dropped on timeout
  completedAt: Date | null;
  createdAt: Date;
  updatedAt?: Date;  // Last updateTaskData merge
  data: TaskData;
}

export interface TaskCreateInput {
  type: string;
  data?: TaskData;
  parentId?: string | null;
}

export interface TaskCompleteInput {
  taskId: string;
  agentId: string;
  status?: TerminalTaskStatus;
  result?: TaskData;
}

export interface TaskFilters {
  type?: string;
  status?: TaskStatus;
}

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return TERMINAL_TASK_STATUSES.some(terminal => terminal === status);
}
