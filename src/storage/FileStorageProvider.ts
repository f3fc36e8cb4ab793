import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import lockfile from 'proper-lockfile';
import {
  Task,
  TaskCreateInput,
  TaskCompleteInput,
  TaskData,
  TaskFilters,
  TaskStatus,
  StatusSummary,
  CompletionRate,
  LockTimeoutError,
  ValidationError,
  isErrorWithCode,
  isTerminalStatus
} from '../types/index.js';
import { BaseStorageProvider } from './StorageProvider.js';
import {
  StateDocument,
  TaskRecord,
  STORE_MANAGED_METADATA_KEYS,
  createStateDocument,
  mergeFields,
  parseStateDocument,
  serializeStateDocument,
  toTask
} from './stateDocument.js';
import {
  ensureDirectory,
  writeFileAtomic,
  readFileSafe,
  fileExists
} from '../utils/fileUtils.js';
import { logger, Logger } from '../utils/logger.js';

export interface FileStorageOptions {
  stateFile: string;
  workflowType?: string;
  lockTimeoutMs?: number;
  lockStaleMs?: number;
  taskTimeoutHours?: number;
  clock?: () => Date;  // Source of task timestamps
}

interface Mutation<T> {
  result: T;
  changed: boolean;  // false skips the write
}

const LOCK_RETRY_INTERVAL_MS = 10;

export const DEFAULT_LOCK_TIMEOUT_MS = 5000;
export const DEFAULT_LOCK_STALE_MS = 10000;
export const DEFAULT_TASK_TIMEOUT_HOURS = 24;

/**
 * Lock marker beside the state file: same base name, `.lock` suffix
 */
export function lockPathFor(stateFile: string): string {
  const parsed = path.parse(stateFile);
  return path.join(parsed.dir, `${parsed.name}.lock`);
}

function generateTaskId(type: string): string {
  return `${type}_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
}

async function waitAtMost(promise: Promise<void>, ms: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      promise,
      new Promise<void>(resolve => {
        timer = setTimeout(resolve, ms);
      })
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * File-based task store: one JSON document holding every task, guarded by
 * an exclusive lock. Each mutation reads the whole document, changes it in
 * memory and replaces the file via temp file + rename.
 */
export class FileStorageProvider extends BaseStorageProvider {
  readonly stateFile: string;
  readonly lockFile: string;
  private workflowType: string;
  private lockTimeoutMs: number;
  private lockStaleMs: number;
  private taskTimeoutMs: number;
  private clock: () => Date;
  private log: Logger;
  private memoryLock: Promise<void> | null = null;

  constructor(options: FileStorageOptions) {
    super();
    this.stateFile = path.resolve(options.stateFile);
    this.lockFile = lockPathFor(this.stateFile);
    this.workflowType = options.workflowType ?? 'generic';
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.lockStaleMs = options.lockStaleMs ?? DEFAULT_LOCK_STALE_MS;
    this.taskTimeoutMs = (options.taskTimeoutHours ?? DEFAULT_TASK_TIMEOUT_HOURS) * 60 * 60 * 1000;
    this.clock = options.clock ?? (() => new Date());
    this.log = logger.child({ component: 'FileStorageProvider', stateFile: this.stateFile });
  }

  protected async doInitialize(): Promise<void> {
    await ensureDirectory(path.dirname(this.stateFile));

    // Under the lock so two processes starting together cannot both create the file
    await this.withLock('initialize', async () => {
      if (await fileExists(this.stateFile)) {
        // Unparseable state is fatal at startup
        await this.readState();
        return;
      }
      const state = createStateDocument(this.workflowType, this.clock());
      await writeFileAtomic(this.stateFile, serializeStateDocument(state));
      this.log.info('Initialized state file', {
        operation: 'initialize',
        workflowType: this.workflowType
      });
    });
  }

  protected async doClose(): Promise<void> {
    // No persistent handles; locks are released at the end of every operation
  }

  // Locking

  private async acquireMemoryLock(deadline: number): Promise<() => void> {
    while (this.memoryLock) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new LockTimeoutError(this.lockFile, this.lockTimeoutMs);
      }
      this.log.trace('Waiting for in-memory lock', { operation: 'acquireMemoryLock' });
      await waitAtMost(this.memoryLock, remaining);
    }

    let resolveLock: () => void = () => undefined;
    const lockPromise = new Promise<void>(resolve => {
      resolveLock = resolve;
    });
    this.memoryLock = lockPromise;

    return () => {
      if (this.memoryLock === lockPromise) {
        this.memoryLock = null;
      }
      resolveLock();
    };
  }

  private async acquireFileLock(deadline: number): Promise<() => Promise<void>> {
    const remaining = Math.max(0, deadline - Date.now());

    try {
      return await lockfile.lock(this.stateFile, {
        lockfilePath: this.lockFile,
        realpath: false,
        stale: this.lockStaleMs,
        retries: {
          retries: Math.ceil(remaining / LOCK_RETRY_INTERVAL_MS),
          minTimeout: LOCK_RETRY_INTERVAL_MS,
          maxTimeout: LOCK_RETRY_INTERVAL_MS,
          factor: 1,
          maxRetryTime: remaining
        },
        onCompromised: (error: Error) => {
          this.log.error('State lock compromised', { operation: 'acquireFileLock' }, error);
        }
      });
    } catch (error: unknown) {
      if (isErrorWithCode(error) && error.code === 'ELOCKED') {
        this.log.warn('Timed out waiting for state lock', {
          operation: 'acquireFileLock',
          lockFile: this.lockFile,
          timeoutMs: this.lockTimeoutMs
        });
        throw new LockTimeoutError(this.lockFile, this.lockTimeoutMs);
      }
      throw error;
    }
  }

  // Unlock failures are logged at warn; the operation's result stands
  private async releaseFileLock(release: () => Promise<void>, operation: string): Promise<void> {
    try {
      await release();
      this.log.trace('File lock released', { operation });
    } catch (error: unknown) {
      this.log.warn('Failed to release state lock', {
        operation,
        lockFile: this.lockFile,
        errorMessage: error instanceof Error ? error.message : String(error)
      });
    }
  }

  /**
   * Run `fn` holding the in-process lock and then the file lock. The wait for
   * both counts against one lock timeout.
   */
  private async withLock<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const deadline = Date.now() + this.lockTimeoutMs;
    const releaseMemoryLock = await this.acquireMemoryLock(deadline);

    try {
      const lockStart = Date.now();
      const release = await this.acquireFileLock(deadline);
      this.log.trace('File lock acquired', { operation, duration: Date.now() - lockStart });

      try {
        return await fn();
      } finally {
        await this.releaseFileLock(release, operation);
      }
    } finally {
      releaseMemoryLock();
    }
  }

  private async withStateLock<T>(
    operation: string,
    mutate: (state: StateDocument, now: Date) => Mutation<T>
  ): Promise<T> {
    this.ensureInitialized();

    return this.withLock(operation, () => this.log.timeAsync(operation, async () => {
      const state = await this.readState();
      const now = this.clock();
      const { result, changed } = mutate(state, now);

      if (changed) {
        state.metadata.last_updated = now.toISOString();
        await this.writeState(state);
      }
      return result;
    }));
  }

  private async readState(): Promise<StateDocument> {
    const content = await readFileSafe(this.stateFile);
    if (content === null) {
      throw new Error(`State file ${this.stateFile} not found`);
    }
    const state = parseStateDocument(content, this.stateFile);
    this.log.trace('State read', { operation: 'readState', tasks: Object.keys(state.tasks).length });
    return state;
  }

  private async writeState(state: StateDocument): Promise<void> {
    await writeFileAtomic(this.stateFile, serializeStateDocument(state));
    this.log.trace('State written', { operation: 'writeState', tasks: Object.keys(state.tasks).length });
  }

  private async readStateForQuery(): Promise<StateDocument> {
    this.ensureInitialized();
    return this.readState();
  }

  /**
   * Return stale claims to pending. Mutates `state`; the caller persists it.
   */
  private reclaimExpired(state: StateDocument, now: Date): string[] {
    const cutoff = now.getTime() - this.taskTimeoutMs;
    const reclaimed: string[] = [];

    for (const [taskId, record] of Object.entries(state.tasks)) {
      if (record.status !== 'in_progress' || record.locked_at === null) {
        continue;
      }
      if (Date.parse(record.locked_at) < cutoff) {
        const previousHolder = record.locked_by;
        record.status = 'pending';
        record.locked_by = null;
        record.locked_at = null;
        // A reclaimed task restarts from scratch
        delete record.task_started_at;
        reclaimed.push(taskId);
        this.log.debug('Reclaimed timed-out task', { taskId, agentId: previousHolder ?? undefined });
      }
    }

    if (reclaimed.length > 0) {
      this.log.info(`Reclaimed ${reclaimed.length} timed-out tasks`, {
        operation: 'reclaimExpired',
        reclaimedTasks: reclaimed
      });
    }
    return reclaimed;
  }

  // Task lifecycle

  async createTask(input: TaskCreateInput): Promise<string> {
    return this.withStateLock('createTask', (state, now) => {
      let taskId = generateTaskId(input.type);
      while (taskId in state.tasks) {
        taskId = generateTaskId(input.type);
      }

      const record: TaskRecord = {
        type: input.type,
        status: 'pending',
        parent_id: input.parentId ?? null,
        locked_by: null,
        locked_at: null,
        completed_at: null,
        created_at: now.toISOString(),
        data: structuredClone(input.data ?? {}),
      };
      state.tasks[taskId] = record;

      this.log.debug('Task created', { operation: 'createTask', taskId, parentId: record.parent_id });
      return { result: taskId, changed: true };
    });
  }

  async getNextTask(agentId: string, taskTypes?: string[]): Promise<Task | null> {
    return this.withStateLock<Task | null>('getNextTask', (state, now) => {
      const reclaimed = this.reclaimExpired(state, now);
      const typeFilter = taskTypes && taskTypes.length > 0 ? new Set(taskTypes) : null;

      // Insertion order is claim order
      for (const [taskId, record] of Object.entries(state.tasks)) {
        if (record.status !== 'pending') {
          continue;
        }
        if (typeFilter && !typeFilter.has(record.type)) {
          continue;
        }

        const claimedAt = now.toISOString();
        record.status = 'in_progress';
        record.locked_by = agentId;
        record.locked_at = claimedAt;
        if (record.task_started_at === undefined) {
          record.task_started_at = claimedAt;
        }

        this.log.debug('Task claimed', { operation: 'getNextTask', taskId, agentId });
        return { result: toTask(taskId, record), changed: true };
      }

      this.log.trace('No matching pending task', { operation: 'getNextTask', agentId, taskTypes });
      return { result: null, changed: reclaimed.length > 0 };
    });
  }

  async completeTask(input: TaskCompleteInput): Promise<boolean> {
    const status = input.status ?? 'completed';
    if (!isTerminalStatus(status)) {
      throw new ValidationError(`Cannot complete task with non-terminal status ${status}`);
    }

    return this.withStateLock('completeTask', (state, now) => {
      const record = state.tasks[input.taskId];
      if (!record || record.status !== 'in_progress' || record.locked_by !== input.agentId) {
        this.log.debug('Completion refused', {
          operation: 'completeTask',
          taskId: input.taskId,
          agentId: input.agentId,
          found: record !== undefined,
          lockedBy: record?.locked_by ?? null
        });
        return { result: false, changed: false };
      }

      record.status = status;
      record.completed_at = now.toISOString();
      record.locked_by = null;
      record.locked_at = null;
      if (input.result) {
        mergeFields(record.data, input.result);
      }

      this.log.debug('Task completed', { operation: 'completeTask', taskId: input.taskId, agentId: input.agentId, status });
      return { result: true, changed: true };
    });
  }

  async releaseTask(taskId: string, agentId: string): Promise<boolean> {
    return this.withStateLock('releaseTask', (state) => {
      const record = state.tasks[taskId];
      if (!record || record.status !== 'in_progress' || record.locked_by !== agentId) {
        return { result: false, changed: false };
      }

      // task_started_at is kept so elapsed time survives re-queuing
      record.status = 'pending';
      record.locked_by = null;
      record.locked_at = null;

      this.log.debug('Task released', { operation: 'releaseTask', taskId, agentId });
      return { result: true, changed: true };
    });
  }

  async updateTaskData(taskId: string, data: TaskData): Promise<boolean> {
    return this.withStateLock('updateTaskData', (state, now) => {
      const record = state.tasks[taskId];
      if (!record) {
        return { result: false, changed: false };
      }

      mergeFields(record.data, data);
      record.updated_at = now.toISOString();
      return { result: true, changed: true };
    });
  }

  async reclaimExpiredTasks(): Promise<string[]> {
    return this.withStateLock('reclaimExpiredTasks', (state, now) => {
      const reclaimed = this.reclaimExpired(state, now);
      return { result: reclaimed, changed: reclaimed.length > 0 };
    });
  }

  // Reads: no lock, the rename guarantees a whole document

  async getTask(taskId: string): Promise<Task | null> {
    const state = await this.readStateForQuery();
    const record = state.tasks[taskId];
    return record ? toTask(taskId, record) : null;
  }

  async getTaskChildren(parentId: string): Promise<Task[]> {
    const state = await this.readStateForQuery();
    return Object.entries(state.tasks)
      .filter(([, record]) => record.parent_id === parentId)
      .map(([taskId, record]) => toTask(taskId, record));
  }

  async listTasks(filters?: TaskFilters): Promise<Task[]> {
    const state = await this.readStateForQuery();
    return Object.entries(state.tasks)
      .filter(([, record]) => !filters?.type || record.type === filters.type)
      .filter(([, record]) => !filters?.status || record.status === filters.status)
      .map(([taskId, record]) => toTask(taskId, record));
  }

  // Workflow

  async getStatusSummary(): Promise<StatusSummary> {
    const state = await this.readStateForQuery();

    const statusCounts: Record<TaskStatus, number> = {
      pending: 0,
      in_progress: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    const typeCounts: Record<string, number> = {};
    const completionRates: Record<string, CompletionRate> = {};

    for (const record of Object.values(state.tasks)) {
      statusCounts[record.status] += 1;
      typeCounts[record.type] = (typeCounts[record.type] ?? 0) + 1;

      const rate = completionRates[record.type] ?? { completed: 0, total: 0 };
      rate.total += 1;
      if (record.status === 'completed') {
        rate.completed += 1;
      }
      completionRates[record.type] = rate;
    }

    return {
      workflowType: state.workflow_type,
      totalTasks: Object.keys(state.tasks).length,
      statusCounts,
      typeCounts,
      completionRates,
      metadata: state.metadata,
    };
  }

  async updateWorkflowMetadata(metadata: TaskData): Promise<void> {
    return this.withStateLock('updateWorkflowMetadata', (state) => {
      const ignored = mergeFields(state.metadata, metadata, STORE_MANAGED_METADATA_KEYS);
      if (ignored.length > 0) {
        this.log.debug('Ignored store-managed metadata keys', { operation: 'updateWorkflowMetadata', ignored });
      }
      return { result: undefined, changed: true };
    });
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    try {
      const state = await this.readStateForQuery();
      return { healthy: true, message: `${Object.keys(state.tasks).length} tasks in ${this.stateFile}` };
    } catch (error: unknown) {
      return { healthy: false, message: error instanceof Error ? error.message : String(error) };
    }
  }
}
