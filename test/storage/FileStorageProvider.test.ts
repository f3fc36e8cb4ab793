import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import lockfile from 'proper-lockfile';
import { FileStorageProvider, lockPathFor } from '../../src/storage/FileStorageProvider.js';
import { LockTimeoutError, StateCorruptedError } from '../../src/types/index.js';
import { Logger } from '../../src/utils/logger.js';
import {
  createMockTaskInput,
  createMockTaskResult,
  createTestClock,
  createTestDataDir,
  stateFileIn,
  HOUR_MS,
  TestClock
} from '../fixtures/index.js';

describe('FileStorageProvider', () => {
  let storage: FileStorageProvider;
  let clock: TestClock;
  let testDataDir: string;
  let stateFile: string;

  beforeEach(async () => {
    testDataDir = createTestDataDir();
    stateFile = stateFileIn(testDataDir);
    clock = createTestClock();
    storage = new FileStorageProvider({ stateFile, clock: clock.now });
    await storage.initialize();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await storage.close();
    rmSync(testDataDir, { recursive: true, force: true });
  });

  const readDocument = (): Record<string, unknown> => JSON.parse(readFileSync(stateFile, 'utf8'));

  describe('Initialization', () => {
    it('should create an empty state document', () => {
      expect(readDocument()).toEqual({
        workflow_type: 'generic',
        metadata: {
          initialized_at: '2025-03-01T08:00:00.000Z',
          last_updated: '2025-03-01T08:00:00.000Z'
        },
        tasks: {}
      });
    });

    it('should use the configured workflow type for a new document', async () => {
      const otherFile = stateFileIn(createTestDataDir());
      const other = new FileStorageProvider({ stateFile: otherFile, workflowType: 'pipeline' });
      await other.initialize();

      const summary = await other.getStatusSummary();
      expect(summary.workflowType).toBe('pipeline');
      await other.close();
    });

    it('should keep an existing document', async () => {
      const taskId = await storage.createTask(createMockTaskInput());

      const reopened = new FileStorageProvider({ stateFile, workflowType: 'ignored' });
      await reopened.initialize();

      expect((await reopened.getTask(taskId))?.type).toBe('seed_dp');
      expect((await reopened.getStatusSummary()).workflowType).toBe('generic');
      await reopened.close();
    });

    it('should handle multiple initializations', async () => {
      await expect(storage.initialize()).resolves.toBeUndefined();
      await expect(storage.initialize()).resolves.toBeUndefined();
    });

    it('should reject unparseable state', async () => {
      const corruptFile = stateFileIn(createTestDataDir());
      writeFileSync(corruptFile, '{"workflow_type": "generic", "tasks": {');

      const corrupt = new FileStorageProvider({ stateFile: corruptFile });
      await expect(corrupt.initialize()).rejects.toBeInstanceOf(StateCorruptedError);
    });

    it('should reject a document without tasks', async () => {
      const corruptFile = stateFileIn(createTestDataDir());
      writeFileSync(corruptFile, JSON.stringify({
        workflow_type: 'generic',
        metadata: { initialized_at: '2025-03-01T08:00:00.000Z', last_updated: '2025-03-01T08:00:00.000Z' }
      }));

      const corrupt = new FileStorageProvider({ stateFile: corruptFile });
      await expect(corrupt.initialize()).rejects.toThrow(/is corrupted: "tasks" is required/);
    });

    it('should surface corruption on later operations', async () => {
      writeFileSync(stateFile, 'not json');
      await expect(storage.getNextTask('agent-1')).rejects.toBeInstanceOf(StateCorruptedError);
      await expect(storage.getTask('seed_dp_00000000')).rejects.toBeInstanceOf(StateCorruptedError);
    });

    it('should refuse operations before initialize', async () => {
      const uninitialized = new FileStorageProvider({ stateFile: stateFileIn(createTestDataDir()) });
      await expect(uninitialized.createTask(createMockTaskInput())).rejects.toThrow(
        'Storage provider not initialized. Call initialize() first.'
      );
      await expect(uninitialized.getTask('seed_dp_00000000')).rejects.toThrow('not initialized');
    });
  });

  describe('createTask', () => {
    it('should create a pending task with a type-prefixed id', async () => {
      const taskId = await storage.createTask(createMockTaskInput());
      expect(taskId).toMatch(/^seed_dp_[0-9a-f]{8}$/);

      const task = await storage.getTask(taskId);
      expect(task).toEqual({
        id: taskId,
        type: 'seed_dp',
        status: 'pending',
        parentId: null,
        lockedBy: null,
        lockedAt: null,
        completedAt: null,
        createdAt: new Date('2025-03-01T08:00:00.000Z'),
        data: { seed: 42, source: 'fixture' }
      });
    });

    it('should generate distinct ids', async () => {
      const ids = new Set<string>();
      for (let i = 0; i < 25; i++) {
        ids.add(await storage.createTask(createMockTaskInput({ data: { index: i } })));
      }
      expect(ids.size).toBe(25);
    });

    it('should accept an unknown parent id', async () => {
      const taskId = await storage.createTask(createMockTaskInput({ parentId: 'missing_00000000' }));
      expect((await storage.getTask(taskId))?.parentId).toBe('missing_00000000');
    });

    it('should not share data with the caller', async () => {
      const data = { nested: { value: 1 } };
      const taskId = await storage.createTask({ type: 'seed_dp', data });
      data.nested.value = 2;

      const task = await storage.getTask(taskId);
      expect(task?.data).toEqual({ nested: { value: 1 } });
    });

    it('should persist snake_case records', async () => {
      clock.advance(1000);
      const parentId = await storage.createTask(createMockTaskInput());
      const childId = await storage.createTask({ type: 'verify', data: { step: 2 }, parentId });

      const document = readDocument();
      expect(document.tasks).toEqual({
        [parentId]: {
          type: 'seed_dp',
          status: 'pending',
          parent_id: null,
          locked_by: null,
          locked_at: null,
          completed_at: null,
          created_at: '2025-03-01T08:00:01.000Z',
          data: { seed: 42, source: 'fixture' }
        },
        [childId]: {
          type: 'verify',
          status: 'pending',
          parent_id: parentId,
          locked_by: null,
          locked_at: null,
          completed_at: null,
          created_at: '2025-03-01T08:00:01.000Z',
          data: { step: 2 }
        }
      });
      expect(document.metadata).toEqual({
        initialized_at: '2025-03-01T08:00:00.000Z',
        last_updated: '2025-03-01T08:00:01.000Z'
      });
    });

    it('should store date-like strings in data unchanged', async () => {
      const taskId = await storage.createTask({ type: 'seed_dp', data: { due: '2025-03-02T00:00:00.000Z' } });
      expect((await storage.getTask(taskId))?.data.due).toBe('2025-03-02T00:00:00.000Z');
    });
  });

  describe('getNextTask', () => {
    it('should claim the seed_dp task and hand it out only once', async () => {
      const taskId = await storage.createTask({ type: 'seed_dp', data: { seed: 7 } });
      clock.advance(5000);

      const task = await storage.getNextTask('agent-1', ['seed_dp']);
      expect(task).not.toBeNull();
      expect(task?.id).toBe(taskId);
      expect(task?.status).toBe('in_progress');
      expect(task?.lockedBy).toBe('agent-1');
      expect(task?.lockedAt).toEqual(new Date('2025-03-01T08:00:05.000Z'));
      expect(task?.taskStartedAt).toEqual(new Date('2025-03-01T08:00:05.000Z'));
      expect(task?.data).toEqual({ seed: 7 });

      expect(await storage.getNextTask('agent-2', ['seed_dp'])).toBeNull();
    });

    it('should claim in creation order', async () => {
      const first = await storage.createTask(createMockTaskInput({ data: { n: 1 } }));
      const second = await storage.createTask(createMockTaskInput({ data: { n: 2 } }));
      const third = await storage.createTask(createMockTaskInput({ data: { n: 3 } }));

      expect((await storage.getNextTask('agent-1'))?.id).toBe(first);
      expect((await storage.getNextTask('agent-2'))?.id).toBe(second);
      expect((await storage.getNextTask('agent-3'))?.id).toBe(third);
      expect(await storage.getNextTask('agent-4')).toBeNull();
    });

    it('should only claim tasks of the requested types', async () => {
      await storage.createTask({ type: 'seed_dp', data: {} });
      const verifyId = await storage.createTask({ type: 'verify', data: {} });

      const task = await storage.getNextTask('agent-1', ['verify', 'report']);
      expect(task?.id).toBe(verifyId);
      expect(await storage.getNextTask('agent-1', ['verify'])).toBeNull();
    });

    it('should treat an empty type list as any type', async () => {
      const taskId = await storage.createTask({ type: 'verify', data: {} });
      expect((await storage.getNextTask('agent-1', []))?.id).toBe(taskId);
    });

    it('should return null on an empty store without writing', async () => {
      clock.advance(HOUR_MS);
      expect(await storage.getNextTask('agent-1')).toBeNull();
      expect(readDocument().metadata).toEqual({
        initialized_at: '2025-03-01T08:00:00.000Z',
        last_updated: '2025-03-01T08:00:00.000Z'
      });
    });
  });

  describe('completeTask', () => {
    let taskId: string;

    beforeEach(async () => {
      taskId = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');
      clock.advance(60_000);
    });

    it('should complete a held task and merge the result', async () => {
      const completed = await storage.completeTask({
        taskId,
        agentId: 'agent-1',
        result: createMockTaskResult()
      });
      expect(completed).toBe(true);

      const task = await storage.getTask(taskId);
      expect(task?.status).toBe('completed');
      expect(task?.lockedBy).toBeNull();
      expect(task?.lockedAt).toBeNull();
      expect(task?.completedAt).toEqual(new Date('2025-03-01T08:01:00.000Z'));
      expect(task?.data).toEqual({ seed: 42, source: 'fixture', score: 0.75, notes: 'looks fine' });
    });

    it('should let result fields overwrite existing data fields', async () => {
      await storage.completeTask({ taskId, agentId: 'agent-1', result: { seed: 99 } });
      expect((await storage.getTask(taskId))?.data).toEqual({ seed: 99, source: 'fixture' });
    });

    it('should record failed and cancelled outcomes', async () => {
      expect(await storage.completeTask({ taskId, agentId: 'agent-1', status: 'failed' })).toBe(true);
      expect((await storage.getTask(taskId))?.status).toBe('failed');

      const otherId = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-2');
      expect(await storage.completeTask({ taskId: otherId, agentId: 'agent-2', status: 'cancelled' })).toBe(true);
      expect((await storage.getTask(otherId))?.status).toBe('cancelled');
    });

    it('should refuse a different agent and leave the task untouched', async () => {
      const before = readFileSync(stateFile, 'utf8');

      expect(await storage.completeTask({ taskId, agentId: 'agent-2' })).toBe(false);

      const task = await storage.getTask(taskId);
      expect(task?.status).toBe('in_progress');
      expect(task?.lockedBy).toBe('agent-1');
      expect(readFileSync(stateFile, 'utf8')).toBe(before);
    });

    it('should refuse a second completion', async () => {
      expect(await storage.completeTask({ taskId, agentId: 'agent-1' })).toBe(true);
      expect(await storage.completeTask({ taskId, agentId: 'agent-1', status: 'failed' })).toBe(false);
      expect((await storage.getTask(taskId))?.status).toBe('completed');
    });

    it('should return false for an unknown task', async () => {
      expect(await storage.completeTask({ taskId: 'seed_dp_ffffffff', agentId: 'agent-1' })).toBe(false);
    });
  });

  describe('releaseTask', () => {
    it('should return the task to pending and keep the first start time', async () => {
      const taskId = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');
      clock.advance(10 * 60_000);

      expect(await storage.releaseTask(taskId, 'agent-1')).toBe(true);

      const released = await storage.getTask(taskId);
      expect(released?.status).toBe('pending');
      expect(released?.lockedBy).toBeNull();
      expect(released?.lockedAt).toBeNull();
      expect(released?.taskStartedAt).toEqual(new Date('2025-03-01T08:00:00.000Z'));

      clock.advance(60_000);
      const reclaimed = await storage.getNextTask('agent-2');
      expect(reclaimed?.id).toBe(taskId);
      expect(reclaimed?.lockedAt).toEqual(new Date('2025-03-01T08:11:00.000Z'));
      expect(reclaimed?.taskStartedAt).toEqual(new Date('2025-03-01T08:00:00.000Z'));
    });

    it('should refuse a different agent', async () => {
      const taskId = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');

      expect(await storage.releaseTask(taskId, 'agent-2')).toBe(false);
      expect((await storage.getTask(taskId))?.lockedBy).toBe('agent-1');
    });

    it('should refuse a pending task', async () => {
      const taskId = await storage.createTask(createMockTaskInput());
      expect(await storage.releaseTask(taskId, 'agent-1')).toBe(false);
    });
  });

  describe('Timeout reclamation', () => {
    it('should reclaim a claim older than the task timeout', async () => {
      const taskId = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');

      clock.advance(24 * HOUR_MS + 1);
      const task = await storage.getNextTask('agent-2');

      expect(task?.id).toBe(taskId);
      expect(task?.lockedBy).toBe('agent-2');
      expect(task?.taskStartedAt).toEqual(new Date('2025-03-02T08:00:00.001Z'));
      expect(await storage.completeTask({ taskId, agentId: 'agent-1' })).toBe(false);
    });

    it('should leave a claim exactly at the timeout alone', async () => {
      await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');

      clock.advance(24 * HOUR_MS);
      expect(await storage.getNextTask('agent-2')).toBeNull();
    });

    it('should clear the start time and persist even when nothing is claimed', async () => {
      const taskId = await storage.createTask({ type: 'seed_dp', data: {} });
      await storage.getNextTask('agent-1');

      clock.advance(25 * HOUR_MS);
      expect(await storage.getNextTask('agent-2', ['verify'])).toBeNull();

      const task = await storage.getTask(taskId);
      expect(task?.status).toBe('pending');
      expect(task?.lockedBy).toBeNull();
      expect(task?.lockedAt).toBeNull();
      expect(task?.taskStartedAt).toBeUndefined();
    });

    it('should honour a custom timeout', async () => {
      const shortFile = stateFileIn(createTestDataDir());
      const short = new FileStorageProvider({ stateFile: shortFile, taskTimeoutHours: 1, clock: clock.now });
      await short.initialize();

      const taskId = await short.createTask(createMockTaskInput());
      await short.getNextTask('agent-1');
      clock.advance(HOUR_MS + 1);

      expect(await short.reclaimExpiredTasks()).toEqual([taskId]);
      expect((await short.getTask(taskId))?.status).toBe('pending');
      await short.close();
    });

    it('should not reclaim on reads', async () => {
      const taskId = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');
      clock.advance(48 * HOUR_MS);

      expect((await storage.getTask(taskId))?.status).toBe('in_progress');
      expect((await storage.getStatusSummary()).statusCounts.in_progress).toBe(1);
    });

    it('should reclaim on demand', async () => {
      const first = await storage.createTask(createMockTaskInput());
      const second = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');
      await storage.getNextTask('agent-2');

      expect(await storage.reclaimExpiredTasks()).toEqual([]);

      clock.advance(30 * HOUR_MS);
      expect(await storage.reclaimExpiredTasks()).toEqual([first, second]);
    });
  });

  describe('Queries', () => {
    it('should list children in creation order', async () => {
      const parentId = await storage.createTask({ type: 'seed_dp', data: {} });
      const childA = await storage.createTask({ type: 'verify', data: { n: 1 }, parentId });
      await storage.createTask({ type: 'verify', data: { n: 2 } });
      const childB = await storage.createTask({ type: 'report', data: { n: 3 }, parentId });

      const children = await storage.getTaskChildren(parentId);
      expect(children.map(child => child.id)).toEqual([childA, childB]);
      expect(await storage.getTaskChildren('unknown_00000000')).toEqual([]);
    });

    it('should return null for an unknown task', async () => {
      expect(await storage.getTask('seed_dp_00000000')).toBeNull();
    });

    it('should filter listed tasks by type and status', async () => {
      const seedA = await storage.createTask({ type: 'seed_dp', data: {} });
      const seedB = await storage.createTask({ type: 'seed_dp', data: {} });
      const verify = await storage.createTask({ type: 'verify', data: {} });
      await storage.getNextTask('agent-1');

      expect((await storage.listTasks()).map(t => t.id)).toEqual([seedA, seedB, verify]);
      expect((await storage.listTasks({ type: 'seed_dp' })).map(t => t.id)).toEqual([seedA, seedB]);
      expect((await storage.listTasks({ status: 'pending' })).map(t => t.id)).toEqual([seedB, verify]);
      expect((await storage.listTasks({ type: 'seed_dp', status: 'in_progress' })).map(t => t.id)).toEqual([seedA]);
    });

    it('should return snapshots callers cannot use to change state', async () => {
      const taskId = await storage.createTask({ type: 'seed_dp', data: { value: 1 } });
      const task = await storage.getTask(taskId);
      if (task) {
        task.data.value = 2;
      }
      expect((await storage.getTask(taskId))?.data).toEqual({ value: 1 });
    });
  });

  describe('Status summary', () => {
    it('should count tasks by status and type', async () => {
      const ids: string[] = [];
      for (let i = 0; i < 4; i++) {
        ids.push(await storage.createTask({ type: 'seed_dp', data: { i } }));
      }
      await storage.createTask({ type: 'verify', data: {} });

      // seed_dp: 2 completed, 1 in progress, 1 pending; verify: 1 pending
      for (const agentId of ['agent-1', 'agent-2', 'agent-3']) {
        await storage.getNextTask(agentId, ['seed_dp']);
      }
      await storage.completeTask({ taskId: ids[0] ?? '', agentId: 'agent-1' });
      await storage.completeTask({ taskId: ids[1] ?? '', agentId: 'agent-2' });

      const summary = await storage.getStatusSummary();
      expect(summary.totalTasks).toBe(5);
      expect(summary.statusCounts).toEqual({
        pending: 2,
        in_progress: 1,
        completed: 2,
        failed: 0,
        cancelled: 0
      });
      expect(summary.typeCounts).toEqual({ seed_dp: 4, verify: 1 });
      expect(summary.completionRates).toEqual({
        seed_dp: { completed: 2, total: 4 },
        verify: { completed: 0, total: 1 }
      });
    });

    it('should report every status on an empty store', async () => {
      const summary = await storage.getStatusSummary();
      expect(summary.totalTasks).toBe(0);
      expect(summary.statusCounts).toEqual({
        pending: 0,
        in_progress: 0,
        completed: 0,
        failed: 0,
        cancelled: 0
      });
      expect(summary.typeCounts).toEqual({});
    });
  });

  describe('Metadata and task data', () => {
    it('should merge workflow metadata and keep initialized_at', async () => {
      await storage.updateWorkflowMetadata({ stage: 'seeding', batch: 1 });
      clock.advance(1000);
      await storage.updateWorkflowMetadata({ batch: 2 });

      const { metadata } = await storage.getStatusSummary();
      expect(metadata).toEqual({
        initialized_at: '2025-03-01T08:00:00.000Z',
        last_updated: '2025-03-01T08:00:01.000Z',
        stage: 'seeding',
        batch: 2
      });
    });

    it('should merge task data and stamp updatedAt without touching status', async () => {
      const taskId = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');
      clock.advance(2000);

      expect(await storage.updateTaskData(taskId, { progress: 0.5, seed: 43 })).toBe(true);

      const task = await storage.getTask(taskId);
      expect(task?.data).toEqual({ seed: 43, source: 'fixture', progress: 0.5 });
      expect(task?.updatedAt).toEqual(new Date('2025-03-01T08:00:02.000Z'));
      expect(task?.status).toBe('in_progress');
      expect(task?.lockedBy).toBe('agent-1');
    });

    it('should not let metadata updates overwrite store-managed timestamps', async () => {
      clock.advance(5000);
      await storage.updateWorkflowMetadata({ initialized_at: 'yesterday', last_updated: 'never', stage: 'seeding' });

      await expect(storage.createTask(createMockTaskInput())).resolves.toMatch(/^seed_dp_/);
      const { metadata } = await storage.getStatusSummary();
      expect(metadata).toEqual({
        initialized_at: '2025-03-01T08:00:00.000Z',
        last_updated: '2025-03-01T08:00:05.000Z',
        stage: 'seeding'
      });
    });

    it('should store a __proto__ field as data', async () => {
      const taskId = await storage.createTask({ type: 'seed_dp' });

      expect(await storage.updateTaskData(taskId, JSON.parse('{"__proto__": {"x": 1}}'))).toBe(true);

      const task = await storage.getTask(taskId);
      expect(JSON.stringify(task?.data)).toBe('{"__proto__":{"x":1}}');
      expect(Object.getPrototypeOf(task?.data)).toBe(Object.prototype);
    });

    it('should merge a __proto__ result field as data on completion', async () => {
      const taskId = await storage.createTask({ type: 'seed_dp', data: { seed: 1 } });
      await storage.getNextTask('agent-1');

      await storage.completeTask({ taskId, agentId: 'agent-1', result: JSON.parse('{"__proto__": "kept"}') });

      expect(JSON.stringify((await storage.getTask(taskId))?.data)).toBe('{"seed":1,"__proto__":"kept"}');
    });

    it('should return false when updating an unknown task', async () => {
      expect(await storage.updateTaskData('seed_dp_00000000', { progress: 1 })).toBe(false);
    });
  });

  describe('Locking and durability', () => {
    it('should place the lock beside the state file', () => {
      expect(lockPathFor('/data/state/task_state.json')).toBe('/data/state/task_state.lock');
      expect(storage.lockFile).toBe(lockPathFor(stateFile));
    });

    it('should time out while another holder keeps the lock', async () => {
      const impatient = new FileStorageProvider({ stateFile, lockTimeoutMs: 200 });
      await impatient.initialize();

      const release = await lockfile.lock(stateFile, { lockfilePath: storage.lockFile, realpath: false });
      try {
        const started = Date.now();
        await expect(impatient.createTask(createMockTaskInput())).rejects.toBeInstanceOf(LockTimeoutError);
        expect(Date.now() - started).toBeLessThan(2000);
      } finally {
        await release();
      }

      await expect(impatient.createTask(createMockTaskInput())).resolves.toMatch(/^seed_dp_/);
      await impatient.close();
    });

    it('should leave only the state file behind', async () => {
      const taskId = await storage.createTask(createMockTaskInput());
      await storage.getNextTask('agent-1');
      await storage.updateTaskData(taskId, { step: 1 });
      await storage.completeTask({ taskId, agentId: 'agent-1' });

      expect(readdirSync(testDataDir)).toEqual(['task_state.json']);
    });

    it('should time each locked operation', async () => {
      const timeAsync = vi.spyOn(Logger.prototype, 'timeAsync');

      const taskId = await storage.createTask(createMockTaskInput());
      await storage.getTask(taskId);
      await storage.releaseTask(taskId, 'agent-1');

      expect(timeAsync.mock.calls.map(call => call[0])).toEqual(['createTask', 'releaseTask']);
    });

    it('should keep a committed result when the lock release fails', async () => {
      vi.spyOn(lockfile, 'lock').mockResolvedValue(async () => {
        throw new Error('Lock is already released');
      });

      const taskId = await storage.createTask(createMockTaskInput());

      expect(taskId).toMatch(/^seed_dp_[0-9a-f]{8}$/);
      expect((await storage.getTask(taskId))?.status).toBe('pending');
    });

    it('should serialize concurrent calls on one instance', async () => {
      const ids = await Promise.all(
        Array.from({ length: 15 }, (_, i) => storage.createTask({ type: 'seed_dp', data: { i } }))
      );
      expect(new Set(ids).size).toBe(15);
      expect(await storage.listTasks()).toHaveLength(15);
    });
  });

  describe('Health check', () => {
    it('should report a readable state file', async () => {
      await storage.createTask(createMockTaskInput());
      expect(await storage.healthCheck()).toEqual({
        healthy: true,
        message: `1 tasks in ${stateFile}`
      });
    });

    it('should report a corrupted state file', async () => {
      writeFileSync(stateFile, '[]');
      const health = await storage.healthCheck();
      expect(health.healthy).toBe(false);
      expect(health.message).toMatch(/is corrupted/);
    });
  });
});
