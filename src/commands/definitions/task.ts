/**
 * Task Commands
 *
 * Create, claim, finish and inspect tasks. Claiming and finishing are
 * ownership-checked by agent id; a mismatch is reported as a failed result.
 */

import chalk from '../../utils/chalk.js';
import { CommandParameter, CommandResult, defineCommand } from '../types.js';
import { Task, TASK_STATUSES, TERMINAL_TASK_STATUSES } from '../../types/index.js';
import { formatTask, formatTaskList } from '../formatters.js';
import { parseJsonObject } from '../utils.js';

// Create Task Command
const createTaskParams = [
  {
    name: 'type',
    type: 'string',
    description: 'Task type (letters, numbers, dots, hyphens, underscores)',
    required: true,
    positional: true
  },
  {
    name: 'data',
    type: 'string',
    description: 'Task data as a JSON object, or @path to read it from a file',
    alias: 'd'
  },
  {
    name: 'parent',
    type: 'string',
    description: 'Id of the parent task',
    alias: 'p'
  }
] as const satisfies readonly CommandParameter[];

export const createTask = defineCommand({
  name: 'createTask',
  cliName: 'create-task',
  description: 'Create a pending task and print its id',
  parameters: createTaskParams,
  examples: [
    'create-task seed_dp --data \'{"seed": 42}\'',
    'create-task verify --data @payload.json --parent seed_dp_1a2b3c4d'
  ],
  async handler(context, args): Promise<CommandResult<{ taskId: string }>> {
    const data = args.data === undefined ? {} : parseJsonObject(args.data, 'task data');
    const taskId = await context.task.createTask({
      type: args.type,
      data,
      parentId: args.parent ?? null
    });

    return {
      success: true,
      data: { taskId },
      message: 'Task created'
    };
  },
  formatResult: (result) => `${chalk.gray('Task ID:')} ${result.data?.taskId ?? 'unknown'}`
});

// Get Next Task Command
const getNextTaskParams = [
  {
    name: 'agentId',
    type: 'string',
    description: 'Id of the agent claiming work',
    required: true,
    positional: true
  },
  {
    name: 'types',
    type: 'array',
    description: 'Only claim tasks of these types',
    alias: 't'
  }
] as const satisfies readonly CommandParameter[];

export const getNextTask = defineCommand({
  name: 'getNextTask',
  cliName: 'get-next-task',
  description: 'Claim the oldest pending task, optionally restricted to some task types. Timed-out claims are reclaimed first.',
  parameters: getNextTaskParams,
  examples: ['get-next-task worker-1 --types seed_dp verify'],
  async handler(context, args): Promise<CommandResult<{ task: Task | null }>> {
    const task = await context.task.getNextTask(args.agentId, args.types);

    if (!task) {
      return {
        success: true,
        data: { task: null },
        message: 'No pending tasks available'
      };
    }

    return {
      success: true,
      data: { task },
      message: `Task ${task.id} assigned to ${args.agentId}`
    };
  },
  formatResult: (result) => result.data?.task ? formatTask(result.data.task) : ''
});

// Complete Task Command
const completeTaskParams = [
  {
    name: 'taskId',
    type: 'string',
    description: 'Task to complete',
    required: true,
    positional: true
  },
  {
    name: 'agentId',
    type: 'string',
    description: 'Agent holding the task',
    required: true,
    positional: true
  },
  {
    name: 'status',
    type: 'string',
    description: 'Terminal status',
    choices: TERMINAL_TASK_STATUSES,
    default: 'completed',
    alias: 's'
  },
  {
    name: 'result',
    type: 'string',
    description: 'Result fields to merge into the task data (JSON object or @path)',
    alias: 'r'
  }
] as const satisfies readonly CommandParameter[];

export const completeTask = defineCommand({
  name: 'completeTask',
  cliName: 'complete-task',
  description: 'Move a held task to completed, failed or cancelled',
  parameters: completeTaskParams,
  examples: ['complete-task seed_dp_1a2b3c4d worker-1 --result \'{"score": 0.9}\''],
  async handler(context, args): Promise<CommandResult<{ taskId: string; status: string }>> {
    const result = args.result === undefined ? undefined : parseJsonObject(args.result, 'result');
    const completed = await context.task.completeTask({
      taskId: args.taskId,
      agentId: args.agentId,
      status: args.status,
      result
    });

    if (!completed) {
      return {
        success: false,
        error: `Task '${args.taskId}' not found or not held by agent '${args.agentId}'`
      };
    }

    return {
      success: true,
      data: { taskId: args.taskId, status: args.status },
      message: `Task ${args.taskId} marked ${args.status}`
    };
  },
  formatResult: () => ''
});

// Release Task Command
const releaseTaskParams = [
  {
    name: 'taskId',
    type: 'string',
    description: 'Task to release',
    required: true,
    positional: true
  },
  {
    name: 'agentId',
    type: 'string',
    description: 'Agent holding the task',
    required: true,
    positional: true
  }
] as const satisfies readonly CommandParameter[];

export const releaseTask = defineCommand({
  name: 'releaseTask',
  cliName: 'release-task',
  description: 'Give a held task back to the queue without finishing it',
  parameters: releaseTaskParams,
  async handler(context, args): Promise<CommandResult<{ taskId: string }>> {
    const released = await context.task.releaseTask(args.taskId, args.agentId);

    if (!released) {
      return {
        success: false,
        error: `Task '${args.taskId}' not found or not held by agent '${args.agentId}'`
      };
    }

    return {
      success: true,
      data: { taskId: args.taskId },
      message: `Task ${args.taskId} released`
    };
  },
  formatResult: () => ''
});

// Get Task Command
const getTaskParams = [
  {
    name: 'taskId',
    type: 'string',
    description: 'Task id',
    required: true,
    positional: true
  }
] as const satisfies readonly CommandParameter[];

export const getTask = defineCommand({
  name: 'getTask',
  cliName: 'get-task',
  description: 'Show a task and the ids of its children',
  parameters: getTaskParams,
  async handler(context, args): Promise<CommandResult<{ task: Task; childIds: string[] }>> {
    const task = await context.task.getTask(args.taskId);
    if (!task) {
      return {
        success: false,
        error: `Task '${args.taskId}' not found`
      };
    }

    const children = await context.task.getTaskChildren(task.id);
    return {
      success: true,
      data: { task, childIds: children.map(child => child.id) }
    };
  },
  formatResult: (result) => {
    if (!result.data) {
      return '';
    }
    let output = formatTask(result.data.task);
    if (result.data.childIds.length > 0) {
      output += `\n${chalk.bold('Children:')}\n`;
      for (const childId of result.data.childIds) {
        output += `  ${childId}\n`;
      }
    }
    return output;
  }
});

// List Tasks Command
const listTasksParams = [
  {
    name: 'type',
    type: 'string',
    description: 'Filter by task type',
    alias: 't'
  },
  {
    name: 'status',
    type: 'string',
    description: 'Filter by status',
    choices: TASK_STATUSES,
    alias: 's'
  }
] as const satisfies readonly CommandParameter[];

export const listTasks = defineCommand({
  name: 'listTasks',
  cliName: 'list-tasks',
  description: 'List tasks in creation order',
  parameters: listTasksParams,
  examples: ['list-tasks --status pending', 'list-tasks --type seed_dp --status completed'],
  async handler(context, args): Promise<CommandResult<{ tasks: Task[] }>> {
    const tasks = await context.task.listTasks({ type: args.type, status: args.status });
    return {
      success: true,
      data: { tasks }
    };
  },
  formatResult: (result) => formatTaskList(result.data?.tasks ?? [])
});

// Get Task Children Command
const getTaskChildrenParams = [
  {
    name: 'parentId',
    type: 'string',
    description: 'Parent task id',
    required: true,
    positional: true
  }
] as const satisfies readonly CommandParameter[];

export const getTaskChildren = defineCommand({
  name: 'getTaskChildren',
  cliName: 'get-task-children',
  description: 'List the tasks created with the given parent id',
  parameters: getTaskChildrenParams,
  async handler(context, args): Promise<CommandResult<{ tasks: Task[] }>> {
    const tasks = await context.task.getTaskChildren(args.parentId);
    return {
      success: true,
      data: { tasks }
    };
  },
  formatResult: (result) => formatTaskList(result.data?.tasks ?? [])
});

// Update Task Data Command
const updateTaskDataParams = [
  {
    name: 'taskId',
    type: 'string',
    description: 'Task id',
    required: true,
    positional: true
  },
  {
    name: 'data',
    type: 'string',
    description: 'Fields to merge into the task data (JSON object or @path)',
    required: true,
    alias: 'd'
  }
] as const satisfies readonly CommandParameter[];

export const updateTaskData = defineCommand({
  name: 'updateTaskData',
  cliName: 'update-task-data',
  description: 'Merge fields into a task\'s data without changing its status',
  parameters: updateTaskDataParams,
  async handler(context, args): Promise<CommandResult<{ taskId: string }>> {
    const data = parseJsonObject(args.data, 'task data');
    const updated = await context.task.updateTaskData(args.taskId, data);

    if (!updated) {
      return {
        success: false,
        error: `Task '${args.taskId}' not found`
      };
    }

    return {
      success: true,
      data: { taskId: args.taskId },
      message: `Task ${args.taskId} updated`
    };
  },
  formatResult: () => ''
});
