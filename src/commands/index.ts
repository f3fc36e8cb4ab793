/**
 * Command definitions, in the order the CLI lists them
 */

import { CommandRunner } from './types.js';

import {
  createTask,
  getNextTask,
  completeTask,
  releaseTask,
  getTask,
  listTasks,
  getTaskChildren,
  updateTaskData
} from './definitions/task.js';

import {
  getStatus,
  updateMetadata,
  reclaimExpired,
  healthCheck
} from './definitions/workflow.js';

export const COMMAND_DEFINITIONS = [
  // Task lifecycle
  createTask,
  getNextTask,
  completeTask,
  releaseTask,
  updateTaskData,

  // Queries
  getTask,
  listTasks,
  getTaskChildren,

  // Workflow
  getStatus,
  updateMetadata,
  reclaimExpired,
  healthCheck
] as const satisfies readonly CommandRunner[];

export function findCommand(cliName: string): CommandRunner | undefined {
  return COMMAND_DEFINITIONS.find(def => def.cliName === cliName);
}

export * from './types.js';
export * from './formatters.js';
export { createServiceContext } from './context.js';
export { generateCliCommand, generateCliHandler, runCliCommand } from './generators.js';
