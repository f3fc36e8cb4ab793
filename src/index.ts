/**
 * Task coordinator library entry point
 */

export * from './types/index.js';
export * from './storage/index.js';
export { TaskService } from './services/TaskService.js';
export { WorkflowService } from './services/WorkflowService.js';
export { loadConfig, getConfigExamples } from './config/index.js';
export type { CoordinatorConfig } from './config/index.js';
export { logger, Logger } from './utils/logger.js';
export type { LogLevel, LogContext } from './utils/logger.js';
export { COMMAND_DEFINITIONS, createServiceContext } from './commands/index.js';
export type { ServiceContext, CommandResult } from './commands/index.js';
