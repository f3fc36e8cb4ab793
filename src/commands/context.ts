/**
 * Service context creation for command handlers
 */

import { StorageProvider } from '../storage/StorageProvider.js';
import { TaskService } from '../services/TaskService.js';
import { WorkflowService } from '../services/WorkflowService.js';
import { ServiceContext } from './types.js';

/**
 * Create service context from storage provider
 */
export function createServiceContext(storage: StorageProvider): ServiceContext {
  return {
    storage,
    task: new TaskService(storage),
    workflow: new WorkflowService(storage)
  };
}
