import { CoordinatorConfig } from '../config/index.js';
import { StorageProvider } from './StorageProvider.js';
import { FileStorageProvider } from './FileStorageProvider.js';

/**
 * Create a storage provider based on configuration
 */
export function createStorageProvider(config: CoordinatorConfig): StorageProvider {
  return new FileStorageProvider({
    stateFile: config.storage.stateFile,
    workflowType: config.storage.workflowType,
    lockTimeoutMs: config.storage.lockTimeoutMs,
    lockStaleMs: config.storage.lockStaleMs,
    taskTimeoutHours: config.tasks.timeoutHours,
  });
}

export * from './StorageProvider.js';
export * from './FileStorageProvider.js';
export * from './stateDocument.js';
