import { StatusSummary, TaskData } from '../types/index.js';
import { StorageProvider } from '../storage/index.js';
import { validate, taskDataSchema } from '../utils/validation.js';

/**
 * Service for workflow-wide state: the status summary and free-form metadata
 */
export class WorkflowService {
  constructor(private storage: StorageProvider) {}

  async getStatusSummary(): Promise<StatusSummary> {
    return this.storage.getStatusSummary();
  }

  /**
   * Shallow-merge into the workflow metadata; last writer wins
   */
  async updateWorkflowMetadata(metadata: TaskData): Promise<void> {
    return this.storage.updateWorkflowMetadata(validate(taskDataSchema.required(), metadata));
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    return this.storage.healthCheck();
  }
}
