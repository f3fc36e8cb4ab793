/**
 * Workflow Commands (status summary, metadata, reclamation, health)
 */

import chalk from '../../utils/chalk.js';
import { CommandParameter, CommandResult, defineCommand } from '../types.js';
import { StatusSummary } from '../../types/index.js';
import { formatHealthCheck, formatStatusSummary } from '../formatters.js';
import { parseJsonObject } from '../utils.js';

export const getStatus = defineCommand({
  name: 'getStatus',
  cliName: 'get-status',
  description: 'Show task counts by status and type, completion rates and workflow metadata',
  parameters: [] as const satisfies readonly CommandParameter[],
  async handler(context): Promise<CommandResult<StatusSummary>> {
    const summary = await context.workflow.getStatusSummary();
    return {
      success: true,
      data: summary
    };
  },
  formatResult: (result) => result.data ? formatStatusSummary(result.data) : ''
});

const updateMetadataParams = [
  {
    name: 'data',
    type: 'string',
    description: 'Fields to merge into the workflow metadata (JSON object or @path)',
    required: true,
    alias: 'd'
  }
] as const satisfies readonly CommandParameter[];

export const updateMetadata = defineCommand({
  name: 'updateMetadata',
  cliName: 'update-metadata',
  description: 'Merge fields into the workflow metadata; last writer wins',
  parameters: updateMetadataParams,
  examples: ['update-metadata --data \'{"stage": "verification"}\''],
  async handler(context, args): Promise<CommandResult> {
    await context.workflow.updateWorkflowMetadata(parseJsonObject(args.data, 'metadata'));
    return {
      success: true,
      message: 'Workflow metadata updated'
    };
  }
});

export const reclaimExpired = defineCommand({
  name: 'reclaimExpired',
  cliName: 'reclaim-expired',
  description: 'Return tasks whose claim has outlived the task timeout to the queue',
  parameters: [] as const satisfies readonly CommandParameter[],
  async handler(context): Promise<CommandResult<{ reclaimedTaskIds: string[] }>> {
    const reclaimedTaskIds = await context.task.reclaimExpiredTasks();
    return {
      success: true,
      data: { reclaimedTaskIds },
      message: `Reclaimed ${reclaimedTaskIds.length} expired task${reclaimedTaskIds.length === 1 ? '' : 's'}`
    };
  },
  formatResult: (result) => {
    const ids = result.data?.reclaimedTaskIds ?? [];
    return ids.map(id => `  ${chalk.yellow(id)}`).join('\n');
  }
});

export const healthCheck = defineCommand({
  name: 'healthCheck',
  cliName: 'health-check',
  description: 'Check that the state file can be read',
  parameters: [] as const satisfies readonly CommandParameter[],
  async handler(context): Promise<CommandResult<{ healthy: boolean; message?: string }>> {
    const health = await context.workflow.healthCheck();
    if (!health.healthy) {
      return {
        success: false,
        data: health,
        error: health.message ?? 'Storage is unhealthy'
      };
    }
    return {
      success: true,
      data: health
    };
  },
  formatResult: (result) => result.data ? formatHealthCheck(result.data) : ''
});
