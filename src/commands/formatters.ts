/**
 * Output formatters for CLI commands
 * Supports both human-readable and JSON formats
 */

import chalk from '../utils/chalk.js';
import { StatusSummary, Task, TaskStatus, TASK_STATUSES } from '../types/index.js';
import type { CommandResult } from './types.js';

export type OutputFormat = 'human' | 'json';

export interface FormattedOutput {
  text: string;
  exitCode: number;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'human' || value === 'json';
}

/**
 * Strip ANSI color codes to get visual width
 */
function getVisualWidth(text: string): number {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\u001b\[[0-9;]*m/g, '').length;
}

/**
 * Pad text to width, accounting for ANSI color codes
 */
function padEndVisual(text: string, width: number): string {
  const padding = Math.max(0, width - getVisualWidth(text));
  return text + ' '.repeat(padding);
}

/**
 * Format command result for display
 */
export function formatCommandResult<R extends CommandResult>(
  result: R,
  format: OutputFormat = 'human',
  formatData?: (result: R) => string
): FormattedOutput {
  const exitCode = result.success ? 0 : 1;

  if (format === 'json') {
    return {
      text: JSON.stringify(result, null, 2),
      exitCode
    };
  }

  if (!result.success) {
    return {
      text: chalk.red(`❌ Error: ${result.error || 'Command failed'}`),
      exitCode
    };
  }

  let output = '';
  if (result.message) {
    output += chalk.green(`✅ ${result.message}`) + '\n';
  }

  if (formatData) {
    output += formatData(result);
  } else if (result.data !== undefined) {
    output += JSON.stringify(result.data, null, 2);
  }

  return {
    text: output.trim(),
    exitCode
  };
}

/**
 * Format task status with colors
 */
export function formatTaskStatus(status: TaskStatus): string {
  const colors: Record<TaskStatus, (text: string) => string> = {
    pending: chalk.yellow,
    in_progress: chalk.blue,
    completed: chalk.green,
    failed: chalk.red,
    cancelled: chalk.gray
  };
  return colors[status](status.toUpperCase());
}

function formatTimestamp(date: Date | null | undefined): string | undefined {
  return date ? date.toISOString() : undefined;
}

/**
 * Format a single task
 */
export function formatTask(task: Task): string {
  let output = `\n${chalk.bold('Task:')} ${task.id}\n`;
  output += `${chalk.gray('Type:')} ${task.type}\n`;
  output += `${chalk.gray('Status:')} ${formatTaskStatus(task.status)}\n`;

  if (task.parentId) {
    output += `${chalk.gray('Parent:')} ${task.parentId}\n`;
  }

  output += `${chalk.gray('Created:')} ${task.createdAt.toISOString()}\n`;

  const optionalTimes: Array<[string, string | undefined]> = [
    ['Started:', formatTimestamp(task.taskStartedAt)],
    ['Updated:', formatTimestamp(task.updatedAt)],
    ['Completed:', formatTimestamp(task.completedAt)]
  ];
  for (const [label, value] of optionalTimes) {
    if (value) {
      output += `${chalk.gray(label)} ${value}\n`;
    }
  }

  if (task.lockedBy) {
    output += `${chalk.gray('Locked by:')} ${task.lockedBy}\n`;
    output += `${chalk.gray('Locked at:')} ${formatTimestamp(task.lockedAt) ?? 'unknown'}\n`;
  }

  if (Object.keys(task.data).length > 0) {
    output += `\n${chalk.bold('Data:')}\n${JSON.stringify(task.data, null, 2)}\n`;
  }

  return output;
}

/**
 * Format task list as a table
 */
export function formatTaskList(tasks: Task[]): string {
  if (tasks.length === 0) {
    return chalk.gray('No tasks found');
  }

  let output = `\n${chalk.bold('Tasks:')} (${tasks.length})\n\n`;

  const ids = tasks.map(t => t.id);
  const types = tasks.map(t => t.type);
  const statuses = tasks.map(t => t.status.toUpperCase());

  const idWidth = Math.max(...ids.map(id => id.length), 'ID'.length);
  const typeWidth = Math.max(...types.map(t => t.length), 'TYPE'.length);
  const statusWidth = Math.max(...statuses.map(s => s.length), 'STATUS'.length);

  output += chalk.bold(
    'ID'.padEnd(idWidth) + ' | ' +
    'TYPE'.padEnd(typeWidth) + ' | ' +
    'STATUS'.padEnd(statusWidth) + ' | ' +
    'LOCKED BY'
  ) + '\n';
  output += chalk.gray('-'.repeat(idWidth + 3 + typeWidth + 3 + statusWidth + 3 + 'LOCKED BY'.length)) + '\n';

  for (const task of tasks) {
    output += task.id.padEnd(idWidth) + ' | ' +
              task.type.padEnd(typeWidth) + ' | ' +
              padEndVisual(formatTaskStatus(task.status), statusWidth) + ' | ' +
              (task.lockedBy ?? '-') + '\n';
  }

  return output;
}

/**
 * Format the workflow status summary
 */
export function formatStatusSummary(summary: StatusSummary): string {
  let output = `\n${chalk.bold('Workflow:')} ${summary.workflowType}\n`;
  output += `${chalk.gray('Total tasks:')} ${summary.totalTasks}\n`;

  output += `\n${chalk.bold('By status:')}\n`;
  const statusWidth = Math.max(...TASK_STATUSES.map(s => s.length));
  for (const status of TASK_STATUSES) {
    output += `  ${padEndVisual(formatTaskStatus(status), statusWidth)}  ${summary.statusCounts[status]}\n`;
  }

  const types = Object.keys(summary.typeCounts);
  if (types.length > 0) {
    output += `\n${chalk.bold('By type:')}\n`;
    const typeWidth = Math.max(...types.map(t => t.length));
    for (const type of types) {
      const rate = summary.completionRates[type];
      const completed = rate ? rate.completed : 0;
      output += `  ${type.padEnd(typeWidth)}  ${completed}/${summary.typeCounts[type]} completed\n`;
    }
  }

  const metadataKeys = Object.keys(summary.metadata);
  if (metadataKeys.length > 0) {
    output += `\n${chalk.bold('Metadata:')}\n`;
    for (const [key, value] of Object.entries(summary.metadata)) {
      output += `  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}\n`;
    }
  }

  return output;
}

/**
 * Format storage health
 */
export function formatHealthCheck(health: { healthy: boolean; message?: string }): string {
  const status = health.healthy ? chalk.green('✓ Healthy') : chalk.red('✗ Unhealthy');
  let output = `\n${chalk.bold('Storage:')} ${status}\n`;
  if (health.message) {
    output += `${chalk.gray('Message:')} ${health.message}\n`;
  }
  return output;
}
