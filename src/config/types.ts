import Joi from 'joi';
import { LogLevel } from '../utils/logger.js';

export interface CoordinatorConfig {
  // Persisted state document
  storage: {
    stateFile: string;
    workflowType: string;
    lockTimeoutMs: number;  // How long a caller waits for the exclusive lock
    lockStaleMs: number;  // Age after which a dead holder's lock is taken over
  };

  // Task lifecycle
  tasks: {
    timeoutHours: number;  // Claims older than this are reclaimed on the next getNextTask
  };

  logging: {
    level: LogLevel;
  };
}

export const configSchema = Joi.object<CoordinatorConfig>({
  storage: Joi.object({
    stateFile: Joi.string().default('./state/task_state.json'),
    workflowType: Joi.string().min(1).max(100).default('generic'),
    lockTimeoutMs: Joi.number().integer().min(0).default(5000), // 5 seconds
    lockStaleMs: Joi.number().integer().min(2000).default(10000), // proper-lockfile minimum is 2s
  }).default(),

  tasks: Joi.object({
    timeoutHours: Joi.number().greater(0).default(24),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'debug', 'trace').default('info'),
  }).default(),
}).default();
