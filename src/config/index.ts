import { CoordinatorConfig, configSchema } from './types.js';

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
  const envConfig = {
    storage: {
      stateFile: env.TASKCOORD_STATE_FILE,
      workflowType: env.TASKCOORD_WORKFLOW_TYPE,
      lockTimeoutMs: parseNumber(env.TASKCOORD_LOCK_TIMEOUT),
      lockStaleMs: parseNumber(env.TASKCOORD_LOCK_STALE),
    },
    tasks: {
      timeoutHours: parseNumber(env.TASKCOORD_TASK_TIMEOUT_HOURS),
    },
    logging: {
      level: env.TASKCOORD_LOG_LEVEL?.toLowerCase(),
    },
  };

  // Remove undefined values to let Joi apply defaults
  const cleanConfig = removeUndefined(envConfig);

  const { error, value } = configSchema.validate(cleanConfig, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

/**
 * Non-numeric input becomes NaN so Joi reports it instead of silently defaulting
 */
function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return Number(raw);
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    cleaned[key] = isPlainObject(value) ? removeUndefined(value) : value;
  }
  return cleaned;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Environment examples for common setups
 */
export function getConfigExamples(): Record<string, Record<string, string>> {
  return {
    development: {
      TASKCOORD_STATE_FILE: './state/task_state.json',
      TASKCOORD_LOG_LEVEL: 'debug',
    },
    workerPool: {
      TASKCOORD_STATE_FILE: '/var/lib/taskcoord/pipeline.json',
      TASKCOORD_WORKFLOW_TYPE: 'pipeline',
      TASKCOORD_LOCK_TIMEOUT: '5000',
      TASKCOORD_TASK_TIMEOUT_HOURS: '24',
      TASKCOORD_LOG_LEVEL: 'warn',
    },
  };
}

export * from './types.js';
