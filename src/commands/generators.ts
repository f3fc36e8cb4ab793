/**
 * Generators for CLI commands from command definitions
 */

import type { Argv } from 'yargs';
import { formatCommandResult, FormattedOutput, isOutputFormat, OutputFormat } from './formatters.js';
import type {
  CommandDefinition,
  CommandParameter,
  CommandResult,
  CommandRunner,
  InferArgs,
  ServiceContext
} from './types.js';
import {
  applyParameterDefaults,
  findParameterProblems,
  hasParameterValues,
  readContentFromFileOrValue
} from './utils.js';
import {
  LockTimeoutError,
  StateCorruptedError,
  toErrorWithMessage
} from '../types/index.js';
import { isValidationError } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'commands' });

export function isExpectedError(error: unknown): boolean {
  return isValidationError(error) ||
    error instanceof LockTimeoutError ||
    error instanceof StateCorruptedError;
}

function logCommandError(error: unknown, commandName: string): void {
  const message = toErrorWithMessage(error).message;
  if (isExpectedError(error)) {
    log.debug(`Command failed: ${commandName}`, { command: commandName, errorMessage: message });
    return;
  }
  log.error(`Unexpected error in ${commandName}`, { command: commandName },
    error instanceof Error ? error : new Error(message));
}

/**
 * Build the runner for a definition: defaults, argument checks, the
 * handler call and output formatting. Handler errors become failed results.
 */
export function createCommandExecutor<T extends readonly CommandParameter[], R extends CommandResult, NAME extends string>(
  definition: CommandDefinition<T, R, NAME>
) {
  return async (
    context: ServiceContext,
    rawArgs: Record<string, unknown>,
    format: OutputFormat = 'human'
  ): Promise<FormattedOutput> => {
    const args = applyParameterDefaults(definition.parameters, rawArgs);
    delete args.format;

    if (!hasParameterValues(definition.parameters, args)) {
      const problems = findParameterProblems(definition.parameters, args);
      return formatCommandResult({ success: false, error: `Invalid arguments: ${problems.join('; ')}` }, format);
    }

    const typedArgs: InferArgs<T> = args;

    try {
      const result = await definition.handler(context, typedArgs);
      const formatter = definition.formatResult;
      return formatCommandResult(result, format, formatter ? (r: R) => formatter(r, typedArgs) : undefined);
    } catch (error: unknown) {
      logCommandError(error, definition.cliName);
      return formatCommandResult({ success: false, error: toErrorWithMessage(error).message }, format);
    }
  };
}

/**
 * Generate CLI command configuration from command definition
 */
export function generateCliCommand(def: CommandRunner) {
  // Build yargs command string with positional parameters
  const commandParts = [def.cliName];
  for (const param of def.parameters.filter(p => p.positional)) {
    commandParts.push(param.required ? `<${param.name}>` : `[${param.name}]`);
  }

  const builder = (yargs: Argv): Argv => {
    let result: Argv = yargs.option('format', {
      type: 'string',
      describe: 'Output format',
      choices: ['human', 'json'],
      default: 'human',
      alias: 'f'
    });

    for (const param of def.parameters) {
      if (param.positional) {
        result = result.positional(param.name, {
          describe: param.description,
          type: param.type === 'array' ? 'string' : param.type,
          ...(param.default !== undefined && { default: param.default }),
          ...(param.choices && { choices: param.choices })
        });
      } else {
        result = result.option(param.name, {
          type: param.type,
          describe: param.description,
          // keep numeric-looking list items (task types) as strings
          ...(param.type === 'array' && { string: true }),
          ...(param.alias && { alias: param.alias }),
          ...(param.default !== undefined && { default: param.default }),
          ...(param.choices && { choices: param.choices })
        });
      }
    }

    if (def.examples) {
      for (const example of def.examples) {
        result = result.example(example, '');
      }
    }

    return result;
  };

  return {
    command: commandParts.join(' '),
    describe: def.description,
    builder
  };
}

/**
 * Run a command from parsed CLI arguments. `@file` values are read from
 * disk before the handler sees them.
 */
export async function runCliCommand(
  def: CommandRunner,
  getContext: () => Promise<ServiceContext>,
  argv: Record<string, unknown>
): Promise<FormattedOutput> {
  const format: OutputFormat = isOutputFormat(argv.format) ? argv.format : 'human';
  const args: Record<string, unknown> = { ...argv };

  for (const param of def.parameters) {
    const value = args[param.name];
    if (param.type === 'string' && typeof value === 'string' && value.startsWith('@')) {
      try {
        args[param.name] = readContentFromFileOrValue(value);
      } catch (error: unknown) {
        logCommandError(error, def.cliName);
        return formatCommandResult(
          { success: false, error: `Failed to read file for ${param.name}: ${toErrorWithMessage(error).message}` },
          format
        );
      }
    }
  }

  let context: ServiceContext;
  try {
    context = await getContext();
  } catch (error: unknown) {
    logCommandError(error, def.cliName);
    return formatCommandResult(
      { success: false, error: `Failed to initialize services: ${toErrorWithMessage(error).message}` },
      format
    );
  }

  return def.execute(context, args, format);
}

/**
 * Generate CLI handler from command definition
 */
export function generateCliHandler(def: CommandRunner, getContext: () => Promise<ServiceContext>) {
  return async (argv: Record<string, unknown>): Promise<void> => {
    const formatted = await runCliCommand(def, getContext, argv);

    if (formatted.text) {
      if (formatted.exitCode === 0) {
        console.log(formatted.text);
      } else {
        console.error(formatted.text);
      }
    }

    process.exitCode = formatted.exitCode;
  };
}
