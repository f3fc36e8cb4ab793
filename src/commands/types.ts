/**
 * Types for the declarative command definition system
 */

import { StorageProvider } from '../storage/StorageProvider.js';
import { TaskService } from '../services/TaskService.js';
import { WorkflowService } from '../services/WorkflowService.js';
import type { FormattedOutput, OutputFormat } from './formatters.js';
import { createCommandExecutor } from './generators.js';

type CamelToKebabCase<S extends string> = S extends `${infer T}${infer U}` ?
  `${T extends Capitalize<T> ? "-" : ""}${Lowercase<T>}${CamelToKebabCase<U>}` :
  S;

// Service context for command handlers
export interface ServiceContext {
  storage: StorageProvider;
  task: TaskService;
  workflow: WorkflowService;
}

export type CommandParameterTypes = 'string' | 'number' | 'boolean' | 'array';

// Parameter definition for commands with type inference support
export interface CommandParameter<T extends CommandParameterTypes = CommandParameterTypes> {
  readonly name: string;
  readonly type: T;
  readonly description: string;
  readonly required?: boolean;
  readonly default?: ParameterFromName<T>;
  readonly choices?: readonly string[];
  readonly alias?: string | readonly string[];
  readonly positional?: boolean;
}

type ParameterFromName<T extends CommandParameterTypes> =
  T extends 'string' ? string :
  T extends 'number' ? number :
  T extends 'boolean' ? boolean :
  T extends 'array' ? string[] :
  never;

// Type inference magic - extract argument types from parameter definitions
type ParameterType<P extends CommandParameter> =
  P extends { type: 'string' } ?
    P extends { choices: readonly (infer C)[] } ? C : string :
  P extends { type: 'number' } ? number :
  P extends { type: 'boolean' } ? boolean :
  P extends { type: 'array' } ? string[] :
  never;

// Parameters with a default are always filled in before the handler runs
type IsOptional<P extends CommandParameter> =
  P extends { required: true } ? false :
  P extends { default: string | number | boolean | readonly string[] } ? false :
  true;

// Convert parameter array to argument object type
export type InferArgs<T extends readonly CommandParameter[]> = {
  [K in T[number] as IsOptional<K> extends true ? never : K['name']]: ParameterType<K>
} & {
  [K in T[number] as IsOptional<K> extends true ? K['name'] : never]?: ParameterType<K>
};

// Result format for consistent output
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

// Command definition interface with type inference
export interface CommandDefinition<
  T extends readonly CommandParameter[] = readonly CommandParameter[],
  R extends CommandResult = CommandResult,
  NAME extends string = string
> {
  // Identity
  name: NAME;
  cliName: CamelToKebabCase<NAME>;
  description: string;

  parameters: T;

  // Handler function with inferred argument types
  handler(context: ServiceContext, args: InferArgs<T>): Promise<R>;

  // Human-readable rendering of a successful result
  formatResult?(result: R, args: InferArgs<T>): string;

  examples?: readonly string[];
}

/**
 * Type-erased view of a command, used by the CLI to register and run
 * every definition the same way
 */
export interface CommandRunner {
  readonly name: string;
  readonly cliName: string;
  readonly description: string;
  readonly parameters: readonly CommandParameter[];
  readonly examples?: readonly string[];
  execute(context: ServiceContext, rawArgs: Record<string, unknown>, format?: OutputFormat): Promise<FormattedOutput>;
}

export type DefinedCommand<
  T extends readonly CommandParameter[],
  R extends CommandResult,
  NAME extends string
> = CommandDefinition<T, R, NAME> & CommandRunner;

// Generic function to define commands with full type inference
export function defineCommand<T extends readonly CommandParameter[], R extends CommandResult, NAME extends string>(
  definition: CommandDefinition<T, R, NAME>
): DefinedCommand<T, R, NAME> {
  return {
    ...definition,
    execute: createCommandExecutor(definition)
  };
}
