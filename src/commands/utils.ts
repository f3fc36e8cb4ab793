/**
 * Utilities for command processing
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { TaskData, ValidationError, toErrorWithMessage } from '../types/index.js';
import { taskDataSchema, validate } from '../utils/validation.js';
import type { CommandParameter, CommandParameterTypes, InferArgs } from './types.js';

/**
 * Reads content from a file path if the value starts with '@', otherwise returns the value as-is
 */
export function readContentFromFileOrValue(value: string): string {
  if (value.startsWith('@')) {
    const filePath = value.slice(1);
    try {
      return readFileSync(resolve(filePath), 'utf-8').trim();
    } catch (error: unknown) {
      throw new Error(`Failed to read file '${filePath}': ${toErrorWithMessage(error).message}`);
    }
  }
  return value;
}

/**
 * Parse a JSON object argument (task data, results, metadata)
 */
export function parseJsonObject(jsonStr: string, context: string = 'JSON'): TaskData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch (error: unknown) {
    throw new ValidationError(`Invalid ${context}: ${toErrorWithMessage(error).message}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`Invalid ${context}: expected a JSON object`);
  }
  return validate(taskDataSchema.required(), parsed);
}

function matchesType(type: CommandParameterTypes, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && !Number.isNaN(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value) && value.every(item => typeof item === 'string');
  }
}

/**
 * List every way `args` fails to match the declared parameters
 */
export function findParameterProblems(parameters: readonly CommandParameter[], args: Record<string, unknown>): string[] {
  const problems: string[] = [];

  for (const param of parameters) {
    const value = args[param.name];
    if (value === undefined) {
      if (param.required) {
        problems.push(`${param.name} is required`);
      }
      continue;
    }

    if (!matchesType(param.type, value)) {
      problems.push(`${param.name} must be of type ${param.type}`);
      continue;
    }

    if (param.choices && typeof value === 'string' && !param.choices.includes(value)) {
      problems.push(`${param.name} must be one of ${param.choices.join(', ')}`);
    }
  }

  return problems;
}

export function hasParameterValues<T extends readonly CommandParameter[]>(
  parameters: T,
  args: Record<string, unknown>
): args is Record<string, unknown> & InferArgs<T> {
  return findParameterProblems(parameters, args).length === 0;
}

/**
 * Fill in declared defaults for arguments the caller left out
 */
export function applyParameterDefaults(
  parameters: readonly CommandParameter[],
  args: Record<string, unknown>
): Record<string, unknown> {
  const withDefaults = { ...args };
  for (const param of parameters) {
    if (withDefaults[param.name] === undefined && param.default !== undefined) {
      withDefaults[param.name] = param.default;
    }
  }
  return withDefaults;
}
