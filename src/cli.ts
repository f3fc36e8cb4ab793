#!/usr/bin/env node

/**
 * taskcoord CLI - generated from the command definitions
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import chalk from './utils/chalk.js';
import { logger } from './utils/logger.js';
import { loadConfig, getConfigExamples } from './config/index.js';
import { createStorageProvider } from './storage/index.js';
import { COMMAND_DEFINITIONS } from './commands/index.js';
import { createServiceContext } from './commands/context.js';
import { generateCliCommand, generateCliHandler } from './commands/generators.js';
import { ServiceContext } from './commands/types.js';

// Global service context, created on first use
let contextPromise: Promise<ServiceContext> | null = null;

function initializeContext(): Promise<ServiceContext> {
  if (!contextPromise) {
    contextPromise = (async () => {
      const config = loadConfig();
      logger.setLogLevel(config.logging.level);

      const storage = createStorageProvider(config);
      await storage.initialize();
      return createServiceContext(storage);
    })();
  }
  return contextPromise;
}

async function closeContext(): Promise<void> {
  if (!contextPromise) {
    return;
  }
  const pending = contextPromise;
  contextPromise = null;
  try {
    const context = await pending;
    await context.storage.close();
  } catch (error: unknown) {
    // initialization failures were already reported by the command
    logger.debug('Skipped storage close', { errorMessage: error instanceof Error ? error.message : String(error) });
  }
}

function configEpilogue(): string {
  const lines = ['Configuration is read from the environment, for example:'];
  for (const [setup, vars] of Object.entries(getConfigExamples())) {
    lines.push('', `  ${setup}:`);
    for (const [name, value] of Object.entries(vars)) {
      lines.push(`    ${name}=${value}`);
    }
  }
  return lines.join('\n');
}

// Build CLI from command definitions
function buildCli(args: string[]) {
  let cli = yargs(args)
    .scriptName('taskcoord')
    .usage('$0 <command> [options]')
    .demandCommand(1, 'You need at least one command before moving on')
    .strict()
    .fail((msg, err) => {
      if (err) {
        console.error(chalk.red('❌ Error:'), err.message);
      } else {
        console.error(chalk.red('❌ Error:'), msg);
        console.error('\nRun --help to see available commands and options');
      }
      process.exit(1);
    })
    .epilogue(configEpilogue())
    .help()
    .version()
    .alias('h', 'help');

  for (const def of COMMAND_DEFINITIONS) {
    const commandConfig = generateCliCommand(def);
    const handler = generateCliHandler(def, initializeContext);

    cli = cli.command(
      commandConfig.command,
      commandConfig.describe,
      commandConfig.builder,
      async (argv) => {
        try {
          await handler(argv);
        } finally {
          await closeContext();
        }
      }
    );
  }

  return cli;
}

// Export for programmatic use
export async function runCLI(args: string[] = hideBin(process.argv)): Promise<void> {
  await buildCli(args).parseAsync();
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run when executed directly
if (isEntryPoint()) {
  runCLI().catch((error: unknown) => {
    console.error(chalk.red('❌ CLI error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
