#!/usr/bin/env node
/**
 * errlens CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 * The classifier is built once, on first use, from the effective config
 * and shared by every command.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ClassifierProvider, CommandContext, GlobalOptions } from './types.js';
import { GlobalOptionsSchema } from './validation.js';
import { createExplainCommand } from './commands/explain.js';
import { createKindsCommand } from './commands/kinds.js';
import { createConfigCommand } from './commands/config.js';
import { ErrorClassifier } from '../classifier/index.js';
import { loadConfig } from '../config/index.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('errlens')
  .description('Turn raw CLI error messages into short, actionable ones')
  .version(VERSION, '-v, --version', 'Display version number')
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan(`errlens explain "Resource group 'demo' could not be found."`)}
  ${chalk.cyan(`errlens explain "Parameter 'resource_group_name' must conform to the following pattern: '^[-\\w._()]+$'." --invalid-value 'my!group'`)}
  ${chalk.cyan('errlens kinds')}
`);

/**
 * Create a command context with logging utilities
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

function getGlobalOptions(): GlobalOptions {
  return GlobalOptionsSchema.parse(program.opts());
}

let classifier: ErrorClassifier | undefined;

const getClassifier: ClassifierProvider = () => {
  if (!classifier) {
    const options = getGlobalOptions();
    const config = loadConfig();
    classifier = new ErrorClassifier({
      // JSON consumers get bare text
      style: options.json ? 'plain' : config.style,
      dispatch: config.dispatch,
      parameterAliases: config.parameter_aliases,
      logger: createContext(options),
    });
  }
  return classifier;
};

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createExplainCommand(getContext, getClassifier));
program.addCommand(createKindsCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    'Run: errlens --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
