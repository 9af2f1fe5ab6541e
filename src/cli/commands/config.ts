/**
 * Config Command
 *
 * Inspects ~/.errlens/config.toml:
 *   errlens config list   - Show the effective configuration
 *   errlens config path   - Show the config file location
 *   errlens config init   - Write a commented default config
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, initConfig, listConfig, loadConfig, loadEnv } from '../../config/index.js';
import type { CommandContext } from '../types.js';

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Inspect configuration settings');

  configCmd
    .command('list')
    .alias('ls')
    .description('List the effective configuration (file + environment)')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig(loadConfig());

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');
      for (const [key, value] of entries) {
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(String(value))}`);
      }
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath(loadEnv())}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath(loadEnv());

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('init')
    .description('Write a commented default config if none exists')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath(loadEnv());
      const written = initConfig(configPath);

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath, written }));
      } else if (written) {
        ctx.log(`${chalk.green('✓')} Wrote ${configPath}`);
      } else {
        ctx.log(`${chalk.yellow('•')} ${configPath} already exists, left unchanged`);
      }
    });

  return configCmd;
}
