/**
 * Kinds Command
 *
 * Lists the recognized error kinds in the order they are tried:
 *   errlens kinds          - Show as a table
 *   errlens kinds --json   - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { createErrorKindRegistry } from '../../classifier/index.js';
import { formatTable, type Column } from '../../utils/table.js';

export function createKindsCommand(getContext: () => CommandContext): Command {
  return new Command('kinds')
    .description('List recognized error kinds in dispatch order')
    .action(() => {
      const ctx = getContext();
      const kinds = createErrorKindRegistry().toArray();

      if (ctx.options.json) {
        const output = kinds.map((kind) => ({
          name: kind.name,
          label: kind.label,
          pattern: kind.pattern.source,
        }));
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      const columns: Column[] = [
        { header: '#', key: 'order', align: 'right' },
        { header: 'Kind', key: 'name' },
        { header: 'Label', key: 'label' },
      ];
      const rows = kinds.map((kind, i) => ({
        order: i + 1,
        name: kind.name,
        label: kind.label,
      }));

      ctx.log(formatTable(columns, rows));
      if (ctx.options.verbose) {
        ctx.log('');
        for (const kind of kinds) {
          ctx.log(`${chalk.cyan(kind.name)}: ${chalk.dim(kind.pattern.source)}`);
        }
      }
    });
}
