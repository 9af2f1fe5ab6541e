/**
 * Explain Command
 *
 * Rewrites a raw CLI error message into a short, user-facing one:
 *   errlens explain "<message>"                       - Print the rewrite
 *   errlens explain "<message>" --invalid-value <v>   - Also suggest a fix
 *   errlens explain "<message>" --plain               - No terminal styling
 *   errlens explain "<message>" --json                - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ClassifierProvider, CommandContext } from '../types.js';
import type { Classification, RawError } from '../../classifier/index.js';
import { ExplainArgsSchema, ExplainOptionsSchema, parseInput } from '../validation.js';

interface ExplainOutputJSON {
  matched: boolean;
  message: string;
  kind?: string;
  label?: string;
  overriddenMessage?: string;
  suggestion?: {
    suggestion: string;
    correctionKind: string;
    parameter?: string;
  };
}

/**
 * Shape a classification for --json output
 */
export function toExplainOutput(result: Classification): ExplainOutputJSON {
  if (!result.matched) {
    return { matched: false, message: result.message };
  }
  const { record } = result;
  return {
    matched: true,
    message: record.message,
    kind: record.kind.name,
    label: record.kind.label,
    overriddenMessage: record.overriddenMessage,
    suggestion: record.suggestedFix?.toJSON(),
  };
}

export function createExplainCommand(
  getContext: () => CommandContext,
  getClassifier: ClassifierProvider
): Command {
  return new Command('explain')
    .description('Rewrite a CLI error message into a clearer one')
    .argument('<message...>', 'The raw error message (quote it, or pass it as several words)')
    .option('--invalid-value <value>', 'The value the CLI rejected, used to suggest a corrected one')
    .option('--plain', 'Print the rewrite without terminal styling')
    .action((messageParts: string[], rawOptions: { invalidValue?: string; plain?: boolean }) => {
      const ctx = getContext();
      const { message } = parseInput(ExplainArgsSchema, { message: messageParts });
      const { invalidValue, plain } = parseInput(ExplainOptionsSchema, rawOptions);

      const input: RawError =
        invalidValue !== undefined ? { message, _invalid_value: invalidValue } : message;
      const result = getClassifier().classify(input, plain ? { style: 'plain' } : {});

      if (ctx.options.json) {
        console.log(JSON.stringify(toExplainOutput(result), null, 2));
        return;
      }

      if (!result.matched) {
        ctx.debug('No known error shape matched; message left as is');
        ctx.log(result.message);
        return;
      }

      ctx.debug(`Matched ${result.record.kind.name}`);
      ctx.log(result.message);

      const fix = result.record.suggestedFix;
      if (fix) {
        const fixText = fix.toString();
        ctx.log(plain ? `Try: ${fixText}` : `${chalk.dim('Try:')} ${chalk.cyan(fixText)}`);
      }
    });
}
