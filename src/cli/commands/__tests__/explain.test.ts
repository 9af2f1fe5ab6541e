/**
 * Tests for explain command
 *
 * Tests cover:
 * - Command structure
 * - Text output for recognized and unrecognized errors
 * - Suggested corrections from --invalid-value
 * - Unstyled output with --plain
 * - JSON output format
 * - Argument validation
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import chalk, { Chalk } from 'chalk';
import { createExplainCommand } from '../explain.js';
import type { CommandContext } from '../../types.js';
import { ErrorClassifier } from '../../../classifier/index.js';
import { ValidationError } from '../../../errors/index.js';

const CHARACTER_MESSAGE = String.raw`Parameter 'resource_group_name' must conform to the following pattern: '^[-\w._()]+$'.`;

describe('createExplainCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let classifier: ErrorClassifier;

  beforeEach(() => {
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    classifier = new ErrorClassifier({ style: 'plain' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function runExplain(args: string[], context = mockContext) {
    const program = new Command();
    program.addCommand(createExplainCommand(() => context, () => classifier));
    await program.parseAsync(['node', 'test', 'explain', ...args]);
  }

  describe('command structure', () => {
    it('creates command with correct name', () => {
      const cmd = createExplainCommand(() => mockContext, () => classifier);

      expect(cmd.name()).toBe('explain');
    });

    it('takes a variadic message argument', () => {
      const cmd = createExplainCommand(() => mockContext, () => classifier);
      const [arg] = cmd.registeredArguments;

      expect(cmd.registeredArguments).toHaveLength(1);
      expect(arg?.name()).toBe('message');
      expect(arg?.variadic).toBe(true);
      expect(arg?.required).toBe(true);
    });
  });

  describe('text output', () => {
    it('prints the rewritten message', async () => {
      await runExplain(["Resource group 'demo' could not be found."]);

      expect(logOutput).toEqual(['Resource not found: demo does not exist']);
    });

    it('joins a message passed as several words', async () => {
      await runExplain(['az', 'storage:', "'create'", 'is', 'not', 'in', 'the', "'az storage'", 'command', 'group']);

      expect(logOutput).toEqual(['Command not found: az storage create']);
    });

    it('prints unrecognized messages unchanged', async () => {
      await runExplain(['disk', 'full']);

      expect(logOutput).toEqual(['disk full']);
      expect(mockContext.debug).toHaveBeenCalledWith('No known error shape matched; message left as is');
    });

    it('prints a suggested fix for disallowed characters', async () => {
      await runExplain([CHARACTER_MESSAGE, '--invalid-value', 'my!group']);

      expect(logOutput).toEqual([
        'Character not allowed: !',
        `${chalk.dim('Try:')} ${chalk.cyan('--resource-group mygroup')}`,
      ]);
    });

    it('records the classification on the shared classifier', async () => {
      await runExplain(['error: argument --location: expected one argument']);

      expect(classifier.getLastError()?.kind.name).toBe('ValueRequired');
    });
  });

  describe('--plain', () => {
    beforeEach(() => {
      classifier = new ErrorClassifier({ style: 'ansi', painter: new Chalk({ level: 1 }) });
    });

    it('styles the rewrite by default', async () => {
      await runExplain(["Resource group 'demo' could not be found."]);

      expect(logOutput).toEqual([
        '\u001b[31m\u001b[1mResource not found\u001b[22m: demo does not exist\u001b[39m',
      ]);
    });

    it('prints the rewrite and the fix without ANSI codes', async () => {
      await runExplain([CHARACTER_MESSAGE, '--invalid-value', 'my!group', '--plain']);

      expect(logOutput).toEqual([
        'Character not allowed: !',
        'Try: --resource-group mygroup',
      ]);
    });

    it('records the unstyled message', async () => {
      await runExplain(['error: argument --location: expected one argument', '--plain']);

      expect(classifier.getLastError()?.message).toBe('Value Required: location');
    });
  });

  describe('JSON output', () => {
    it('describes a recognized error', async () => {
      const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      mockContext.options.json = true;

      await runExplain([CHARACTER_MESSAGE, '--invalid-value', 'my!group']);

      expect(logOutput).toEqual([]);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
        matched: true,
        message: 'Character not allowed: !',
        kind: 'CharacterNotAllowed',
        label: 'Character not allowed',
        overriddenMessage: CHARACTER_MESSAGE,
        suggestion: {
          suggestion: 'mygroup',
          correctionKind: 'InvalidArgument',
          parameter: '--resource-group',
        },
      });
    });

    it('reports matched=false for an unrecognized error', async () => {
      const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      mockContext.options.json = true;

      await runExplain(['disk full']);

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
        matched: false,
        message: 'disk full',
      });
    });
  });

  describe('validation', () => {
    it('rejects a blank message', async () => {
      await expect(runExplain(['   '])).rejects.toThrow(ValidationError);
    });
  });
});
