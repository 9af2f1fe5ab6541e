/**
 * Error Kind Registry
 *
 * The fixed, ordered set of error shapes the classifier recognizes. Order
 * is dispatch priority: the first kind whose pattern matches is tried
 * first.
 */

import { ContractError, describeType } from '../errors/index.js';
import {
  handleArgumentRequired,
  handleCharacterNotAllowed,
  handleCommandNotFound,
  handleResourceNotFound,
  handleValueRequired,
} from './handlers.js';
import type { ErrorHandler, ErrorKind, ErrorKindName } from './types.js';

/**
 * Build a frozen ErrorKind, failing fast on a bad label or pattern.
 */
export function defineErrorKind(
  name: ErrorKindName,
  label: unknown,
  pattern: unknown,
  handler: ErrorHandler
): ErrorKind {
  if (typeof label !== 'string') {
    throw new ContractError(`expected label to be of type string, got ${describeType(label)}`);
  }
  if (label.trim() === '') {
    throw new ContractError(`expected label of ${name} to be non-empty`);
  }

  let compiled: RegExp;
  if (pattern instanceof RegExp) {
    compiled = pattern;
  } else if (typeof pattern === 'string') {
    try {
      compiled = new RegExp(pattern);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ContractError(`pattern of ${name} does not compile: ${reason}`);
    }
  } else {
    throw new ContractError(
      `expected pattern to be of type string or RegExp, got ${describeType(pattern)}`
    );
  }

  // A sticky or global pattern would carry lastIndex between calls
  if (compiled.global || compiled.sticky) {
    compiled = new RegExp(compiled.source, compiled.flags.replace(/[gy]/g, ''));
  }

  return Object.freeze({ name, label, pattern: compiled, handler });
}

/**
 * Kinds are equal when their label and pattern are, whatever their name.
 */
export function isSameErrorKind(a: ErrorKind, b: ErrorKind): boolean {
  return (
    a.label === b.label &&
    a.pattern.source === b.pattern.source &&
    a.pattern.flags === b.pattern.flags
  );
}

export class ErrorKindRegistry implements Iterable<ErrorKind> {
  private readonly kinds: readonly ErrorKind[];

  constructor(kinds: readonly ErrorKind[]) {
    this.kinds = Object.freeze([...kinds]);
  }

  get size(): number {
    return this.kinds.length;
  }

  [Symbol.iterator](): Iterator<ErrorKind> {
    return this.kinds[Symbol.iterator]();
  }

  find(name: ErrorKindName): ErrorKind | undefined {
    return this.kinds.find((kind) => kind.name === name);
  }

  toArray(): readonly ErrorKind[] {
    return this.kinds;
  }
}

/**
 * Build the default registry in dispatch order.
 */
export function createErrorKindRegistry(): ErrorKindRegistry {
  return new ErrorKindRegistry([
    defineErrorKind(
      'ResourceNotFound',
      'Resource not found',
      String.raw`(?<resource_type>[A-Za-z\s]+)\s+'(?<invalid_resource_name>.*)'\s+(?:not found|could not be found)`,
      handleResourceNotFound
    ),
    defineErrorKind(
      'CharacterNotAllowed',
      'Character not allowed',
      String.raw`[Pp]arameter\s+'(?<parameter>.*)'\s+.*pattern[:\s]+'(?<regex>.*)'`,
      handleCharacterNotAllowed
    ),
    defineErrorKind(
      'CommandNotFound',
      'Command not found',
      String.raw`(['"])(?<subcommand>.*)\1 is not in the \1(?<command_group>az\s.*)\1 command group`,
      handleCommandNotFound
    ),
    defineErrorKind(
      'ArgumentRequired',
      'Argument required',
      'the following arguments are required',
      handleArgumentRequired
    ),
    defineErrorKind(
      'ValueRequired',
      'Value Required',
      String.raw`expected (at least)?\s?one argument`,
      handleValueRequired
    ),
  ]);
}
