/**
 * Error Handlers
 *
 * One pure function per error kind. Each receives the named groups of the
 * kind's pattern match plus any metadata lifted off the raw error, and
 * returns a RewriteResult. Handlers never throw on odd input; they return
 * { type: 'none' } instead.
 */

import { SuggestedErrorCorrection } from './correction.js';
import type { HandlerInput, RewriteResult } from './types.js';

/**
 * A long flag such as --resource-group. Not matched when joined to another
 * alternative with "/", as in "--name/-n/--resource-group/-g".
 */
export const FLAG_PATTERN = /(?<!\/)--(?<flag>[a-z][A-Za-z-]*)/g;

const NO_REWRITE: RewriteResult = Object.freeze({ type: 'none' });

function rewriteTo(message: string): RewriteResult {
  return message ? { type: 'message', message } : NO_REWRITE;
}

/**
 * All flag names in a message, in order, without their leading dashes.
 */
export function extractFlags(message: string): string[] {
  const flags: string[] = [];
  for (const match of message.matchAll(FLAG_PATTERN)) {
    const flag = match.groups?.['flag'];
    if (flag) flags.push(flag);
  }
  return flags;
}

// ============================================================================
// RESOURCE NOT FOUND
// ============================================================================

export function handleResourceNotFound({ groups }: HandlerInput): RewriteResult {
  const name = groups['invalid_resource_name'];
  return name === undefined ? NO_REWRITE : rewriteTo(`${name} does not exist`);
}

// ============================================================================
// CHARACTER NOT ALLOWED
// ============================================================================

/**
 * Turn the allow-list pattern reported by a validator into one usable for
 * substring search. Validators often print class escapes with a doubled
 * backslash ("\\w"); those collapse to a single one. Anchors are dropped.
 */
export function normalizeReportedPattern(reported: string): string {
  let source = reported.replace(/\\\\(?=[wWdDsS])/g, '\\');
  if (source.startsWith('^')) source = source.slice(1);
  if (source.endsWith('$') && !source.endsWith('\\$')) source = source.slice(0, -1);
  return source;
}

// Validators report \w and \d with Unicode semantics
const WIDE_ESCAPES: Readonly<Record<string, string>> = {
  w: String.raw`[\p{L}\p{N}_]`,
  W: String.raw`[^\p{L}\p{N}_]`,
  d: String.raw`\p{Nd}`,
  D: String.raw`\P{Nd}`,
};

// Inside a character class; \W has no class-member form and stays as is
const WIDE_CLASS_ESCAPES: Readonly<Record<string, string>> = {
  w: String.raw`\p{L}\p{N}_`,
  d: String.raw`\p{Nd}`,
  D: String.raw`\P{Nd}`,
};

/**
 * Rewrite \w, \W, \d and \D as Unicode property escapes, for compiling
 * with the `u` flag.
 */
export function widenClassEscapes(source: string): string {
  let widened = '';
  let inClass = false;

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);
    if (ch === '\\') {
      const escaped = source.charAt(i + 1);
      const table = inClass ? WIDE_CLASS_ESCAPES : WIDE_ESCAPES;
      widened += table[escaped] ?? ch + escaped;
      i++;
      continue;
    }
    if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    widened += ch;
  }

  return widened;
}

function tryCompile(source: string, flags: string): RegExp | undefined {
  try {
    return new RegExp(source, flags);
  } catch {
    return undefined;
  }
}

/**
 * Compile with Unicode semantics, or as written when the pattern is not
 * valid under `u` (an identity escape such as \_, say).
 */
function compileAllowPattern(allowPattern: string): RegExp | undefined {
  return tryCompile(widenClassEscapes(allowPattern), 'gu') ?? tryCompile(allowPattern, 'g');
}

export interface InvalidCharacters {
  /** Distinct offending characters, in order of first appearance */
  invalid: string[];
  /** The value with every offending character removed */
  corrected: string;
}

/**
 * Work out which characters of `value` an allow-list pattern rejects.
 *
 * Every substring the pattern accepts is a valid fragment; whatever falls
 * between fragments is invalid. Returns undefined when the pattern does
 * not compile.
 */
export function findInvalidCharacters(
  value: string,
  allowPattern: string
): InvalidCharacters | undefined {
  const pattern = compileAllowPattern(allowPattern);
  if (!pattern) {
    return undefined;
  }

  let leftover = '';
  let cursor = 0;
  for (const fragment of value.matchAll(pattern)) {
    const start = fragment.index ?? cursor;
    leftover += value.slice(cursor, start);
    cursor = Math.max(cursor, start + fragment[0].length);
  }
  leftover += value.slice(cursor);

  const invalid = [...new Set(leftover)];
  const corrected = [...value].filter((ch) => !invalid.includes(ch)).join('');

  return { invalid, corrected };
}

export function handleCharacterNotAllowed({
  groups,
  metadata,
  parameterAliases,
}: HandlerInput): RewriteResult {
  const reported = groups['regex'];
  const parameter = groups['parameter'];
  const { invalidValue } = metadata;

  if (!reported || invalidValue === undefined) {
    return NO_REWRITE;
  }

  const result = findInvalidCharacters(invalidValue, normalizeReportedPattern(reported));
  if (!result || result.invalid.length === 0) {
    return NO_REWRITE;
  }

  return {
    type: 'correction',
    message: result.invalid.join(''),
    correction: new SuggestedErrorCorrection(
      result.corrected,
      'InvalidArgument',
      parameter,
      parameterAliases
    ),
  };
}

// ============================================================================
// COMMAND NOT FOUND
// ============================================================================

export function handleCommandNotFound({ groups }: HandlerInput): RewriteResult {
  const group = groups['command_group'];
  const subcommand = groups['subcommand'];
  if (group === undefined || subcommand === undefined) {
    return NO_REWRITE;
  }
  return rewriteTo(`${group} ${subcommand}`);
}

// ============================================================================
// ARGUMENT / VALUE REQUIRED
// ============================================================================

/**
 * "--resource-group/-g, --name/-n" becomes "resource-group and name".
 * Three or more flags are joined with " and " throughout.
 */
export function handleArgumentRequired({ message }: HandlerInput): RewriteResult {
  return rewriteTo(extractFlags(message).join(' and '));
}

export function handleValueRequired({ message }: HandlerInput): RewriteResult {
  const [first] = extractFlags(message);
  return first ? rewriteTo(first) : NO_REWRITE;
}
