/**
 * Classifier Types
 *
 * Shared types for the error kind registry, the per-kind handlers and
 * the ErrorClassifier that dispatches between them.
 */

import type { SuggestedErrorCorrection } from './correction.js';

// ============================================================================
// RAW INPUT
// ============================================================================

/**
 * Anything exposing a textual message. Error instances qualify, as do
 * plain objects thrown by other libraries.
 */
export interface ErrorLike {
  message: string;
  /** Value rejected by the host's validator (CharacterNotAllowed only) */
  _invalid_value?: unknown;
  invalidValue?: unknown;
  /** Positional arguments; element 0 mirrors the message */
  args?: unknown[];
}

/** Input accepted by the classifier */
export type RawError = string | ErrorLike;

/**
 * Out-of-band data the classifier lifts off an ErrorLike before
 * dispatching, so handlers never touch the raw object.
 */
export interface ErrorMetadata {
  invalidValue?: string;
}

// ============================================================================
// HANDLERS
// ============================================================================

/** Named capture groups of a pattern match */
export type MatchGroups = Readonly<Record<string, string | undefined>>;

export interface HandlerInput {
  groups: MatchGroups;
  /** The message the pattern was matched against */
  message: string;
  metadata: ErrorMetadata;
  /** Internal field name -> CLI flag, consulted before the built-in table */
  parameterAliases: Readonly<Record<string, string>>;
}

/**
 * Outcome of a handler.
 * - none: no confident rewrite for this occurrence
 * - message: rewritten text
 * - correction: rewritten text plus a suggested replacement value
 */
export type RewriteResult =
  | { type: 'none' }
  | { type: 'message'; message: string }
  | { type: 'correction'; message: string; correction: SuggestedErrorCorrection };

export type ErrorHandler = (input: HandlerInput) => RewriteResult;

// ============================================================================
// REGISTRY
// ============================================================================

export type ErrorKindName =
  | 'ResourceNotFound'
  | 'CharacterNotAllowed'
  | 'CommandNotFound'
  | 'ArgumentRequired'
  | 'ValueRequired';

export interface ErrorKind {
  readonly name: ErrorKindName;
  /** Human-readable category shown before the rewritten message */
  readonly label: string;
  readonly pattern: RegExp;
  readonly handler: ErrorHandler;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * What ends a scan over the registry.
 * - first-rewrite: a matched kind whose handler yields nothing is skipped
 * - first-match: the first matching kind ends the scan either way
 */
export type DispatchPolicy = 'first-rewrite' | 'first-match';

/** How the "{label}: {message}" template is rendered */
export type MessageStyle = 'ansi' | 'plain';

/**
 * Full record of one successful classification. The classifier keeps the
 * most recent one as its "last error".
 */
export interface ClassificationRecord {
  /** Final formatted message */
  message: string;
  /** Message before rewriting */
  overriddenMessage: string;
  suggestedFix?: SuggestedErrorCorrection;
  kind: ErrorKind;
  groups: MatchGroups;
  match: RegExpExecArray;
}

/**
 * Per-call result. The original input is carried untouched; `message` is
 * either the formatted rewrite or the original message.
 */
export type Classification<T extends RawError = RawError> =
  | { matched: false; original: T; message: string }
  | { matched: true; original: T; message: string; record: ClassificationRecord };
