/**
 * Classifier Module
 *
 * Recognizes known CLI error shapes and rewrites them into short,
 * user-facing messages, optionally with a suggested corrected value.
 *
 * @example
 * ```typescript
 * const classifier = new ErrorClassifier({ style: 'plain' });
 * classifier.rewrite("Resource group 'demo' could not be found.");
 * // => 'Resource not found: demo does not exist'
 * ```
 */

export { ErrorClassifier, type ClassifierOptions, type ClassifyOptions } from './classifier.js';
export {
  ErrorKindRegistry,
  createErrorKindRegistry,
  defineErrorKind,
  isSameErrorKind,
} from './kinds.js';
export {
  SuggestedErrorCorrection,
  PARAMETER_FLAGS,
  normalizeParameter,
  type CorrectionKind,
} from './correction.js';
export {
  FLAG_PATTERN,
  extractFlags,
  findInvalidCharacters,
  normalizeReportedPattern,
  handleArgumentRequired,
  handleCharacterNotAllowed,
  handleCommandNotFound,
  handleResourceNotFound,
  handleValueRequired,
  type InvalidCharacters,
} from './handlers.js';
export { formatClassifiedMessage } from './format.js';
export type {
  Classification,
  ClassificationRecord,
  DispatchPolicy,
  ErrorHandler,
  ErrorKind,
  ErrorKindName,
  ErrorLike,
  ErrorMetadata,
  HandlerInput,
  MatchGroups,
  MessageStyle,
  RawError,
  RewriteResult,
} from './types.js';
