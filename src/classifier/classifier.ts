/**
 * Error Classifier
 *
 * Takes a raw error (a string or anything with a message), finds the first
 * registered kind that can rewrite it, and renders "{label}: {message}".
 *
 * One classifier is meant to be built by the host program and handed to
 * every call site. Each call returns its own ClassificationRecord; the
 * classifier also keeps the most recent one (getLastError), which is a
 * single shared slot: the last writer wins.
 */

import type { ChalkInstance } from 'chalk';
import { ContractError, describeType } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { formatClassifiedMessage } from './format.js';
import { createErrorKindRegistry, type ErrorKindRegistry } from './kinds.js';
import type {
  Classification,
  ClassificationRecord,
  DispatchPolicy,
  ErrorLike,
  ErrorMetadata,
  MessageStyle,
  RawError,
} from './types.js';

export interface ClassifierOptions {
  /** Kinds to try, in order (default: createErrorKindRegistry()) */
  registry?: ErrorKindRegistry;
  /** Default: 'first-rewrite' */
  dispatch?: DispatchPolicy;
  /** Default: 'ansi' */
  style?: MessageStyle;
  /** Chalk instance used for ansi style (default: the global one) */
  painter?: ChalkInstance;
  /** Extra internal-name -> flag mappings for suggested corrections */
  parameterAliases?: Readonly<Record<string, string>>;
  logger?: Logger;
}

export interface ClassifyOptions {
  /** Overrides the classifier's style for this call */
  style?: MessageStyle;
}

/**
 * Read the message off a raw error, rejecting anything that is neither a
 * string nor message-bearing.
 */
function readMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message || String(error);
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  throw new ContractError(
    `expected error to be of type string or Error, got ${describeType(error)}`
  );
}

function readMetadata(error: RawError): ErrorMetadata {
  if (typeof error === 'string') {
    return {};
  }
  const value = error._invalid_value ?? error.invalidValue;
  return typeof value === 'string' ? { invalidValue: value } : {};
}

export class ErrorClassifier {
  private readonly registry: ErrorKindRegistry;
  private readonly dispatch: DispatchPolicy;
  private readonly style: MessageStyle;
  private readonly painter?: ChalkInstance;
  private readonly parameterAliases: Readonly<Record<string, string>>;
  private readonly logger: Logger;
  private lastError?: ClassificationRecord;

  constructor(options: ClassifierOptions = {}) {
    this.registry = options.registry ?? createErrorKindRegistry();
    this.dispatch = options.dispatch ?? 'first-rewrite';
    this.style = options.style ?? 'ansi';
    this.painter = options.painter;
    this.parameterAliases = options.parameterAliases ?? {};
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * The most recent successful classification, or undefined before the
   * first one.
   */
  getLastError(): ClassificationRecord | undefined {
    return this.lastError;
  }

  /**
   * Classify an error without touching it.
   *
   * @throws ContractError when `error` is not a string or message-bearing object
   */
  classify<T extends RawError>(error: T, options: ClassifyOptions = {}): Classification<T> {
    const overriddenMessage = readMessage(error);
    const metadata = readMetadata(error);
    this.logger.debug?.(`Classifying error: ${overriddenMessage}`);

    for (const kind of this.registry) {
      const match = kind.pattern.exec(overriddenMessage);
      if (!match) {
        continue;
      }

      const groups = Object.freeze({ ...match.groups });
      const result = kind.handler({
        groups,
        message: overriddenMessage,
        metadata,
        parameterAliases: this.parameterAliases,
      });

      if (result.type === 'none') {
        this.logger.debug?.(`${kind.name} matched but produced no rewrite`);
        if (this.dispatch === 'first-match') {
          break;
        }
        continue;
      }

      const message = formatClassifiedMessage(
        kind.label,
        result.message,
        options.style ?? this.style,
        this.painter
      );
      const record: ClassificationRecord = {
        message,
        overriddenMessage,
        suggestedFix: result.type === 'correction' ? result.correction : undefined,
        kind,
        groups,
        match,
      };

      this.logger.debug?.(`Classified as ${kind.name}`);
      this.lastError = record;
      return { matched: true, original: error, message, record };
    }

    return { matched: false, original: error, message: overriddenMessage };
  }

  /**
   * Classify and hand back the same shape: a string becomes the formatted
   * string; an error-like object gets its message (and args[0]) replaced
   * in place and is returned. Unmatched input comes back untouched.
   */
  rewrite(error: string): string;
  rewrite<T extends ErrorLike>(error: T): T;
  rewrite(error: RawError): RawError {
    const result = this.classify(error);
    if (!result.matched) {
      return error;
    }
    if (typeof error === 'string') {
      return result.message;
    }

    error.message = result.message;
    if (Array.isArray(error.args)) {
      error.args = [result.message, ...error.args.slice(1)];
    }
    return error;
  }
}
