/**
 * errlens - library entry point
 *
 * Host CLIs build one ErrorClassifier at startup and pass every error
 * through it before display:
 *
 * ```typescript
 * import { ErrorClassifier, consoleLogger } from 'errlens';
 *
 * const classifier = new ErrorClassifier({ logger: consoleLogger });
 * try {
 *   run();
 * } catch (error) {
 *   if (error instanceof Error) console.error(classifier.rewrite(error).message);
 * }
 * ```
 */

export * from './classifier/index.js';
export {
  CLIError,
  ConfigError,
  ValidationError,
  ContractError,
  formatError,
  getExitCode,
} from './errors/index.js';
export { loadConfig, DEFAULT_CONFIG, type Config } from './config/index.js';
export { consoleLogger, silentLogger, formatTable, type Logger } from './utils/index.js';
