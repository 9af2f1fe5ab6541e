/**
 * Rendering of the "{label}: {message}" template.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { MessageStyle } from './types.js';

/**
 * Render a rewritten message. In ansi style the label is bold red and the
 * message red; stripping the escape codes always leaves "{label}: {message}".
 */
export function formatClassifiedMessage(
  label: string,
  message: string,
  style: MessageStyle = 'ansi',
  painter: ChalkInstance = chalk
): string {
  if (style === 'plain') {
    return `${label}: ${message}`;
  }
  return painter.red(`${painter.bold(label)}: ${message}`);
}
