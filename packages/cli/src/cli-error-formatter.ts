/**
 * CLI Error Formatter
 * Format errors for human-readable or JSON output
 */

import { WeftError } from 'weft';
import type { StackFrame } from 'weft';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json';

/**
 * Format options for error output.
 */
export interface FormatOptions {
  readonly format: OutputFormat;
  /** Include the error context values (human format) */
  readonly verbose: boolean;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

function formatFrame(frame: StackFrame): string {
  return `  at ${frame.documentName}:${frame.line}:${frame.column}`;
}

/**
 * Format error in human-readable format.
 *
 * Output format:
 * ```
 * error[WEFT-P002]: Adapter not found: elvish
 *   at page.html:3:1
 * ```
 */
function formatErrorHuman(error: Error, options: FormatOptions): string {
  if (!(error instanceof WeftError)) {
    return `error: ${error.message}`;
  }

  const lines = [`error[${error.errorId}]: ${error.message}`];
  lines.push(...error.frames.map(formatFrame));

  if (options.verbose && error.context) {
    for (const [key, value] of Object.entries(error.context)) {
      lines.push(`  = ${key}: ${String(value)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format error as JSON.
 * Non-Weft errors carry only their message.
 */
function formatErrorJson(error: Error): string {
  if (!(error instanceof WeftError)) {
    return JSON.stringify({ message: error.message }, null, 2);
  }
  const data = error.toData();
  return JSON.stringify(
    {
      errorId: data.errorId,
      message: data.message,
      frames: data.frames ?? [],
      context: data.context ?? {},
    },
    null,
    2
  );
}

/**
 * Format an error for stderr.
 *
 * @throws {TypeError} Unknown format
 */
export function formatError(error: Error, options: FormatOptions): string {
  if (options.format !== 'human' && options.format !== 'json') {
    throw new TypeError(`Unknown format: ${String(options.format)}`);
  }

  if (options.format === 'json') {
    return formatErrorJson(error);
  }

  return formatErrorHuman(error, options);
}
