/**
 * CLI Shared Utilities
 * Verbose logging and flag detection for weft-exec
 */

import { VERSION } from 'weft';
import type { ObservabilityCallbacks } from 'weft';

/**
 * Observability callbacks that log one line per event.
 * Used for --verbose; lines go to the given sink (stderr in main()).
 */
export function createVerboseObservability(
  log: (line: string) => void
): ObservabilityCallbacks {
  return {
    onCompile: (event) =>
      log(
        `[weft] compiled ${event.documentName} (${event.segmentCount} segments, ${event.durationMs.toFixed(1)}ms)`
      ),
    onExecuteStart: (event) =>
      log(
        `[weft] executing ${event.documentName} (run ${event.executionCount + 1})`
      ),
    onExecuteEnd: (event) =>
      log(
        `[weft] executed ${event.documentName} in ${event.durationMs.toFixed(1)}ms`
      ),
    onError: (event) =>
      log(`[weft] error in ${event.documentName}: ${event.error.message}`),
    onEvict: (event) =>
      log(`[weft] evicted ${event.documentName} (${event.reason})`),
  };
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 * @returns Object with mode if flag found, null otherwise
 */
export function detectHelpVersionFlag(
  argv: string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

export { VERSION };
