/**
 * Execution Controller
 * Hooks a host wraps around a whole executable run
 */

import type { ExecutionContext } from './context.js';

/**
 * Called around execute() as a whole, not per segment. Skipped for
 * immutable (enterable) contexts. finalize runs on failure too.
 */
export interface ExecutionController {
  initialize?(context: ExecutionContext): void | Promise<void>;
  finalize?(context: ExecutionContext): void | Promise<void>;
}
