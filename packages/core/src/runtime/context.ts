/**
 * Execution Context
 * Per-call state handed to every program an executable runs
 */

import type { LanguageAdapter } from '../language/adapter.js';

// ============================================================
// WRITERS
// ============================================================

/** Text sink programs write output to */
export interface Writer {
  write(text: string): void;
}

/** Writer that collects output in memory */
export class StringWriter implements Writer {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/** Writer over a Node.js writable stream (stdout, a file stream) */
export function createStreamWriter(stream: NodeJS.WritableStream): Writer {
  return {
    write(text: string): void {
      stream.write(text);
    },
  };
}

// ============================================================
// EXECUTION CONTEXT
// ============================================================

export interface ExecutionContextOptions {
  readonly writer?: Writer | undefined;
  readonly errorWriter?: Writer | undefined;
  readonly exposedVariables?: Record<string, unknown> | undefined;
  readonly services?: Record<string, unknown> | undefined;
}

/**
 * Mutable state for one run. A context must not be used by two runs at
 * the same time; after makeEnterable() it belongs to one executable until
 * that executable is released.
 */
export class ExecutionContext {
  writer: Writer;
  errorWriter: Writer;
  /** Values made visible to programs under their names */
  readonly exposedVariables: Map<string, unknown>;
  /** Services visible to programs; the running executable installs one */
  readonly services: Map<string, unknown>;
  /** Adapter-private and host state */
  readonly attributes = new Map<string, unknown>();
  /** Adapter of the most recently started program */
  adapter: LanguageAdapter | undefined;
  /** Set once the context is claimed as an enterable context */
  immutable = false;

  constructor(options: ExecutionContextOptions = {}) {
    this.writer = options.writer ?? new StringWriter();
    this.errorWriter = options.errorWriter ?? new StringWriter();
    this.exposedVariables = new Map(
      Object.entries(options.exposedVariables ?? {})
    );
    this.services = new Map(Object.entries(options.services ?? {}));
  }
}
