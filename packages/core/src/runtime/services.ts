/**
 * Executable Service
 * The handle a running program receives under the exposed name
 */

import { ExecutionError } from '../error-classes.js';
import type { ExecutionContext } from './context.js';
import type { Executable } from './executable.js';

/**
 * Host object that can run other documents on behalf of a program.
 * DocumentService is the bundled implementation.
 */
export interface ExecutableContainer {
  /** Run a text-with-scriptlets document, writing into the same context */
  include(documentName: string, context: ExecutionContext): Promise<void>;
  /** Run a document of pure source code */
  execute?(documentName: string, context: ExecutionContext): Promise<void>;
}

function notSupported(operation: string): ExecutionError {
  return new ExecutionError(
    'WEFT-E004',
    `Container does not support ${operation}`,
    undefined,
    { operation }
  );
}

/**
 * Installed in context.services while an executable runs, then replaced
 * by whatever was there before.
 */
export class ExecutableService {
  constructor(
    readonly executable: Executable,
    readonly context: ExecutionContext,
    readonly container: ExecutableContainer | undefined
  ) {}

  get documentName(): string {
    return this.executable.documentName;
  }

  /** Include another document at this point of the output */
  async include(documentName: string): Promise<void> {
    if (!this.container) {
      throw notSupported('include');
    }
    await this.container.include(String(documentName), this.context);
  }

  /** Run a document of pure source code */
  async execute(documentName: string): Promise<void> {
    if (!this.container?.execute) {
      throw notSupported('execute');
    }
    await this.container.execute(String(documentName), this.context);
  }
}
