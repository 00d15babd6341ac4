/**
 * Language Adapter Contract
 * Capability surface a language engine provides to the engine core
 */

import type { ExecutionContext } from '../runtime/context.js';
import type { Executable } from '../runtime/executable.js';

/** Identification metadata of an adapter */
export interface LanguageAdapterInfo {
  /** Adapter name (e.g. "JavaScript (node:vm)") */
  readonly name: string;
  readonly version: string;
  /** Name of the language the adapter runs */
  readonly languageName: string;
  /** Tags a scriptlet may use to select this adapter */
  readonly tags: readonly string[];
  /** File extensions (without dot) associated with the language */
  readonly extensions: readonly string[];
  readonly defaultTag: string;
  readonly defaultExtension: string;
}

/** Options passed when a segment's source is turned into a program */
export interface ProgramOptions {
  readonly executable: Executable;
  readonly startLine: number;
  readonly startColumn: number;
}

/** A compiled unit of one language, run once per execution */
export interface Program {
  readonly sourceCode: string;
  /** Compile ahead of time; throws ParsingError on malformed source */
  prepare(): void;
  execute(context: ExecutionContext): void | Promise<void>;
}

export interface LanguageAdapter {
  readonly info: LanguageAdapterInfo;
  /** Adapters that are not thread-safe run under their registry mutex */
  readonly threadSafe: boolean;

  /** Code that writes the literal text to the context writer */
  getSourceCodeForLiteralOutput(literal: string, executable: Executable): string;
  /** Code that writes the expression's value to the context writer */
  getSourceCodeForExpressionOutput(
    expression: string,
    executable: Executable
  ): string;
  /** Code that includes the document named by the expression */
  getSourceCodeForExpressionInclude(
    expression: string,
    executable: Executable
  ): string;

  createProgram(sourceCode: string, options: ProgramOptions): Program;

  /**
   * Call a function defined during an earlier run in the same context.
   * Throws EntryPointNotFoundError for unresolved names.
   */
  enter?(
    entryPointName: string,
    executable: Executable,
    context: ExecutionContext,
    args: readonly unknown[]
  ): Promise<unknown>;

  /** Free adapter state tied to a context */
  releaseContext?(context: ExecutionContext): void;
}
