/**
 * JavaScript Adapter
 * Runs scriptlets in one node:vm context per execution context
 */

import { Script, createContext } from 'node:vm';
import type { Context } from 'node:vm';

import {
  EntryPointNotFoundError,
  ParsingError,
} from '../../error-classes.js';
import type { ExecutionContext } from '../../runtime/context.js';
import type { Executable } from '../../runtime/executable.js';
import type {
  LanguageAdapter,
  LanguageAdapterInfo,
  Program,
  ProgramOptions,
} from '../adapter.js';

const FUNCTION_DECLARATION =
  /^[ \t]*(?:async[ \t]+)?function[ \t]*\*?[ \t]*([A-Za-z_$][\w$]*)/gm;

/**
 * Wrap program source in an async function so scriptlets can await.
 * Top-level function declarations are published on the context's global
 * object so enter() can find them after the run.
 */
export function wrapSource(sourceCode: string): string {
  const publish = [...sourceCode.matchAll(FUNCTION_DECLARATION)]
    .map((match) => match[1])
    .filter((name): name is string => name !== undefined)
    .map(
      (name) =>
        `if (typeof ${name} === 'function') globalThis.${name} = ${name};`
    )
    .join(' ');
  return `(async function () { ${publish}${sourceCode}\n}).call(globalThis);`;
}

function describeError(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}

// ============================================================
// PROGRAM
// ============================================================

class JavaScriptProgram implements Program {
  private script: Script | undefined;

  constructor(
    readonly sourceCode: string,
    private readonly adapter: JavaScriptAdapter,
    private readonly options: ProgramOptions
  ) {}

  prepare(): void {
    this.compile();
  }

  async execute(context: ExecutionContext): Promise<void> {
    const script = this.compile();
    const sandbox = this.adapter.getSandbox(context);
    // Services are read on access: nested runs swap them mid-program
    for (const name of context.services.keys()) {
      Object.defineProperty(sandbox, name, {
        get: (): unknown => context.services.get(name),
        configurable: true,
        enumerable: true,
      });
    }
    for (const [name, value] of context.exposedVariables) {
      Object.defineProperty(sandbox, name, {
        value,
        writable: true,
        configurable: true,
        enumerable: true,
      });
    }
    const completion: unknown = script.runInContext(sandbox);
    await completion;
  }

  private compile(): Script {
    if (this.script) {
      return this.script;
    }
    try {
      this.script = new Script(wrapSource(this.sourceCode), {
        filename: this.options.executable.documentName,
        lineOffset: this.options.startLine - 1,
      });
    } catch (error) {
      const reason = describeError(error);
      throw new ParsingError(
        'WEFT-P003',
        `Could not prepare javascript program: ${reason}`,
        undefined,
        { tag: 'javascript', reason },
        error
      );
    }
    return this.script;
  }
}

// ============================================================
// ADAPTER
// ============================================================

export class JavaScriptAdapter implements LanguageAdapter {
  readonly info: LanguageAdapterInfo = {
    name: 'JavaScript (node:vm)',
    version: process.versions.v8,
    languageName: 'JavaScript',
    tags: ['javascript', 'js'],
    extensions: ['js'],
    defaultTag: 'javascript',
    defaultExtension: 'js',
  };

  readonly threadSafe = true;

  private readonly sandboxes = new WeakMap<ExecutionContext, Context>();

  getSourceCodeForLiteralOutput(literal: string): string {
    return `print(${JSON.stringify(literal)});`;
  }

  getSourceCodeForExpressionOutput(expression: string): string {
    return `print(${expression});`;
  }

  getSourceCodeForExpressionInclude(
    expression: string,
    executable: Executable
  ): string {
    return `await ${executable.exposedName}.include(${expression});`;
  }

  createProgram(sourceCode: string, options: ProgramOptions): Program {
    return new JavaScriptProgram(sourceCode, this, options);
  }

  async enter(
    entryPointName: string,
    _executable: Executable,
    context: ExecutionContext,
    args: readonly unknown[]
  ): Promise<unknown> {
    const sandbox = this.sandboxes.get(context);
    const entryPoint: unknown = sandbox?.[entryPointName];
    if (typeof entryPoint !== 'function') {
      throw new EntryPointNotFoundError(entryPointName);
    }
    const result: unknown = await Reflect.apply(entryPoint, sandbox, args);
    return result;
  }

  releaseContext(context: ExecutionContext): void {
    this.sandboxes.delete(context);
  }

  /** Global object shared by every program run with this context */
  getSandbox(context: ExecutionContext): Context {
    const existing = this.sandboxes.get(context);
    if (existing) {
      return existing;
    }
    const sandbox = createContext({
      print: (value: unknown): void => {
        context.writer.write(String(value));
      },
      println: (value: unknown = ''): void => {
        context.writer.write(`${String(value)}\n`);
      },
    });
    this.sandboxes.set(context, sandbox);
    return sandbox;
  }
}
