/**
 * Executable
 * Compiled document plus the execute / enterable / release state machine
 */

import type { DocumentSource } from '../document/source.js';
import {
  EntryPointNotFoundError,
  ExecutionError,
  ParsingError,
  WeftError,
} from '../error-classes.js';
import type { StackFrame } from '../error-classes.js';
import type { Program } from '../language/adapter.js';
import type { LanguageRegistry } from '../language/registry.js';
import type { ObservabilityCallbacks } from '../observability.js';
import { collapseSegments } from '../segmenter/collapser.js';
import { DEFAULT_DELIMITERS } from '../segmenter/delimiters.js';
import type { DelimiterPair } from '../segmenter/delimiters.js';
import { lowerSegments } from '../segmenter/lowering.js';
import { Segment } from '../segmenter/segment.js';
import { segmentDocument } from '../segmenter/segmenter.js';
import type { InFlowRequest } from '../segmenter/segmenter.js';
import type { RawSegment, SegmentData } from '../segmenter/types.js';
import type { ExecutionContext } from './context.js';
import type { ExecutionController } from './controller.js';
import { ExecutableService } from './services.js';
import type { ExecutableContainer } from './services.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Name under which the running executable's service is exposed */
export const DEFAULT_EXPOSED_NAME = 'executable';

/** Prefix of synthesized in-flow document names */
export const IN_FLOW_PREFIX = '_IN_FLOW_';

let inFlowCounter = 0;

// ============================================================
// TYPES
// ============================================================

export type ExecutableState = 'constructed' | 'executed' | 'enterable' | 'released';

export interface ExecutableOptions {
  readonly documentName: string;
  /** Name in the document source when it differs from documentName */
  readonly registeredName?: string | undefined;
  readonly sourceCode: string;
  readonly registry: LanguageRegistry;
  /** Language of untagged scriptlets and of pure source documents */
  readonly defaultLanguageTag: string;
  /** False compiles the whole source as one program (default true) */
  readonly isTextWithScriptlets?: boolean | undefined;
  /** Cache namespace, normally the document source identifier */
  readonly partition?: string | undefined;
  readonly documentTimestamp?: number | undefined;
  /** Where in-flow sub-documents are registered; without it in-flow scriptlets run inline */
  readonly documentSource?: DocumentSource | undefined;
  readonly exposedName?: string | undefined;
  /** Compile every program ahead of the first execution */
  readonly prepare?: boolean | undefined;
  readonly delimiters?: readonly DelimiterPair[] | undefined;
  readonly observability?: ObservabilityCallbacks | undefined;
  readonly clock?: (() => number) | undefined;
}

export interface ExecuteOptions {
  /** Skip the run when the executable has run before */
  readonly checkIfRanBefore?: boolean | undefined;
  /** Skip the run while the last run is younger than cacheDuration */
  readonly checkCache?: boolean | undefined;
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
// EXECUTABLE
// ============================================================

/**
 * A document compiled into segments. Construction throws ParsingError and
 * leaves nothing behind; a constructed executable can run any number of
 * times, each time with its own ExecutionContext.
 */
export class Executable {
  readonly documentName: string;
  readonly registeredName: string;
  readonly partition: string;
  readonly documentTimestamp: number;
  readonly exposedName: string;
  readonly delimiterStart: string;
  readonly delimiterEnd: string;
  readonly segments: readonly Segment[];
  /** Host state attached to the executable */
  readonly attributes = new Map<string, unknown>();
  /** Milliseconds a host may cache this executable's output */
  cacheDuration = 0;

  private readonly registry: LanguageRegistry;
  private readonly documentSource: DocumentSource | undefined;
  private readonly observability: ObservabilityCallbacks | undefined;
  private readonly clock: () => number;
  private readonly dependencySet = new Set<string>();
  private claimedContext: ExecutionContext | undefined;
  private currentState: ExecutableState = 'constructed';
  private completedExecutions = 0;
  private lastExecuted = 0;

  constructor(options: ExecutableOptions) {
    this.documentName = options.documentName;
    this.registeredName = options.registeredName ?? options.documentName;
    this.partition = options.partition ?? '';
    this.registry = options.registry;
    this.documentSource = options.documentSource;
    this.observability = options.observability;
    this.clock = options.clock ?? Date.now;
    this.documentTimestamp = options.documentTimestamp ?? this.clock();
    this.exposedName = options.exposedName ?? DEFAULT_EXPOSED_NAME;

    const started = performance.now();
    try {
      const { segments, delimiters } = this.segment(options);
      this.delimiterStart = delimiters.start;
      this.delimiterEnd = delimiters.end;
      this.segments = segments;
      for (const segment of segments) {
        if (segment.isProgram) {
          this.resolve(segment, options.prepare ?? false);
        }
      }
    } catch (error) {
      if (error instanceof Error) {
        this.observability?.onError?.({
          documentName: this.documentName,
          error,
        });
      }
      throw error;
    }

    this.observability?.onCompile?.({
      documentName: this.documentName,
      segmentCount: this.segments.length,
      durationMs: performance.now() - started,
    });
  }

  // ============================================================
  // COMPILATION
  // ============================================================

  private segment(options: ExecutableOptions): {
    segments: Segment[];
    delimiters: DelimiterPair;
  } {
    const pairs = options.delimiters ?? DEFAULT_DELIMITERS;
    let delimiters: DelimiterPair = pairs[0] ?? { start: '<%', end: '%>' };
    let raw: RawSegment[];

    if (options.isTextWithScriptlets ?? true) {
      const result = segmentDocument(options.sourceCode, {
        documentName: this.documentName,
        defaultLanguageTag: options.defaultLanguageTag,
        delimiters: pairs,
        inFlow: this.documentSource
          ? (request) => this.createInFlow(request, options)
          : undefined,
      });
      raw = result.segments;
      delimiters = result.delimiters ?? delimiters;
    } else {
      raw =
        options.sourceCode.length > 0
          ? [
              {
                kind: 'plain',
                sourceText: options.sourceCode,
                languageTag: options.defaultLanguageTag,
                startLine: 1,
                startColumn: 1,
              },
            ]
          : [];
    }

    const collapsed = collapseSegments(
      lowerSegments(raw, this.registry, this),
      this.registry,
      this
    );
    const data: SegmentData[] =
      collapsed.length > 0
        ? collapsed
        : [
            {
              sourceText: '',
              isProgram: false,
              languageTag: options.defaultLanguageTag,
              startLine: 1,
              startColumn: 1,
            },
          ];

    return {
      segments: data.map((segment, position) => new Segment(segment, position)),
      delimiters,
    };
  }

  private resolve(segment: Segment, prepare: boolean): void {
    const frame = this.frameOf(segment);
    const tag = segment.languageTag;
    const adapter = this.registry.getAdapter(tag);
    if (!adapter) {
      throw new ParsingError('WEFT-P002', `Adapter not found: ${tag}`, frame, {
        tag,
      });
    }

    let program: Program;
    try {
      program = adapter.createProgram(segment.sourceText, {
        executable: this,
        startLine: segment.startLine,
        startColumn: segment.startColumn,
      });
      if (prepare) {
        program.prepare();
      }
    } catch (error) {
      if (error instanceof ParsingError) {
        if (error.frames.length === 0) {
          error.pushFrame(frame);
        }
        throw error;
      }
      const reason = describeError(error);
      throw new ParsingError(
        'WEFT-P003',
        `Could not prepare ${tag} program: ${reason}`,
        frame,
        { tag, reason },
        error
      );
    }
    segment.setProgram(program);
  }

  /** Compile an in-flow body as its own document and register it */
  private createInFlow(
    request: InFlowRequest,
    options: ExecutableOptions
  ): string {
    const name = `${IN_FLOW_PREFIX}${inFlowCounter++}`;
    let executable: Executable;
    try {
      executable = new Executable({
        ...options,
        documentName: `${this.documentName}/${name}`,
        registeredName: name,
        sourceCode: request.sourceCode,
        defaultLanguageTag: request.languageTag,
        isTextWithScriptlets: true,
      });
    } catch (error) {
      if (error instanceof WeftError) {
        error.pushFrame({
          documentName: this.documentName,
          line: request.location.line,
          column: request.location.column,
        });
      }
      throw error;
    }
    this.documentSource?.setDocument(name, request.sourceCode, '', executable);
    this.dependencySet.add(name);
    return name;
  }

  private frameOf(segment: Segment): StackFrame {
    return {
      documentName: this.documentName,
      line: segment.startLine,
      column: segment.startColumn,
    };
  }

  // ============================================================
  // STATE
  // ============================================================

  get state(): ExecutableState {
    return this.currentState;
  }

  get executionCount(): number {
    return this.completedExecutions;
  }

  /** Completion time of the last successful run (0 before any) */
  get lastExecutedTimestamp(): number {
    return this.lastExecuted;
  }

  /** Time until which a host may serve cached output (0 when not cached) */
  get expiration(): number {
    return this.cacheDuration > 0 ? this.lastExecuted + this.cacheDuration : 0;
  }

  get enterableContext(): ExecutionContext | undefined {
    return this.claimedContext;
  }

  /** Names of documents this one was built from (in-flow sub-documents) */
  get dependencies(): ReadonlySet<string> {
    return this.dependencySet;
  }

  /** The document text when it has no scriptlets at all */
  get pureText(): string | undefined {
    const [first, ...rest] = this.segments;
    if (first && rest.length === 0 && !first.isProgram) {
      return first.sourceText;
    }
    return undefined;
  }

  // ============================================================
  // EXECUTION
  // ============================================================

  /**
   * Run every segment in order against the context.
   * Controller hooks wrap the run unless the context is immutable.
   *
   * @returns false when the options skipped the run
   */
  async execute(
    context: ExecutionContext,
    container?: ExecutableContainer,
    controller?: ExecutionController,
    options: ExecuteOptions = {}
  ): Promise<boolean> {
    if (this.completedExecutions > 0) {
      if (options.checkIfRanBefore) {
        return false;
      }
      if (
        options.checkCache &&
        this.clock() - this.lastExecuted < this.cacheDuration
      ) {
        return false;
      }
    }

    const started = performance.now();
    this.observability?.onExecuteStart?.({
      documentName: this.documentName,
      executionCount: this.completedExecutions,
    });

    const hooks = context.immutable ? undefined : controller;
    try {
      await hooks?.initialize?.(context);
      try {
        for (const segment of this.segments) {
          await this.executeSegment(segment, context, container);
        }
      } finally {
        await hooks?.finalize?.(context);
      }
    } catch (error) {
      if (error instanceof Error) {
        this.observability?.onError?.({
          documentName: this.documentName,
          error,
        });
      }
      throw error;
    }

    this.lastExecuted = this.clock();
    this.completedExecutions++;
    if (this.currentState === 'constructed') {
      this.currentState = 'executed';
    }
    this.observability?.onExecuteEnd?.({
      documentName: this.documentName,
      durationMs: performance.now() - started,
    });
    return true;
  }

  private async executeSegment(
    segment: Segment,
    context: ExecutionContext,
    container: ExecutableContainer | undefined
  ): Promise<void> {
    if (!segment.isProgram) {
      context.writer.write(segment.sourceText);
      return;
    }

    const program = segment.program;
    const entry = this.registry.getEntry(segment.languageTag);
    if (!program || !entry) {
      throw new ParsingError(
        'WEFT-P002',
        `Adapter not found: ${segment.languageTag}`,
        this.frameOf(segment),
        { tag: segment.languageTag }
      );
    }

    context.adapter = entry.adapter;
    const run = (): Promise<void> =>
      this.runProgram(program, segment, context, container);
    if (entry.adapter.threadSafe) {
      await run();
    } else {
      await entry.mutex.runExclusive(context, run);
    }
  }

  private async runProgram(
    program: Program,
    segment: Segment,
    context: ExecutionContext,
    container: ExecutableContainer | undefined
  ): Promise<void> {
    const swapService = !context.immutable;
    const hadPrevious = context.services.has(this.exposedName);
    const previous = context.services.get(this.exposedName);
    if (swapService) {
      context.services.set(
        this.exposedName,
        new ExecutableService(this, context, container)
      );
    }

    try {
      await program.execute(context);
    } catch (error) {
      throw this.normalizeError(error, this.frameOf(segment));
    } finally {
      if (swapService) {
        if (hadPrevious) {
          context.services.set(this.exposedName, previous);
        } else {
          context.services.delete(this.exposedName);
        }
      }
    }
  }

  private normalizeError(error: unknown, frame: StackFrame): WeftError {
    if (error instanceof WeftError) {
      error.pushFrame(frame);
      return error;
    }
    const reason = describeError(error);
    return new ExecutionError('WEFT-E001', reason, frame, { reason }, error);
  }

  // ============================================================
  // ENTERABLE CONTEXT
  // ============================================================

  /**
   * Execute once and claim the context for later enter() calls.
   * Returns false without running when a context is already claimed.
   */
  async makeEnterable(
    context: ExecutionContext,
    container?: ExecutableContainer,
    controller?: ExecutionController
  ): Promise<boolean> {
    if (this.claimedContext !== undefined) {
      return false;
    }

    await this.execute(context, container, controller);

    // Another caller may have claimed while this run was in flight
    if (this.claimedContext !== undefined) {
      return false;
    }
    this.claimedContext = context;
    context.immutable = true;
    this.currentState = 'enterable';
    return true;
  }

  /**
   * Call an entry point defined during the enterable run, through the
   * adapter that ran last in the claimed context.
   */
  async enter(entryPointName: string, ...args: unknown[]): Promise<unknown> {
    const context = this.claimedContext;
    if (!context) {
      throw new ExecutionError(
        'WEFT-E002',
        `Executable ${this.documentName} has no enterable context`,
        undefined,
        { name: this.documentName }
      );
    }

    const adapter = context.adapter;
    if (!adapter?.enter) {
      throw new EntryPointNotFoundError(entryPointName);
    }

    const enter = adapter.enter.bind(adapter);
    const call = (): Promise<unknown> =>
      enter(entryPointName, this, context, args);
    const entry = this.registry.getEntryForAdapter(adapter);

    try {
      if (adapter.threadSafe || !entry) {
        return await call();
      }
      return await entry.mutex.runExclusive(context, call);
    } catch (error) {
      if (error instanceof WeftError) {
        throw error;
      }
      const reason = describeError(error);
      throw new ExecutionError(
        'WEFT-E001',
        reason,
        undefined,
        { reason, entryPoint: entryPointName },
        error
      );
    }
  }

  /** Drop the claimed context and free adapter state tied to it. Idempotent. */
  release(): void {
    const context = this.claimedContext;
    if (!context) {
      return;
    }
    this.claimedContext = undefined;
    this.currentState = 'released';
    context.immutable = false;
    context.adapter?.releaseContext?.(context);
  }
}
