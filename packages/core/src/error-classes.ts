/**
 * Weft Error Classes and Factory
 * Structured error types with registry-based error codes and document stack frames
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// STACK FRAME
// ============================================================

/**
 * One entry of a document-level call stack.
 * Frames accumulate as an error crosses include and in-flow boundaries.
 */
export interface StackFrame {
  readonly documentName: string;
  readonly line: number;
  readonly column: number;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface WeftErrorData {
  readonly errorId: string;
  readonly message: string;
  /** Innermost frame first */
  readonly frames?: readonly StackFrame[] | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly cause?: unknown;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Weft errors.
 * Provides structured data for host applications to format as needed.
 */
export class WeftError extends Error {
  readonly errorId: string;
  readonly context: Record<string, unknown> | undefined;
  private readonly stackFrames: StackFrame[];

  constructor(data: WeftErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(
      data.message,
      data.cause === undefined ? undefined : { cause: data.cause }
    );
    this.name = 'WeftError';
    this.errorId = data.errorId;
    this.context = data.context;
    this.stackFrames = [...(data.frames ?? [])];
  }

  /** Document frames, innermost first */
  get frames(): readonly StackFrame[] {
    return this.stackFrames;
  }

  /** Append an enclosing frame (outermost frames come last) */
  pushFrame(frame: StackFrame): void {
    this.stackFrames.push(frame);
  }

  /** Get structured error data for custom formatting */
  toData(): WeftErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      frames: [...this.stackFrames],
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: WeftErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

function framesOf(frame: StackFrame | undefined): StackFrame[] {
  return frame ? [frame] : [];
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Segmentation and resolution errors; the executable is never cached */
export class ParsingError extends WeftError {
  constructor(
    errorId: string,
    message: string,
    frame?: StackFrame | undefined,
    context?: Record<string, unknown> | undefined,
    cause?: unknown
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, frames: framesOf(frame), context, cause });
    this.name = 'ParsingError';
  }
}

/** Errors raised while executing or entering an executable */
export class ExecutionError extends WeftError {
  constructor(
    errorId: string,
    message: string,
    frame?: StackFrame | undefined,
    context?: Record<string, unknown> | undefined,
    cause?: unknown
  ) {
    assertCategory(errorId, 'execution');
    super({ errorId, message, frames: framesOf(frame), context, cause });
    this.name = 'ExecutionError';
  }
}

/**
 * The adapter could not resolve a named entry point.
 * Callers may retry with a different name.
 */
export class EntryPointNotFoundError extends ExecutionError {
  readonly entryPointName: string;

  constructor(entryPointName: string, frame?: StackFrame | undefined) {
    const context = { entryPoint: entryPointName };
    super('WEFT-E003', renderTemplate('WEFT-E003', context), frame, context);
    this.name = 'EntryPointNotFoundError';
    this.entryPointName = entryPointName;
  }
}

/** Errors reading documents from a document source */
export class DocumentError extends WeftError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown> | undefined,
    cause?: unknown
  ) {
    assertCategory(errorId, 'document');
    super({ errorId, message, context, cause });
    this.name = 'DocumentError';
  }
}

/** No document with the requested name exists */
export class DocumentNotFoundError extends DocumentError {
  readonly documentName: string;

  constructor(documentName: string) {
    const context = { name: documentName };
    super('WEFT-D001', renderTemplate('WEFT-D001', context), context);
    this.name = 'DocumentNotFoundError';
    this.documentName = documentName;
  }
}

function renderTemplate(
  errorId: string,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the definition, renders its message template with context,
 * and creates the error class matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("WEFT-P002", { tag: "elvish" }, { documentName: "page", line: 3, column: 1 })
 * // Creates ParsingError: "Adapter not found: elvish"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  frame?: StackFrame | undefined
): WeftError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'parse':
      return new ParsingError(errorId, message, frame, context);
    case 'execution':
      if (errorId === 'WEFT-E003') {
        return new EntryPointNotFoundError(
          String(context['entryPoint'] ?? ''),
          frame
        );
      }
      return new ExecutionError(errorId, message, frame, context);
    case 'document':
      if (errorId === 'WEFT-D001') {
        return new DocumentNotFoundError(String(context['name'] ?? ''));
      }
      return new DocumentError(errorId, message, context);
  }
}

/** Document frames of an error, innermost first (empty for foreign errors) */
export function getStack(error: unknown): readonly StackFrame[] {
  return error instanceof WeftError ? error.frames : [];
}
