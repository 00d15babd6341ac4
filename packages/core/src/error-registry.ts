/**
 * Error Registry
 * Central error definition registry with message template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'parse' | 'execution' | 'document';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: WEFT-{category}{3-digit} (e.g., WEFT-P001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Parse Errors (WEFT-P0xx)
  {
    errorId: 'WEFT-P001',
    category: 'parse',
    description: 'Unterminated scriptlet',
    messageTemplate: 'Scriptlet missing closing delimiter {delimiter}',
    cause:
      'A scriptlet was opened with a start delimiter but the document ends before the matching end delimiter.',
    resolution:
      'Close the scriptlet with the end delimiter of the style the document uses (%> or ?>).',
  },
  {
    errorId: 'WEFT-P002',
    category: 'parse',
    description: 'Adapter not found',
    messageTemplate: 'Adapter not found: {tag}',
    cause:
      'A scriptlet names a language tag for which no adapter is registered.',
    resolution:
      'Register an adapter for the tag in the language registry, or fix the tag after the opening delimiter.',
  },
  {
    errorId: 'WEFT-P003',
    category: 'parse',
    description: 'Program preparation failed',
    messageTemplate: 'Could not prepare {tag} program: {reason}',
    cause: 'The language adapter rejected the scriptlet source code.',
    resolution: 'Fix the syntax of the scriptlet in the reported language.',
  },

  // Execution Errors (WEFT-E0xx)
  {
    errorId: 'WEFT-E001',
    category: 'execution',
    description: 'Program failed',
    messageTemplate: '{reason}',
    cause: 'A program raised an error while executing.',
    resolution: 'Inspect the stack frames to find the failing scriptlet.',
  },
  {
    errorId: 'WEFT-E002',
    category: 'execution',
    description: 'Executable not enterable',
    messageTemplate: 'Executable {name} has no enterable context',
    cause: 'enter() was called before makeEnterable() succeeded, or after release().',
    resolution: 'Call makeEnterable() with a context before entering.',
  },
  {
    errorId: 'WEFT-E003',
    category: 'execution',
    description: 'Entry point not found',
    messageTemplate: 'No such entry point: {entryPoint}',
    cause:
      'The adapter could not find a function, closure or method with the requested name.',
    resolution:
      'Define the entry point in the document, or call a different name.',
  },
  {
    errorId: 'WEFT-E004',
    category: 'execution',
    description: 'Include not supported',
    messageTemplate: 'Container does not support {operation}',
    cause:
      'A program asked to include or execute a document but the executable runs without a document container.',
    resolution:
      'Pass a DocumentService (or another container with include/execute) to execute().',
  },

  // Document Errors (WEFT-D0xx)
  {
    errorId: 'WEFT-D001',
    category: 'document',
    description: 'Document not found',
    messageTemplate: 'Document not found: {name}',
    cause: 'No document with this name exists in the document source.',
    resolution: 'Check the document name and the base path of the source.',
  },
  {
    errorId: 'WEFT-D002',
    category: 'document',
    description: 'Document read failure',
    messageTemplate: 'Could not read document {name}: {reason}',
    cause: 'The backing file exists but could not be read.',
    resolution: 'Check file permissions and encoding.',
  },
];

/** Global error registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} tokens with context values.
 *
 * Missing placeholders render as empty strings. Non-string values are
 * coerced with String(). An unclosed brace returns the template unchanged.
 *
 * @example
 * renderMessage("Adapter not found: {tag}", { tag: "elvish" })
 * // Returns: "Adapter not found: elvish"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{' && template[i + 1] !== '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace - return template unchanged
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
