/**
 * Observability Types
 *
 * Callbacks hosts pass to watch compilation, execution and cache eviction.
 * The core never writes to the console itself.
 */

/** Observability callbacks for monitoring documents and executables */
export interface ObservabilityCallbacks {
  /** Called after a document compiled into an executable */
  onCompile?: (event: CompileEvent) => void;
  /** Called before an executable runs */
  onExecuteStart?: (event: ExecuteStartEvent) => void;
  /** Called after an executable ran successfully */
  onExecuteEnd?: (event: ExecuteEndEvent) => void;
  /** Called when compiling or running fails */
  onError?: (event: ErrorEvent) => void;
  /** Called when a document source drops a cached descriptor */
  onEvict?: (event: EvictEvent) => void;
}

/** Event emitted after compilation */
export interface CompileEvent {
  documentName: string;
  /** Segments after collapsing */
  segmentCount: number;
  durationMs: number;
}

/** Event emitted before execution */
export interface ExecuteStartEvent {
  documentName: string;
  /** Completed executions before this one */
  executionCount: number;
}

/** Event emitted after execution */
export interface ExecuteEndEvent {
  documentName: string;
  durationMs: number;
}

/** Event emitted on failure */
export interface ErrorEvent {
  documentName: string;
  error: Error;
}

/** Event emitted on eviction */
export interface EvictEvent {
  documentName: string;
  reason: 'invalid' | 'replaced';
}
