/**
 * Weft Module
 * Exports the segmenter, executables, document sources and bundled adapters
 */

export { VERSION } from './version.js';
export type { SourceLocation } from './source-location.js';

// ============================================================
// SEGMENTATION
// ============================================================
export {
  DEFAULT_DELIMITERS,
  SHORTHAND,
  Segment,
  collapseSegments,
  detectDelimiters,
  foldLiterals,
  lowerSegments,
  mergeAdjacent,
  segmentDocument,
} from './segmenter/index.js';
export type {
  DelimiterPair,
  InFlowRequest,
  RawSegment,
  ScriptletKind,
  SegmentData,
  SegmenterOptions,
  SegmenterResult,
} from './segmenter/index.js';

// ============================================================
// LANGUAGES
// ============================================================
export {
  HandlebarsAdapter,
  JavaScriptAdapter,
  LanguageRegistry,
  Mutex,
  wrapSource,
} from './language/index.js';
export type {
  LanguageAdapter,
  LanguageAdapterInfo,
  LanguageEntry,
  Program,
  ProgramOptions,
} from './language/index.js';

// ============================================================
// RUNTIME
// ============================================================
export {
  DEFAULT_EXPOSED_NAME,
  DocumentService,
  EXECUTED_DOCUMENTS_ATTRIBUTE,
  Executable,
  ExecutableService,
  ExecutionContext,
  IN_FLOW_PREFIX,
  StringWriter,
  createStreamWriter,
} from './runtime/index.js';
export type {
  DocumentServiceOptions,
  ExecutableContainer,
  ExecutableOptions,
  ExecutableState,
  ExecuteOptions,
  ExecutionContextOptions,
  ExecutionController,
  Writer,
} from './runtime/index.js';

// ============================================================
// DOCUMENTS
// ============================================================
export {
  AtomicMap,
  DEFAULT_DOCUMENT_NAME,
  DEFAULT_MINIMUM_TIME_BETWEEN_VALIDITY_CHECKS,
  DocumentDescriptor,
  DocumentFileSource,
  InMemoryDocumentSource,
  createOnce,
} from './document/index.js';
export type {
  CreateOnceOptions,
  DocumentDescriptorInit,
  DocumentFileSourceOptions,
  DocumentSource,
  InMemoryDocumentSourceOptions,
  Validity,
  ValidityOptions,
} from './document/index.js';

// ============================================================
// OBSERVABILITY
// ============================================================
export type {
  CompileEvent,
  ErrorEvent,
  EvictEvent,
  ExecuteEndEvent,
  ExecuteStartEvent,
  ObservabilityCallbacks,
} from './observability.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export { ERROR_REGISTRY, renderMessage } from './error-registry.js';
export type {
  ErrorCategory,
  ErrorDefinition,
  ErrorRegistry,
} from './error-registry.js';
export {
  DocumentError,
  DocumentNotFoundError,
  EntryPointNotFoundError,
  ExecutionError,
  ParsingError,
  WeftError,
  createError,
  getStack,
} from './error-classes.js';
export type { StackFrame, WeftErrorData } from './error-classes.js';
