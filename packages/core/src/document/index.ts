/**
 * Documents
 * Descriptors, sources and single-flight compilation
 */

export { AtomicMap } from './atomic-map.js';
export { createOnce } from './create-once.js';
export type { CreateOnceOptions } from './create-once.js';
export { DocumentDescriptor } from './descriptor.js';
export type {
  DocumentDescriptorInit,
  Validity,
  ValidityOptions,
} from './descriptor.js';
export {
  DEFAULT_DOCUMENT_NAME,
  DEFAULT_MINIMUM_TIME_BETWEEN_VALIDITY_CHECKS,
  DocumentFileSource,
} from './file-source.js';
export type { DocumentFileSourceOptions } from './file-source.js';
export { InMemoryDocumentSource } from './memory-source.js';
export type { InMemoryDocumentSourceOptions } from './memory-source.js';
export type { DocumentSource } from './source.js';
