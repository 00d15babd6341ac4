/**
 * Language Registry and Adapters
 */

export type {
  LanguageAdapter,
  LanguageAdapterInfo,
  Program,
  ProgramOptions,
} from './adapter.js';
export { LanguageRegistry } from './registry.js';
export type { LanguageEntry } from './registry.js';
export { Mutex } from './mutex.js';
export { HandlebarsAdapter, JavaScriptAdapter, wrapSource } from './adapters/index.js';
