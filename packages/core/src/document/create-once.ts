/**
 * Single-Flight Compilation
 */

import type { LanguageRegistry } from '../language/registry.js';
import type { ObservabilityCallbacks } from '../observability.js';
import { Executable } from '../runtime/executable.js';
import type { DelimiterPair } from '../segmenter/delimiters.js';
import type { DocumentSource } from './source.js';

export interface CreateOnceOptions {
  readonly registry: LanguageRegistry;
  /** Used when the descriptor tag maps to no registered extension */
  readonly defaultLanguageTag: string;
  readonly isTextWithScriptlets?: boolean | undefined;
  readonly prepare?: boolean | undefined;
  readonly exposedName?: string | undefined;
  readonly delimiters?: readonly DelimiterPair[] | undefined;
  readonly observability?: ObservabilityCallbacks | undefined;
  readonly clock?: (() => number) | undefined;
}

/**
 * Executable for a document, compiled at most once per descriptor.
 *
 * Compilation runs synchronously between obtaining the descriptor and the
 * set-if-absent, so overlapping callers all receive the stored winner.
 */
export async function createOnce(
  source: DocumentSource,
  documentName: string,
  options: CreateOnceOptions
): Promise<Executable> {
  const descriptor = await source.getDocument(documentName);
  const existing = descriptor.executable;
  if (existing) {
    return existing;
  }

  const executable = new Executable({
    documentName,
    sourceCode: descriptor.sourceText,
    registry: options.registry,
    defaultLanguageTag:
      options.registry.getLanguageTagByExtension(descriptor.tag) ??
      options.defaultLanguageTag,
    isTextWithScriptlets: options.isTextWithScriptlets,
    partition: source.getIdentifier(),
    documentTimestamp: descriptor.timestamp,
    documentSource: source,
    exposedName: options.exposedName,
    prepare: options.prepare,
    delimiters: options.delimiters,
    observability: options.observability,
    clock: options.clock,
  });
  return descriptor.setExecutableIfAbsent(executable);
}
