/**
 * Document Source Contract
 */

import type { Executable } from '../runtime/executable.js';
import type { DocumentDescriptor } from './descriptor.js';

/** Cache of documents by name, namespaced by its identifier */
export interface DocumentSource {
  /**
   * Valid descriptor for a name; invalid cached descriptors are evicted
   * and rebuilt. Throws DocumentNotFoundError for unknown names.
   */
  getDocument(documentName: string): Promise<DocumentDescriptor>;

  /** Register an in-memory document, returning the descriptor it replaced */
  setDocument(
    documentName: string,
    sourceText: string,
    tag: string,
    executable?: Executable
  ): DocumentDescriptor | undefined;

  /** Register an in-memory document unless the name is taken; returns the mapped descriptor */
  setDocumentIfAbsent(
    documentName: string,
    sourceText: string,
    tag: string,
    executable?: Executable
  ): DocumentDescriptor;

  /** Descriptors for every document the source can provide */
  getDocuments(): Promise<DocumentDescriptor[]>;

  /** Namespace of this source; used as the executables' partition */
  getIdentifier(): string;

  /** Descriptor already in the cache, without validity checks */
  getCachedDocument(documentName: string): DocumentDescriptor | undefined;
}
