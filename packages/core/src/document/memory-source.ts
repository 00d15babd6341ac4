/**
 * In-Memory Document Source
 * Documents registered directly with their text
 */

import { DocumentNotFoundError } from '../error-classes.js';
import type { ObservabilityCallbacks } from '../observability.js';
import type { Executable } from '../runtime/executable.js';
import { AtomicMap } from './atomic-map.js';
import {
  DocumentDescriptor,
  inFlowDependencies,
  invalidateDependents,
} from './descriptor.js';
import type { ValidityOptions } from './descriptor.js';
import type { DocumentSource } from './source.js';

export interface InMemoryDocumentSourceOptions {
  readonly identifier?: string | undefined;
  readonly clock?: (() => number) | undefined;
  readonly observability?: ObservabilityCallbacks | undefined;
}

/**
 * Source holding only registered documents. Its descriptors stay valid
 * unless one of their dependencies turns invalid, in which case the
 * document is registered again from its text without the executable.
 */
export class InMemoryDocumentSource implements DocumentSource {
  private readonly identifier: string;
  private readonly clock: () => number;
  private readonly observability: ObservabilityCallbacks | undefined;
  private readonly documents = new AtomicMap<string, DocumentDescriptor>();
  private readonly validityOptions: ValidityOptions;

  constructor(options: InMemoryDocumentSourceOptions = {}) {
    this.identifier = options.identifier ?? 'memory';
    this.clock = options.clock ?? Date.now;
    this.observability = options.observability;
    this.validityOptions = {
      lookup: (name) => this.documents.get(name),
      minimumTimeBetweenValidityChecks: -1,
      clock: this.clock,
    };
  }

  async getDocument(documentName: string): Promise<DocumentDescriptor> {
    const descriptor = this.documents.get(documentName);
    if (!descriptor) {
      throw new DocumentNotFoundError(documentName);
    }
    if (await descriptor.isValid()) {
      return descriptor;
    }

    this.observability?.onEvict?.({ documentName, reason: 'invalid' });
    this.dropInFlowDocuments(descriptor);
    const fresh = this.createDescriptor(
      documentName,
      descriptor.sourceText,
      descriptor.tag,
      undefined
    );
    if (this.documents.get(documentName) === descriptor) {
      this.documents.set(documentName, fresh);
    }
    return this.documents.get(documentName) ?? fresh;
  }

  setDocument(
    documentName: string,
    sourceText: string,
    tag: string,
    executable?: Executable
  ): DocumentDescriptor | undefined {
    const previous = this.documents.set(
      documentName,
      this.createDescriptor(documentName, sourceText, tag, executable)
    );
    if (previous) {
      previous.invalidate();
      this.dropInFlowDocuments(previous);
      this.observability?.onEvict?.({ documentName, reason: 'replaced' });
      invalidateDependents(this.documents.values(), documentName);
    }
    return previous;
  }

  setDocumentIfAbsent(
    documentName: string,
    sourceText: string,
    tag: string,
    executable?: Executable
  ): DocumentDescriptor {
    return this.documents.putIfAbsent(
      documentName,
      this.createDescriptor(documentName, sourceText, tag, executable)
    );
  }

  async getDocuments(): Promise<DocumentDescriptor[]> {
    return this.documents.values();
  }

  getIdentifier(): string {
    return this.identifier;
  }

  getCachedDocument(documentName: string): DocumentDescriptor | undefined {
    return this.documents.get(documentName);
  }

  private createDescriptor(
    name: string,
    sourceText: string,
    tag: string,
    executable: Executable | undefined
  ): DocumentDescriptor {
    return new DocumentDescriptor(
      { name, sourceText, tag, timestamp: this.clock(), executable },
      this.validityOptions
    );
  }

  private dropInFlowDocuments(descriptor: DocumentDescriptor): void {
    for (const name of inFlowDependencies(descriptor)) {
      const inFlow = this.documents.get(name);
      this.documents.delete(name);
      if (inFlow) {
        this.dropInFlowDocuments(inFlow);
      }
    }
  }
}
