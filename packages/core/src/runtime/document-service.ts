/**
 * Document Service
 * Container that lets running programs include and execute other documents
 */

import { createOnce } from '../document/create-once.js';
import type { CreateOnceOptions } from '../document/create-once.js';
import type { DocumentSource } from '../document/source.js';
import { DocumentNotFoundError } from '../error-classes.js';
import type { ExecutionContext } from './context.js';
import { DEFAULT_EXPOSED_NAME } from './executable.js';
import type { Executable } from './executable.js';
import { ExecutableService } from './services.js';
import type { ExecutableContainer } from './services.js';

/** Context attribute holding the names passed to markExecuted() */
export const EXECUTED_DOCUMENTS_ATTRIBUTE = 'weft.documentService.executed';

export interface DocumentServiceOptions
  extends Omit<CreateOnceOptions, 'isTextWithScriptlets'> {
  readonly source: DocumentSource;
  /** Searched in order when the main source has no such document */
  readonly librarySources?: readonly DocumentSource[] | undefined;
}

export class DocumentService implements ExecutableContainer {
  readonly source: DocumentSource;
  readonly librarySources: readonly DocumentSource[];
  private readonly options: DocumentServiceOptions;

  constructor(options: DocumentServiceOptions) {
    this.options = options;
    this.source = options.source;
    this.librarySources = options.librarySources ?? [];
  }

  /**
   * Run a text-with-scriptlets document into the context's writer.
   * The including document is recorded as depending on it.
   */
  async include(
    documentName: string,
    context: ExecutionContext
  ): Promise<void> {
    const executable = await this.getExecutable(documentName, true);
    this.recordDependency(documentName, context);
    await executable.execute(context, this);
  }

  /** Run a document of pure source code in its extension's language */
  async execute(
    documentName: string,
    context: ExecutionContext
  ): Promise<void> {
    const executable = await this.getExecutable(documentName, false);
    await executable.execute(context, this);
  }

  /** Like execute(), but at most once per context and document name */
  async executeOnce(
    documentName: string,
    context: ExecutionContext
  ): Promise<boolean> {
    if (!this.markExecuted(documentName, context)) {
      return false;
    }
    await this.execute(documentName, context);
    return true;
  }

  /** Record a document as executed; false when it already was */
  markExecuted(documentName: string, context: ExecutionContext): boolean {
    const executed = this.executedDocuments(context);
    if (executed.has(documentName)) {
      return false;
    }
    executed.add(documentName);
    return true;
  }

  /** Compile (or fetch) a document from the main source, then libraries */
  async getExecutable(
    documentName: string,
    isTextWithScriptlets: boolean
  ): Promise<Executable> {
    const sources = [this.source, ...this.librarySources];
    for (const [index, source] of sources.entries()) {
      try {
        return await createOnce(source, documentName, {
          ...this.options,
          isTextWithScriptlets,
        });
      } catch (error) {
        const hasFallback = index < sources.length - 1;
        if (!(error instanceof DocumentNotFoundError) || !hasFallback) {
          throw error;
        }
      }
    }
    throw new DocumentNotFoundError(documentName);
  }

  private executedDocuments(context: ExecutionContext): Set<unknown> {
    const existing = context.attributes.get(EXECUTED_DOCUMENTS_ATTRIBUTE);
    if (existing instanceof Set) {
      return existing;
    }
    const created = new Set<unknown>();
    context.attributes.set(EXECUTED_DOCUMENTS_ATTRIBUTE, created);
    return created;
  }

  private recordDependency(
    documentName: string,
    context: ExecutionContext
  ): void {
    const current = context.services.get(
      this.options.exposedName ?? DEFAULT_EXPOSED_NAME
    );
    if (
      current instanceof ExecutableService &&
      current.executable.partition === this.source.getIdentifier()
    ) {
      this.source
        .getCachedDocument(current.executable.registeredName)
        ?.addDependency(documentName);
    }
  }
}
