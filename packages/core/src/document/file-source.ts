/**
 * Document File Source
 * Documents read from files under a base directory
 */

import type { Dirent, Stats } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import {
  DocumentError,
  DocumentNotFoundError,
} from '../error-classes.js';
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

// ============================================================
// OPTIONS
// ============================================================

/** Milliseconds between two mtime checks of the same document */
export const DEFAULT_MINIMUM_TIME_BETWEEN_VALIDITY_CHECKS = 1000;

/** File a directory name resolves to (with any extension) */
export const DEFAULT_DOCUMENT_NAME = 'index';

export interface DocumentFileSourceOptions {
  /** Name of the file a directory resolves to (default "index") */
  readonly defaultName?: string | undefined;
  /** Extension (without dot) chosen when several files share a stem */
  readonly preferredExtension?: string | undefined;
  /** -1 disables validity checks */
  readonly minimumTimeBetweenValidityChecks?: number | undefined;
  readonly clock?: (() => number) | undefined;
  readonly observability?: ObservabilityCallbacks | undefined;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================
// FILE SOURCE
// ============================================================

/**
 * Source backed by a directory. Descriptors are cached by document name
 * and by resolved file; a descriptor whose file changed is evicted from
 * both maps the next time it is looked up.
 */
export class DocumentFileSource implements DocumentSource {
  readonly basePath: string;
  readonly defaultName: string;
  readonly preferredExtension: string | undefined;
  readonly minimumTimeBetweenValidityChecks: number;

  private readonly clock: () => number;
  private readonly observability: ObservabilityCallbacks | undefined;
  private readonly byName = new AtomicMap<string, DocumentDescriptor>();
  private readonly byFile = new AtomicMap<string, DocumentDescriptor>();
  private readonly validityOptions: ValidityOptions;

  constructor(basePath: string, options: DocumentFileSourceOptions = {}) {
    this.basePath = path.resolve(basePath);
    this.defaultName = options.defaultName ?? DEFAULT_DOCUMENT_NAME;
    this.preferredExtension = options.preferredExtension?.replace(/^\./, '');
    this.minimumTimeBetweenValidityChecks =
      options.minimumTimeBetweenValidityChecks ??
      DEFAULT_MINIMUM_TIME_BETWEEN_VALIDITY_CHECKS;
    this.clock = options.clock ?? Date.now;
    this.observability = options.observability;
    this.validityOptions = {
      lookup: (name) => this.byName.get(name),
      minimumTimeBetweenValidityChecks: this.minimumTimeBetweenValidityChecks,
      clock: this.clock,
    };
  }

  getIdentifier(): string {
    return this.basePath;
  }

  getCachedDocument(documentName: string): DocumentDescriptor | undefined {
    return this.byName.get(documentName);
  }

  async getDocument(documentName: string): Promise<DocumentDescriptor> {
    const cached = this.byName.get(documentName);
    if (cached) {
      if (await cached.isValid()) {
        return cached;
      }
      this.evict(cached);
      if (cached.file === undefined) {
        return this.byName.putIfAbsent(
          documentName,
          this.createDescriptor(documentName, cached.sourceText, cached.tag)
        );
      }
    }

    const file = await this.getFileForDocumentName(documentName);
    const filed = this.byFile.get(file);
    if (filed) {
      if (await filed.isValid()) {
        return this.byName.putIfAbsent(documentName, filed);
      }
      this.evict(filed);
    }

    const descriptor = await this.readDescriptor(documentName, file);
    const winner = this.byFile.putIfAbsent(file, descriptor);
    return this.byName.putIfAbsent(documentName, winner);
  }

  setDocument(
    documentName: string,
    sourceText: string,
    tag: string,
    executable?: Executable
  ): DocumentDescriptor | undefined {
    const previous = this.byName.set(
      documentName,
      this.createDescriptor(documentName, sourceText, tag, executable)
    );
    if (previous) {
      previous.invalidate();
      this.byFile.deleteValue(previous);
      this.dropInFlowDocuments(previous);
      this.observability?.onEvict?.({ documentName, reason: 'replaced' });
      invalidateDependents(this.byName.values(), documentName);
    }
    return previous;
  }

  setDocumentIfAbsent(
    documentName: string,
    sourceText: string,
    tag: string,
    executable?: Executable
  ): DocumentDescriptor {
    return this.byName.putIfAbsent(
      documentName,
      this.createDescriptor(documentName, sourceText, tag, executable)
    );
  }

  /** Descriptors for all non-hidden files under the base path */
  async getDocuments(): Promise<DocumentDescriptor[]> {
    const names = await this.listDocumentNames(this.basePath, '');
    const descriptors: DocumentDescriptor[] = [];
    for (const name of names) {
      descriptors.push(await this.getDocument(name));
    }
    return descriptors;
  }

  // ============================================================
  // NAME RESOLUTION
  // ============================================================

  /**
   * Resolve a document name to a file.
   *
   * A directory resolves to its default-name file. A missing file resolves
   * to a file with the same stem and any extension; the preferred extension
   * wins, otherwise the first name in sorted order.
   *
   * @throws DocumentNotFoundError when nothing matches
   */
  async getFileForDocumentName(documentName: string): Promise<string> {
    const resolved = path.resolve(
      this.basePath,
      documentName.replace(/^[/\\]+/, '')
    );
    const relative = path.relative(this.basePath, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new DocumentNotFoundError(documentName);
    }

    let stats: Stats | undefined;
    try {
      stats = await stat(resolved);
    } catch (error) {
      if (!isNotFound(error)) {
        throw this.readError(documentName, error);
      }
    }

    if (stats?.isDirectory()) {
      return this.findVariant(resolved, this.defaultName, documentName);
    }
    if (stats?.isFile()) {
      return resolved;
    }
    return this.findVariant(
      path.dirname(resolved),
      path.basename(resolved),
      documentName
    );
  }

  private async findVariant(
    directory: string,
    stem: string,
    documentName: string
  ): Promise<string> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        throw new DocumentNotFoundError(documentName);
      }
      throw this.readError(documentName, error);
    }

    const candidates = entries
      .filter((entry) => entry.isFile() && path.parse(entry.name).name === stem)
      .map((entry) => entry.name)
      .sort();

    const preferred =
      this.preferredExtension === undefined
        ? undefined
        : candidates.find(
            (name) => path.extname(name) === `.${this.preferredExtension}`
          );
    const chosen = preferred ?? candidates[0];
    if (chosen === undefined) {
      throw new DocumentNotFoundError(documentName);
    }
    return path.join(directory, chosen);
  }

  private async listDocumentNames(
    directory: string,
    prefix: string
  ): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    const names: string[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith('.')) {
        continue;
      }
      const name = prefix + entry.name;
      if (entry.isDirectory()) {
        names.push(
          ...(await this.listDocumentNames(
            path.join(directory, entry.name),
            `${name}/`
          ))
        );
      } else if (entry.isFile()) {
        names.push(name);
      }
    }
    return names;
  }

  // ============================================================
  // DESCRIPTORS
  // ============================================================

  private async readDescriptor(
    documentName: string,
    file: string
  ): Promise<DocumentDescriptor> {
    let sourceText: string;
    let stats: Stats;
    try {
      [sourceText, stats] = await Promise.all([
        readFile(file, 'utf8'),
        stat(file),
      ]);
    } catch (error) {
      if (isNotFound(error)) {
        throw new DocumentNotFoundError(documentName);
      }
      throw this.readError(documentName, error);
    }

    return new DocumentDescriptor(
      {
        name: documentName,
        sourceText,
        tag: path.extname(file).replace(/^\./, ''),
        timestamp: stats.mtimeMs,
        file,
      },
      this.validityOptions
    );
  }

  private createDescriptor(
    name: string,
    sourceText: string,
    tag: string,
    executable?: Executable
  ): DocumentDescriptor {
    return new DocumentDescriptor(
      { name, sourceText, tag, timestamp: this.clock(), executable },
      this.validityOptions
    );
  }

  private evict(descriptor: DocumentDescriptor): void {
    this.byName.deleteValue(descriptor);
    this.byFile.deleteValue(descriptor);
    this.dropInFlowDocuments(descriptor);
    this.observability?.onEvict?.({
      documentName: descriptor.name,
      reason: 'invalid',
    });
  }

  /** In-flow documents belong to the executable that registered them */
  private dropInFlowDocuments(descriptor: DocumentDescriptor): void {
    for (const name of inFlowDependencies(descriptor)) {
      const inFlow = this.byName.get(name);
      this.byName.delete(name);
      if (inFlow) {
        this.dropInFlowDocuments(inFlow);
      }
    }
  }

  private readError(documentName: string, error: unknown): DocumentError {
    const reason = describeError(error);
    return new DocumentError(
      'WEFT-D002',
      `Could not read document ${documentName}: ${reason}`,
      { name: documentName, reason },
      error
    );
  }
}
