/**
 * Document Descriptor
 * Cached document text, its executable and its validity
 */

import { stat } from 'node:fs/promises';

import { IN_FLOW_PREFIX } from '../runtime/executable.js';
import type { Executable } from '../runtime/executable.js';

export type Validity = 'unknown' | 'valid' | 'invalid';

export interface DocumentDescriptorInit {
  readonly name: string;
  readonly sourceText: string;
  /** File extension or other language hint */
  readonly tag: string;
  /** Backing file mtime, or registration time for in-memory documents */
  readonly timestamp: number;
  /** Backing file; undefined for in-memory documents */
  readonly file?: string | undefined;
  readonly executable?: Executable | undefined;
}

/** Supplied by the owning source */
export interface ValidityOptions {
  /** Finds dependency descriptors in the owning source */
  readonly lookup: (documentName: string) => DocumentDescriptor | undefined;
  /** -1 disables checks */
  readonly minimumTimeBetweenValidityChecks: number;
  readonly clock: () => number;
}

export class DocumentDescriptor {
  readonly name: string;
  readonly sourceText: string;
  readonly tag: string;
  readonly timestamp: number;
  readonly file: string | undefined;

  private readonly dependencySet = new Set<string>();
  private cachedExecutable: Executable | undefined;
  private currentValidity: Validity = 'unknown';
  private lastValidityCheck: number;

  constructor(
    init: DocumentDescriptorInit,
    private readonly validityOptions: ValidityOptions
  ) {
    this.name = init.name;
    this.sourceText = init.sourceText;
    this.tag = init.tag;
    this.timestamp = init.timestamp;
    this.file = init.file;
    this.lastValidityCheck = validityOptions.clock();
    if (init.executable) {
      this.setExecutableIfAbsent(init.executable);
    }
  }

  get executable(): Executable | undefined {
    return this.cachedExecutable;
  }

  get validity(): Validity {
    return this.currentValidity;
  }

  /** Names of documents whose invalidity invalidates this one */
  get dependencies(): ReadonlySet<string> {
    return this.dependencySet;
  }

  addDependency(documentName: string): void {
    if (documentName !== this.name) {
      this.dependencySet.add(documentName);
    }
  }

  /**
   * Store the executable unless one is stored already.
   * Returns the stored executable: callers that lose a race get the winner.
   */
  setExecutableIfAbsent(executable: Executable): Executable {
    if (this.cachedExecutable) {
      return this.cachedExecutable;
    }
    this.cachedExecutable = executable;
    for (const dependency of executable.dependencies) {
      this.addDependency(dependency);
    }
    return executable;
  }

  /** Mark invalid; invalid is final */
  invalidate(): void {
    this.currentValidity = 'invalid';
  }

  /**
   * Check dependencies, then the backing file's mtime against the recorded
   * timestamp, at most once per throttle interval.
   */
  async isValid(visited = new Set<DocumentDescriptor>()): Promise<boolean> {
    if (this.currentValidity === 'invalid') {
      return false;
    }
    if (visited.has(this)) {
      return true;
    }
    visited.add(this);

    for (const name of this.dependencySet) {
      const dependency = this.validityOptions.lookup(name);
      if (dependency && !(await dependency.isValid(visited))) {
        this.invalidate();
        return false;
      }
    }

    const file = this.file;
    const { minimumTimeBetweenValidityChecks, clock } = this.validityOptions;
    if (file === undefined || minimumTimeBetweenValidityChecks === -1) {
      this.currentValidity = 'valid';
      return true;
    }

    const now = clock();
    if (now - this.lastValidityCheck <= minimumTimeBetweenValidityChecks) {
      return true;
    }
    this.lastValidityCheck = now;

    try {
      const stats = await stat(file);
      this.currentValidity =
        stats.mtimeMs <= this.timestamp ? 'valid' : 'invalid';
    } catch {
      // Deleted or unreadable
      this.currentValidity = 'invalid';
    }
    return this.currentValidity === 'valid';
  }
}

/**
 * Invalidate descriptors depending on a replaced document. The replacement
 * is valid, so the dependency check alone would not notice the change.
 */
export function invalidateDependents(
  descriptors: Iterable<DocumentDescriptor>,
  documentName: string
): void {
  for (const descriptor of descriptors) {
    if (descriptor.dependencies.has(documentName)) {
      descriptor.invalidate();
    }
  }
}

/** Synthesized in-flow documents a descriptor's executable registered */
export function inFlowDependencies(descriptor: DocumentDescriptor): string[] {
  return [...descriptor.dependencies].filter((name) =>
    name.startsWith(IN_FLOW_PREFIX)
  );
}
