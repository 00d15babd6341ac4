/**
 * Language Registry
 * Explicit map from language tags and file extensions to adapters
 */

import type { LanguageAdapter } from './adapter.js';
import { Mutex } from './mutex.js';

/** A registered adapter and the lock that guards it */
export interface LanguageEntry {
  readonly adapter: LanguageAdapter;
  readonly mutex: Mutex;
}

function normalizeExtension(extension: string): string {
  return extension.replace(/^\./, '').toLowerCase();
}

/**
 * Caller-constructed registry of language adapters.
 * Later registrations replace earlier ones for the tags and extensions
 * they share.
 */
export class LanguageRegistry {
  private readonly byTag = new Map<string, LanguageEntry>();
  private readonly byExtension = new Map<string, LanguageEntry>();
  private readonly byAdapter = new Map<LanguageAdapter, LanguageEntry>();

  constructor(adapters: readonly LanguageAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: LanguageAdapter): this {
    const entry: LanguageEntry = { adapter, mutex: new Mutex() };
    this.byAdapter.set(adapter, entry);
    for (const tag of adapter.info.tags) {
      this.byTag.set(tag, entry);
    }
    for (const extension of adapter.info.extensions) {
      this.byExtension.set(normalizeExtension(extension), entry);
    }
    return this;
  }

  getAdapter(tag: string): LanguageAdapter | undefined {
    return this.byTag.get(tag)?.adapter;
  }

  getEntry(tag: string): LanguageEntry | undefined {
    return this.byTag.get(tag);
  }

  getEntryForAdapter(adapter: LanguageAdapter): LanguageEntry | undefined {
    return this.byAdapter.get(adapter);
  }

  getAdapterByExtension(extension: string): LanguageAdapter | undefined {
    return this.byExtension.get(normalizeExtension(extension))?.adapter;
  }

  /** Default tag of the adapter associated with a file extension */
  getLanguageTagByExtension(extension: string): string | undefined {
    return this.getAdapterByExtension(extension)?.info.defaultTag;
  }

  get adapters(): LanguageAdapter[] {
    return [...this.byAdapter.keys()];
  }
}
