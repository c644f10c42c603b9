/**
 * CollectionService — smart and custom collections over the clip history.
 *
 * Smart collections (one per content kind) are constants computed from the
 * visible history. Custom collections are user-managed, persisted, and hold
 * explicit record membership stored on the records themselves.
 *
 * @module collection-service
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from './logger';
import { CONTENT_KINDS } from '../../shared/types/clipboard';
import type { ClipRecord, Collection, ContentKind } from '../../shared/types/clipboard';
import type { ClipRepository } from './database-service';
import type { CollectionLookup, HistoryStore } from './history-store';
import type { UnitOfWork } from './unit-of-work';

const log = createLogger('Collections');

export const DEFAULT_COLLECTION_ICON = 'folder';
export const DEFAULT_COLLECTION_COLOR = '#007AFF';

const SMART_PRESENTATION: Record<ContentKind, { name: string; icon: string; colorHex: string }> = {
  text: { name: 'Text', icon: 'doc.text', colorHex: '#8E8E93' },
  richText: { name: 'Rich Text', icon: 'doc.richtext', colorHex: '#5856D6' },
  image: { name: 'Images', icon: 'photo', colorHex: '#34C759' },
  file: { name: 'Files', icon: 'doc', colorHex: '#FF9500' },
  link: { name: 'Links', icon: 'link', colorHex: '#007AFF' },
  color: { name: 'Colors', icon: 'paintpalette', colorHex: '#FF2D55' },
};

export function smartCollectionId(kind: ContentKind): string {
  return `smart:${kind}`;
}

/** One smart collection per content kind, in kind order */
export const SMART_COLLECTIONS: readonly Collection[] = CONTENT_KINDS.map((kind, index) => ({
  id: smartCollectionId(kind),
  ...SMART_PRESENTATION[kind],
  sortOrder: index,
  smartFilterType: kind,
}));

export interface CollectionServiceOptions {
  makeId?: () => string;
}

export class CollectionService extends EventEmitter implements CollectionLookup {
  private custom = new Map<string, Collection>();
  private readonly makeId: () => string;

  constructor(
    private readonly repository: ClipRepository,
    private readonly unitOfWork: UnitOfWork,
    private readonly history: HistoryStore,
    options: CollectionServiceOptions = {},
  ) {
    super();
    this.makeId = options.makeId ?? uuidv4;
  }

  load(): void {
    this.custom.clear();
    for (const collection of this.repository.loadCollections()) {
      this.custom.set(collection.id, collection);
    }
    log.info(`Loaded ${this.custom.size} custom collections`);
    this.emit('change');
  }

  // ─── Queries ───

  /** Smart collections first, then custom collections by sort order */
  getAllCollections(): Collection[] {
    return [...SMART_COLLECTIONS, ...this.customCollections()];
  }

  getCollection(id: string): Collection | null {
    return SMART_COLLECTIONS.find((c) => c.id === id) ?? this.custom.get(id) ?? null;
  }

  isCustomCollection(id: string): boolean {
    return this.custom.has(id);
  }

  /**
   * Visible records of a collection, newest first. Smart membership is
   * computed by content kind; unknown ids yield an empty list.
   */
  getRecords(collectionId: string): ClipRecord[] {
    const smart = SMART_COLLECTIONS.find((c) => c.id === collectionId);
    if (smart?.smartFilterType) {
      return this.history.recordsOfKind(smart.smartFilterType);
    }
    if (this.custom.has(collectionId)) {
      return this.history.recordsInCollection(collectionId);
    }
    return [];
  }

  // ─── Mutations ───

  createCollection(name: string, icon = DEFAULT_COLLECTION_ICON, colorHex = DEFAULT_COLLECTION_COLOR): Collection {
    const sortOrder = this.customCollections().reduce((max, c) => Math.max(max, c.sortOrder + 1), 0);

    let id = this.makeId();
    while (this.custom.has(id)) id = this.makeId();

    const collection: Collection = {
      id,
      name: name.trim() || 'Untitled',
      icon,
      colorHex,
      sortOrder,
      smartFilterType: null,
    };

    this.custom.set(id, collection);
    this.unitOfWork.markCollection(collection);
    this.commit();
    log.info(`Created collection "${collection.name}"`);
    return collection;
  }

  /** Smart collections and blank names are refused */
  renameCollection(id: string, name: string): boolean {
    const collection = this.custom.get(id);
    const trimmed = name.trim();
    if (!collection || !trimmed) return false;

    collection.name = trimmed;
    this.unitOfWork.markCollection(collection);
    this.commit();
    return true;
  }

  /**
   * Delete a custom collection. Member records stay in history; only their
   * membership is dropped.
   */
  deleteCollection(id: string): boolean {
    if (!this.custom.has(id)) return false;

    this.custom.delete(id);
    const detached = this.history.detachCollection(id);
    this.unitOfWork.removeCollection(id);
    this.commit();
    log.info(`Deleted collection ${id} (${detached.length} records detached)`);
    return true;
  }

  addRecord(recordId: string, collectionId: string): boolean {
    const ok = this.history.addToCollection(recordId, collectionId);
    if (ok) this.emit('change');
    return ok;
  }

  removeRecord(recordId: string, collectionId: string): boolean {
    const ok = this.history.removeFromCollection(recordId, collectionId);
    if (ok) this.emit('change');
    return ok;
  }

  /** Coarse-grained change notification. Returns an unsubscribe function. */
  onChange(listener: () => void): () => void {
    this.on('change', listener);
    return () => {
      this.off('change', listener);
    };
  }

  // ─── Private ───

  private customCollections(): Collection[] {
    return [...this.custom.values()].sort((a, b) => a.sortOrder - b.sortOrder);
  }

  private commit(): void {
    this.unitOfWork.save();
    this.emit('change');
  }
}
