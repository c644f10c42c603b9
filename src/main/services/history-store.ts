/**
 * HistoryStore — the ordered, persistent collection of clip records.
 *
 * Owns record identity, display order, pin/favorite/tombstone state and
 * custom-collection membership. All mutations run synchronously on the event
 * loop and end with a conditional save through the shared UnitOfWork.
 *
 * Ordering: `createdAt` is the only sort key. The visible list (non-deleted
 * records) is always strictly descending by `createdAt`; moving a record to
 * the front or reordering rewrites timestamps to keep it that way.
 *
 * Deletion is two-phase: softDelete() sets the tombstone, and only retention,
 * auto-cleanup or purgeDeleted() physically remove records.
 *
 * @module history-store
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from './logger';
import { contentKey, describeContent } from './content-classifier';
import { DEFAULT_HISTORY_LIMIT, REORDER_STEP_MS } from '../../shared/constants';
import type { UnitOfWork } from './unit-of-work';
import type { ClipRepository } from './database-service';
import type { ClipContent, ClipRecord, ContentKind, LinkMetadata, Provenance } from '../../shared/types/clipboard';

const log = createLogger('HistoryStore');

const DAY_MS = 24 * 60 * 60 * 1000;

/** Lets the store tell custom collections from smart or unknown ones */
export interface CollectionLookup {
  isCustomCollection(id: string): boolean;
}

export interface HistoryStoreOptions {
  /** Read on every retention pass so config changes apply immediately */
  historyLimit?: () => number;
  now?: () => number;
  makeId?: () => string;
}

export interface InsertOutcome {
  record: ClipRecord;
  /** false when an existing record was moved to the front */
  created: boolean;
}

type ChangeListener = () => void;
type RemovedListener = (ids: string[]) => void;

export class HistoryStore {
  private records = new Map<string, ClipRecord>();
  /** contentKey → id, non-deleted records only */
  private keyIndex = new Map<string, string>();
  private visible: ClipRecord[] = [];
  private collections: CollectionLookup | null = null;
  private newClipCount = 0;
  private changeListeners = new Set<ChangeListener>();
  private removedListeners = new Set<RemovedListener>();

  private readonly historyLimit: () => number;
  private readonly now: () => number;
  private readonly makeId: () => string;

  constructor(
    private readonly repository: ClipRepository,
    private readonly unitOfWork: UnitOfWork,
    options: HistoryStoreOptions = {},
  ) {
    this.historyLimit = options.historyLimit ?? (() => DEFAULT_HISTORY_LIMIT);
    this.now = options.now ?? Date.now;
    this.makeId = options.makeId ?? uuidv4;
  }

  /**
   * Set dependencies after construction (DI wiring phase).
   */
  setDependencies(opts: { collections?: CollectionLookup }): void {
    if (opts.collections) this.collections = opts.collections;
  }

  // ─── Lifecycle ───

  /**
   * Load persisted records. Tombstones left by a previous run are purged
   * first; they can no longer be restored once the process has exited.
   */
  load(): void {
    const purged = this.repository.purgeDeletedRecords();
    if (purged > 0) {
      log.info(`Purged ${purged} soft-deleted records from a previous session`);
    }

    this.records.clear();
    this.keyIndex.clear();

    let previous: ClipRecord | null = null;
    for (const record of this.repository.loadRecords()) {
      if (this.keyIndex.has(record.contentKey)) {
        // Older duplicate of a newer record: keep only the newest representation.
        record.deleted = true;
        this.records.set(record.id, record);
        this.unitOfWork.markRecord(record);
        continue;
      }
      if (previous && record.createdAt >= previous.createdAt) {
        record.createdAt = previous.createdAt - 1;
        this.unitOfWork.markRecord(record);
      }
      this.records.set(record.id, record);
      this.keyIndex.set(record.contentKey, record.id);
      previous = record;
    }

    this.refreshVisible();
    this.unitOfWork.save();
    log.info(`Loaded ${this.visible.length} records`);
    this.notifyChange();
  }

  // ─── Capture ───

  /**
   * Insert new content, or move the existing content-equal record to the
   * front and bump its usage.
   */
  insertOrBump(content: ClipContent, provenance: Provenance): InsertOutcome {
    const key = contentKey(content);
    const existing = this.liveRecord(this.keyIndex.get(key));
    const now = this.now();

    if (existing) {
      existing.createdAt = this.nextStamp(now);
      existing.lastUsedAt = now;
      existing.useCount += 1;
      this.unitOfWork.markRecord(existing);
      this.refreshVisible();
      this.commit();
      log.debug(`Bumped record ${existing.id} (use count ${existing.useCount})`);
      return { record: existing, created: false };
    }

    const record: ClipRecord = {
      id: this.freshId(),
      content,
      contentKey: key,
      sourceAppId: provenance.sourceAppId,
      sourceAppName: provenance.sourceAppName,
      pinned: false,
      favorite: false,
      deleted: false,
      createdAt: this.nextStamp(now),
      lastUsedAt: now,
      useCount: 1,
      title: null,
      ocrText: null,
      collectionIds: new Set(),
      ...describeContent(content),
    };

    this.records.set(record.id, record);
    this.keyIndex.set(key, record.id);
    this.unitOfWork.markRecord(record);
    this.newClipCount++;
    this.refreshVisible();

    const removed = this.applyRetention(this.historyLimit());
    this.commit(removed);
    log.debug(`Inserted ${content.kind} record ${record.id}`);
    return { record, created: true };
  }

  // ─── Mutations ───

  softDelete(id: string): boolean {
    const record = this.liveRecord(id);
    if (!record) return false;

    record.deleted = true;
    this.keyIndex.delete(record.contentKey);
    this.unitOfWork.markRecord(record);
    this.refreshVisible();
    this.commit([id]);
    return true;
  }

  /**
   * Clear the tombstone. Refused while another live record holds the same
   * content, since that would break the one-representation-per-content rule.
   */
  restore(id: string): boolean {
    const record = this.records.get(id);
    if (!record || !record.deleted) return false;

    if (this.keyIndex.has(record.contentKey)) {
      log.debug(`Not restoring ${id}: content is already present in history`);
      return false;
    }

    record.deleted = false;
    record.createdAt = this.freeStamp(record.createdAt);
    this.keyIndex.set(record.contentKey, record.id);
    this.unitOfWork.markRecord(record);
    this.refreshVisible();
    this.commit();
    return true;
  }

  togglePin(id: string): boolean {
    return this.update(id, (record) => {
      record.pinned = !record.pinned;
    });
  }

  toggleFavorite(id: string): boolean {
    return this.update(id, (record) => {
      record.favorite = !record.favorite;
    });
  }

  /** Set the user title; an empty title clears it */
  rename(id: string, title: string): boolean {
    const trimmed = title.trim();
    return this.update(id, (record) => {
      record.title = trimmed === '' ? null : trimmed;
    });
  }

  /** Paste bookkeeping: usage counters only, no reordering */
  markUsed(id: string): boolean {
    const now = this.now();
    return this.update(id, (record) => {
      record.lastUsedAt = now;
      record.useCount += 1;
    });
  }

  /**
   * Move `sourceId` to the position of `targetId`. Both must be visible and
   * in the same pinned/unpinned partition. Every visible record gets
   * `now - index * REORDER_STEP_MS` as its new createdAt.
   */
  reorder(sourceId: string, targetId: string): boolean {
    if (sourceId === targetId) return false;

    const source = this.liveRecord(sourceId);
    const target = this.liveRecord(targetId);
    if (!source || !target) return false;
    if (source.pinned !== target.pinned) {
      log.debug(`Refusing reorder across pinned/unpinned partitions (${sourceId} → ${targetId})`);
      return false;
    }

    const list = [...this.visible];
    const from = list.indexOf(source);
    const to = list.indexOf(target);
    list.splice(from, 1);
    list.splice(to, 0, source);

    const now = this.now();
    list.forEach((record, index) => {
      record.createdAt = now - index * REORDER_STEP_MS;
      this.unitOfWork.markRecord(record);
    });

    this.refreshVisible();
    this.commit();
    return true;
  }

  // ─── Retention ───

  /**
   * Purge tombstones, then evict the oldest unpinned records beyond
   * `max(0, limit - pinnedCount)`. Returns the ids physically removed.
   */
  enforceRetention(limit: number = this.historyLimit()): string[] {
    const removed = this.applyRetention(limit);
    this.commit(removed);
    return removed;
  }

  /**
   * Physically delete unpinned records older than `days` days (0 disables).
   */
  performAutoCleanup(days: number): string[] {
    if (days <= 0) return [];

    const cutoff = this.now() - days * DAY_MS;
    const expired = [...this.records.values()].filter((record) => !record.pinned && record.createdAt < cutoff);
    if (expired.length === 0) return [];

    const removed = expired.map((record) => this.purge(record));
    this.refreshVisible();
    this.commit(removed);
    log.info(`Auto-cleanup: deleted ${removed.length} records older than ${days} days`);
    return removed;
  }

  /** Physically remove every soft-deleted record */
  purgeDeleted(): string[] {
    const removed = this.purgeTombstones();
    this.commit(removed);
    return removed;
  }

  // ─── Collection membership ───

  addToCollection(recordId: string, collectionId: string): boolean {
    if (!this.isCustomCollection(collectionId)) return false;
    const record = this.liveRecord(recordId);
    if (!record) return false;
    if (record.collectionIds.has(collectionId)) return true;

    record.collectionIds.add(collectionId);
    this.unitOfWork.markRecord(record);
    this.commit();
    return true;
  }

  removeFromCollection(recordId: string, collectionId: string): boolean {
    if (!this.isCustomCollection(collectionId)) return false;
    const record = this.liveRecord(recordId);
    if (!record) return false;
    if (!record.collectionIds.has(collectionId)) return true;

    record.collectionIds.delete(collectionId);
    this.unitOfWork.markRecord(record);
    this.commit();
    return true;
  }

  /**
   * Drop a collection id from every record (live or tombstoned). The join
   * rows go with the collection row in the database; the caller saves.
   */
  detachCollection(collectionId: string): string[] {
    const affected: string[] = [];
    for (const record of this.records.values()) {
      if (record.collectionIds.delete(collectionId)) affected.push(record.id);
    }
    if (affected.length > 0) this.notifyChange();
    return affected;
  }

  // ─── Enrichment merge points ───

  /**
   * Merge fetched link metadata. The link title is only filled while empty;
   * the user-assigned title is never touched. Returns false when the record
   * is gone or no longer a link.
   */
  applyLinkMetadata(id: string, metadata: LinkMetadata): boolean {
    const record = this.liveRecord(id);
    if (!record || record.content.kind !== 'link') return false;

    const link = record.content;
    if (!link.title && metadata.title) link.title = metadata.title;
    if (metadata.favicon) link.favicon = metadata.favicon;
    if (metadata.previewImage) link.previewImage = metadata.previewImage;
    record.linkTitle = link.title || null;

    this.unitOfWork.markRecord(record);
    this.commit();
    return true;
  }

  /** Attach recognised image text. Returns false when the record is gone. */
  applyRecognizedText(id: string, text: string): boolean {
    const record = this.liveRecord(id);
    if (!record || record.content.kind !== 'image') return false;

    const trimmed = text.trim();
    if (trimmed === '') return false;

    record.ocrText = trimmed;
    this.unitOfWork.markRecord(record);
    this.commit();
    return true;
  }

  // ─── Reads ───

  /** Non-deleted records, newest first */
  getVisibleRecords(): ClipRecord[] {
    return [...this.visible];
  }

  getById(id: string, opts: { includeDeleted?: boolean } = {}): ClipRecord | null {
    const record = this.records.get(id);
    if (!record) return null;
    if (record.deleted && !opts.includeDeleted) return null;
    return record;
  }

  /** Soft-deleted records still awaiting purge (for undo) */
  getDeletedRecords(): ClipRecord[] {
    return [...this.records.values()].filter((record) => record.deleted).sort((a, b) => b.createdAt - a.createdAt);
  }

  count(): number {
    return this.visible.length;
  }

  pinnedCount(): number {
    return this.visible.filter((record) => record.pinned).length;
  }

  /**
   * Case-insensitive search over text, recognised text, titles, file names
   * and source app names. An empty query returns every visible record.
   */
  search(query: string): ClipRecord[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return this.getVisibleRecords();

    return this.visible.filter((record) =>
      [record.plainText, record.ocrText, record.title, record.linkTitle, record.fileName, record.sourceAppName].some(
        (field) => field?.toLowerCase().includes(needle) === true,
      ),
    );
  }

  recordsOfKind(kind: ContentKind): ClipRecord[] {
    return this.visible.filter((record) => record.content.kind === kind);
  }

  recordsInCollection(collectionId: string): ClipRecord[] {
    return this.visible.filter((record) => record.collectionIds.has(collectionId));
  }

  /**
   * Immutable copy of the visible history for export consumers.
   */
  snapshot(): ReadonlyArray<Readonly<ClipRecord>> {
    return this.visible.map((record) => Object.freeze(structuredClone(record)));
  }

  getNewClipCount(): number {
    return this.newClipCount;
  }

  resetNewClipCount(): void {
    this.newClipCount = 0;
  }

  // ─── Subscriptions ───

  /** Coarse-grained change notification. Returns an unsubscribe function. */
  onChange(listener: ChangeListener): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  /** Records that were soft-deleted or physically removed */
  onRemoved(listener: RemovedListener): () => void {
    this.removedListeners.add(listener);
    return () => {
      this.removedListeners.delete(listener);
    };
  }

  // ─── Private ───

  private liveRecord(id: string | undefined): ClipRecord | null {
    if (id === undefined) return null;
    const record = this.records.get(id);
    return record && !record.deleted ? record : null;
  }

  private update(id: string, mutate: (record: ClipRecord) => void): boolean {
    const record = this.liveRecord(id);
    if (!record) return false;

    mutate(record);
    this.unitOfWork.markRecord(record);
    this.commit();
    return true;
  }

  private isCustomCollection(collectionId: string): boolean {
    if (!this.collections) {
      log.warn('Collection membership edit before the collection index was wired');
      return false;
    }
    return this.collections.isCustomCollection(collectionId);
  }

  private freshId(): string {
    let id = this.makeId();
    while (this.records.has(id)) id = this.makeId();
    return id;
  }

  /**
   * `stamp`, or the nearest older stamp no visible record holds. Keeps a
   * restored record from tying with one bumped while it was deleted.
   */
  private freeStamp(stamp: number): number {
    const taken = new Set(this.visible.map((record) => record.createdAt));
    let free = stamp;
    while (taken.has(free)) free -= 1;
    return free;
  }

  /** A createdAt strictly newer than every visible record */
  private nextStamp(now: number): number {
    const newest = this.visible[0];
    return newest && newest.createdAt >= now ? newest.createdAt + 1 : now;
  }

  private applyRetention(limit: number): string[] {
    const removed = this.purgeTombstones();

    const pinned = this.visible.filter((record) => record.pinned);
    const unpinned = this.visible.filter((record) => !record.pinned);
    const maxUnpinned = Math.max(0, limit - pinned.length);

    if (unpinned.length > maxUnpinned) {
      // visible is newest-first, so the tail is the oldest
      for (const record of unpinned.slice(maxUnpinned)) {
        removed.push(this.purge(record));
      }
      this.refreshVisible();
      log.debug(`Retention evicted ${unpinned.length - maxUnpinned} records (limit ${limit})`);
    }

    return removed;
  }

  private purgeTombstones(): string[] {
    const removed: string[] = [];
    for (const record of [...this.records.values()]) {
      if (record.deleted) removed.push(this.purge(record));
    }
    return removed;
  }

  private purge(record: ClipRecord): string {
    this.records.delete(record.id);
    if (this.keyIndex.get(record.contentKey) === record.id) {
      this.keyIndex.delete(record.contentKey);
    }
    this.unitOfWork.removeRecord(record.id);
    return record.id;
  }

  private refreshVisible(): void {
    this.visible = [...this.records.values()]
      .filter((record) => !record.deleted)
      .sort((a, b) => b.createdAt - a.createdAt);
  }

  private commit(removed: string[] = []): void {
    this.unitOfWork.save();
    if (removed.length > 0) {
      for (const listener of this.removedListeners) {
        try {
          listener(removed);
        } catch (err) {
          log.error('onRemoved listener error:', err);
        }
      }
    }
    this.notifyChange();
  }

  private notifyChange(): void {
    for (const listener of this.changeListeners) {
      try {
        listener();
      } catch (err) {
        log.error('onChange listener error:', err);
      }
    }
  }
}
