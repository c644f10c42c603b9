/**
 * UnitOfWork — pending-change tracker shared by the history store and the
 * collection index.
 *
 * Mutations mark entities dirty; save() flushes everything in a single
 * repository transaction and is a no-op when nothing is pending. A failed
 * save keeps the changes pending so the next save retries them; the
 * in-memory state stays authoritative in the meantime.
 */

import { createLogger } from './logger';
import { ClipKeepError, ErrorCode } from '../../shared/types/errors';
import type { ClipRecord, Collection } from '../../shared/types/clipboard';
import type { ClipRepository } from './database-service';

const log = createLogger('UnitOfWork');

export class UnitOfWork {
  private dirtyRecords = new Map<string, ClipRecord>();
  private removedRecords = new Set<string>();
  private dirtyCollections = new Map<string, Collection>();
  private removedCollections = new Set<string>();
  private lastError: ClipKeepError | null = null;

  constructor(private readonly repository: ClipRepository) {}

  markRecord(record: ClipRecord): void {
    this.removedRecords.delete(record.id);
    this.dirtyRecords.set(record.id, record);
  }

  removeRecord(id: string): void {
    this.dirtyRecords.delete(id);
    this.removedRecords.add(id);
  }

  markCollection(collection: Collection): void {
    this.removedCollections.delete(collection.id);
    this.dirtyCollections.set(collection.id, collection);
  }

  removeCollection(id: string): void {
    this.dirtyCollections.delete(id);
    this.removedCollections.add(id);
  }

  hasChanges(): boolean {
    return (
      this.dirtyRecords.size > 0 ||
      this.removedRecords.size > 0 ||
      this.dirtyCollections.size > 0 ||
      this.removedCollections.size > 0
    );
  }

  /** Error of the most recent failed save, cleared by the next successful one */
  getLastError(): ClipKeepError | null {
    return this.lastError;
  }

  /**
   * Flush pending changes. Returns true when the store is in sync afterwards.
   */
  save(): boolean {
    if (!this.hasChanges()) return true;

    try {
      this.repository.applyChanges({
        upsertRecords: [...this.dirtyRecords.values()],
        deleteRecordIds: [...this.removedRecords],
        upsertCollections: [...this.dirtyCollections.values()],
        deleteCollectionIds: [...this.removedCollections],
      });
    } catch (err) {
      this.lastError = ClipKeepError.from(err, ErrorCode.DB_SAVE_ERROR);
      log.error('Failed to save changes, keeping them pending:', this.lastError.message);
      return false;
    }

    this.dirtyRecords.clear();
    this.removedRecords.clear();
    this.dirtyCollections.clear();
    this.removedCollections.clear();
    this.lastError = null;
    return true;
  }
}
