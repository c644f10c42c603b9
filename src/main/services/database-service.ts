/**
 * DatabaseService — SQLite-backed persistent storage for clip history.
 *
 * Uses better-sqlite3 (synchronous, WAL mode). Three entity tables:
 * clip_records, collections and the record_collections join table
 * (rows vanish with their collection, records are never touched).
 *
 * Writes go through applyChanges(), which runs one transaction per save;
 * a throwing transaction is rolled back by better-sqlite3 before the error
 * reaches the caller.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { createLogger } from './logger';
import { ClipKeepError, ErrorCode } from '../../shared/types/errors';
import type { ClipContent, ClipRecord, Collection, LinkContent } from '../../shared/types/clipboard';

const log = createLogger('DatabaseService');

// ─── Schema version for migrations ───
const SCHEMA_VERSION = 2;

export const IN_MEMORY_DATABASE = ':memory:';

export interface ClipRecordRow {
  id: string;
  content_kind: string;
  content_key: string;
  content_json: string;
  content_blob: Buffer | null;
  favicon: Buffer | null;
  preview_image: Buffer | null;
  plain_text: string | null;
  ocr_text: string | null;
  title: string | null;
  source_app_id: string | null;
  source_app_name: string | null;
  pinned: number;
  favorite: number;
  deleted: number;
  created_at: number;
  last_used_at: number;
  use_count: number;
  character_count: number | null;
  image_dimensions: string | null;
  link_title: string | null;
  file_name: string | null;
}

export interface CollectionRow {
  id: string;
  name: string;
  icon: string;
  color_hex: string;
  sort_order: number;
}

interface MembershipRow {
  record_id: string;
  collection_id: string;
}

/** Pending writes collected by the unit of work between two saves */
export interface ChangeSet {
  upsertRecords: ClipRecord[];
  deleteRecordIds: string[];
  upsertCollections: Collection[];
  deleteCollectionIds: string[];
}

/** Storage seam used by the history store and the collection index */
export interface ClipRepository {
  loadRecords(): ClipRecord[];
  loadCollections(): Collection[];
  purgeDeletedRecords(): number;
  applyChanges(changes: ChangeSet): void;
}

// Binary fields live in BLOB columns; everything else of the content is JSON.
const StoredContentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), text: z.string() }),
  z.object({
    kind: z.literal('richText'),
    text: z.string(),
    format: z.enum(['html', 'rtf']),
    data: z.string(),
  }),
  z.object({ kind: z.literal('image'), width: z.number(), height: z.number() }),
  z.object({ kind: z.literal('file'), path: z.string(), name: z.string() }),
  z.object({ kind: z.literal('link'), url: z.string(), title: z.string().optional() }),
  z.object({ kind: z.literal('color'), hex: z.string() }),
]);

type StoredContent = z.infer<typeof StoredContentSchema>;

function toBuffer(data: Uint8Array | undefined): Buffer | null {
  if (!data) return null;
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

export class DatabaseService implements ClipRepository {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  // ─── Lifecycle ───

  initialize(): void {
    if (this.db) return;

    if (this.dbPath !== IN_MEMORY_DATABASE) {
      const dbDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }
    }

    log.info(`Opening database at ${this.dbPath}`);

    try {
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('temp_store = MEMORY');
    } catch (err) {
      this.db = null;
      throw new ClipKeepError(`Failed to open database at ${this.dbPath}`, ErrorCode.DB_CONNECTION_ERROR, {
        severity: 'fatal',
        recoverable: false,
        originalError: err instanceof Error ? err : undefined,
      });
    }

    try {
      this.runMigrations();
    } catch (err) {
      throw ClipKeepError.from(err, ErrorCode.DB_MIGRATION_ERROR, { dbPath: this.dbPath });
    }

    log.info('Database initialized successfully');
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  close(): void {
    if (this.db) {
      try {
        if (this.dbPath !== IN_MEMORY_DATABASE) {
          this.db.pragma('wal_checkpoint(TRUNCATE)');
        }
        this.db.close();
        log.info('Database closed');
      } catch (err) {
        log.error('Error closing database:', err);
      }
      this.db = null;
    }
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new ClipKeepError('Database is not open — call initialize() first', ErrorCode.INVALID_STATE);
    }
    return this.db;
  }

  // ─── Migrations ───

  private runMigrations(): void {
    const db = this.requireDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const current = db.prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version').get();
    const version = current?.v ?? 0;

    if (version < 1) {
      this.migrateV1(db);
    }

    if (version < 2) {
      this.migrateV2(db);
    }
  }

  private migrateV1(db: Database.Database): void {
    log.info('Running migration v1: clip records + collections');

    db.exec(`
      CREATE TABLE IF NOT EXISTS clip_records (
        id TEXT PRIMARY KEY,
        content_kind TEXT NOT NULL,
        content_key TEXT NOT NULL,
        content_json TEXT NOT NULL,
        content_blob BLOB,
        plain_text TEXT,
        title TEXT,
        source_app_id TEXT,
        source_app_name TEXT,
        pinned INTEGER NOT NULL DEFAULT 0,
        favorite INTEGER NOT NULL DEFAULT 0,
        deleted INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        last_used_at INTEGER NOT NULL,
        use_count INTEGER NOT NULL DEFAULT 1,
        character_count INTEGER,
        image_dimensions TEXT,
        link_title TEXT,
        file_name TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_clip_records_created ON clip_records(created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_clip_records_key ON clip_records(content_key);
      CREATE INDEX IF NOT EXISTS idx_clip_records_kind ON clip_records(content_kind);

      CREATE TABLE IF NOT EXISTS collections (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        icon TEXT NOT NULL DEFAULT 'folder',
        color_hex TEXT NOT NULL DEFAULT '#007AFF',
        sort_order INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS record_collections (
        record_id TEXT NOT NULL REFERENCES clip_records(id) ON DELETE CASCADE,
        collection_id TEXT NOT NULL REFERENCES collections(id) ON DELETE CASCADE,
        PRIMARY KEY (record_id, collection_id)
      );

      INSERT INTO schema_version (version) VALUES (1);
    `);
  }

  private migrateV2(db: Database.Database): void {
    log.info('Running migration v2: enrichment columns');

    db.exec(`
      ALTER TABLE clip_records ADD COLUMN ocr_text TEXT;
      ALTER TABLE clip_records ADD COLUMN favicon BLOB;
      ALTER TABLE clip_records ADD COLUMN preview_image BLOB;

      INSERT INTO schema_version (version) VALUES (${SCHEMA_VERSION});
    `);
  }

  getSchemaVersion(): number {
    const row = this.requireDb()
      .prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version')
      .get();
    return row?.v ?? 0;
  }

  // ─── Reads ───

  /**
   * All non-deleted records, newest first, with their collection membership.
   */
  loadRecords(): ClipRecord[] {
    const db = this.requireDb();

    const membership = new Map<string, Set<string>>();
    const links = db.prepare<[], MembershipRow>('SELECT record_id, collection_id FROM record_collections').all();
    for (const link of links) {
      let ids = membership.get(link.record_id);
      if (!ids) {
        ids = new Set();
        membership.set(link.record_id, ids);
      }
      ids.add(link.collection_id);
    }

    const rows = db
      .prepare<[], ClipRecordRow>('SELECT * FROM clip_records WHERE deleted = 0 ORDER BY created_at DESC')
      .all();

    const records: ClipRecord[] = [];
    for (const row of rows) {
      const record = this.rowToRecord(row, membership.get(row.id) ?? new Set());
      if (record) records.push(record);
    }
    return records;
  }

  /**
   * Custom collections ordered by sort order.
   */
  loadCollections(): Collection[] {
    const rows = this.requireDb()
      .prepare<[], CollectionRow>('SELECT * FROM collections ORDER BY sort_order ASC')
      .all();
    return rows.map((row) => this.rowToCollection(row));
  }

  /**
   * Physically delete tombstoned records. Returns the number removed.
   */
  purgeDeletedRecords(): number {
    const result = this.requireDb().prepare('DELETE FROM clip_records WHERE deleted = 1').run();
    return result.changes;
  }

  // ─── Writes ───

  applyChanges(changes: ChangeSet): void {
    const db = this.requireDb();

    const upsertCollection = db.prepare<CollectionRow>(`
      INSERT INTO collections (id, name, icon, color_hex, sort_order)
      VALUES (@id, @name, @icon, @color_hex, @sort_order)
      ON CONFLICT(id) DO UPDATE SET
        name = @name, icon = @icon, color_hex = @color_hex, sort_order = @sort_order
    `);
    const upsertRecord = db.prepare<ClipRecordRow>(`
      INSERT INTO clip_records (
        id, content_kind, content_key, content_json, content_blob, favicon, preview_image,
        plain_text, ocr_text, title, source_app_id, source_app_name, pinned, favorite, deleted,
        created_at, last_used_at, use_count, character_count, image_dimensions, link_title, file_name
      ) VALUES (
        @id, @content_kind, @content_key, @content_json, @content_blob, @favicon, @preview_image,
        @plain_text, @ocr_text, @title, @source_app_id, @source_app_name, @pinned, @favorite, @deleted,
        @created_at, @last_used_at, @use_count, @character_count, @image_dimensions, @link_title, @file_name
      )
      ON CONFLICT(id) DO UPDATE SET
        content_json = @content_json, favicon = @favicon, preview_image = @preview_image,
        plain_text = @plain_text, ocr_text = @ocr_text, title = @title,
        pinned = @pinned, favorite = @favorite, deleted = @deleted,
        created_at = @created_at, last_used_at = @last_used_at, use_count = @use_count,
        character_count = @character_count, link_title = @link_title
    `);
    const clearMembership = db.prepare<[string]>('DELETE FROM record_collections WHERE record_id = ?');
    const addMembership = db.prepare<[string, string]>(
      'INSERT OR IGNORE INTO record_collections (record_id, collection_id) VALUES (?, ?)',
    );
    const deleteRecord = db.prepare<[string]>('DELETE FROM clip_records WHERE id = ?');
    const deleteCollection = db.prepare<[string]>('DELETE FROM collections WHERE id = ?');

    const transaction = db.transaction((set: ChangeSet) => {
      for (const collection of set.upsertCollections) {
        upsertCollection.run(this.collectionToRow(collection));
      }
      for (const record of set.upsertRecords) {
        upsertRecord.run(this.recordToRow(record));
        clearMembership.run(record.id);
        for (const collectionId of record.collectionIds) {
          addMembership.run(record.id, collectionId);
        }
      }
      for (const id of set.deleteRecordIds) {
        deleteRecord.run(id);
      }
      for (const id of set.deleteCollectionIds) {
        deleteCollection.run(id);
      }
    });

    try {
      transaction(changes);
    } catch (err) {
      throw ClipKeepError.from(err, ErrorCode.DB_SAVE_ERROR, {
        records: changes.upsertRecords.length,
        deletedRecords: changes.deleteRecordIds.length,
      });
    }
  }

  // ─── Row mapping ───

  private recordToRow(record: ClipRecord): ClipRecordRow {
    const content = record.content;
    let stored: StoredContent;
    let blob: Buffer | null = null;
    let favicon: Buffer | null = null;
    let previewImage: Buffer | null = null;

    switch (content.kind) {
      case 'image':
        stored = { kind: 'image', width: content.width, height: content.height };
        blob = toBuffer(content.data);
        break;
      case 'link':
        stored = { kind: 'link', url: content.url, title: content.title };
        favicon = toBuffer(content.favicon);
        previewImage = toBuffer(content.previewImage);
        break;
      default:
        stored = content;
    }

    return {
      id: record.id,
      content_kind: content.kind,
      content_key: record.contentKey,
      content_json: JSON.stringify(stored),
      content_blob: blob,
      favicon,
      preview_image: previewImage,
      plain_text: record.plainText,
      ocr_text: record.ocrText,
      title: record.title,
      source_app_id: record.sourceAppId,
      source_app_name: record.sourceAppName,
      pinned: record.pinned ? 1 : 0,
      favorite: record.favorite ? 1 : 0,
      deleted: record.deleted ? 1 : 0,
      created_at: record.createdAt,
      last_used_at: record.lastUsedAt,
      use_count: record.useCount,
      character_count: record.characterCount,
      image_dimensions: record.imageDimensions,
      link_title: record.linkTitle,
      file_name: record.fileName,
    };
  }

  private rowToContent(row: ClipRecordRow): ClipContent | null {
    let json: unknown;
    try {
      json = JSON.parse(row.content_json);
    } catch {
      return null;
    }

    const parsed = StoredContentSchema.safeParse(json);
    if (!parsed.success) return null;

    const stored = parsed.data;
    switch (stored.kind) {
      case 'image':
        if (!row.content_blob) return null;
        return { kind: 'image', data: row.content_blob, width: stored.width, height: stored.height };
      case 'link': {
        const link: LinkContent = { kind: 'link', url: stored.url };
        if (stored.title !== undefined) link.title = stored.title;
        if (row.favicon) link.favicon = row.favicon;
        if (row.preview_image) link.previewImage = row.preview_image;
        return link;
      }
      default:
        return stored;
    }
  }

  private rowToRecord(row: ClipRecordRow, collectionIds: Set<string>): ClipRecord | null {
    const content = this.rowToContent(row);
    if (!content) {
      log.warn(`Skipping record ${row.id}: stored content is unreadable`);
      return null;
    }

    return {
      id: row.id,
      content,
      contentKey: row.content_key,
      sourceAppId: row.source_app_id,
      sourceAppName: row.source_app_name,
      pinned: row.pinned === 1,
      favorite: row.favorite === 1,
      deleted: row.deleted === 1,
      createdAt: row.created_at,
      lastUsedAt: row.last_used_at,
      useCount: row.use_count,
      title: row.title,
      ocrText: row.ocr_text,
      plainText: row.plain_text,
      characterCount: row.character_count,
      imageDimensions: row.image_dimensions,
      fileName: row.file_name,
      linkTitle: row.link_title,
      collectionIds,
    };
  }

  private collectionToRow(collection: Collection): CollectionRow {
    return {
      id: collection.id,
      name: collection.name,
      icon: collection.icon,
      color_hex: collection.colorHex,
      sort_order: collection.sortOrder,
    };
  }

  private rowToCollection(row: CollectionRow): Collection {
    return {
      id: row.id,
      name: row.name,
      icon: row.icon,
      colorHex: row.color_hex,
      sortOrder: row.sort_order,
      smartFilterType: null,
    };
  }
}
