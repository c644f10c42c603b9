import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
  })),
}));

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DatabaseService, IN_MEMORY_DATABASE, type ChangeSet } from '../src/main/services/database-service';
import { ClipKeepError, ErrorCode } from '../src/shared/types/errors';
import type { ClipContent, ClipRecord, Collection } from '../src/shared/types/clipboard';

const T0 = 1_700_000_000_000;

function makeRecord(id: string, content: ClipContent, createdAt: number, overrides: Partial<ClipRecord> = {}): ClipRecord {
  return {
    id,
    content,
    contentKey: `${content.kind}:${id}`,
    sourceAppId: null,
    sourceAppName: null,
    pinned: false,
    favorite: false,
    deleted: false,
    createdAt,
    lastUsedAt: createdAt,
    useCount: 1,
    title: null,
    ocrText: null,
    plainText: null,
    characterCount: null,
    imageDimensions: null,
    fileName: null,
    linkTitle: null,
    collectionIds: new Set(),
    ...overrides,
  };
}

function makeCollection(id: string, name: string, sortOrder: number): Collection {
  return { id, name, icon: 'folder', colorHex: '#007AFF', sortOrder, smartFilterType: null };
}

function changes(partial: Partial<ChangeSet>): ChangeSet {
  return { upsertRecords: [], deleteRecordIds: [], upsertCollections: [], deleteCollectionIds: [], ...partial };
}

describe('DatabaseService', () => {
  let db: DatabaseService;

  beforeEach(() => {
    db = new DatabaseService(IN_MEMORY_DATABASE);
    db.initialize();
  });

  afterEach(() => {
    db.close();
  });

  // ─── Lifecycle ───

  it('runs every migration', () => {
    expect(db.getSchemaVersion()).toBe(2);
    expect(db.isOpen()).toBe(true);
  });

  it('refuses queries before initialize()', () => {
    const closed = new DatabaseService(IN_MEMORY_DATABASE);
    let caught: unknown;
    try {
      closed.loadRecords();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ClipKeepError);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_STATE });
  });

  it('creates the data directory and reopens an existing file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipkeep-db-'));
    const file = path.join(dir, 'nested', 'clipkeep.db');
    try {
      const first = new DatabaseService(file);
      first.initialize();
      first.applyChanges(changes({ upsertRecords: [makeRecord('r1', { kind: 'text', text: 'kept' }, T0)] }));
      first.close();

      const second = new DatabaseService(file);
      second.initialize();
      expect(second.getSchemaVersion()).toBe(2);
      expect(second.loadRecords().map((r) => r.id)).toEqual(['r1']);
      second.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  // ─── Records ───

  it('loads records newest first', () => {
    db.applyChanges(
      changes({
        upsertRecords: [
          makeRecord('old', { kind: 'text', text: 'a' }, T0),
          makeRecord('new', { kind: 'text', text: 'b' }, T0 + 2),
          makeRecord('mid', { kind: 'color', hex: '#FF0000' }, T0 + 1),
        ],
      }),
    );

    expect(db.loadRecords().map((r) => r.id)).toEqual(['new', 'mid', 'old']);
  });

  it('round-trips every field of a record', () => {
    const record = makeRecord('r1', { kind: 'text', text: 'hello' }, T0, {
      sourceAppId: 'com.example.editor',
      sourceAppName: 'Editor',
      pinned: true,
      favorite: true,
      lastUsedAt: T0 + 5,
      useCount: 3,
      title: 'Greeting',
      plainText: 'hello',
      characterCount: 5,
    });
    db.applyChanges(changes({ upsertRecords: [record] }));

    expect(db.loadRecords()).toEqual([record]);
  });

  it('stores image bytes and link assets as blobs', () => {
    db.applyChanges(
      changes({
        upsertRecords: [
          makeRecord('img', { kind: 'image', data: new Uint8Array([1, 2, 3]), width: 3, height: 1 }, T0, {
            imageDimensions: '3 × 1',
          }),
          makeRecord(
            'lnk',
            {
              kind: 'link',
              url: 'https://example.com',
              title: 'Example',
              favicon: new Uint8Array([9]),
            },
            T0 + 1,
          ),
        ],
      }),
    );

    const [link, image] = db.loadRecords();
    expect(link.content).toEqual({
      kind: 'link',
      url: 'https://example.com',
      title: 'Example',
      favicon: Buffer.from([9]),
    });
    expect(image.content).toEqual({ kind: 'image', data: Buffer.from([1, 2, 3]), width: 3, height: 1 });
    expect(image.imageDimensions).toBe('3 × 1');
  });

  it('updates mutable fields on upsert', () => {
    const record = makeRecord('r1', { kind: 'text', text: 'x' }, T0);
    db.applyChanges(changes({ upsertRecords: [record] }));

    record.pinned = true;
    record.useCount = 4;
    record.createdAt = T0 + 100;
    db.applyChanges(changes({ upsertRecords: [record] }));

    expect(db.loadRecords()[0]).toMatchObject({ pinned: true, useCount: 4, createdAt: T0 + 100 });
  });

  it('skips tombstones when loading and purges them on request', () => {
    db.applyChanges(
      changes({
        upsertRecords: [
          makeRecord('live', { kind: 'text', text: 'a' }, T0),
          makeRecord('gone', { kind: 'text', text: 'b' }, T0 + 1, { deleted: true }),
        ],
      }),
    );

    expect(db.loadRecords().map((r) => r.id)).toEqual(['live']);
    expect(db.purgeDeletedRecords()).toBe(1);
    expect(db.purgeDeletedRecords()).toBe(0);
  });

  it('deletes records by id', () => {
    db.applyChanges(changes({ upsertRecords: [makeRecord('r1', { kind: 'text', text: 'a' }, T0)] }));
    db.applyChanges(changes({ deleteRecordIds: ['r1'] }));
    expect(db.loadRecords()).toEqual([]);
  });

  // ─── Collections & membership ───

  it('loads collections by sort order', () => {
    db.applyChanges(
      changes({ upsertCollections: [makeCollection('c2', 'Home', 1), makeCollection('c1', 'Work', 0)] }),
    );

    expect(db.loadCollections().map((c) => c.name)).toEqual(['Work', 'Home']);
  });

  it('saves membership with the record and drops it with the collection', () => {
    const work = makeCollection('c1', 'Work', 0);
    const home = makeCollection('c2', 'Home', 1);
    const record = makeRecord('r1', { kind: 'text', text: 'a' }, T0, { collectionIds: new Set(['c1', 'c2']) });
    db.applyChanges(changes({ upsertCollections: [work, home], upsertRecords: [record] }));

    expect([...db.loadRecords()[0].collectionIds].sort()).toEqual(['c1', 'c2']);

    db.applyChanges(changes({ deleteCollectionIds: ['c2'] }));

    const [reloaded] = db.loadRecords();
    expect(reloaded.id).toBe('r1');
    expect([...reloaded.collectionIds]).toEqual(['c1']);
  });

  it('rolls back the whole change set when one write fails', () => {
    const orphan = makeRecord('r1', { kind: 'text', text: 'a' }, T0, { collectionIds: new Set(['missing']) });
    let caught: unknown;
    try {
      db.applyChanges(changes({ upsertCollections: [makeCollection('c1', 'Work', 0)], upsertRecords: [orphan] }));
    } catch (err) {
      caught = err;
    }

    expect(caught).toMatchObject({ code: ErrorCode.DB_SAVE_ERROR });
    expect(db.loadRecords()).toEqual([]);
    expect(db.loadCollections()).toEqual([]);
  });

  it('skips rows whose stored content cannot be read', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipkeep-db-'));
    const file = path.join(dir, 'clipkeep.db');
    try {
      const svc = new DatabaseService(file);
      svc.initialize();
      svc.applyChanges(
        changes({
          upsertRecords: [
            makeRecord('good', { kind: 'text', text: 'a' }, T0),
            makeRecord('bad', { kind: 'text', text: 'b' }, T0 + 1),
          ],
        }),
      );
      svc.close();

      const raw = new Database(file);
      raw.prepare("UPDATE clip_records SET content_json = '{\"kind\":\"hologram\"}' WHERE id = 'bad'").run();
      raw.close();

      svc.initialize();
      expect(svc.loadRecords().map((r) => r.id)).toEqual(['good']);
      svc.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
