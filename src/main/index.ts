/**
 * clipkeep — clipboard capture & history engine.
 *
 * Embedders construct a ServiceContainer with a ClipboardSource and a data
 * directory; individual services are exported for composition and tests.
 */

export { ServiceContainer } from './services/service-container';
export type { ContainerOptions, ServiceKey, ServiceMap } from './services/service-container';

export { ConfigService } from './services/config';
export { DatabaseService, IN_MEMORY_DATABASE } from './services/database-service';
export type { ClipRepository, ChangeSet } from './services/database-service';
export { UnitOfWork } from './services/unit-of-work';
export { HistoryStore } from './services/history-store';
export type { CollectionLookup, HistoryStoreOptions, InsertOutcome } from './services/history-store';
export { CollectionService, SMART_COLLECTIONS, smartCollectionId } from './services/collection-service';
export { CaptureService, isConcealed, isIgnoredApplication } from './services/capture-service';
export type { CaptureSettings, SkipReason } from './services/capture-service';
export { EnrichmentService } from './services/enrichment-service';
export type { TextRecognizer, EnrichmentOptions } from './services/enrichment-service';
export { HttpLinkMetadataFetcher, parsePageHead } from './services/link-metadata-service';
export type { LinkMetadataFetcher, PageHead } from './services/link-metadata-service';
export { ImageCacheService } from './services/image-cache-service';
export { LRUCache } from './services/lru-cache';
export { classify, contentKey, contentEquals, describeContent, isColorHex, isLink } from './services/content-classifier';
export { MemoryClipboardSource, readSnapshot } from './services/clipboard-source';
export type {
  ClipboardImage,
  ClipboardSnapshot,
  ClipboardSource,
  ClipboardWrite,
  SourceApplication,
} from './services/clipboard-source';
export { createLogger, setLogLevel, getLogLevel } from './services/logger';
export type { Logger, LogLevel } from './services/logger';

export * from '../shared/types';
