/**
 * EnrichmentService — asynchronous, best-effort decoration of new records.
 *
 * Link records get page metadata, image records get recognised text. Work is
 * fire-and-forget from the capture loop's point of view; results are merged
 * back through the history store, which re-resolves the record by id and
 * drops results for records that were deleted in the meantime.
 *
 * @module enrichment-service
 */

import { createLogger } from './logger';
import { ClipKeepError, ErrorCode } from '../../shared/types/errors';
import type { HistoryStore } from './history-store';
import type { LinkMetadataFetcher } from './link-metadata-service';
import type { ClipRecord } from '../../shared/types/clipboard';

const log = createLogger('Enrichment');

/** Recognises text in an image (OCR engine adapter) */
export interface TextRecognizer {
  recognize(image: Uint8Array): Promise<string>;
}

export interface EnrichmentOptions {
  linkFetcher?: LinkMetadataFetcher | null;
  textRecognizer?: TextRecognizer | null;
  /** Checked when a task is scheduled, so config toggles apply immediately */
  isLinkEnrichmentEnabled?: () => boolean;
  isTextRecognitionEnabled?: () => boolean;
}

export class EnrichmentService {
  private readonly linkFetcher: LinkMetadataFetcher | null;
  private readonly textRecognizer: TextRecognizer | null;
  private readonly linksEnabled: () => boolean;
  private readonly recognitionEnabled: () => boolean;
  private inFlight = new Set<Promise<void>>();

  constructor(
    private readonly history: HistoryStore,
    options: EnrichmentOptions = {},
  ) {
    this.linkFetcher = options.linkFetcher ?? null;
    this.textRecognizer = options.textRecognizer ?? null;
    this.linksEnabled = options.isLinkEnrichmentEnabled ?? (() => true);
    this.recognitionEnabled = options.isTextRecognitionEnabled ?? (() => true);
  }

  /**
   * Start enrichment for a freshly captured record. Returns false when the
   * record's kind has nothing to enrich or the relevant collaborator is off.
   */
  schedule(record: ClipRecord): boolean {
    const task = this.taskFor(record);
    if (!task) return false;

    const tracked = task
      .catch((err: unknown) => {
        const error = ClipKeepError.from(err, ErrorCode.ENRICHMENT_ERROR, { recordId: record.id });
        log.warn(`Enrichment of ${record.id} failed: ${error.message}`);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });

    this.inFlight.add(tracked);
    return true;
  }

  /** Number of tasks still running */
  pendingCount(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once every scheduled task (including ones scheduled meanwhile)
   * has settled. With `timeoutMs`, gives up after that long; the result says
   * whether the pipeline actually went idle.
   */
  async whenIdle(timeoutMs?: number): Promise<boolean> {
    const drain = async (): Promise<boolean> => {
      while (this.inFlight.size > 0) {
        await Promise.all([...this.inFlight]);
      }
      return true;
    };
    if (timeoutMs === undefined) return drain();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([drain(), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private taskFor(record: ClipRecord): Promise<void> | null {
    const content = record.content;

    if (content.kind === 'link') {
      const fetcher = this.linkFetcher;
      if (!fetcher || !this.linksEnabled()) return null;
      return fetcher.fetch(content.url).then((metadata) => {
        if (!this.history.applyLinkMetadata(record.id, metadata)) {
          log.debug(`Discarding link metadata for ${record.id}: record is gone`);
        }
      });
    }

    if (content.kind === 'image') {
      const recognizer = this.textRecognizer;
      if (!recognizer || !this.recognitionEnabled()) return null;
      return recognizer.recognize(content.data).then((text) => {
        if (text.trim() === '') return;
        if (!this.history.applyRecognizedText(record.id, text)) {
          log.debug(`Discarding recognised text for ${record.id}: record is gone`);
        }
      });
    }

    return null;
  }
}
