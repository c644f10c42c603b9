/**
 * Clipboard history types — shared between the capture engine and its consumers.
 *
 * @module clipboard
 */

/** The six built-in content kinds */
export type ContentKind = 'text' | 'richText' | 'image' | 'file' | 'link' | 'color';

export const CONTENT_KINDS: readonly ContentKind[] = ['text', 'richText', 'image', 'file', 'link', 'color'];

export type RichTextFormat = 'html' | 'rtf';

export interface TextContent {
  kind: 'text';
  text: string;
}

export interface RichTextContent {
  kind: 'richText';
  /** Plain-text rendition, used for search and previews */
  text: string;
  format: RichTextFormat;
  /** Raw formatting payload (HTML markup or RTF source) */
  data: string;
}

export interface ImageContent {
  kind: 'image';
  data: Uint8Array;
  width: number;
  height: number;
}

export interface FileContent {
  kind: 'file';
  path: string;
  name: string;
}

export interface LinkContent {
  kind: 'link';
  url: string;
  title?: string;
  favicon?: Uint8Array;
  previewImage?: Uint8Array;
}

export interface ColorContent {
  kind: 'color';
  hex: string;
}

/** Classified clipboard payload */
export type ClipContent =
  | TextContent
  | RichTextContent
  | ImageContent
  | FileContent
  | LinkContent
  | ColorContent;

/** Where a clip came from (both fields may be unknown) */
export interface Provenance {
  sourceAppId: string | null;
  sourceAppName: string | null;
}

/** Metadata derived from content and stored next to it */
export interface ContentMetadata {
  plainText: string | null;
  characterCount: number | null;
  imageDimensions: string | null;
  fileName: string | null;
  linkTitle: string | null;
}

/** One captured clipboard entry */
export interface ClipRecord extends Provenance, ContentMetadata {
  /** Stable unique identifier (UUID v4) */
  id: string;
  content: ClipContent;
  /** `<kind>:<sha256>` of the meaningful payload; basis for deduplication */
  contentKey: string;
  pinned: boolean;
  favorite: boolean;
  /** Soft-delete tombstone */
  deleted: boolean;
  /** Epoch ms; primary sort key (descending) */
  createdAt: number;
  /** Epoch ms */
  lastUsedAt: number;
  useCount: number;
  /** User-assigned title */
  title: string | null;
  /** Text recognised in an image clip */
  ocrText: string | null;
  /** Custom collection ids */
  collectionIds: Set<string>;
}

/** Result of fetching a link's page metadata */
export interface LinkMetadata {
  title: string | null;
  favicon: Uint8Array | null;
  previewImage: Uint8Array | null;
}

/** A named tag set; smart collections compute membership from content kind */
export interface Collection {
  id: string;
  name: string;
  icon: string;
  colorHex: string;
  sortOrder: number;
  smartFilterType: ContentKind | null;
}

/** Capture pause state */
export type PauseState =
  | { state: 'active' }
  | { state: 'paused-until'; until: number }
  | { state: 'paused-indefinitely' };

/** Pause length in ms, or until `resume()` is called */
export type PauseDuration = number | 'until-resumed';

export const PAUSE_PRESETS = {
  fiveMinutes: 5 * 60 * 1000,
  fifteenMinutes: 15 * 60 * 1000,
  oneHour: 60 * 60 * 1000,
  untilResumed: 'until-resumed',
} as const satisfies Record<string, PauseDuration>;

/** Capture loop phase */
export type CapturePhase = 'idle' | 'filtering' | 'classifying' | 'committing';

/** Capture loop status */
export interface CaptureStatus {
  monitoring: boolean;
  phase: CapturePhase;
  pause: PauseState;
  totalRecords: number;
  pinnedRecords: number;
  newClipCount: number;
  /** ISO timestamp */
  startedAt?: string;
}

/** Width/height box for derived images */
export interface ImageSize {
  width: number;
  height: number;
}

/** A decoded, rescaled image held by the derived-asset cache */
export interface CachedImage {
  data: Buffer;
  width: number;
  height: number;
}
