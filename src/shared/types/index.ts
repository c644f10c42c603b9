/**
 * Shared types — single source of truth for the engine and its consumers.
 */

// Configuration
export type { ClipKeepConfig, ClipKeepConfigInput, ConfigKey } from './config';

// Clipboard history
export type {
  ContentKind,
  RichTextFormat,
  TextContent,
  RichTextContent,
  ImageContent,
  FileContent,
  LinkContent,
  ColorContent,
  ClipContent,
  Provenance,
  ContentMetadata,
  ClipRecord,
  LinkMetadata,
  Collection,
  PauseState,
  PauseDuration,
  CapturePhase,
  CaptureStatus,
  ImageSize,
  CachedImage,
} from './clipboard';
export { CONTENT_KINDS, PAUSE_PRESETS } from './clipboard';

// Errors
export { ClipKeepError, ErrorCode } from './errors';
export type { ErrorSeverity } from './errors';
