/**
 * Content classification — turns a clipboard snapshot into a typed ClipContent.
 *
 * Priority when several representations are present:
 *   Image > File > Link > Color > RichText > Text
 *
 * Everything here is pure: no I/O, no clock, no logging.
 *
 * @module content-classifier
 */

import { createHash } from 'crypto';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { ClipboardSnapshot } from './clipboard-source';
import type { ClipContent, ContentMetadata } from '../../shared/types/clipboard';

// ─── Detection patterns ───

const COLOR_HEX_PATTERN = /^#?[0-9A-Fa-f]{6}([0-9A-Fa-f]{2})?$/;
const LINK_PREFIX_PATTERN = /^https?:\/\//i;

/**
 * A link is an http(s) URL with a non-empty host.
 */
export function isLink(text: string): boolean {
  const trimmed = text.trim();
  if (!LINK_PREFIX_PATTERN.test(trimmed)) return false;

  try {
    const url = new URL(trimmed);
    return url.hostname.length > 0;
  } catch {
    return false;
  }
}

export function isColorHex(text: string): boolean {
  return COLOR_HEX_PATTERN.test(text.trim());
}

function fileFromUrl(fileUrl: string): ClipContent | null {
  let filePath: string;
  try {
    filePath = fileURLToPath(fileUrl);
  } catch {
    return null;
  }
  return { kind: 'file', path: filePath, name: path.basename(filePath) || filePath };
}

/**
 * Classify a clipboard snapshot. Returns null for empty or unsupported payloads.
 */
export function classify(snapshot: ClipboardSnapshot): ClipContent | null {
  const image = snapshot.image;
  if (image && image.data.byteLength > 0 && image.width > 0 && image.height > 0) {
    return { kind: 'image', data: image.data, width: image.width, height: image.height };
  }

  for (const fileUrl of snapshot.fileUrls) {
    const file = fileFromUrl(fileUrl);
    if (file) return file;
  }

  const text = snapshot.text;
  if (text === null || text === '') return null;

  const trimmed = text.trim();
  if (isLink(trimmed)) {
    return { kind: 'link', url: trimmed };
  }

  if (isColorHex(trimmed)) {
    return { kind: 'color', hex: trimmed };
  }

  if (snapshot.html) {
    return { kind: 'richText', text, format: 'html', data: snapshot.html };
  }
  if (snapshot.rtf) {
    return { kind: 'richText', text, format: 'rtf', data: snapshot.rtf };
  }

  return { kind: 'text', text };
}

// ─── Identity ───

function sha256(...parts: Array<string | Uint8Array>): string {
  const hash = createHash('sha256');
  parts.forEach((part, i) => {
    if (i > 0) hash.update('\u0000');
    hash.update(part);
  });
  return hash.digest('hex');
}

/**
 * Content key: equal keys ⇔ structurally equal payloads.
 * Link metadata (title, favicon, preview) never participates.
 */
export function contentKey(content: ClipContent): string {
  switch (content.kind) {
    case 'text':
      return `text:${sha256(content.text)}`;
    case 'richText':
      return `richText:${sha256(content.text, content.format, content.data)}`;
    case 'image':
      return `image:${sha256(content.data)}`;
    case 'file':
      return `file:${sha256(content.path)}`;
    case 'link':
      return `link:${sha256(content.url)}`;
    case 'color':
      return `color:${sha256(content.hex)}`;
  }
}

export function contentEquals(a: ClipContent, b: ClipContent): boolean {
  return contentKey(a) === contentKey(b);
}

// ─── Derived metadata ───

export function describeContent(content: ClipContent): ContentMetadata {
  const metadata: ContentMetadata = {
    plainText: null,
    characterCount: null,
    imageDimensions: null,
    fileName: null,
    linkTitle: null,
  };

  switch (content.kind) {
    case 'text':
    case 'richText':
      metadata.plainText = content.text;
      metadata.characterCount = [...content.text].length;
      break;
    case 'link':
      metadata.plainText = content.url;
      metadata.characterCount = [...content.url].length;
      metadata.linkTitle = content.title || null;
      break;
    case 'image':
      metadata.imageDimensions = `${content.width}x${content.height}`;
      break;
    case 'file':
      metadata.fileName = content.name;
      break;
    case 'color':
      metadata.plainText = content.hex;
      break;
  }

  return metadata;
}
