/**
 * ClipboardSource — the system clipboard as seen by the capture loop.
 *
 * The engine only reads from it. Platform adapters implement the interface;
 * MemoryClipboardSource is the in-process implementation used by tests and
 * by embedders that push clipboard changes themselves.
 */

export interface ClipboardImage {
  data: Uint8Array;
  width: number;
  height: number;
}

export interface SourceApplication {
  /** Bundle / application identifier */
  id: string | null;
  /** Display name */
  name: string | null;
}

export interface ClipboardSource {
  /** Monotonically increasing counter, bumped on every clipboard write */
  changeCount(): number;
  /** Type identifiers present on the clipboard (used for concealed markers) */
  availableTypes(): string[];
  readImage(): ClipboardImage | null;
  /** File URLs (`file://...`) currently on the clipboard */
  readFileUrls(): string[];
  readText(): string | null;
  readHtml(): string | null;
  readRtf(): string | null;
  /** Application that owned the clipboard write, when known */
  frontmostApplication(): SourceApplication | null;
}

/** Everything the classifier needs from one clipboard change */
export interface ClipboardSnapshot {
  types: string[];
  image: ClipboardImage | null;
  fileUrls: string[];
  text: string | null;
  html: string | null;
  rtf: string | null;
}

export function readSnapshot(source: ClipboardSource): ClipboardSnapshot {
  return {
    types: source.availableTypes(),
    image: source.readImage(),
    fileUrls: source.readFileUrls(),
    text: source.readText(),
    html: source.readHtml(),
    rtf: source.readRtf(),
  };
}

export interface ClipboardWrite {
  text?: string;
  html?: string;
  rtf?: string;
  image?: ClipboardImage;
  fileUrls?: string[];
  /** Extra type markers, e.g. concealed types set by password managers */
  types?: string[];
  source?: SourceApplication;
}

/**
 * In-memory clipboard. Each write() replaces the whole payload and bumps the
 * change counter, like a real pasteboard.
 */
export class MemoryClipboardSource implements ClipboardSource {
  private count = 0;
  private current: ClipboardWrite = {};

  write(payload: ClipboardWrite): void {
    this.current = { ...payload };
    this.count++;
  }

  clear(): void {
    this.write({});
  }

  changeCount(): number {
    return this.count;
  }

  availableTypes(): string[] {
    const types = [...(this.current.types ?? [])];
    if (this.current.text !== undefined) types.push('public.utf8-plain-text');
    if (this.current.html !== undefined) types.push('public.html');
    if (this.current.rtf !== undefined) types.push('public.rtf');
    if (this.current.image) types.push('public.png');
    if (this.current.fileUrls?.length) types.push('public.file-url');
    return types;
  }

  readImage(): ClipboardImage | null {
    return this.current.image ?? null;
  }

  readFileUrls(): string[] {
    return [...(this.current.fileUrls ?? [])];
  }

  readText(): string | null {
    return this.current.text ?? null;
  }

  readHtml(): string | null {
    return this.current.html ?? null;
  }

  readRtf(): string | null {
    return this.current.rtf ?? null;
  }

  frontmostApplication(): SourceApplication | null {
    return this.current.source ?? null;
  }
}
