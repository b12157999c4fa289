import { fitFilename } from './attachment';

export type ContentCategory = 'image' | 'video' | 'audio' | 'document';

const MB = 1024 * 1024;

export const CONTENT_TYPE_CATEGORIES: Readonly<Record<string, ContentCategory>> = {
  'image/jpeg': 'image',
  'image/png': 'image',
  'image/webp': 'image',
  'image/gif': 'image',
  'video/mp4': 'video',
  'video/webm': 'video',
  'video/quicktime': 'video',
  'audio/mpeg': 'audio',
  'audio/wav': 'audio',
  'audio/ogg': 'audio',
  'application/pdf': 'document',
};

export const KNOWN_CONTENT_TYPES: readonly string[] = Object.keys(CONTENT_TYPE_CATEGORIES);

export const DEFAULT_SIZE_LIMITS: Readonly<Record<ContentCategory, number>> = {
  image: 20 * MB,
  video: 200 * MB,
  audio: 50 * MB,
  document: 30 * MB,
};

type Signature = readonly [offset: number, bytes: Buffer];

function sig(offset: number, bytes: string | number[]): Signature {
  return [offset, typeof bytes === 'string' ? Buffer.from(bytes, 'latin1') : Buffer.from(bytes)];
}

/**
 * File signatures per content type. Every entry of a type is a full alternative:
 * one matching alternative is enough. RIFF containers need both their markers, so
 * they are checked with `all`.
 */
const MAGIC_SIGNATURES: Readonly<Record<string, { any?: Signature[]; all?: Signature[] }>> = {
  'image/jpeg': { any: [sig(0, [0xff, 0xd8, 0xff])] },
  'image/png': { any: [sig(0, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])] },
  'image/webp': { all: [sig(0, 'RIFF'), sig(8, 'WEBP')] },
  'image/gif': { any: [sig(0, 'GIF87a'), sig(0, 'GIF89a')] },
  'video/mp4': { any: [sig(4, 'ftyp')] },
  'video/webm': { any: [sig(0, [0x1a, 0x45, 0xdf, 0xa3])] },
  'video/quicktime': { any: [sig(4, 'ftyp')] },
  'audio/mpeg': { any: [sig(0, [0xff, 0xfb]), sig(0, [0xff, 0xf3]), sig(0, [0xff, 0xf2]), sig(0, 'ID3')] },
  'audio/wav': { all: [sig(0, 'RIFF'), sig(8, 'WAVE')] },
  'audio/ogg': { any: [sig(0, 'OggS')] },
  'application/pdf': { any: [sig(0, '%PDF')] },
};

export const DEFAULT_FILENAME = 'unnamed_file';
const MAX_FILENAME_BYTES = 255;

export type SizeCheck = { ok: true } | { ok: false; reason: string };

export type UploadCheck =
  | { ok: true; filename: string }
  | { ok: false; reason: string };

export interface FileValidatorOptions {
  /** Subset of KNOWN_CONTENT_TYPES. Defaults to all of them. */
  allowedContentTypes?: readonly string[];
  sizeLimits?: Partial<Record<ContentCategory, number>>;
}

export class FileValidator {
  private readonly allowed: ReadonlySet<string>;
  private readonly sizeLimits: Readonly<Record<ContentCategory, number>>;

  constructor(opts: FileValidatorOptions = {}) {
    this.allowed = new Set(opts.allowedContentTypes ?? KNOWN_CONTENT_TYPES);
    this.sizeLimits = { ...DEFAULT_SIZE_LIMITS, ...opts.sizeLimits };
  }

  validateContentType(contentType: string): boolean {
    return this.allowed.has(contentType);
  }

  /** No signature table entry means no match: there is no default-allow. */
  validateMagicBytes(data: Buffer, claimedContentType: string): boolean {
    const entry = MAGIC_SIGNATURES[claimedContentType];
    if (!entry) return false;

    if (entry.all) {
      return entry.all.every((s) => matches(data, s));
    }
    return (entry.any ?? []).some((s) => matches(data, s));
  }

  validateFileSize(size: number, contentType: string): SizeCheck {
    const category = CONTENT_TYPE_CATEGORIES[contentType];
    if (!category) {
      return { ok: false, reason: `Unknown content type: ${contentType}` };
    }

    const limit = this.sizeLimits[category];
    if (size > limit) {
      return {
        ok: false,
        reason: `File size ${(size / MB).toFixed(1)}MB exceeds ${category} limit of ${Math.round(limit / MB)}MB`,
      };
    }
    return { ok: true };
  }

  sanitizeFilename(filename: string): string {
    return sanitizeFilename(filename);
  }

  /** type allowlist → size → magic bytes → filename, stopping at the first failure. */
  validateUpload(data: Buffer, claimedContentType: string, filename: string): UploadCheck {
    if (!this.validateContentType(claimedContentType)) {
      return { ok: false, reason: `Content type not allowed: ${claimedContentType}` };
    }

    const size = this.validateFileSize(data.length, claimedContentType);
    if (!size.ok) return size;

    if (!this.validateMagicBytes(data, claimedContentType)) {
      return { ok: false, reason: 'File content does not match claimed content type' };
    }

    return { ok: true, filename: sanitizeFilename(filename) };
  }
}

function matches(data: Buffer, [offset, bytes]: Signature): boolean {
  if (data.length < offset + bytes.length) return false;
  return data.subarray(offset, offset + bytes.length).equals(bytes);
}

export function sanitizeFilename(filename: string): string {
  let name = filename.replace(/^.*[/\\]/, '');
  name = name.replace(/[^\p{L}\p{N}_\s.-]/gu, '_');
  name = name.replace(/[\s_]+/g, '_');
  name = name.replace(/^\.+/, '');

  name = fitFilename(name, MAX_FILENAME_BYTES);

  return name || DEFAULT_FILENAME;
}
