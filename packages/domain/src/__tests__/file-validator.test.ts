import { describe, it, expect } from 'vitest';
import { FileValidator, sanitizeFilename } from '../file-validator';

const MB = 1024 * 1024;
const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46]);
const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);

function riff(format: string): Buffer {
  return Buffer.concat([Buffer.from('RIFF'), Buffer.from([0x24, 0, 0, 0]), Buffer.from(format), Buffer.alloc(4)]);
}

describe('FileValidator', () => {
  const validator = new FileValidator();

  describe('validateContentType', () => {
    it('accepts every known type by default', () => {
      expect(validator.validateContentType('image/jpeg')).toBe(true);
      expect(validator.validateContentType('application/pdf')).toBe(true);
    });

    it('rejects types outside the allowlist', () => {
      expect(validator.validateContentType('application/zip')).toBe(false);
      const narrow = new FileValidator({ allowedContentTypes: ['image/png'] });
      expect(narrow.validateContentType('image/jpeg')).toBe(false);
      expect(narrow.validateContentType('image/png')).toBe(true);
    });
  });

  describe('validateMagicBytes', () => {
    it('matches the claimed type only', () => {
      expect(validator.validateMagicBytes(PNG, 'image/png')).toBe(true);
      expect(validator.validateMagicBytes(PNG, 'image/jpeg')).toBe(false);
      expect(validator.validateMagicBytes(JPEG, 'image/jpeg')).toBe(true);
    });

    it('requires both RIFF markers', () => {
      expect(validator.validateMagicBytes(riff('WEBP'), 'image/webp')).toBe(true);
      expect(validator.validateMagicBytes(riff('WAVE'), 'image/webp')).toBe(false);
      expect(validator.validateMagicBytes(riff('WAVE'), 'audio/wav')).toBe(true);
    });

    it('finds ftyp at offset 4 for mp4 and quicktime', () => {
      const mp4 = Buffer.concat([Buffer.from([0, 0, 0, 0x18]), Buffer.from('ftypisom')]);
      expect(validator.validateMagicBytes(mp4, 'video/mp4')).toBe(true);
      expect(validator.validateMagicBytes(mp4, 'video/quicktime')).toBe(true);
    });

    it('rejects unknown types and truncated data', () => {
      expect(validator.validateMagicBytes(Buffer.from('hello'), 'text/plain')).toBe(false);
      expect(validator.validateMagicBytes(Buffer.from([0xff, 0xd8]), 'image/jpeg')).toBe(false);
    });
  });

  describe('validateFileSize', () => {
    it('accepts a file exactly at the category limit', () => {
      expect(validator.validateFileSize(20 * MB, 'image/png')).toEqual({ ok: true });
    });

    it('rejects one byte over', () => {
      expect(validator.validateFileSize(20 * MB + 1, 'image/png')).toEqual({
        ok: false,
        reason: 'File size 20.0MB exceeds image limit of 20MB',
      });
    });

    it('uses configured limits', () => {
      const small = new FileValidator({ sizeLimits: { image: MB } });
      expect(small.validateFileSize(1.5 * MB, 'image/gif')).toEqual({
        ok: false,
        reason: 'File size 1.5MB exceeds image limit of 1MB',
      });
      expect(small.validateFileSize(100 * MB, 'video/mp4')).toEqual({ ok: true });
    });

    it('rejects unknown content types', () => {
      expect(validator.validateFileSize(10, 'text/plain')).toEqual({
        ok: false,
        reason: 'Unknown content type: text/plain',
      });
    });
  });

  describe('validateUpload', () => {
    it('checks the type before anything else', () => {
      expect(validator.validateUpload(PNG, 'application/zip', 'a.zip')).toEqual({
        ok: false,
        reason: 'Content type not allowed: application/zip',
      });
    });

    it('checks size before content', () => {
      const tiny = new FileValidator({ sizeLimits: { image: 4 } });
      const result = tiny.validateUpload(PNG, 'image/jpeg', 'a.jpg');
      expect(result.ok).toBe(false);
      expect(result.ok ? '' : result.reason).toMatch(/^File size /);
    });

    it('rejects content that does not match the claimed type', () => {
      expect(validator.validateUpload(PNG, 'image/jpeg', 'a.jpg')).toEqual({
        ok: false,
        reason: 'File content does not match claimed content type',
      });
    });

    it('returns the sanitized filename on success', () => {
      expect(validator.validateUpload(JPEG, 'image/jpeg', '../../photo.jpg')).toEqual({
        ok: true,
        filename: 'photo.jpg',
      });
    });
  });
});

describe('sanitizeFilename', () => {
  it('strips directory components', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\Users\\me\\photo.jpg')).toBe('photo.jpg');
  });

  it('replaces unsafe characters and collapses runs', () => {
    expect(sanitizeFilename('my photo (1).jpg')).toBe('my_photo_1_.jpg');
    expect(sanitizeFilename('a  <b>.png')).toBe('a_b_.png');
  });

  it('keeps unicode letters', () => {
    expect(sanitizeFilename('rapport_été.pdf')).toBe('rapport_été.pdf');
  });

  it('drops leading dots', () => {
    expect(sanitizeFilename('...hidden')).toBe('hidden');
  });

  it('falls back to a default name', () => {
    expect(sanitizeFilename('')).toBe('unnamed_file');
    expect(sanitizeFilename('///')).toBe('unnamed_file');
    expect(sanitizeFilename('...')).toBe('unnamed_file');
  });

  it('truncates to 255 bytes keeping the extension', () => {
    const name = sanitizeFilename(`${'a'.repeat(300)}.jpg`);
    expect(name).toBe(`${'a'.repeat(251)}.jpg`);
  });

  it('never splits a multi-byte character', () => {
    const name = sanitizeFilename('é'.repeat(200));
    expect(name).toBe('é'.repeat(127));
    expect(Buffer.byteLength(name, 'utf8')).toBe(254);
  });
});
