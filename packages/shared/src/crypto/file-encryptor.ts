import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';
import { CompactEncrypt, compactDecrypt } from 'jose';
import { EncryptionError, errorMessage, type DecryptedChunk, type EnvelopeEncryptor } from '@appraise/domain';

const ALGORITHM = 'aes-256-gcm';
const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const INDEX_BYTES = 4;
const MAX_CHUNK_INDEX = 0xffffffff;

/**
 * Envelope encryption for stored files.
 *
 * Every file gets its own random 256-bit data key (DEK). File bytes are sealed with AES-256-GCM
 * under the DEK; the DEK is wrapped as a compact JWE (`dir` + A256CBC-HS512) under a 512-bit key
 * derived from the master secret, and only the wrapped form is ever persisted.
 *
 * Layouts:
 * - whole file: `nonce(12) ‖ ciphertext ‖ tag(16)`
 * - chunk: `index(u32 LE) ‖ nonce(12) ‖ ciphertext ‖ tag(16)`, with the index header also bound
 *   as associated data
 */
export class FileEncryptor implements EnvelopeEncryptor {
  private readonly wrappingKey: Uint8Array;

  constructor(masterKey: string) {
    if (masterKey.length === 0) {
      throw new EncryptionError('INVALID_KEY', 'Master key must not be empty');
    }
    this.wrappingKey = new Uint8Array(createHash('sha512').update(masterKey, 'utf8').digest());
  }

  generateFileKey(): Buffer {
    return randomBytes(KEY_BYTES);
  }

  async wrapKey(fileKey: Buffer): Promise<string> {
    assertFileKey(fileKey);
    return new CompactEncrypt(new Uint8Array(fileKey))
      .setProtectedHeader({ alg: 'dir', enc: 'A256CBC-HS512' })
      .encrypt(this.wrappingKey);
  }

  async unwrapKey(wrappedKey: string): Promise<Buffer> {
    let plaintext: Uint8Array;
    try {
      ({ plaintext } = await compactDecrypt(wrappedKey, this.wrappingKey, {
        keyManagementAlgorithms: ['dir'],
        contentEncryptionAlgorithms: ['A256CBC-HS512'],
      }));
    } catch (err) {
      throw new EncryptionError('INVALID_KEY', `Could not unwrap file key: ${errorMessage(err)}`);
    }
    const fileKey = Buffer.from(plaintext);
    assertFileKey(fileKey);
    return fileKey;
  }

  encryptFile(data: Buffer, fileKey: Buffer): Buffer {
    return seal(data, fileKey);
  }

  decryptFile(encrypted: Buffer, fileKey: Buffer): Buffer {
    return open(encrypted, fileKey);
  }

  encryptChunk(data: Buffer, fileKey: Buffer, chunkIndex: number): Buffer {
    if (!Number.isInteger(chunkIndex) || chunkIndex < 0 || chunkIndex > MAX_CHUNK_INDEX) {
      throw new EncryptionError('MALFORMED', `Chunk index out of range: ${chunkIndex}`);
    }
    const header = Buffer.alloc(INDEX_BYTES);
    header.writeUInt32LE(chunkIndex);
    return Buffer.concat([header, seal(data, fileKey, header)]);
  }

  decryptChunk(encrypted: Buffer, fileKey: Buffer): DecryptedChunk {
    if (encrypted.length < INDEX_BYTES + NONCE_BYTES + TAG_BYTES) {
      throw new EncryptionError('MALFORMED', 'Encrypted chunk is too short');
    }
    const header = encrypted.subarray(0, INDEX_BYTES);
    return {
      index: header.readUInt32LE(0),
      data: open(encrypted.subarray(INDEX_BYTES), fileKey, header),
    };
  }
}

function seal(data: Buffer, fileKey: Buffer, aad?: Buffer): Buffer {
  assertFileKey(fileKey);
  const nonce = randomBytes(NONCE_BYTES);
  const cipher = createCipheriv(ALGORITHM, fileKey, nonce, { authTagLength: TAG_BYTES });
  if (aad) cipher.setAAD(aad);
  const ciphertext = Buffer.concat([cipher.update(data), cipher.final()]);
  return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
}

function open(sealed: Buffer, fileKey: Buffer, aad?: Buffer): Buffer {
  assertFileKey(fileKey);
  if (sealed.length < NONCE_BYTES + TAG_BYTES) {
    throw new EncryptionError('MALFORMED', 'Encrypted payload is too short');
  }
  const nonce = sealed.subarray(0, NONCE_BYTES);
  const tag = sealed.subarray(sealed.length - TAG_BYTES);
  const ciphertext = sealed.subarray(NONCE_BYTES, sealed.length - TAG_BYTES);

  const decipher = createDecipheriv(ALGORITHM, fileKey, nonce, { authTagLength: TAG_BYTES });
  decipher.setAuthTag(tag);
  if (aad) decipher.setAAD(aad);
  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new EncryptionError('AUTHENTICATION_FAILED', 'Decryption failed: data was modified or the key is wrong');
  }
}

function assertFileKey(fileKey: Buffer): void {
  if (fileKey.length !== KEY_BYTES) {
    throw new EncryptionError('INVALID_KEY', `File key must be ${KEY_BYTES} bytes, got ${fileKey.length}`);
  }
}
