/**
 * credentialCipher.ts — Encryption of stored credentials.
 *
 * Key: PBKDF2-SHA256 over the credential key label, salted with the
 * machine identifier (hostname, padded or truncated to 16 bytes).
 * Payload: AES-256-GCM, serialised as `iv:authTag:ciphertext` in hex.
 *
 * A blob written on one machine cannot be read on another, and one key's
 * blob cannot be decrypted under another key's label.
 */

import * as crypto from 'crypto';
import { hostname } from 'os';
import { z } from 'zod';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const SALT_LENGTH = 16;
const PBKDF2_ITERATIONS = 100_000;

const payloadSchema = z.object({
  username: z.string(),
  password: z.string(),
});

export type CredentialPayload = z.infer<typeof payloadSchema>;

/** 16-byte salt from a machine identifier; short ids are right-padded with '0'. */
export function machineSalt(machineId: string): Buffer {
  const bytes = Buffer.from(machineId, 'utf8');
  if (bytes.length >= SALT_LENGTH) return bytes.subarray(0, SALT_LENGTH);
  return Buffer.concat([bytes, Buffer.alloc(SALT_LENGTH - bytes.length, '0')]);
}

export class CredentialCipher {
  private readonly salt: Buffer;
  private readonly keys = new Map<string, Buffer>();

  constructor(machineId: string = hostname()) {
    this.salt = machineSalt(machineId);
  }

  encrypt(label: string, payload: CredentialPayload): string {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.keyFor(label), iv);

    let encrypted = cipher.update(JSON.stringify(payload), 'utf8', 'hex');
    encrypted += cipher.final('hex');

    const authTag = cipher.getAuthTag();

    // Format: iv:authTag:ciphertext
    return `${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
  }

  /** Throws when the blob is malformed, tampered with, or was sealed under another label. */
  decrypt(label: string, encrypted: string): CredentialPayload {
    const parts = encrypted.split(':');
    if (parts.length !== 3) {
      throw new Error('Encrypted credential must have the form iv:authTag:ciphertext');
    }
    const [ivHex, tagHex, ciphertext] = parts;

    const decipher = crypto.createDecipheriv(ALGORITHM, this.keyFor(label), Buffer.from(ivHex, 'hex'));
    decipher.setAuthTag(Buffer.from(tagHex, 'hex'));

    let decrypted = decipher.update(ciphertext, 'hex', 'utf8');
    decrypted += decipher.final('utf8');

    return payloadSchema.parse(JSON.parse(decrypted));
  }

  private keyFor(label: string): Buffer {
    let key = this.keys.get(label);
    if (!key) {
      key = crypto.pbkdf2Sync(label, this.salt, PBKDF2_ITERATIONS, KEY_LENGTH, 'sha256');
      this.keys.set(label, key);
    }
    return key;
  }
}
