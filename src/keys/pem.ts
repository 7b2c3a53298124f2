/**
 * PEM encoding of Rubix keys
 *
 * Public keys are stored as the base64 of the 33-byte compressed point.
 * Private keys are stored encrypted: `salt(16) ‖ nonce(12) ‖ ciphertext ‖ tag(16)`
 * with AES-256-GCM under a PBKDF2-HMAC-SHA256 key of the passphrase.
 */

import { createCipheriv, createDecipheriv, pbkdf2, randomBytes } from 'crypto';
import { promisify } from 'util';
import { StorageError } from '../errors';
import { bytesToHex, hexToBytes } from '../utils/crypto';

const pbkdf2Async = promisify(pbkdf2);

export const PUBLIC_KEY_LABEL = 'PUBLIC KEY';
export const ENCRYPTED_PRIVATE_KEY_LABEL = 'ENCRYPTED PRIVATE KEY';
export const DEFAULT_PASSPHRASE = 'mypassword';
export const DEFAULT_KDF_ITERATIONS = 200_000;

const SALT_LENGTH = 16;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const PRIVATE_KEY_LENGTH = 32;

export interface PrivateKeyEncryption {
  passphrase?: string;
  iterations?: number;
}

function wrapPem(label: string, body: Uint8Array): string {
  const b64 = Buffer.from(body).toString('base64');
  const lines = b64.match(/.{1,64}/g) ?? [];
  return `-----BEGIN ${label}-----\n${lines.join('\n')}\n-----END ${label}-----\n`;
}

function unwrapPem(label: string, pem: string): Buffer {
  const begin = `-----BEGIN ${label}-----`;
  const end = `-----END ${label}-----`;
  const start = pem.indexOf(begin);
  const stop = pem.indexOf(end);

  if (start === -1 || stop === -1 || stop < start) {
    throw new StorageError(`PEM does not contain a ${label} block`);
  }

  const body = pem.slice(start + begin.length, stop).replace(/\s+/g, '');
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(body)) {
    throw new StorageError(`${label} PEM body is not valid base64`);
  }
  return Buffer.from(body, 'base64');
}

export function encodePublicKeyPem(publicKeyHex: string): string {
  return wrapPem(PUBLIC_KEY_LABEL, hexToBytes(publicKeyHex));
}

/**
 * Compressed public key hex of a `PUBLIC KEY` PEM
 */
export function decodePublicKeyPem(pem: string): string {
  const bytes = unwrapPem(PUBLIC_KEY_LABEL, pem);
  if (bytes.length !== 33 || (bytes[0] !== 2 && bytes[0] !== 3)) {
    throw new StorageError('Decoded key is not a compressed secp256k1 public key');
  }
  return bytesToHex(bytes);
}

function deriveKey(passphrase: string, salt: Uint8Array, iterations: number): Promise<Buffer> {
  return pbkdf2Async(passphrase, salt, iterations, KEY_LENGTH, 'sha256');
}

export async function encryptPrivateKeyPem(
  privateKey: Uint8Array,
  options: PrivateKeyEncryption = {}
): Promise<string> {
  if (privateKey.length !== PRIVATE_KEY_LENGTH) {
    throw new StorageError('Private key must be 32 bytes');
  }

  const salt = randomBytes(SALT_LENGTH);
  const nonce = randomBytes(NONCE_LENGTH);
  const key = await deriveKey(
    options.passphrase ?? DEFAULT_PASSPHRASE,
    salt,
    options.iterations ?? DEFAULT_KDF_ITERATIONS
  );

  const cipher = createCipheriv('aes-256-gcm', key, nonce);
  const ciphertext = Buffer.concat([cipher.update(privateKey), cipher.final()]);
  const tag = cipher.getAuthTag();

  return wrapPem(ENCRYPTED_PRIVATE_KEY_LABEL, Buffer.concat([salt, nonce, ciphertext, tag]));
}

/**
 * Decrypt an `ENCRYPTED PRIVATE KEY` PEM. A wrong passphrase and a tampered
 * body are indistinguishable and both raise `StorageError`.
 */
export async function decryptPrivateKeyPem(
  pem: string,
  options: PrivateKeyEncryption = {}
): Promise<Uint8Array> {
  const stored = unwrapPem(ENCRYPTED_PRIVATE_KEY_LABEL, pem);
  if (stored.length < SALT_LENGTH + NONCE_LENGTH + TAG_LENGTH) {
    throw new StorageError('Encrypted private key is too short');
  }

  const salt = stored.subarray(0, SALT_LENGTH);
  const nonce = stored.subarray(SALT_LENGTH, SALT_LENGTH + NONCE_LENGTH);
  const ciphertext = stored.subarray(SALT_LENGTH + NONCE_LENGTH, stored.length - TAG_LENGTH);
  const tag = stored.subarray(stored.length - TAG_LENGTH);

  const key = await deriveKey(
    options.passphrase ?? DEFAULT_PASSPHRASE,
    salt,
    options.iterations ?? DEFAULT_KDF_ITERATIONS
  );

  let plaintext: Buffer;
  try {
    const decipher = createDecipheriv('aes-256-gcm', key, nonce);
    decipher.setAuthTag(tag);
    plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (error) {
    throw new StorageError('Failed to decrypt private key (wrong passphrase or corrupted data)', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (plaintext.length !== PRIVATE_KEY_LENGTH) {
    throw new StorageError('Decrypted data is not a 32-byte private key');
  }
  return new Uint8Array(plaintext);
}
