/**
 * Cryptographic Utilities
 * secp256k1 signature verification and SHA-256 helpers
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';

export { bytesToHex, hexToBytes };

/**
 * Calculate SHA-256 hash
 */
export function hash256(data: string | Uint8Array): string {
  const bytes = typeof data === 'string' ? utf8ToBytes(data) : data;
  return bytesToHex(sha256(bytes));
}

export function sha256Bytes(data: string | Uint8Array): Uint8Array {
  return sha256(typeof data === 'string' ? utf8ToBytes(data) : data);
}

/**
 * Verify a secp256k1 signature (DER or compact) over a message digest.
 * Accepts compressed (33 bytes) or uncompressed (65 bytes) public keys.
 */
export function verifySignature(
  publicKey: string | Uint8Array,
  message: Uint8Array,
  signature: string | Uint8Array
): boolean {
  try {
    return secp256k1.verify(toBytes(signature), message, toBytes(publicKey));
  } catch (error) {
    return false;
  }
}

function toBytes(value: string | Uint8Array): Uint8Array {
  return typeof value === 'string' ? hexToBytes(value) : value;
}
