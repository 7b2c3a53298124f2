/**
 * secp256k1 keypair used for Rubix DIDs and transaction signatures
 */

import { inspect } from 'util';
import { secp256k1 } from '@noble/curves/secp256k1';
import { HDKey } from '@scure/bip32';
import { bytesToHex, hexToBytes, verifySignature } from '../utils/crypto';
import { ValidationError } from '../errors';

export class Secp256k1Keypair {
  /** Compressed public key, hex (66 chars) */
  public readonly publicKey: string;
  private readonly privateKey: Uint8Array;

  private constructor(privateKey: Uint8Array) {
    if (!secp256k1.utils.isValidPrivateKey(privateKey)) {
      throw new ValidationError('Invalid secp256k1 private key');
    }
    this.privateKey = Uint8Array.from(privateKey);
    this.publicKey = bytesToHex(secp256k1.getPublicKey(this.privateKey, true));
  }

  /**
   * Import a keypair from a raw 32-byte private key (bytes or hex)
   */
  public static fromPrivateKey(privateKey: Uint8Array | string): Secp256k1Keypair {
    if (typeof privateKey === 'string') {
      if (!/^[0-9a-fA-F]{64}$/.test(privateKey)) {
        throw new ValidationError('Invalid private key: must be 64 hex characters');
      }
      return new Secp256k1Keypair(hexToBytes(privateKey));
    }
    return new Secp256k1Keypair(privateKey);
  }

  /**
   * Derive the keypair of a BIP-39 seed: the non-hardened child `m/0` of
   * the BIP-32 master key.
   */
  public static fromSeed(seed: Uint8Array): Secp256k1Keypair {
    const child = HDKey.fromMasterSeed(seed).deriveChild(0);
    if (!child.privateKey) {
      throw new ValidationError('Failed to derive child key from mnemonic seed');
    }
    return new Secp256k1Keypair(child.privateKey);
  }

  /**
   * Sign a message digest. Nonces follow RFC 6979, so the same key and
   * message always give the same DER-encoded signature.
   */
  public sign(message: Uint8Array): Uint8Array {
    return secp256k1.sign(message, this.privateKey).toDERRawBytes();
  }

  public verify(message: Uint8Array, signature: Uint8Array | string): boolean {
    return verifySignature(this.publicKey, message, signature);
  }

  /**
   * Raw private key bytes (use with caution)
   */
  public getPrivateKey(): Uint8Array {
    return Uint8Array.from(this.privateKey);
  }

  public equals(other: Secp256k1Keypair): boolean {
    return this.publicKey === other.publicKey;
  }

  public toJSON(): { publicKey: string } {
    return { publicKey: this.publicKey };
  }

  public [inspect.custom](): string {
    return `Secp256k1Keypair { publicKey: '${this.publicKey}' }`;
  }
}
