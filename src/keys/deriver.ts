/**
 * Mnemonic generation and deterministic keypair derivation
 */

import * as bip39 from 'bip39';
import { randomBytes } from '@noble/hashes/utils';
import { InvalidMnemonicError } from '../errors';
import { Mnemonic } from '../types';
import { Secp256k1Keypair } from './keypair';

/**
 * Cryptographically secure source of random bytes
 */
export type RandomSource = (size: number) => Uint8Array;

export interface DerivedKey {
  mnemonic: Mnemonic;
  keypair: Secp256k1Keypair;
}

export const MNEMONIC_WORD_COUNT = 24;
const MNEMONIC_STRENGTH = 256;

export function normalizeMnemonic(mnemonic: string): string {
  return mnemonic.trim().split(/\s+/).join(' ');
}

export class KeyDeriver {
  constructor(private readonly random: RandomSource = randomBytes) {}

  /**
   * Generate a 24-word BIP-39 mnemonic from 256 bits of entropy
   */
  public generateMnemonic(): Mnemonic {
    return bip39.generateMnemonic(MNEMONIC_STRENGTH, (size) => Buffer.from(this.random(size)));
  }

  /**
   * Throw `InvalidMnemonicError` unless the phrase is 24 known words with a
   * valid checksum. The phrase is never echoed in the error.
   */
  public validateMnemonic(mnemonic: Mnemonic): void {
    const normalized = normalizeMnemonic(mnemonic);
    if (normalized === '') {
      throw new InvalidMnemonicError('Mnemonic phrase cannot be empty');
    }

    const wordCount = normalized.split(' ').length;
    if (wordCount !== MNEMONIC_WORD_COUNT) {
      throw new InvalidMnemonicError(
        `Mnemonic phrase must be ${MNEMONIC_WORD_COUNT} words long, got ${wordCount}`
      );
    }

    if (!bip39.validateMnemonic(normalized)) {
      throw new InvalidMnemonicError('Invalid mnemonic phrase: unknown word or bad checksum');
    }
  }

  /**
   * BIP-39 seed (64 bytes) of a validated mnemonic
   */
  public mnemonicToSeed(mnemonic: Mnemonic, passphrase: string = ''): Uint8Array {
    this.validateMnemonic(mnemonic);
    return new Uint8Array(bip39.mnemonicToSeedSync(normalizeMnemonic(mnemonic), passphrase));
  }

  /**
   * Derive the keypair of `mnemonic`, generating a fresh mnemonic when none
   * is given. The same mnemonic always yields the same keypair.
   */
  public derive(mnemonic?: Mnemonic): DerivedKey {
    const phrase =
      mnemonic === undefined || mnemonic.trim() === ''
        ? this.generateMnemonic()
        : normalizeMnemonic(mnemonic);

    const seed = this.mnemonicToSeed(phrase);
    return { mnemonic: phrase, keypair: Secp256k1Keypair.fromSeed(seed) };
  }
}
