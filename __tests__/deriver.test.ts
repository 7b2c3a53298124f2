/**
 * Key Derivation Tests
 */

import { KeyDeriver, MNEMONIC_WORD_COUNT } from '../src/keys/deriver';
import { bytesToHex } from '../src/utils/crypto';
import { InvalidMnemonicError } from '../src/errors';

const ZERO_MNEMONIC = `${'abandon '.repeat(23)}art`;
const BAD_CHECKSUM = 'abandon '.repeat(24).trim();
const BUFFALO_MNEMONIC =
  'buffalo tumble defy laundry call almost little pig lift party property pool ' +
  'frame erosion mind library sample floor ring enemy word enemy foster ill';
const TWELVE_WORDS = `${'abandon '.repeat(11)}about`;

const zeroRandom = (size: number): Uint8Array => new Uint8Array(size);

describe('KeyDeriver', () => {
  describe('generateMnemonic', () => {
    it('should generate 24 words', () => {
      const mnemonic = new KeyDeriver().generateMnemonic();

      expect(mnemonic.split(' ')).toHaveLength(MNEMONIC_WORD_COUNT);
    });

    it('should draw 32 bytes from the injected random source', () => {
      const random = jest.fn(zeroRandom);
      const mnemonic = new KeyDeriver(random).generateMnemonic();

      expect(random).toHaveBeenCalledWith(32);
      expect(mnemonic).toBe(ZERO_MNEMONIC);
    });

    it('should generate different mnemonics from the default source', () => {
      const deriver = new KeyDeriver();

      expect(deriver.generateMnemonic()).not.toBe(deriver.generateMnemonic());
    });
  });

  describe('validateMnemonic', () => {
    const deriver = new KeyDeriver();

    it('should accept a valid phrase', () => {
      expect(() => deriver.validateMnemonic(ZERO_MNEMONIC)).not.toThrow();
    });

    it('should reject an empty phrase', () => {
      expect(() => deriver.validateMnemonic('   ')).toThrow('Mnemonic phrase cannot be empty');
    });

    it('should reject a wrong word count', () => {
      expect(() => deriver.validateMnemonic(TWELVE_WORDS)).toThrow(
        'Mnemonic phrase must be 24 words long, got 12'
      );
    });

    it('should reject a bad checksum', () => {
      expect(() => deriver.validateMnemonic(BAD_CHECKSUM)).toThrow(InvalidMnemonicError);
    });

    it('should reject unknown words', () => {
      expect(() => deriver.validateMnemonic(`${'abandon '.repeat(23)}notaword`)).toThrow(
        InvalidMnemonicError
      );
    });

    it('should never echo the phrase', () => {
      try {
        deriver.validateMnemonic(BAD_CHECKSUM);
        throw new Error('expected validation to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidMnemonicError);
        expect(String(error)).not.toContain('abandon');
      }
    });
  });

  describe('mnemonicToSeed', () => {
    const deriver = new KeyDeriver();

    it('should produce a 64-byte seed', () => {
      expect(deriver.mnemonicToSeed(ZERO_MNEMONIC)).toHaveLength(64);
    });

    it('should depend on the passphrase', () => {
      const plain = Buffer.from(deriver.mnemonicToSeed(ZERO_MNEMONIC)).toString('hex');
      const salted = Buffer.from(deriver.mnemonicToSeed(ZERO_MNEMONIC, 'test-secret')).toString('hex');

      expect(plain).not.toBe(salted);
    });
  });

  describe('derive', () => {
    it('should derive the same keypair twice', () => {
      const deriver = new KeyDeriver();
      const first = deriver.derive(ZERO_MNEMONIC);
      const second = deriver.derive(ZERO_MNEMONIC);

      expect(first.keypair.equals(second.keypair)).toBe(true);
      expect(first.mnemonic).toBe(ZERO_MNEMONIC);
    });

    it('should match a known seed and child 0 public key', () => {
      const deriver = new KeyDeriver();

      expect(bytesToHex(deriver.mnemonicToSeed(BUFFALO_MNEMONIC))).toBe(
        '1884e5ddc2a5fb783f60803868cffaef1af1ce36e6686357c9c5dd6c80b63d69' +
          '8d78a8db3cab0404ecd3d966a00b9d51e4ac783997f78f64a1b24152e09ec524'
      );
      expect(deriver.derive(BUFFALO_MNEMONIC).keypair.publicKey).toBe(
        '02761e49d910a81c10d439b06387482a8b1e8d807e19131235deac727266da5cff'
      );
    });

    it('should normalise whitespace', () => {
      const deriver = new KeyDeriver();
      const spaced = `  ${ZERO_MNEMONIC.split(' ').join('   ')}\n`;

      const derived = deriver.derive(spaced);

      expect(derived.mnemonic).toBe(ZERO_MNEMONIC);
      expect(derived.keypair.equals(deriver.derive(ZERO_MNEMONIC).keypair)).toBe(true);
    });

    it('should generate a mnemonic when none is given', () => {
      const derived = new KeyDeriver(zeroRandom).derive();

      expect(derived.mnemonic).toBe(ZERO_MNEMONIC);
    });

    it('should treat a blank mnemonic as absent', () => {
      expect(new KeyDeriver(zeroRandom).derive('  ').mnemonic).toBe(ZERO_MNEMONIC);
    });

    it('should reject an invalid mnemonic', () => {
      expect(() => new KeyDeriver().derive(BAD_CHECKSUM)).toThrow(InvalidMnemonicError);
    });

    it('should give different mnemonics different keys', () => {
      const deriver = new KeyDeriver();
      const other = new KeyDeriver((size) => new Uint8Array(size).fill(0xff)).generateMnemonic();

      expect(deriver.derive(ZERO_MNEMONIC).keypair.equals(deriver.derive(other).keypair)).toBe(false);
    });
  });
});
