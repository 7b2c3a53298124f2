/**
 * Crypto, Canonical JSON and Validation Tests
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToHex, hash256, hexToBytes, sha256Bytes, verifySignature } from '../src/utils/crypto';
import { canonicalizeJson } from '../src/utils/canonical-json';
import { validateAlias, validateAssetAddress, validateDid } from '../src/utils/validate';

const PRIVATE_KEY = '0000000000000000000000000000000000000000000000000000000000000001';

describe('Crypto Utilities', () => {
  describe('hash256', () => {
    it('should hash strings as UTF-8', () => {
      expect(hash256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should hash empty input', () => {
      expect(hash256(new Uint8Array(0))).toBe(
        'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
      );
    });

    it('should agree with sha256Bytes', () => {
      expect(bytesToHex(sha256Bytes('abc'))).toBe(hash256('abc'));
    });
  });

  describe('verifySignature', () => {
    const message = sha256Bytes('payload');
    const publicKey = bytesToHex(secp256k1.getPublicKey(hexToBytes(PRIVATE_KEY), true));

    it('should accept a DER signature', () => {
      const signature = secp256k1.sign(message, hexToBytes(PRIVATE_KEY)).toDERRawBytes();

      expect(verifySignature(publicKey, message, signature)).toBe(true);
      expect(verifySignature(publicKey, message, bytesToHex(signature))).toBe(true);
    });

    it('should accept a public key as bytes and a compact signature', () => {
      const signature = secp256k1.sign(message, hexToBytes(PRIVATE_KEY)).toCompactRawBytes();

      expect(verifySignature(hexToBytes(publicKey), message, signature)).toBe(true);
      expect(verifySignature(hexToBytes(publicKey), message, bytesToHex(signature))).toBe(true);
    });

    it('should reject a signature over another message', () => {
      const signature = secp256k1.sign(message, hexToBytes(PRIVATE_KEY)).toDERRawBytes();

      expect(verifySignature(publicKey, sha256Bytes('other'), signature)).toBe(false);
    });

    it('should return false for malformed input', () => {
      expect(verifySignature(publicKey, message, 'zz')).toBe(false);
      expect(verifySignature('02', message, '3006020101020101')).toBe(false);
    });
  });
});

describe('canonicalizeJson', () => {
  it('should sort keys at every depth', () => {
    const value = { b: 1, a: { d: [{ z: 1, y: 2 }], c: null } };

    expect(canonicalizeJson(value)).toBe('{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}');
  });

  it('should not depend on insertion order', () => {
    expect(canonicalizeJson({ x: 1, y: 'two' })).toBe(canonicalizeJson({ y: 'two', x: 1 }));
  });

  it('should keep scalars and arrays as JSON', () => {
    expect(canonicalizeJson([3, 'a', true])).toBe('[3,"a",true]');
    expect(canonicalizeJson(0.001)).toBe('0.001');
  });
});

describe('Validation', () => {
  const DID_V1 = 'bafybmifbugq2dinbugq2dinbugq2dinbugq2dinbugq2dinbugq2dinbue';
  const DID_V1_BASE58 = 'zdjCksRBBrSavRwFiSbHMqbtLSgx5uCPVM8FqggmHqHi9scDE';
  const ASSET_V0 = 'QmPVGjYFugq4XUyBfoTHG6c3qxfBS26jEdaFM1gdAVuMZ2';

  it('should accept CIDv1 DIDs', () => {
    expect(validateDid(DID_V1)).toBe(true);
    expect(validateDid('bafybmi' + 'a'.repeat(52))).toBe(true);
    expect(validateDid('bafybeiarceirceirceirceirceirceirceirceirceirceirceirceirce')).toBe(true);
  });

  it('should accept CIDv1 DIDs in base58btc', () => {
    expect(validateDid(DID_V1_BASE58)).toBe(true);
  });

  it('should reject other DID shapes', () => {
    expect(validateDid('did:rubix:abc')).toBe(false);
    expect(validateDid(DID_V1.toUpperCase().replace(/^B/, 'b'))).toBe(false);
    expect(validateDid(DID_V1.slice(0, -1))).toBe(false);
    expect(validateDid('bafybmi' + 'b'.repeat(52))).toBe(false);
    expect(validateDid('')).toBe(false);
  });

  it('should reject a CIDv0 as a DID', () => {
    expect(validateDid(ASSET_V0)).toBe(false);
  });

  it('should accept CIDv0 asset addresses', () => {
    expect(validateAssetAddress(ASSET_V0)).toBe(true);
    expect(validateAssetAddress('QmQdtkyNprt8aLLivRsMoiYvxvot1SYoua5BgAg5vgc233')).toBe(true);
  });

  it('should reject addresses that are not CIDv0', () => {
    expect(validateAssetAddress(DID_V1)).toBe(false);
    expect(validateAssetAddress('Qm' + '1'.repeat(44))).toBe(false);
    expect(validateAssetAddress('Qm' + '0'.repeat(44))).toBe(false);
    expect(validateAssetAddress(ASSET_V0.slice(0, -1))).toBe(false);
    expect(validateAssetAddress('')).toBe(false);
  });

  it('should accept plain aliases', () => {
    expect(validateAlias('nick')).toBe(true);
    expect(validateAlias('alice.main_01-b')).toBe(true);
  });

  it('should reject path-like aliases', () => {
    expect(validateAlias('')).toBe(false);
    expect(validateAlias('.')).toBe(false);
    expect(validateAlias('..')).toBe(false);
    expect(validateAlias('a/b')).toBe(false);
    expect(validateAlias('../evil')).toBe(false);
  });
});
