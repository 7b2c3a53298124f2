/**
 * Format checks for identifiers handed to the node.
 *
 * Rubix DIDs are IPFS CIDv1 (`bafy…`); token-chain assets such as smart
 * contracts and NFTs are CIDv0 (`Qm…`).
 */

import { CID } from 'multiformats';

function cidVersion(value: string): number | undefined {
  try {
    return CID.parse(value).version;
  } catch (error) {
    return undefined;
  }
}

export function validateDid(did: string): boolean {
  return cidVersion(did) === 1;
}

export function validateAssetAddress(address: string): boolean {
  return cidVersion(address) === 0;
}

const ALIAS_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Aliases name a directory under the config path, so separators and dot
 * segments are refused.
 */
export function validateAlias(alias: string): boolean {
  return ALIAS_PATTERN.test(alias) && alias !== '.' && alias !== '..';
}
