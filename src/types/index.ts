/**
 * Rubix SDK Type Definitions
 */

import type { z } from 'zod';
import type { Logger } from '../utils/logger';
import type {
  ftBalanceSchema,
  nftInfoSchema,
  nftTokenBlockSchema,
  smartContractTokenBlockSchema,
} from './schemas';

export interface RubixClientConfig {
  /** Base URL of the Rubix node */
  nodeUrl?: string;
  /** Request timeout in seconds */
  timeout?: number;
  /** Sent as `X-API-Key` on every request */
  apiKey?: string;
  maxRetries?: number;
  /** Base delay between retries in milliseconds */
  retryDelay?: number;
  logger?: Logger;
}

export type Mnemonic = string;
export type DID = string;

/**
 * Signs a node challenge with the account's private key without handing
 * the key itself to the caller.
 */
export type ChallengeSigner = (message: Uint8Array) => Uint8Array;

/**
 * Canonical RBT transfer body, exactly as posted to the node
 */
export interface TransferPayload {
  comment: string;
  receiver: DID;
  sender: DID;
  tokenCount: number;
  type: number;
}

export interface SignedPayload {
  payload: TransferPayload;
  /** SHA-256 of the canonical payload JSON, hex */
  digest: string;
  /** DER-encoded secp256k1 signature over the digest, hex */
  signature: string;
  /** Compressed public key of the signer, hex */
  publicKey: string;
}

export interface TransactionResponse {
  status: boolean;
  message?: string;
  result?: string;
}

export interface DeploymentResponse extends TransactionResponse {
  /** Smart contract or NFT address generated by the node */
  address: string;
}

export interface RBTBalance {
  did: DID;
  rbt: number;
}

export type FTBalance = z.infer<typeof ftBalanceSchema>;
export type SmartContractTokenBlock = z.infer<typeof smartContractTokenBlockSchema>;
export type NFTTokenBlock = z.infer<typeof nftTokenBlockSchema>;
export type NFTInfo = z.infer<typeof nftInfoSchema>;

/**
 * File sent as one multipart field when generating an asset address
 */
export interface AssetUpload {
  field: string;
  filePath: string;
  /** Human-readable name used in error messages */
  label: string;
}

export interface SmartContractDeployment {
  wasmFile: string;
  codeFile: string;
  schemaFile: string;
  /** RBT locked for the deployment */
  contractValue: number;
  comment?: string;
}

export interface NFTDeployment {
  artifactFile: string;
  metadataFile: string;
  nftData: string;
  nftValue: number;
  nftMetadataInfo?: string;
  nftFileName?: string;
}

/**
 * Capabilities of a Rubix node that the signing components depend on.
 * `RubixClient` is the HTTP implementation.
 */
export interface NodeClient {
  registerDID(publicKey: string, sign: ChallengeSigner): Promise<DID>;
  getBalance(did: DID): Promise<RBTBalance>;
  submitTransfer(signed: SignedPayload, sign: ChallengeSigner): Promise<TransactionResponse>;
  submitTransaction(
    endpoint: string,
    body: Record<string, unknown>,
    sign: ChallengeSigner
  ): Promise<TransactionResponse>;
  uploadAsset(endpoint: string, did: DID, files: AssetUpload[]): Promise<string>;
  verifySignature(did: DID, message: Uint8Array, signature: Uint8Array): Promise<boolean>;
}
