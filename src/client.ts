/**
 * Rubix Client
 * HTTP boundary to a Rubix node
 */

import { promises as fs } from 'fs';
import path from 'path';
import { resolveClientConfig } from './config';
import {
  QueryError,
  RegistrationError,
  StorageError,
  TransactionError,
  ValidationError,
} from './errors';
import { verifySignedPayload } from './transactions/transfer-builder';
import {
  AssetUpload,
  ChallengeSigner,
  DID,
  NodeClient,
  RBTBalance,
  RubixClientConfig,
  SignedPayload,
  TransactionResponse,
} from './types';
import {
  NodeResponse,
  SigningChallenge,
  accountInfoResponseSchema,
  didRequestResponseSchema,
  nodeResponseSchema,
  parseNodeResponse,
  signingChallengeSchema,
  verifySignatureResponseSchema,
} from './types/schemas';
import { bytesToHex } from './utils/crypto';
import { errnoCode, errorMessage } from './utils/errno';
import { HTTPClient } from './utils/http-client';
import { Logger } from './utils/logger';
import { validateDid } from './utils/validate';

/** Upper bound on chained signing challenges for one request */
export const MAX_SIGNATURE_ROUNDS = 10;
/** Signature mode expected by `/api/signature-response` */
export const SIGNATURE_MODE = 4;

export class RubixClient implements NodeClient {
  private httpClient: HTTPClient;
  private logger: Logger;
  public readonly nodeUrl: string;

  constructor(config: RubixClientConfig = {}) {
    const resolved = resolveClientConfig(config);

    this.nodeUrl = resolved.nodeUrl;
    this.logger = resolved.logger;
    this.httpClient = new HTTPClient({
      baseUrl: resolved.nodeUrl,
      apiKey: resolved.apiKey,
      timeout: resolved.timeout * 1000,
      maxRetries: resolved.maxRetries,
      retryDelay: resolved.retryDelay,
      logger: resolved.logger,
    });
  }

  /**
   * Obtain a DID for `publicKey` and register it, answering the node's
   * signing challenge with `sign`.
   */
  public async registerDID(publicKey: string, sign: ChallengeSigner): Promise<DID> {
    if (publicKey.trim() === '') {
      throw new ValidationError('Public key is required to create a DID');
    }

    const created = parseNodeResponse(
      didRequestResponseSchema,
      await this.post('/api/request-did-for-pubkey', { public_key: publicKey }),
      '/api/request-did-for-pubkey'
    );
    if (created.status === false) {
      throw new RegistrationError(`DID creation failed: ${created.message}`);
    }
    if (!created.did) {
      throw new RegistrationError('Node returned no DID for the public key');
    }

    const registered = parseNodeResponse(
      nodeResponseSchema,
      await this.post('/api/register-did', { did: created.did }),
      '/api/register-did'
    );
    if (!registered.status) {
      throw new RegistrationError(`DID registration failed: ${registered.message}`);
    }

    const challenge = signingChallengeSchema.safeParse(registered.result);
    if (!challenge.success) {
      throw new RegistrationError('No message to sign for DID registration');
    }

    const outcome = await this.answerChallenges(challenge.data, sign);
    if (!outcome.status) {
      throw new RegistrationError(`Signature response failed: ${outcome.message ?? ''}`);
    }
    return created.did;
  }

  /**
   * RBT balance of `did`
   */
  public async getBalance(did: DID): Promise<RBTBalance> {
    if (!validateDid(did)) {
      throw new ValidationError(`Invalid DID: ${did}`);
    }

    const endpoint = '/api/get-account-info';
    const response = parseNodeResponse(
      accountInfoResponseSchema,
      await this.get(endpoint, { did }),
      endpoint
    );
    if (!response.status) {
      throw new QueryError(`Failed to get RBT balance: ${response.message}`);
    }

    const account = response.account_info?.[0];
    if (!account) {
      throw new QueryError(`No account information returned for ${did}`);
    }
    return { did, rbt: account.rbt_amount ?? 0 };
  }

  /**
   * Submit a signed RBT transfer. The payload is checked against its digest
   * and signature before anything is sent.
   */
  public async submitTransfer(
    signed: SignedPayload,
    sign: ChallengeSigner
  ): Promise<TransactionResponse> {
    if (!verifySignedPayload(signed)) {
      throw new TransactionError('Signed transfer does not match its digest or signature', {
        digest: signed.digest,
      });
    }
    return this.submitTransaction('/api/initiate-rbt-transfer', { ...signed.payload }, sign);
  }

  /**
   * Initiate a transaction at `endpoint` and answer the signing challenges
   * that follow. A refused initiation returns `{ status: false, message }`.
   */
  public async submitTransaction(
    endpoint: string,
    body: Record<string, unknown>,
    sign: ChallengeSigner
  ): Promise<TransactionResponse> {
    const response = parseNodeResponse(nodeResponseSchema, await this.post(endpoint, body), endpoint);
    if (!response.status) {
      return { status: false, message: response.message };
    }

    const challenge = signingChallengeSchema.safeParse(response.result);
    if (!challenge.success) {
      throw new TransactionError(`Node returned no signing challenge for ${endpoint}`, {
        message: response.message,
      });
    }
    return this.answerChallenges(challenge.data, sign);
  }

  /**
   * Upload files as multipart form data to obtain an asset address
   * (smart contract or NFT)
   */
  public async uploadAsset(endpoint: string, did: DID, files: AssetUpload[]): Promise<string> {
    const form = new FormData();
    form.append('did', did);

    for (const file of files) {
      const content = await readUpload(file);
      form.append(file.field, new Blob([content]), path.basename(file.filePath));
    }

    this.logger.debug(`POST ${endpoint} (multipart, ${files.length} files)`);
    const response = parseNodeResponse(
      nodeResponseSchema,
      await this.httpClient.postForm(endpoint, form),
      endpoint
    );
    if (!response.status) {
      throw new TransactionError(`Asset address generation failed: ${response.message}`);
    }
    if (typeof response.result !== 'string' || response.result === '') {
      throw new TransactionError('Empty asset address received from Rubix node', {
        message: response.message,
      });
    }
    return response.result;
  }

  /**
   * Ask the node to verify `signature` over `message` for `did`
   */
  public async verifySignature(did: DID, message: Uint8Array, signature: Uint8Array): Promise<boolean> {
    const endpoint = '/api/verify-signature';
    const response = parseNodeResponse(
      verifySignatureResponseSchema,
      await this.get(endpoint, {
        signer_did: did,
        signed_msg: Buffer.from(message).toString('utf8'),
        signature: bytesToHex(signature),
      }),
      endpoint
    );
    return response.status;
  }

  public get(endpoint: string, params?: Record<string, unknown>): Promise<unknown> {
    this.logger.debug(`GET ${endpoint}`);
    return this.httpClient.get(endpoint, params);
  }

  public post(endpoint: string, body?: Record<string, unknown>): Promise<unknown> {
    this.logger.debug(`POST ${endpoint}`);
    return this.httpClient.post(endpoint, body);
  }

  public close(): void {
    this.httpClient.close();
  }

  private async answerChallenges(
    first: SigningChallenge,
    sign: ChallengeSigner
  ): Promise<TransactionResponse> {
    let challenge = first;

    for (let round = 1; round <= MAX_SIGNATURE_ROUNDS; round++) {
      const message = Buffer.from(challenge.hash, 'base64');
      if (message.length === 0) {
        throw new TransactionError(`Signing challenge ${challenge.id} carries no message`);
      }

      const signature = sign(new Uint8Array(message));
      const response = parseNodeResponse(
        nodeResponseSchema,
        await this.post('/api/signature-response', {
          id: challenge.id,
          Signature: { Signature: Array.from(signature) },
          mode: SIGNATURE_MODE,
        }),
        '/api/signature-response'
      );

      const next = response.status ? signingChallengeSchema.safeParse(response.result) : undefined;
      if (!next?.success) {
        return toTransactionResponse(response);
      }
      challenge = next.data;
    }

    throw new TransactionError(`Node requested more than ${MAX_SIGNATURE_ROUNDS} signatures`);
  }
}

function toTransactionResponse(response: NodeResponse): TransactionResponse {
  return {
    status: response.status,
    message: response.message,
    result: typeof response.result === 'string' ? response.result : undefined,
  };
}

async function readUpload(file: AssetUpload): Promise<Buffer> {
  try {
    return await fs.readFile(file.filePath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ValidationError(`${file.label} file not found: ${file.filePath}`);
    }
    throw new StorageError(`Cannot read ${file.label} file ${file.filePath}`, {
      cause: errorMessage(error),
    });
  }
}
