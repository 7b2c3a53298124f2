/**
 * Signer
 * Holds one alias's keys and DID and signs everything sent on its behalf
 */

import { DEFAULT_QUORUM_TYPE } from '../config';
import { ValidationError } from '../errors';
import { DIDResolver } from '../identity/did-resolver';
import { KeyDeriver, RandomSource } from '../keys/deriver';
import { Secp256k1Keypair } from '../keys/keypair';
import { Keystore, KeystoreEntry } from '../keys/keystore';
import { signTransfer } from '../transactions/transfer-builder';
import {
  ChallengeSigner,
  DID,
  DeploymentResponse,
  Mnemonic,
  NFTDeployment,
  NodeClient,
  SignedPayload,
  SmartContractDeployment,
  TransactionResponse,
} from '../types';
import { Logger, defaultLogger } from '../utils/logger';

export interface SignerOptions {
  alias: string;
  /** Recovery mnemonic, used only when the alias does not exist yet */
  mnemonic?: Mnemonic;
  configPath?: string;
  passphrase?: string;
  kdfIterations?: number;
  quorumType?: number;
  random?: RandomSource;
  logger?: Logger;
}

export class Signer {
  private readonly challengeSigner: ChallengeSigner;

  private constructor(
    private readonly client: NodeClient,
    private readonly entry: KeystoreEntry,
    public readonly did: DID,
    private readonly quorumType: number,
    private readonly logger: Logger
  ) {
    this.challengeSigner = (message) => this.entry.keypair.sign(message);
  }

  /**
   * Load or create the keys of `options.alias` and make sure they have a
   * registered DID
   */
  public static async create(client: NodeClient, options: SignerOptions): Promise<Signer> {
    const logger = options.logger ?? defaultLogger;
    const quorumType = options.quorumType ?? DEFAULT_QUORUM_TYPE;
    if (!Number.isInteger(quorumType) || quorumType < 1) {
      throw new ValidationError('Quorum type must be a positive integer');
    }

    const keystore = new Keystore({
      configPath: options.configPath,
      passphrase: options.passphrase,
      kdfIterations: options.kdfIterations,
      deriver: new KeyDeriver(options.random),
      logger,
    });

    const entry = await keystore.loadOrCreate(options.alias, options.mnemonic);
    const did = await new DIDResolver(keystore, logger).resolve(entry, client);

    return new Signer(client, entry, did, quorumType, logger);
  }

  public get alias(): string {
    return this.entry.alias;
  }

  public get publicKey(): string {
    return this.entry.keypair.publicKey;
  }

  /**
   * True when a supplied mnemonic was ignored because the alias already
   * held a different key
   */
  public get mnemonicIgnored(): boolean {
    return this.entry.mnemonicIgnored;
  }

  public getKeypair(): Secp256k1Keypair {
    return this.entry.keypair;
  }

  /**
   * Mnemonic generated or accepted in this session. Entries loaded from
   * disk without a matching mnemonic have none.
   */
  public getMnemonic(): Mnemonic | undefined {
    return this.entry.mnemonic;
  }

  public signData(data: Uint8Array): Uint8Array {
    return this.entry.keypair.sign(data);
  }

  public signTransfer(receiverDid: DID, amount: number, comment: string = ''): SignedPayload {
    return signTransfer(
      { did: this.did, keypair: this.entry.keypair },
      receiverDid,
      amount,
      comment,
      this.quorumType
    );
  }

  public async sendRbtTokens(
    receiverDid: DID,
    amount: number,
    comment: string = ''
  ): Promise<TransactionResponse> {
    const signed = this.signTransfer(receiverDid, amount, comment);
    this.logger.info(`Sending ${amount} RBT from ${this.did} to ${signed.payload.receiver}`);
    return this.client.submitTransfer(signed, this.challengeSigner);
  }

  public async createFT(name: string, supply: number, rbtLockAmount: number): Promise<TransactionResponse> {
    if (name.trim() === '') {
      throw new ValidationError('FT name must not be empty');
    }
    assertPositiveInteger(supply, 'FT supply');
    assertPositiveInteger(rbtLockAmount, 'RBT lock amount');

    return this.submit('/api/create-ft', {
      did: this.did,
      ft_count: supply,
      ft_name: name,
      ft_num_start_index: 0,
      token_count: rbtLockAmount,
    });
  }

  public async sendFT(
    receiverDid: DID,
    ftName: string,
    ftCount: number,
    ftCreatorDid: DID,
    comment: string = ''
  ): Promise<TransactionResponse> {
    assertPositiveInteger(ftCount, 'FT count');

    return this.submit('/api/initiate-ft-transfer', {
      comment,
      creatorDID: ftCreatorDid,
      ft_count: ftCount,
      ft_name: ftName,
      quorum_type: this.quorumType,
      receiver: receiverDid,
      sender: this.did,
    });
  }

  /**
   * Upload the contract files, then deploy the generated contract address
   */
  public async deploySmartContract(deployment: SmartContractDeployment): Promise<DeploymentResponse> {
    const address = await this.client.uploadAsset('/api/generate-smart-contract', this.did, [
      { field: 'binaryCodePath', filePath: deployment.wasmFile, label: 'WASM' },
      { field: 'rawCodePath', filePath: deployment.codeFile, label: 'Code' },
      { field: 'schemaFilePath', filePath: deployment.schemaFile, label: 'Schema' },
    ]);

    const response = await this.submit('/api/deploy-smart-contract', {
      comment: deployment.comment ?? '',
      deployerAddr: this.did,
      quorumType: this.quorumType,
      rbtAmount: deployment.contractValue,
      smartContractToken: address,
    });
    return { ...response, address };
  }

  public async executeSmartContract(
    contractAddress: string,
    smartContractData: string,
    comment: string = ''
  ): Promise<TransactionResponse> {
    return this.submit('/api/execute-smart-contract', {
      comment,
      executorAddr: this.did,
      quorumType: this.quorumType,
      smartContractData,
      smartContractToken: contractAddress,
    });
  }

  /**
   * Upload the NFT artifact and metadata, then deploy the generated NFT
   */
  public async deployNFT(deployment: NFTDeployment): Promise<DeploymentResponse> {
    const address = await this.client.uploadAsset('/api/create-nft', this.did, [
      { field: 'artifact', filePath: deployment.artifactFile, label: 'Artifact' },
      { field: 'metadata', filePath: deployment.metadataFile, label: 'Metadata' },
    ]);

    const response = await this.submit('/api/deploy-nft', {
      did: this.did,
      nft: address,
      nft_data: deployment.nftData,
      nft_file_name: deployment.nftFileName ?? '',
      nft_metadata: deployment.nftMetadataInfo ?? '',
      nft_value: deployment.nftValue,
      quorum_type: this.quorumType,
    });
    return { ...response, address };
  }

  public async executeNFT(nftAddress: string, nftData: string, comment: string = ''): Promise<TransactionResponse> {
    return this.submit('/api/execute-nft', {
      comment,
      executor: this.did,
      nft: nftAddress,
      nft_data: nftData,
      quorum_type: this.quorumType,
      receiver: '',
    });
  }

  /**
   * Hand an NFT over to `receiverDid`
   */
  public async transferNFT(
    nftAddress: string,
    receiverDid: DID,
    nftValue: number,
    nftData: string = '',
    comment: string = ''
  ): Promise<TransactionResponse> {
    if (receiverDid.trim() === '') {
      throw new ValidationError('Receiver DID must not be empty');
    }

    return this.submit('/api/execute-nft', {
      comment,
      executor: this.did,
      nft: nftAddress,
      nft_data: nftData,
      nft_value: nftValue,
      quorum_type: this.quorumType,
      receiver: receiverDid,
    });
  }

  private submit(endpoint: string, body: Record<string, unknown>): Promise<TransactionResponse> {
    this.logger.debug(`Initiating ${endpoint} for ${this.did}`);
    return this.client.submitTransaction(endpoint, body, this.challengeSigner);
  }
}

function assertPositiveInteger(value: number, label: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${label} must be a positive integer`);
  }
}
