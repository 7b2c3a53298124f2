/**
 * Querier
 * Read-only queries against a Rubix node
 */

import { RubixClient } from '../client';
import { QueryError, ValidationError } from '../errors';
import { DID, FTBalance, NFTInfo, NFTTokenBlock, RBTBalance, SmartContractTokenBlock } from '../types';
import {
  ftInfoResponseSchema,
  nftDataResponseSchema,
  nftListResponseSchema,
  parseNodeResponse,
  smartContractDataResponseSchema,
} from '../types/schemas';
import { validateAssetAddress, validateDid } from '../utils/validate';

export class Querier {
  constructor(private client: RubixClient) {}

  public async getRbtBalance(did: DID): Promise<RBTBalance> {
    return this.client.getBalance(did);
  }

  /**
   * Fungible tokens held by `did`
   */
  public async getFtBalances(did: DID): Promise<FTBalance[]> {
    assertDid(did);

    const endpoint = '/api/get-ft-info-by-did';
    const response = parseNodeResponse(
      ftInfoResponseSchema,
      await this.client.get(endpoint, { did }),
      endpoint
    );
    if (!response.status) {
      throw new QueryError(`Failed to get FT balances: ${response.message}`);
    }
    return response.ft_info ?? [];
  }

  /**
   * Token chain of a smart contract, or only its latest block
   */
  public async getSmartContractStates(
    contractAddress: string,
    onlyLatest: boolean = false
  ): Promise<SmartContractTokenBlock[]> {
    if (!validateAssetAddress(contractAddress)) {
      throw new ValidationError(`Invalid smart contract address: ${contractAddress}`);
    }

    const endpoint = '/api/get-smart-contract-token-chain-data';
    const response = parseNodeResponse(
      smartContractDataResponseSchema,
      await this.client.post(endpoint, { latest: onlyLatest, token: contractAddress }),
      endpoint
    );
    if (!response.status) {
      throw new QueryError(`Failed to get smart contract states: ${response.message}`);
    }
    if (!response.SCTDataReply) {
      throw new QueryError(`No smart contract states found for address: ${contractAddress}`);
    }
    return response.SCTDataReply;
  }

  public async getNftStates(nftAddress: string, onlyLatest: boolean = false): Promise<NFTTokenBlock[]> {
    if (!validateAssetAddress(nftAddress)) {
      throw new ValidationError(`Invalid NFT address: ${nftAddress}`);
    }

    const endpoint = '/api/get-nft-token-chain-data';
    const response = parseNodeResponse(
      nftDataResponseSchema,
      await this.client.get(endpoint, { latest: onlyLatest, nft: nftAddress }),
      endpoint
    );
    if (!response.status) {
      throw new QueryError(`Failed to get NFT states: ${response.message}`);
    }
    if (!response.NFTDataReply) {
      throw new QueryError(`No NFT states found for address: ${nftAddress}`);
    }
    return response.NFTDataReply;
  }

  /**
   * Every NFT known to the node's subnet
   */
  public async getAllNfts(): Promise<NFTInfo[]> {
    const endpoint = '/api/list-nfts';
    const response = parseNodeResponse(nftListResponseSchema, await this.client.get(endpoint), endpoint);
    if (!response.status) {
      throw new QueryError(`Failed to get all NFTs: ${response.message}`);
    }
    return response.nfts ?? [];
  }

  public async getNftsByOwner(ownerDid: DID): Promise<NFTInfo[]> {
    assertDid(ownerDid);

    const endpoint = '/api/get-nfts-by-did';
    const response = parseNodeResponse(
      nftListResponseSchema,
      await this.client.get(endpoint, { did: ownerDid }),
      endpoint
    );
    if (!response.status) {
      throw new QueryError(`Failed to get NFTs by owner: ${response.message}`);
    }
    return response.nfts ?? [];
  }
}

function assertDid(did: DID): void {
  if (!validateDid(did)) {
    throw new ValidationError(`Invalid DID: ${did}`);
  }
}
