/**
 * Shapes of Rubix node responses.
 *
 * The node answers every call with `{ status, message, result }` plus
 * endpoint-specific fields; objects stay open so newer node versions can
 * add fields without breaking the SDK.
 */

import { z } from 'zod';
import { RubixError } from '../errors';

export const nodeResponseSchema = z
  .object({
    status: z.boolean(),
    message: z.string().default(''),
    result: z.unknown().optional(),
  })
  .passthrough();

export const signingChallengeSchema = z
  .object({
    id: z.string().min(1),
    hash: z.string().min(1),
  })
  .passthrough();

// request-did-for-pubkey omits `status` on success
export const didRequestResponseSchema = z
  .object({
    status: z.boolean().optional(),
    message: z.string().default(''),
    did: z.string().optional(),
  })
  .passthrough();

export const verifySignatureResponseSchema = z
  .object({
    status: z.boolean().default(false),
    message: z.string().default(''),
  })
  .passthrough();

export const accountInfoResponseSchema = nodeResponseSchema.extend({
  account_info: z
    .array(
      z
        .object({
          did: z.string().optional(),
          rbt_amount: z.number().optional(),
        })
        .passthrough()
    )
    .nullish(),
});

export const ftBalanceSchema = z
  .object({
    ft_name: z.string(),
    ft_count: z.number(),
    creator_did: z.string(),
  })
  .passthrough();

export const ftInfoResponseSchema = nodeResponseSchema.extend({
  ft_info: z.array(ftBalanceSchema).nullish(),
});

export const smartContractTokenBlockSchema = z
  .object({
    BlockNo: z.number(),
    BlockId: z.string(),
    SmartContractData: z.string(),
    Epoch: z.number(),
    InitiatorSignature: z.string(),
    ExecutorDID: z.string(),
    InitiatorSignData: z.string(),
  })
  .passthrough();

export const smartContractDataResponseSchema = nodeResponseSchema.extend({
  SCTDataReply: z.array(smartContractTokenBlockSchema).nullish(),
});

export const nftTokenBlockSchema = z
  .object({
    BlockNo: z.number(),
    BlockId: z.string(),
    NFTData: z.string(),
    NFTOwner: z.string(),
    NFTValue: z.number(),
    Epoch: z.number(),
    TransactionID: z.string(),
  })
  .passthrough();

export const nftDataResponseSchema = nodeResponseSchema.extend({
  NFTDataReply: z.array(nftTokenBlockSchema).nullish(),
});

export const nftInfoSchema = z
  .object({
    nft: z.string(),
    owner_did: z.string(),
    nft_value: z.number(),
    nft_metadata: z.string(),
    nft_file_name: z.string(),
  })
  .passthrough();

export const nftListResponseSchema = nodeResponseSchema.extend({
  nfts: z.array(nftInfoSchema).nullish(),
});

export type NodeResponse = z.infer<typeof nodeResponseSchema>;
export type SigningChallenge = z.infer<typeof signingChallengeSchema>;

/**
 * Validate the body returned by `endpoint` against `schema`
 */
export function parseNodeResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  endpoint: string
): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new RubixError(`Unexpected response from ${endpoint}`, 'INVALID_RESPONSE', undefined, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
