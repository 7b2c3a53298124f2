/**
 * RBT transfer construction and signing
 *
 * A transfer moves through `TransferBuilder` (input checks) to a
 * `BuiltTransfer` (canonical payload and digest) to a `SignedPayload`.
 * Submission and its outcome belong to the node client.
 */

import { DEFAULT_QUORUM_TYPE } from '../config';
import { InvalidAmountError, InvalidRecipientError, ValidationError } from '../errors';
import { Secp256k1Keypair } from '../keys/keypair';
import { DID, SignedPayload, TransferPayload } from '../types';
import { canonicalizeJson } from '../utils/canonical-json';
import { bytesToHex, hash256, hexToBytes, verifySignature } from '../utils/crypto';

/**
 * Sender identity: the registered DID and the key behind it
 */
export interface SigningAccount {
  did: DID;
  keypair: Secp256k1Keypair;
}

export function transferDigest(payload: TransferPayload): string {
  return hash256(canonicalizeJson(payload));
}

export class BuiltTransfer {
  public readonly state = 'built' as const;
  public readonly digest: string;

  constructor(public readonly payload: TransferPayload) {
    this.digest = transferDigest(payload);
  }

  /**
   * Sign the payload digest. Signing is deterministic: the same payload and
   * key always give the same signature.
   */
  sign(keypair: Secp256k1Keypair): SignedPayload {
    const signature = keypair.sign(hexToBytes(this.digest));
    return {
      payload: { ...this.payload },
      digest: this.digest,
      signature: bytesToHex(signature),
      publicKey: keypair.publicKey,
    };
  }
}

export class TransferBuilder {
  private comment = '';
  private quorumType = DEFAULT_QUORUM_TYPE;

  constructor(
    private readonly sender: DID,
    private readonly receiver: DID,
    private readonly amount: number
  ) {
    if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
      throw new InvalidAmountError();
    }
    if (typeof receiver !== 'string' || receiver.trim() === '') {
      throw new InvalidRecipientError();
    }
    if (typeof sender !== 'string' || sender.trim() === '') {
      throw new ValidationError('Sender DID must not be empty');
    }
  }

  setComment(comment: string): this {
    this.comment = comment;
    return this;
  }

  setQuorumType(quorumType: number): this {
    if (!Number.isInteger(quorumType) || quorumType < 1) {
      throw new ValidationError('Quorum type must be a positive integer');
    }
    this.quorumType = quorumType;
    return this;
  }

  build(): BuiltTransfer {
    return new BuiltTransfer({
      comment: this.comment,
      receiver: this.receiver.trim(),
      sender: this.sender,
      tokenCount: this.amount,
      type: this.quorumType,
    });
  }
}

/**
 * Build and sign an RBT transfer from `account` to `receiverDid`
 */
export function signTransfer(
  account: SigningAccount,
  receiverDid: DID,
  amount: number,
  comment: string = '',
  quorumType: number = DEFAULT_QUORUM_TYPE
): SignedPayload {
  return new TransferBuilder(account.did, receiverDid, amount)
    .setComment(comment)
    .setQuorumType(quorumType)
    .build()
    .sign(account.keypair);
}

/**
 * True when the digest matches the payload and the signature matches the
 * digest under the embedded public key
 */
export function verifySignedPayload(signed: SignedPayload): boolean {
  if (transferDigest(signed.payload) !== signed.digest) {
    return false;
  }
  return verifySignature(signed.publicKey, hexToBytes(signed.digest), signed.signature);
}
