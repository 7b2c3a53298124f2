/**
 * Obtains the DID of a keystore entry, registering it with the node the
 * first time and persisting it next to the keys.
 */

import {
  NodeUnreachableError,
  RegistrationError,
  RubixError,
  TimeoutError,
} from '../errors';
import { Keystore, KeystoreEntry } from '../keys/keystore';
import { DID, NodeClient } from '../types';
import { errorMessage } from '../utils/errno';
import { Logger, defaultLogger } from '../utils/logger';

export class DIDResolver {
  private readonly inFlight = new Map<string, Promise<DID>>();
  private readonly resolved = new Map<string, DID>();

  constructor(
    private readonly keystore: Keystore,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * DID of `entry`. A DID already known for the public key, in memory or in
   * the entry's `account.json`, is returned without contacting the node;
   * concurrent calls for the same public key share one registration.
   */
  public async resolve(entry: KeystoreEntry, nodeClient: NodeClient): Promise<DID> {
    if (entry.did) {
      return entry.did;
    }

    const key = entry.keypair.publicKey;
    const known = this.resolved.get(key);
    if (known) {
      return known;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const registration = this.register(entry, nodeClient).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, registration);
    return registration;
  }

  private async register(entry: KeystoreEntry, nodeClient: NodeClient): Promise<DID> {
    const publicKey = entry.keypair.publicKey;
    const stored = await this.keystore.storedDid(entry.alias, publicKey);
    if (stored) {
      this.resolved.set(publicKey, stored);
      return stored;
    }

    let did: DID;
    try {
      did = await nodeClient.registerDID(publicKey, (message) => entry.keypair.sign(message));
    } catch (error) {
      if (
        error instanceof TimeoutError ||
        error instanceof NodeUnreachableError ||
        error instanceof RegistrationError
      ) {
        throw error;
      }
      throw new RegistrationError(`DID registration failed: ${errorMessage(error)}`, {
        code: error instanceof RubixError ? error.code : undefined,
      });
    }

    if (did.trim() === '') {
      throw new RegistrationError('Node returned an empty DID');
    }

    await this.keystore.saveDid(entry.alias, did);
    this.resolved.set(publicKey, did);
    this.logger.info(`Registered DID ${did} for keystore entry "${entry.alias}"`);
    return did;
  }
}
