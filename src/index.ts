/**
 * Rubix SDK
 * TypeScript SDK for key management, DID registration and transactions on
 * a Rubix node
 */

// Main client
export { RubixClient, MAX_SIGNATURE_ROUNDS, SIGNATURE_MODE } from './client';

// Sub-clients
export { Signer, SignerOptions } from './clients/signer';
export { Querier } from './clients/querier';

// Keys and identity
export { Secp256k1Keypair } from './keys/keypair';
export { KeyDeriver, DerivedKey, RandomSource, MNEMONIC_WORD_COUNT } from './keys/deriver';
export { Keystore, KeystoreEntry, KeystoreOptions } from './keys/keystore';
export { DIDResolver } from './identity/did-resolver';

// Transactions
export {
  TransferBuilder,
  BuiltTransfer,
  SigningAccount,
  signTransfer,
  verifySignedPayload,
} from './transactions/transfer-builder';

// Configuration
export {
  resolveClientConfig,
  DEFAULT_NODE_URL,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_QUORUM_TYPE,
  DEFAULT_CONFIG_PATH,
} from './config';

// Types
export * from './types';

// Errors
export * from './errors';

// Utilities
export { Logger, createConsoleLogger, silentLogger } from './utils/logger';
export { hash256, verifySignature } from './utils/crypto';
export { validateDid, validateAssetAddress, validateAlias } from './utils/validate';
