/**
 * Keystore
 *
 * One directory per alias under the config path, holding `pubKey.pem`,
 * `privKey.pem` (encrypted) and `account.json`. An alias that already exists
 * is always loaded as is; a new alias is written to a temporary directory
 * and published with a single `rename`.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_CONFIG_PATH } from '../config';
import { PermissionError, RubixError, StorageError, ValidationError } from '../errors';
import { DID, Mnemonic } from '../types';
import { errnoCode, errorMessage } from '../utils/errno';
import { Logger, defaultLogger } from '../utils/logger';
import { validateAlias } from '../utils/validate';
import { KeyDeriver } from './deriver';
import { Secp256k1Keypair } from './keypair';
import {
  DEFAULT_KDF_ITERATIONS,
  DEFAULT_PASSPHRASE,
  decodePublicKeyPem,
  decryptPrivateKeyPem,
  encodePublicKeyPem,
  encryptPrivateKeyPem,
} from './pem';

export const PUBLIC_KEY_FILE = 'pubKey.pem';
export const PRIVATE_KEY_FILE = 'privKey.pem';
export const ACCOUNT_FILE = 'account.json';

const DIR_MODE = 0o700;
const FILE_MODE = 0o600;

const accountFileSchema = z.object({
  version: z.literal(1),
  alias: z.string().min(1),
  publicKey: z.string().regex(/^0[23][0-9a-f]{64}$/),
  did: z.string().min(1).optional(),
  createdAt: z.string().optional(),
});

type AccountFile = z.infer<typeof accountFileSchema>;

export interface KeystoreOptions {
  /** Root directory of all aliases (default `~/.rubix`) */
  configPath?: string;
  /** Passphrase protecting `privKey.pem` */
  passphrase?: string;
  /** PBKDF2 iterations for new and existing private keys */
  kdfIterations?: number;
  deriver?: KeyDeriver;
  logger?: Logger;
}

export interface KeystoreEntry {
  alias: string;
  keypair: Secp256k1Keypair;
  did?: DID;
  /** True when this call created the entry */
  created: boolean;
  /** Mnemonic generated, or supplied and matching, in this call */
  mnemonic?: Mnemonic;
  /** A supplied mnemonic derived a different key than the stored one */
  mnemonicIgnored: boolean;
}

export class Keystore {
  public readonly configPath: string;
  private readonly passphrase: string;
  private readonly kdfIterations: number;
  private readonly deriver: KeyDeriver;
  private readonly logger: Logger;

  constructor(options: KeystoreOptions = {}) {
    this.configPath = path.resolve(options.configPath ?? DEFAULT_CONFIG_PATH);
    this.passphrase = options.passphrase ?? DEFAULT_PASSPHRASE;
    this.kdfIterations = options.kdfIterations ?? DEFAULT_KDF_ITERATIONS;
    this.deriver = options.deriver ?? new KeyDeriver();
    this.logger = options.logger ?? defaultLogger;

    if (!Number.isInteger(this.kdfIterations) || this.kdfIterations < 1) {
      throw new ValidationError('kdfIterations must be a positive integer');
    }
  }

  public aliasDir(alias: string): string {
    this.assertAlias(alias);
    return path.join(this.configPath, alias);
  }

  /**
   * Return the entry of `alias`, creating it from `mnemonic` (or a fresh
   * mnemonic) when it does not exist yet.
   *
   * An existing entry always wins over a supplied mnemonic. When the two
   * disagree the entry is returned with `mnemonicIgnored: true`.
   */
  public async loadOrCreate(alias: string, mnemonic?: Mnemonic): Promise<KeystoreEntry> {
    const existing = await this.load(alias);
    if (existing) {
      return this.reconcile(existing, mnemonic);
    }

    const derived = this.deriver.derive(mnemonic);
    const target = this.aliasDir(alias);

    await this.guard('create', this.configPath, () =>
      fs.mkdir(this.configPath, { recursive: true, mode: DIR_MODE })
    );
    const staging = await this.guard('create', this.configPath, () =>
      fs.mkdtemp(path.join(this.configPath, `.${alias}-`))
    );

    try {
      await this.writeEntryFiles(staging, alias, derived.keypair);
      await fs.rename(staging, target);
    } catch (error) {
      await fs.rm(staging, { recursive: true, force: true });

      const code = errnoCode(error);
      if (code === 'ENOTEMPTY' || code === 'EEXIST') {
        this.logger.info(`Keystore entry "${alias}" was created concurrently, loading it`);
        const winner = await this.load(alias);
        if (!winner) {
          throw new StorageError(`Keystore entry "${alias}" disappeared after a concurrent create`);
        }
        return this.reconcile(winner, mnemonic);
      }
      throw this.toStorageError(error, 'write', target);
    }

    this.logger.info(`Created keystore entry "${alias}" at ${target}`);
    return {
      alias,
      keypair: derived.keypair,
      created: true,
      mnemonic: derived.mnemonic,
      mnemonicIgnored: false,
    };
  }

  /**
   * Load the entry of `alias`, or null when it does not exist
   */
  public async load(alias: string): Promise<KeystoreEntry | null> {
    if (!(await this.exists(alias))) {
      return null;
    }

    const dir = this.aliasDir(alias);
    const [publicPem, privatePem, account] = await Promise.all([
      this.readText(path.join(dir, PUBLIC_KEY_FILE)),
      this.readText(path.join(dir, PRIVATE_KEY_FILE)),
      this.readAccount(dir),
    ]);

    const storedPublicKey = decodePublicKeyPem(publicPem);
    const privateKey = await decryptPrivateKeyPem(privatePem, {
      passphrase: this.passphrase,
      iterations: this.kdfIterations,
    });

    let keypair: Secp256k1Keypair;
    try {
      keypair = Secp256k1Keypair.fromPrivateKey(privateKey);
    } catch (error) {
      throw this.toStorageError(error, 'decode', path.join(dir, PRIVATE_KEY_FILE));
    }

    if (keypair.publicKey !== storedPublicKey || keypair.publicKey !== account.publicKey) {
      throw new StorageError(`Keystore entry "${alias}" is inconsistent: public key does not match private key`);
    }

    return {
      alias,
      keypair,
      did: account.did,
      created: false,
      mnemonicIgnored: false,
    };
  }

  public async exists(alias: string): Promise<boolean> {
    const dir = this.aliasDir(alias);
    try {
      const stats = await fs.stat(dir);
      if (!stats.isDirectory()) {
        throw new StorageError(`Keystore path ${dir} is not a directory`);
      }
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw this.toStorageError(error, 'read', dir);
    }
  }

  /**
   * Persist the DID of `alias` by atomically replacing `account.json`
   */
  public async saveDid(alias: string, did: DID): Promise<void> {
    if (did.trim() === '') {
      throw new ValidationError('DID must not be empty');
    }

    const dir = this.aliasDir(alias);
    const account = await this.readAccount(dir);
    await this.writeAccount(dir, { ...account, did });
    this.logger.debug(`Saved DID of keystore entry "${alias}"`);
  }

  /**
   * DID persisted for `alias`, read from `account.json` without decrypting
   * the private key. Undefined when the alias is absent, has no DID yet or
   * now holds a different public key.
   */
  public async storedDid(alias: string, publicKey: string): Promise<DID | undefined> {
    if (!(await this.exists(alias))) {
      return undefined;
    }
    const account = await this.readAccount(this.aliasDir(alias));
    return account.publicKey === publicKey ? account.did : undefined;
  }

  public async remove(alias: string): Promise<void> {
    const dir = this.aliasDir(alias);
    await this.guard('remove', dir, () => fs.rm(dir, { recursive: true, force: true }));
  }

  private reconcile(entry: KeystoreEntry, mnemonic?: Mnemonic): KeystoreEntry {
    if (mnemonic === undefined || mnemonic.trim() === '') {
      return entry;
    }

    const derived = this.deriver.derive(mnemonic);
    if (derived.keypair.equals(entry.keypair)) {
      return { ...entry, mnemonic: derived.mnemonic };
    }

    this.logger.warn(
      `Keystore entry "${entry.alias}" already holds a different key; the supplied mnemonic was ignored`
    );
    return { ...entry, mnemonicIgnored: true };
  }

  private async writeEntryFiles(dir: string, alias: string, keypair: Secp256k1Keypair): Promise<void> {
    const privatePem = await encryptPrivateKeyPem(keypair.getPrivateKey(), {
      passphrase: this.passphrase,
      iterations: this.kdfIterations,
    });

    await writeSynced(path.join(dir, PUBLIC_KEY_FILE), encodePublicKeyPem(keypair.publicKey));
    await writeSynced(path.join(dir, PRIVATE_KEY_FILE), privatePem);
    await writeSynced(
      path.join(dir, ACCOUNT_FILE),
      serializeAccount({
        version: 1,
        alias,
        publicKey: keypair.publicKey,
        createdAt: new Date().toISOString(),
      })
    );
  }

  private async readAccount(dir: string): Promise<AccountFile> {
    const file = path.join(dir, ACCOUNT_FILE);
    const text = await this.readText(file);

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw this.toStorageError(error, 'parse', file);
    }

    const parsed = accountFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(`Invalid ${ACCOUNT_FILE} in ${dir}`, { issues: parsed.error.issues });
    }
    return parsed.data;
  }

  private async writeAccount(dir: string, account: AccountFile): Promise<void> {
    const file = path.join(dir, ACCOUNT_FILE);
    const staging = `${file}.${process.pid}.${Date.now()}.tmp`;

    try {
      await writeSynced(staging, serializeAccount(account));
      await fs.rename(staging, file);
    } catch (error) {
      await fs.rm(staging, { force: true });
      throw this.toStorageError(error, 'write', file);
    }
  }

  private readText(file: string): Promise<string> {
    return this.guard('read', file, () => fs.readFile(file, 'utf8'));
  }

  private async guard<T>(action: string, target: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.toStorageError(error, action, target);
    }
  }

  private toStorageError(error: unknown, action: string, target: string): RubixError {
    if (error instanceof RubixError) {
      return error;
    }

    const code = errnoCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
      return new PermissionError(`Permission denied: cannot ${action} ${target}`, { code });
    }

    return new StorageError(`Cannot ${action} ${target}: ${errorMessage(error)}`, { code });
  }

  private assertAlias(alias: string): void {
    if (!validateAlias(alias)) {
      throw new ValidationError(`Invalid alias "${alias}": use letters, digits, ".", "_" or "-"`);
    }
  }
}

/**
 * Write `data` and flush it to disk before returning, so a later `rename`
 * never publishes a partially written file.
 */
async function writeSynced(file: string, data: string): Promise<void> {
  const handle = await fs.open(file, 'w', FILE_MODE);
  try {
    await handle.writeFile(data, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

function serializeAccount(account: AccountFile): string {
  return `${JSON.stringify(account, null, 2)}\n`;
}
