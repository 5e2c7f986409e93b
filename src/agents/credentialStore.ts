/**
 * credentialStore.ts — Resolve and persist login credentials.
 *
 * Resolution order for a key:
 *
 *   1. In-memory cache (for the rest of the run).
 *   2. Platform keyring — only when secure storage is enabled.
 *   3. JSON config file.
 *   4. Interactive prompt — only when the process may prompt (a TTY by default).
 *
 * The first source that yields credentials wins and is cached. Stored copies
 * are sealed with CredentialCipher; entries that fail to decrypt are logged
 * and skipped so the next source gets a chance.
 */

import { createInterface } from 'readline/promises';
import { Writable } from 'stream';
import { Logger } from '../core/logger';
import { CredentialUnavailableError, describeError } from '../core/errors';
import { DEFAULT_CREDENTIALS_FILE, type CrawlerConfig } from '../core/config';
import { CredentialCipher } from './credentialCipher';
import {
  ConfigFileBackend,
  KeyringBackend,
  type SecretBackend,
  type StoredSecret,
} from './secretBackends';
import type { Credentials } from '../core/types';

const logger = new Logger('CredentialStore');

// ─── Prompting ──────────────────────────────────────────────

export interface CredentialPrompt {
  ask(key: string): Promise<Credentials>;
}

/** Echoes to stdout unless muted; used to hide the password while it is typed. */
class MutableStdout extends Writable {
  muted = false;

  override _write(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (!this.muted) process.stdout.write(chunk, encoding);
    callback();
  }
}

/** Asks on the terminal: username, password (not echoed), save? */
export class TerminalPrompt implements CredentialPrompt {
  async ask(key: string): Promise<Credentials> {
    const output = new MutableStdout();
    const rl = createInterface({ input: process.stdin, output, terminal: true });

    try {
      process.stdout.write(`\nPlease enter credentials for ${key}:\n`);
      const username = await rl.question('Username: ');

      const pending = rl.question('Password: ');
      output.muted = true;
      const password = await pending;
      output.muted = false;
      process.stdout.write('\n');

      const save = (await rl.question('Save credentials for future use? (y/n): ')).trim().toLowerCase() === 'y';
      return { username: username.trim(), password, save };
    } finally {
      rl.close();
    }
  }
}

// ─── Store ──────────────────────────────────────────────────

export interface CredentialStoreOptions {
  /** Consult and write the platform keyring (default true). */
  secureStorage?: boolean;
  keyring?: SecretBackend;
  configFile?: SecretBackend;
  cipher?: CredentialCipher;
  prompt?: CredentialPrompt;
  /** Whether prompting is allowed (default: stdin is a TTY). */
  interactive?: boolean;
}

export class CredentialStore {
  private readonly cache = new Map<string, Credentials>();
  private readonly secureStorage: boolean;
  private readonly keyring: SecretBackend;
  private readonly configFile: SecretBackend;
  private readonly cipher: CredentialCipher;
  private readonly prompt: CredentialPrompt;
  private readonly interactive: boolean;

  constructor(options: CredentialStoreOptions = {}) {
    this.secureStorage = options.secureStorage ?? true;
    this.keyring = options.keyring ?? new KeyringBackend();
    this.configFile = options.configFile ?? new ConfigFileBackend(DEFAULT_CREDENTIALS_FILE);
    this.cipher = options.cipher ?? new CredentialCipher();
    this.prompt = options.prompt ?? new TerminalPrompt();
    this.interactive = options.interactive ?? Boolean(process.stdin.isTTY);
  }

  /** Store using the configured credentials file and secure-storage flag. */
  static fromConfig(config: CrawlerConfig, options: CredentialStoreOptions = {}): CredentialStore {
    return new CredentialStore({
      secureStorage: config.secureStorage,
      configFile: new ConfigFileBackend(config.credentialsFile),
      ...options,
    });
  }

  async resolve(key: string): Promise<Credentials> {
    const cached = this.cache.get(key);
    if (cached) return cached;

    const sources = this.secureStorage ? [this.keyring, this.configFile] : [this.configFile];
    for (const backend of sources) {
      const found = await this.readFrom(backend, key);
      if (found) {
        logger.info(`Credentials for "${key}" loaded from ${backend.name}`);
        this.cache.set(key, found);
        return found;
      }
    }

    if (!this.interactive) {
      throw new CredentialUnavailableError(key);
    }

    logger.info(`No stored credentials for "${key}", prompting`);
    const prompted = await this.prompt.ask(key);
    if (!prompted.username || !prompted.password) {
      throw new CredentialUnavailableError(key);
    }
    if (prompted.save) {
      await this.persist(key, prompted, this.secureStorage);
    }
    this.cache.set(key, prompted);
    return prompted;
  }

  /**
   * Encrypt and store `credentials` under `key` in the keyring (`secure`) or
   * the config file. Failures are logged and reported as `false`.
   */
  async persist(key: string, credentials: Credentials, secure: boolean): Promise<boolean> {
    const backend = secure ? this.keyring : this.configFile;
    try {
      const sealed = this.cipher.encrypt(key, {
        username: credentials.username,
        password: credentials.password,
      });
      await backend.write(key, sealed);
      this.cache.set(key, credentials);
      logger.info(`Credentials for "${key}" saved to ${backend.name}`);
      return true;
    } catch (err) {
      logger.error(`Failed to store credentials for "${key}" in ${backend.name}`, err);
      return false;
    }
  }

  /** Remove `key` from the cache and from every backend. */
  async forget(key: string): Promise<void> {
    this.cache.delete(key);
    for (const backend of [this.keyring, this.configFile]) {
      try {
        await backend.remove(key);
      } catch (err) {
        logger.warn(`Could not remove "${key}" from ${backend.name}: ${describeError(err)}`);
      }
    }
  }

  private async readFrom(backend: SecretBackend, key: string): Promise<Credentials | null> {
    let stored: StoredSecret | null;
    try {
      stored = await backend.read(key);
    } catch (err) {
      logger.warn(`Failed to read credentials from ${backend.name}: ${describeError(err)}`);
      return null;
    }
    if (stored === null) return null;

    if (typeof stored !== 'string') {
      return { username: stored.username, password: stored.password, save: false };
    }

    try {
      const payload = this.cipher.decrypt(key, stored);
      return { username: payload.username, password: payload.password, save: false };
    } catch (err) {
      logger.warn(`Stored credentials for "${key}" in ${backend.name} could not be decrypted: ${describeError(err)}`);
      return null;
    }
  }
}
