/**
 * secretBackends.ts — Places a credential blob can live.
 *
 *   • KeyringBackend    — the platform secret store (macOS Keychain, Windows
 *                         Credential Manager, Secret Service) via @napi-rs/keyring.
 *   • ConfigFileBackend — a JSON file keyed by credential key. Entries are an
 *                         encrypted string or a plain `{ username, password }`.
 *   • MemorySecretBackend — process-local, for tests and ephemeral runs.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';

/** A stored entry: an encrypted blob, or plaintext credentials from a hand-written file. */
export type StoredSecret = string | { username: string; password: string };

export interface SecretBackend {
  readonly name: string;
  read(key: string): Promise<StoredSecret | null>;
  write(key: string, secret: StoredSecret): Promise<void>;
  /** @returns whether an entry existed */
  remove(key: string): Promise<boolean>;
}

const plainSecretSchema = z.object({ username: z.string(), password: z.string() });

const plainJsonSchema = z
  .string()
  .transform((raw, ctx): unknown => {
    try {
      return JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Not a JSON entry' });
      return z.NEVER;
    }
  })
  .pipe(plainSecretSchema);

// ─── Platform keyring ───────────────────────────────────────

let keyringModule: typeof import('@napi-rs/keyring') | null = null;

async function getKeyring(): Promise<typeof import('@napi-rs/keyring')> {
  if (!keyringModule) {
    keyringModule = await import('@napi-rs/keyring');
  }
  return keyringModule;
}

export class KeyringBackend implements SecretBackend {
  readonly name = 'keyring';

  constructor(private readonly service: string = 'session-crawler') {}

  async read(key: string): Promise<StoredSecret | null> {
    const { Entry } = await getKeyring();
    const value = new Entry(this.service, key).getPassword() ?? null;
    if (value === null) return null;

    // Plaintext entries are written as JSON; anything else is a sealed blob.
    const plain = plainJsonSchema.safeParse(value);
    return plain.success ? plain.data : value;
  }

  async write(key: string, secret: StoredSecret): Promise<void> {
    const { Entry } = await getKeyring();
    const value = typeof secret === 'string' ? secret : JSON.stringify(secret);
    new Entry(this.service, key).setPassword(value);
  }

  async remove(key: string): Promise<boolean> {
    const { Entry } = await getKeyring();
    return new Entry(this.service, key).deletePassword();
  }
}

// ─── JSON config file ───────────────────────────────────────

const fileSchema = z.record(
  z.string(),
  z.union([z.string(), plainSecretSchema]),
);

type SecretsFile = z.infer<typeof fileSchema>;

export class ConfigFileBackend implements SecretBackend {
  readonly name = 'config-file';

  constructor(readonly path: string) {}

  async read(key: string): Promise<StoredSecret | null> {
    const entries = await this.load();
    return entries[key] ?? null;
  }

  async write(key: string, secret: StoredSecret): Promise<void> {
    const entries = await this.load();
    entries[key] = secret;
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(entries, null, 2), { mode: 0o600 });
  }

  async remove(key: string): Promise<boolean> {
    const entries = await this.load();
    if (!(key in entries)) return false;
    delete entries[key];
    await writeFile(this.path, JSON.stringify(entries, null, 2), { mode: 0o600 });
    return true;
  }

  /** Missing file → empty; malformed file → throws. */
  private async load(): Promise<SecretsFile> {
    if (!existsSync(this.path)) return {};
    const raw = await readFile(this.path, 'utf-8');
    return fileSchema.parse(JSON.parse(raw));
  }
}

// ─── In-memory ──────────────────────────────────────────────

export class MemorySecretBackend implements SecretBackend {
  readonly name = 'memory';
  private readonly entries = new Map<string, StoredSecret>();

  async read(key: string): Promise<StoredSecret | null> {
    return this.entries.get(key) ?? null;
  }

  async write(key: string, secret: StoredSecret): Promise<void> {
    this.entries.set(key, secret);
  }

  async remove(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }
}
