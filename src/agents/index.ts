/**
 * agents/index.ts — Barrel export for the session layer.
 *
 * The `middleware/` directory moves bytes and paces requests; `agents/`
 * holds the stateful pieces that reason about a whole session:
 *   • SessionNegotiator — login flow and outcome classification
 *   • CredentialStore   — credential resolution and encrypted persistence
 *   • Cookie file       — session snapshots between runs
 */

export {
  SessionNegotiator,
  classifyLoginResponse,
  DEFAULT_LOGIN_PHRASES,
} from './sessionNegotiator';
export type {
  LoginPhrases,
  LoginVerdict,
  LoginVerifier,
  SessionNegotiatorOptions,
} from './sessionNegotiator';

export { CredentialStore, TerminalPrompt } from './credentialStore';
export type { CredentialPrompt, CredentialStoreOptions } from './credentialStore';

export { CredentialCipher, machineSalt } from './credentialCipher';
export type { CredentialPayload } from './credentialCipher';

export { KeyringBackend, ConfigFileBackend, MemorySecretBackend } from './secretBackends';
export type { SecretBackend, StoredSecret } from './secretBackends';

export { loadSavedCookies, saveCookies } from './cookieFile';
