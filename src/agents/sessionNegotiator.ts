/**
 * sessionNegotiator.ts — Log in through a FetchEngine and hand back its session.
 *
 * Sequence: fetch the login page → let the engine's transport fill and
 * submit the form → classify the settled response. Both requests go through
 * the engine, so they are admitted and reported like any other fetch.
 *
 * Classification is a phrase heuristic: failure phrases win over success
 * phrases, and a response matching neither counts as a success with a
 * warning. That default is known to be weak on unfamiliar sites; an adapter
 * that can tell for sure should supply `verifyLogin`.
 */

import { Logger } from '../core/logger';
import { AuthenticationError, ConfigurationError, describeError } from '../core/errors';
import { parseFieldMap } from '../core/config';
import type { FetchEngine } from '../middleware/fetchEngine';
import type { CredentialStore } from './credentialStore';
import type { Credentials, FetchResult, SessionHandle } from '../core/types';

const logger = new Logger('SessionNegotiator');

export interface LoginPhrases {
  failure: readonly string[];
  success: readonly string[];
}

export const DEFAULT_LOGIN_PHRASES: LoginPhrases = {
  failure: [
    'incorrect password',
    'login failed',
    'invalid credentials',
    'username or password is incorrect',
    'authentication failed',
  ],
  success: ['logout', 'sign out', 'account', 'profile', 'dashboard'],
};

export type LoginVerdict =
  | { outcome: 'failure'; phrase: string }
  | { outcome: 'success'; phrase: string }
  | { outcome: 'ambiguous' };

/** Case-insensitive phrase match over the response content. */
export function classifyLoginResponse(content: string, phrases: LoginPhrases = DEFAULT_LOGIN_PHRASES): LoginVerdict {
  const haystack = content.toLowerCase();

  const failure = phrases.failure.find((phrase) => haystack.includes(phrase.toLowerCase()));
  if (failure) return { outcome: 'failure', phrase: failure };

  const success = phrases.success.find((phrase) => haystack.includes(phrase.toLowerCase()));
  if (success) return { outcome: 'success', phrase: success };

  return { outcome: 'ambiguous' };
}

/** Site-specific login check; `undefined` defers to the phrase heuristic. */
export type LoginVerifier = (result: FetchResult) => boolean | undefined;

export interface SessionNegotiatorOptions {
  phrases?: Partial<LoginPhrases>;
  verifyLogin?: LoginVerifier;
  credentialStore?: CredentialStore;
  timeoutMs?: number;
}

export class SessionNegotiator {
  private readonly phrases: LoginPhrases;

  constructor(private readonly options: SessionNegotiatorOptions = {}) {
    this.phrases = {
      failure: options.phrases?.failure ?? DEFAULT_LOGIN_PHRASES.failure,
      success: options.phrases?.success ?? DEFAULT_LOGIN_PHRASES.success,
    };
  }

  /**
   * Log in at `loginUrl` and return the engine's (now authenticated) session.
   *
   * @throws ConfigurationError for a malformed field map
   * @throws AuthenticationError when the login is rejected or a request fails
   */
  async login(
    engine: FetchEngine,
    loginUrl: string,
    fieldMapInput: unknown,
    credentials: Credentials,
  ): Promise<SessionHandle> {
    const fieldMap = parseFieldMap(fieldMapInput);
    logger.info(`Logging in at ${loginUrl} as ${credentials.username}`);

    const loginPage = await this.step(loginUrl, 'fetch the login page', () =>
      engine.fetch({ url: loginUrl, timeoutMs: this.options.timeoutMs }),
    );

    const response = await this.step(loginUrl, 'submit the login form', () =>
      engine.submitLogin({ loginPage, fieldMap, credentials, timeoutMs: this.options.timeoutMs }),
    );

    const verified = this.options.verifyLogin?.(response);
    if (verified === false) {
      throw new AuthenticationError('Login failed: site verification rejected the response', {
        loginUrl,
        finalUrl: response.finalUrl,
      });
    }

    if (verified === undefined) {
      const verdict = classifyLoginResponse(response.content, this.phrases);
      if (verdict.outcome === 'failure') {
        throw new AuthenticationError(`Login failed: response contains "${verdict.phrase}"`, {
          loginUrl,
          finalUrl: response.finalUrl,
          phrase: verdict.phrase,
        });
      }
      if (verdict.outcome === 'ambiguous') {
        logger.warn(
          `No success or failure phrase in the login response from ${response.finalUrl} — assuming success`,
        );
      }
    }

    const session = engine.session;
    const cookies = await session.cookies();
    logger.info(`Logged in at ${response.finalUrl} (${cookies.length} session cookie(s))`);
    return session;
  }

  /** Resolve credentials for `key` from the configured store, then log in. */
  async loginWithStore(
    engine: FetchEngine,
    loginUrl: string,
    fieldMapInput: unknown,
    key: string,
  ): Promise<SessionHandle> {
    const store = this.options.credentialStore;
    if (!store) {
      throw new ConfigurationError('loginWithStore needs a credentialStore');
    }
    const credentials = await store.resolve(key);
    return this.login(engine, loginUrl, fieldMapInput, credentials);
  }

  private async step<T>(loginUrl: string, what: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof AuthenticationError) throw err;
      throw new AuthenticationError(
        `Could not ${what}: ${describeError(err)}`,
        { loginUrl },
        err,
      );
    }
  }
}
