// tests/unit/fetchEngine.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FetchEngine } from '../../src/middleware/fetchEngine';
import { RateController } from '../../src/middleware/rateController';
import {
  ConfigurationError,
  FetchCancelledError,
  FetchTimeoutError,
  HttpStatusError,
  NetworkError,
  RobotsDisallowedError,
} from '../../src/core/errors';
import { FakeTransport, hangUntilAborted, page } from '../helpers/fakeTransport';
import type { SessionCookie } from '../../src/core/types';

const BASE = 'https://shop.test/catalog/';
const SHOP = 'https://shop.test';

const sid: SessionCookie = { name: 'sid', value: 'abc', domain: 'shop.test', path: '/' };

describe('FetchEngine', () => {
  let transport: FakeTransport;
  let rateController: RateController;
  let engine: FetchEngine;

  beforeEach(() => {
    transport = new FakeTransport();
    rateController = new RateController({ baseDelay: 0, jitter: 0, concurrency: 4 });
    engine = new FetchEngine({ baseUrl: BASE, transportImpl: transport, rateController });
  });

  afterEach(async () => {
    await engine.close();
  });

  describe('construction', () => {
    it('should reject a relative base URL', () => {
      expect(() => new FetchEngine({ baseUrl: '/catalog', transportImpl: transport })).toThrow(ConfigurationError);
    });

    it('should take its kind from the transport', () => {
      expect(engine.kind).toBe('light');
    });
  });

  describe('initialize', () => {
    it('should open the transport once for concurrent and repeated calls', async () => {
      await Promise.all([engine.initialize(), engine.initialize()]);
      await engine.initialize();

      expect(transport.opened).toHaveLength(1);
    });

    it('should seed configured cookies into the session', async () => {
      engine = new FetchEngine({ baseUrl: BASE, transportImpl: transport, rateController, cookies: [sid] });
      await engine.initialize();

      expect(transport.opened[0]).toEqual([sid]);
      expect(await engine.session.isEmpty()).toBe(false);
    });
  });

  describe('fetch', () => {
    it('should resolve relative URLs and merge query parameters', async () => {
      const result = await engine.fetch({ url: 'items?page=1', params: { sort: 'asc' } });

      expect(transport.requests[0]).toMatchObject({
        url: 'https://shop.test/catalog/items?page=1&sort=asc',
        method: 'GET',
        timeoutMs: 30_000,
      });
      expect(result.url).toBe('https://shop.test/catalog/items?page=1&sort=asc');
    });

    it('should return a frozen success result', async () => {
      transport.respond = async (request) => ({
        finalUrl: `${request.url}?redirected=1`,
        statusCode: 200,
        content: '<h1>Items</h1>',
        headers: {},
        cookies: [],
      });

      const result = await engine.fetch({ url: 'https://shop.test/items' });

      expect(result).toMatchObject({
        url: 'https://shop.test/items',
        finalUrl: 'https://shop.test/items?redirected=1',
        content: '<h1>Items</h1>',
        statusCode: 200,
        status: 'success',
        transport: 'light',
        newCookies: [],
      });
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should send engine headers merged with request headers', async () => {
      engine = new FetchEngine({
        baseUrl: BASE,
        transportImpl: transport,
        rateController,
        headers: { 'x-client': 'crawler', accept: 'text/html' },
      });

      await engine.fetch({ url: '/a', headers: { accept: 'application/json' } });

      expect(transport.requests[0].headers).toEqual({ 'x-client': 'crawler', accept: 'application/json' });
    });

    it('should POST when a form body is given', async () => {
      await engine.fetch({ url: '/search', form: { q: 'lamp' } });

      expect(transport.requests[0]).toMatchObject({ method: 'POST', form: { q: 'lamp' } });
    });

    it('should report cookies set by the request as new cookies', async () => {
      const pref: SessionCookie = { name: 'pref', value: 'dark', domain: 'shop.test', path: '/' };
      const cart: SessionCookie = { name: 'cart', value: '3', domain: 'shop.test', path: '/' };
      transport.handle.jar.push(sid, pref);
      transport.respond = async (request) => {
        const set = [pref, { ...sid, value: 'rotated' }, cart];
        transport.handle.jar = set;
        return page(request.url, undefined, 200, set);
      };

      const result = await engine.fetch({ url: '/cart' });

      expect(result.newCookies).toEqual([{ ...sid, value: 'rotated' }, cart]);
    });

    it("should keep cookies of concurrent requests out of each other's results", async () => {
      const other: SessionCookie = { name: 'other', value: 'x', domain: 'b.test', path: '/' };
      let finishSlow: () => void = () => undefined;
      transport.respond = async (request) => {
        if (request.url === 'https://a.test/slow') {
          await new Promise<void>((resolve) => {
            finishSlow = resolve;
          });
          return page(request.url);
        }
        transport.handle.jar.push(other);
        return page(request.url, undefined, 200, [other]);
      };

      const slow = engine.fetch({ url: 'https://a.test/slow' });
      await new Promise((resolve) => setTimeout(resolve, 10));
      const fast = await engine.fetch({ url: 'https://b.test/fast' });
      finishSlow();

      expect(fast.newCookies).toEqual([other]);
      expect((await slow).newCookies).toEqual([]);
    });

    it('should report success to the rate controller', async () => {
      rateController.report(SHOP, 'failure');

      await engine.fetch({ url: '/a' });

      expect(rateController.snapshot(SHOP)?.consecutiveErrors).toBe(0);
      expect(rateController.activeCount).toBe(0);
    });

    it('should reject a transport hint that differs from the engine transport', async () => {
      await expect(engine.fetch({ url: '/a', transport: 'browser' })).rejects.toBeInstanceOf(ConfigurationError);
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe('error typing', () => {
    it('should surface a 404 as a client error with the raw status and body', async () => {
      transport.respond = async (request) => page(request.url, 'Not here', 404);

      const error = await engine.fetch({ url: '/missing' }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toMatchObject({ status: 'client-error', statusCode: 404, body: 'Not here' });
      expect(rateController.snapshot(SHOP)?.consecutiveErrors).toBe(1);
    });

    it('should surface a 503 as a server error', async () => {
      transport.respond = async (request) => page(request.url, 'busy', 503);

      await expect(engine.fetch({ url: '/a' })).rejects.toMatchObject({
        status: 'server-error',
        statusCode: 503,
      });
    });

    it('should wrap transport failures in NetworkError', async () => {
      const cause = new Error('connect ECONNREFUSED');
      transport.respond = async () => {
        throw cause;
      };

      const error = await engine.fetch({ url: '/a' }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({
        status: 'network-error',
        message: 'Network failure fetching https://shop.test/a: connect ECONNREFUSED',
        cause,
      });
      expect(rateController.snapshot(SHOP)?.consecutiveErrors).toBe(1);
    });

    it('should time out, release the slot and count a failure', async () => {
      transport.respond = async (_request, signal) => hangUntilAborted(signal);

      const error = await engine.fetch({ url: '/slow', timeoutMs: 20 }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(FetchTimeoutError);
      expect(error).toMatchObject({ status: 'timeout', code: 'FETCH_TIMEOUT' });
      expect(rateController.activeCount).toBe(0);
      expect(rateController.snapshot(SHOP)?.consecutiveErrors).toBe(1);
    });

    it('should classify timeout-named errors from the client as timeouts', async () => {
      transport.respond = async () => {
        const err = new Error('Timeout awaiting request');
        err.name = 'TimeoutError';
        throw err;
      };

      await expect(engine.fetch({ url: '/a' })).rejects.toBeInstanceOf(FetchTimeoutError);
    });
  });

  describe('robots.txt', () => {
    it('should refuse disallowed paths without admitting them', async () => {
      const robotsLoader = vi.fn(async () => 'User-agent: *\nDisallow: /private');
      engine = new FetchEngine({
        baseUrl: BASE,
        transportImpl: transport,
        rateController,
        respectRobotsTxt: true,
        robotsLoader,
      });

      await expect(engine.fetch({ url: '/private/orders' })).rejects.toBeInstanceOf(RobotsDisallowedError);
      await engine.fetch({ url: '/public' });

      expect(transport.requests.map((r) => r.url)).toEqual(['https://shop.test/public']);
      expect(robotsLoader).toHaveBeenCalledTimes(1);
      expect(robotsLoader).toHaveBeenCalledWith('https://shop.test/robots.txt');
    });
  });

  describe('session', () => {
    it('should keep one session across requests until invalidated', async () => {
      await engine.fetch({ url: '/a' });
      const handle = engine.session;
      transport.handle.jar.push(sid);
      await engine.fetch({ url: '/b' });

      expect(engine.session).toBe(handle);
      expect(await engine.session.cookies()).toEqual([sid]);

      await engine.invalidateSession();
      expect(await engine.session.isEmpty()).toBe(true);
    });

    it('should forward login submissions to the transport', async () => {
      const loginPage = await engine.fetch({ url: '/login' });
      transport.onLogin = async () => page('https://shop.test/account', 'Welcome back');

      const result = await engine.submitLogin({
        loginPage,
        fieldMap: { username: '#user', password: '#pass' },
        credentials: { username: 'alice', password: 'test-secret', save: false },
      });

      expect(result.finalUrl).toBe('https://shop.test/account');
      expect(transport.logins[0]).toMatchObject({
        fieldMap: { username: '#user', password: '#pass' },
        credentials: { username: 'alice', password: 'test-secret' },
        timeoutMs: 30_000,
      });
    });
  });

  describe('close', () => {
    it('should be a no-op before initialize', async () => {
      await engine.close();
      await engine.close();

      expect(transport.closeCalls).toBe(0);
      expect(engine.isClosed).toBe(true);
    });

    it('should close the transport exactly once', async () => {
      await engine.initialize();

      await engine.close();
      await engine.close();

      expect(transport.closeCalls).toBe(1);
    });

    it('should fail in-flight fetches with a cancellation', async () => {
      transport.respond = async (_request, signal) => hangUntilAborted(signal);

      const pending = engine.fetch({ url: '/a' }).catch((err: unknown) => err);
      await vi.waitFor(() => expect(transport.requests).toHaveLength(1));
      await engine.close();

      const error = await pending;
      expect(error).toBeInstanceOf(FetchCancelledError);
      expect(error).toMatchObject({ status: 'cancelled' });
      expect(rateController.activeCount).toBe(0);
    });

    it('should reject fetches on a closed engine', async () => {
      await engine.initialize();
      await engine.close();

      await expect(engine.fetch({ url: '/a' })).rejects.toBeInstanceOf(FetchCancelledError);
    });
  });

  describe('session file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'engine-session-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should save cookies on close and restore them in the next engine', async () => {
      const sessionFile = join(dir, 'cookies.json');
      engine = new FetchEngine({ baseUrl: BASE, transportImpl: transport, rateController, sessionFile });
      await engine.initialize();
      transport.handle.jar.push(sid);
      await engine.close();

      const next = new FakeTransport();
      const restored = new FetchEngine({ baseUrl: BASE, transportImpl: next, rateController, sessionFile });
      await restored.initialize();

      expect(next.opened[0]).toEqual([sid]);
      await restored.close();
    });
  });

  describe('concurrency', () => {
    it('should never run more fetches than the shared concurrency limit', async () => {
      const shared = new RateController({ baseDelay: 0, jitter: 0, concurrency: 2 });
      engine = new FetchEngine({ baseUrl: BASE, transportImpl: transport, rateController: shared });
      let inFlight = 0;
      let peak = 0;
      transport.respond = async (request) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 10));
        inFlight -= 1;
        return page(request.url);
      };

      const urls = ['a', 'b', 'c', 'd', 'e'].map((host) => `https://${host}.test/`);
      const results = await Promise.all(urls.map((url) => engine.fetch({ url })));

      expect(results).toHaveLength(5);
      expect(peak).toBe(2);
    });
  });
});
