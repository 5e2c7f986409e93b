// tests/unit/compliance.test.ts

import { describe, it, expect, vi } from 'vitest';
import { RobotsPolicy, classifyStatus, isSuccessStatus, pickUserAgent } from '../../src/middleware/compliance';

describe('classifyStatus', () => {
  it('should split statuses into success, client and server errors', () => {
    expect(classifyStatus(200)).toBe('success');
    expect(classifyStatus(204)).toBe('success');
    expect(classifyStatus(302)).toBe('client-error');
    expect(classifyStatus(404)).toBe('client-error');
    expect(classifyStatus(500)).toBe('server-error');
    expect(classifyStatus(503)).toBe('server-error');
  });

  it('should only treat 2xx as success', () => {
    expect(isSuccessStatus(299)).toBe(true);
    expect(isSuccessStatus(300)).toBe(false);
    expect(isSuccessStatus(199)).toBe(false);
  });
});

describe('pickUserAgent', () => {
  it('should pick a desktop Chrome user agent', () => {
    expect(pickUserAgent(() => 0)).toContain('Windows NT 10.0');
    expect(pickUserAgent(() => 0.999)).toContain('X11; Linux x86_64');
  });
});

describe('RobotsPolicy', () => {
  it('should apply the group for its user agent', async () => {
    const robots = 'User-agent: session-crawler\nDisallow: /\n\nUser-agent: *\nDisallow: /admin';
    const policy = new RobotsPolicy('session-crawler', async () => robots);

    expect(await policy.isAllowed('https://shop.test/catalog')).toBe(false);
  });

  it('should fall back to the wildcard group', async () => {
    const policy = new RobotsPolicy('session-crawler', async () => 'User-agent: *\nDisallow: /admin');

    expect(await policy.isAllowed('https://shop.test/admin/users')).toBe(false);
    expect(await policy.isAllowed('https://shop.test/catalog')).toBe(true);
  });

  it('should load robots.txt once per origin', async () => {
    const load = vi.fn(async (_robotsUrl: string) => 'User-agent: *\nDisallow:');
    const policy = new RobotsPolicy('session-crawler', load);

    await policy.isAllowed('https://shop.test/a');
    await policy.isAllowed('https://shop.test/b');
    await policy.isAllowed('https://blog.test/c');

    expect(load.mock.calls.map(([url]) => url)).toEqual([
      'https://shop.test/robots.txt',
      'https://blog.test/robots.txt',
    ]);
  });

  it('should allow everything when there is no robots.txt', async () => {
    const policy = new RobotsPolicy('session-crawler', async () => null);

    expect(await policy.isAllowed('https://shop.test/admin')).toBe(true);
  });

  it('should allow everything when robots.txt cannot be loaded', async () => {
    const policy = new RobotsPolicy('session-crawler', async () => {
      throw new Error('ECONNRESET');
    });

    expect(await policy.isAllowed('https://shop.test/admin')).toBe(true);
  });

  it('should reload after clear', async () => {
    const load = vi.fn(async (_robotsUrl: string) => null);
    const policy = new RobotsPolicy('session-crawler', load);

    await policy.isAllowed('https://shop.test/a');
    policy.clear();
    await policy.isAllowed('https://shop.test/a');

    expect(load).toHaveBeenCalledTimes(2);
  });
});
