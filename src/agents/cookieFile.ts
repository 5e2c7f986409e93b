/**
 * cookieFile.ts — Save/load session cookies so a later run can skip login.
 *
 * The file holds `{ timestamp, cookies }`. A snapshot older than the TTL is
 * discarded on load, as is one that does not parse.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { Logger } from '../core/logger';
import { describeError } from '../core/errors';
import type { SessionCookie } from '../core/types';

const logger = new Logger('CookieFile');

const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
});

const cookieFileSchema = z.object({
  timestamp: z.number(),
  cookies: z.array(cookieSchema),
});

/**
 * Load saved cookies from `path`.
 *
 * @returns the cookies, or an empty list when the file is missing, stale
 *   (older than `ttlHours`) or unreadable.
 */
export async function loadSavedCookies(
  path: string,
  ttlHours: number,
  now: number = Date.now(),
): Promise<SessionCookie[]> {
  if (!existsSync(path)) {
    return [];
  }

  try {
    const raw = await readFile(path, 'utf-8');
    const saved = cookieFileSchema.parse(JSON.parse(raw));

    // TTL check — don't use stale cookies.
    const ageHours = (now - saved.timestamp) / (1000 * 60 * 60);
    if (ageHours > ttlHours) {
      logger.info(
        `Saved cookies are ${ageHours.toFixed(1)}h old ` +
          `(TTL: ${ttlHours}h) — discarding`,
      );
      return [];
    }

    logger.info(`Loaded ${saved.cookies.length} saved cookies (${ageHours.toFixed(1)}h old)`);
    return saved.cookies;
  } catch (err) {
    logger.warn(`Failed to load saved cookies from ${path}: ${describeError(err)}`);
    return [];
  }
}

/** Write `cookies` to `path`. Failures are logged, not thrown. */
export async function saveCookies(
  path: string,
  cookies: readonly SessionCookie[],
  now: number = Date.now(),
): Promise<boolean> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify({ timestamp: now, cookies }, null, 2));
    logger.info(`Saved ${cookies.length} cookies to ${path}`);
    return true;
  } catch (err) {
    logger.warn(`Failed to save cookies to ${path}: ${describeError(err)}`);
    return false;
  }
}
