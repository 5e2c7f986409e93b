/**
 * formParser.ts — Turn a login page + field map into a plain HTTP form post.
 *
 * The light transport has no DOM to type into, so the locators from the
 * field map are resolved against the fetched HTML with cheerio:
 *
 *   1. Each locator → the matching input's `name` attribute.
 *   2. The enclosing `<form>` → action URL and method.
 *   3. Hidden inputs are carried over unchanged.
 *   4. A CSRF token is looked up in meta tags, well-known hidden inputs and
 *      `data-csrf` attributes. Not finding one is normal.
 */

import * as cheerio from 'cheerio';
import { ConfigurationError } from '../core/errors';
import type { Credentials, FieldMap, HttpMethod } from '../core/types';

export interface CsrfToken {
  /** Form field the token is posted under. */
  field: string;
  token: string;
}

export interface ParsedLoginForm {
  action: string;
  method: HttpMethod;
  fields: Record<string, string>;
  csrf: CsrfToken | null;
  headers: Record<string, string>;
}

const CSRF_INPUT_NAMES = ['csrf_token', 'csrf', '_csrf_token', '_csrf', '_token', 'authenticity_token'];

// ─── Public API ─────────────────────────────────────────────

export function parseLoginForm(
  html: string,
  pageUrl: string,
  fieldMap: FieldMap,
  credentials: Credentials,
): ParsedLoginForm {
  const $ = cheerio.load(html);

  const passwordInput = select($, fieldMap.password).first();
  let form = passwordInput.closest('form');
  if (form.length === 0) form = $('form').first();

  const fields: Record<string, string> = {};

  form.find('input[type="hidden"][name]').each((_, el) => {
    const name = $(el).attr('name');
    if (name) fields[name] = $(el).attr('value') ?? '';
  });

  fields[resolveFieldName($, fieldMap.username, 'username')] = credentials.username;
  fields[resolveFieldName($, fieldMap.password, 'password')] = credentials.password;

  if (fieldMap.submit) {
    const submit = select($, fieldMap.submit).first();
    const name = submit.attr('name');
    if (name) fields[name] = submit.attr('value') ?? '';
  }

  const csrf = extractCsrfToken(html);
  const headers: Record<string, string> = {};
  if (csrf) {
    fields[csrf.field] ??= csrf.token;
    headers['x-csrf-token'] = csrf.token;
  }

  const rawAction = fieldMap.action ?? form.attr('action') ?? pageUrl;
  const action = new URL(rawAction || pageUrl, pageUrl).toString();
  const method: HttpMethod = (form.attr('method') ?? '').toUpperCase() === 'GET' ? 'GET' : 'POST';

  return { action, method, fields, csrf, headers };
}

/** Find a CSRF token in `html`, or null. */
export function extractCsrfToken(html: string): CsrfToken | null {
  const $ = cheerio.load(html);

  // 1. <meta name="csrf-token"> (+ optional <meta name="csrf-param">)
  const metaToken =
    $('meta[name="csrf-token"]').attr('content') ?? $('meta[name="_csrf_token"]').attr('content');
  if (metaToken) {
    const field = $('meta[name="csrf-param"]').attr('content') ?? 'csrf_token';
    return { field, token: metaToken };
  }

  // 2. Hidden inputs with a well-known name.
  for (const name of CSRF_INPUT_NAMES) {
    const value = $(`input[name="${name}"]`).attr('value');
    if (value) return { field: name, token: value };
  }

  // 3. data-csrf attributes.
  const dataToken = $('[data-csrf]').attr('data-csrf');
  if (dataToken) return { field: 'csrf_token', token: dataToken };

  return null;
}

// ─── Helpers ────────────────────────────────────────────────

function select($: cheerio.CheerioAPI, locator: string) {
  try {
    return $(locator);
  } catch (err) {
    throw new ConfigurationError(`Invalid locator "${locator}" in field map`, {
      locator,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * The input name a locator points at. Falls back to the id in `#id`, the
 * value in `[name=...]`, and finally the logical field name.
 */
function resolveFieldName($: cheerio.CheerioAPI, locator: string, logical: string): string {
  const name = select($, locator).first().attr('name');
  if (name) return name;

  const byName = /\[name=["']?([^"'\]]+)["']?\]/.exec(locator);
  if (byName) return byName[1];

  const byId = /^#([\w-]+)$/.exec(locator.trim());
  if (byId) return byId[1];

  return logical;
}
