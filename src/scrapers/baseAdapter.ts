/**
 * baseAdapter.ts — The site-adapter contract + shared cheerio helpers.
 *
 * An adapter is the extraction collaborator of the crawl: it receives a
 * page's content and final URL and returns plain records. It never fetches.
 *
 * Capabilities:
 *   • classifyPage   — decide which extractor applies (required)
 *   • extractList    — listing/index pages (optional)
 *   • extractDetail  — single-item pages (optional)
 *   • extractGeneric — everything else, and the fallback (required)
 *   • verifyLogin    — site-specific login check (optional)
 */

import * as cheerio from 'cheerio';
import type { FetchResult } from '../core/types';

export type PageType = 'list' | 'detail' | 'generic';

/** One extracted item; the shape is up to the adapter. */
export type ExtractedRecord = Record<string, unknown>;

export interface SiteAdapter {
  readonly id: string;
  classifyPage(content: string, url: string): PageType;
  extractList?(content: string, url: string): Promise<ExtractedRecord[]>;
  extractDetail?(content: string, url: string): Promise<ExtractedRecord>;
  extractGeneric(content: string, url: string): Promise<ExtractedRecord>;
  /** `undefined` means "can't tell"; the phrase heuristic decides then. */
  verifyLogin?(result: FetchResult): boolean | undefined;
}

/**
 * Run the extractor `adapter` picks for the page. A page type whose
 * extractor the adapter lacks falls back to `extractGeneric`.
 */
export async function extractPage(
  adapter: SiteAdapter,
  content: string,
  url: string,
): Promise<{ pageType: PageType; records: ExtractedRecord[] }> {
  const pageType = adapter.classifyPage(content, url);

  if (pageType === 'list' && adapter.extractList) {
    return { pageType, records: await adapter.extractList(content, url) };
  }
  if (pageType === 'detail' && adapter.extractDetail) {
    return { pageType, records: [await adapter.extractDetail(content, url)] };
  }
  return { pageType, records: [await adapter.extractGeneric(content, url)] };
}

/** Heuristic helpers shared by concrete adapters. */
export abstract class BaseSiteAdapter implements SiteAdapter {
  abstract readonly id: string;

  abstract classifyPage(content: string, url: string): PageType;

  abstract extractGeneric(content: string, url: string): Promise<ExtractedRecord>;

  /**
   * Page title from `og:title`, then `<title>` (minus " | Site" suffixes),
   * then the hostname.
   */
  protected extractTitle($: cheerio.CheerioAPI, url: string): string {
    const ogTitle = $('meta[property="og:title"]').attr('content')?.trim();
    if (ogTitle) return ogTitle;

    const title = $('title').text().trim();
    if (title) {
      return title.split(/\s*[|\-–—]\s*/)[0].trim();
    }

    try {
      return new URL(url).hostname;
    } catch {
      return url;
    }
  }

  /** Absolute, de-duplicated `href`s on the page, skipping fragments and `javascript:`. */
  protected extractLinks($: cheerio.CheerioAPI, url: string): string[] {
    const links = new Set<string>();
    $('a[href]').each((_, el) => {
      const href = $(el).attr('href')?.trim();
      if (!href || href.startsWith('#') || href.toLowerCase().startsWith('javascript:')) return;
      try {
        links.add(new URL(href, url).toString());
      } catch {
        // Malformed href; skip it.
      }
    });
    return [...links];
  }
}
