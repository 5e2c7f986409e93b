/**
 * genericAdapter.ts — Fallback adapter for sites without a dedicated one.
 *
 * Uses page structure alone: many repeated item links → a list page; a
 * single `<article>` or a `<main>` with an `<h1>` → a detail page; anything
 * else is generic.
 */

import * as cheerio from 'cheerio';
import { BaseSiteAdapter, type ExtractedRecord, type PageType } from './baseAdapter';
import { Logger } from '../core/logger';

const logger = new Logger('GenericAdapter');

/** Repeated item containers that mark a listing page. */
const LIST_ITEM_SELECTOR = 'ul > li > a[href], ol > li > a[href], [class*="item"] a[href], article a[href]';
const LIST_MIN_ITEMS = 5;

export class GenericAdapter extends BaseSiteAdapter {
  readonly id = 'generic';

  classifyPage(content: string, _url: string): PageType {
    const $ = cheerio.load(content);
    if ($('article').length > 1 || $(LIST_ITEM_SELECTOR).length >= LIST_MIN_ITEMS) {
      return 'list';
    }
    if ($('article').length === 1 || $('main h1').length === 1) {
      return 'detail';
    }
    return 'generic';
  }

  async extractList(content: string, url: string): Promise<ExtractedRecord[]> {
    const $ = cheerio.load(content);
    const items: ExtractedRecord[] = [];

    $(LIST_ITEM_SELECTOR).each((_, el) => {
      const title = $(el).text().replace(/\s+/g, ' ').trim();
      const href = $(el).attr('href');
      if (!title || !href) return;
      try {
        items.push({ title, url: new URL(href, url).toString() });
      } catch {
        // Malformed href; skip it.
      }
    });

    logger.info(`Found ${items.length} list item(s) on ${url}`);
    return items;
  }

  async extractDetail(content: string, url: string): Promise<ExtractedRecord> {
    const $ = cheerio.load(content);
    const scope = $('article').first().length > 0 ? $('article').first() : $('main').first();
    const heading = scope.find('h1').first().text().trim();

    return {
      url,
      title: heading || this.extractTitle($, url),
      text: scope.text().replace(/\s+/g, ' ').trim(),
    };
  }

  async extractGeneric(content: string, url: string): Promise<ExtractedRecord> {
    const $ = cheerio.load(content);
    const description = $('meta[name="description"]').attr('content')?.trim();

    return {
      url,
      title: this.extractTitle($, url),
      description: description ?? null,
      headings: $('h1, h2')
        .map((_, el) => $(el).text().trim())
        .get()
        .filter((text) => text.length > 0),
      links: this.extractLinks($, url),
    };
  }
}
