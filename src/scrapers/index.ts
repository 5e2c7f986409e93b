/**
 * scrapers/index.ts — Site adapters: the extraction side of a crawl.
 *
 * Adding a site is two steps:
 *   a) Create `src/scrapers/<site>Adapter.ts` extending BaseSiteAdapter.
 *   b) `registry.register('<site>', () => new SiteAdapter())` at startup.
 */

export { BaseSiteAdapter, extractPage } from './baseAdapter';
export type { ExtractedRecord, PageType, SiteAdapter } from './baseAdapter';
export { GenericAdapter } from './genericAdapter';
export { AdapterRegistry } from './adapterRegistry';
export type { AdapterFactory } from './adapterRegistry';
