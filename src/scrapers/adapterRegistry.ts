/**
 * adapterRegistry.ts — Explicit id → adapter-factory table.
 *
 * The orchestrating caller builds one registry at startup, registers the
 * adapters it ships with, and looks them up by site id. There is no module
 * state and no discovery by file name.
 */

import { ConfigurationError } from '../core/errors';
import { Logger } from '../core/logger';
import { GenericAdapter } from './genericAdapter';
import type { SiteAdapter } from './baseAdapter';

const logger = new Logger('AdapterRegistry');

export type AdapterFactory = (config: Record<string, unknown>) => SiteAdapter;

export class AdapterRegistry {
  private readonly factories = new Map<string, AdapterFactory>();

  /** Registry pre-populated with the generic fallback adapter. */
  static withDefaults(): AdapterRegistry {
    return new AdapterRegistry().register('generic', () => new GenericAdapter());
  }

  /** Add (or replace) the factory for `id`. Returns `this` for chaining. */
  register(id: string, factory: AdapterFactory): this {
    if (!id.trim()) {
      throw new ConfigurationError('Adapter id must not be empty');
    }
    if (this.factories.has(id)) {
      logger.warn(`Replacing adapter registered for "${id}"`);
    }
    this.factories.set(id, factory);
    logger.debug(`Registered adapter for site: ${id}`);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  /** Registered ids, in registration order. */
  list(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Build the adapter for `id`.
   *
   * @throws ConfigurationError when nothing is registered under `id`
   */
  create(id: string, config: Record<string, unknown> = {}): SiteAdapter {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new ConfigurationError(`No adapter registered for site "${id}"`, {
        site: id,
        registered: this.list(),
      });
    }
    return factory(config);
  }

  /** Like create(), but falls back to `fallbackId` when `id` is unknown. */
  resolve(id: string, fallbackId = 'generic', config: Record<string, unknown> = {}): SiteAdapter {
    if (this.has(id)) return this.create(id, config);
    logger.info(`No adapter for "${id}", using "${fallbackId}"`);
    return this.create(fallbackId, config);
  }
}
