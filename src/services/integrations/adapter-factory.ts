/**
 * Adapter catalog and factory map.
 *
 * Adapter names resolve to factories at startup; names without a dedicated
 * adapter fall back to the generic REST adapter.
 *
 * @module integrations/adapter-factory
 */

import { logger } from '../../utils/logger';
import { HepsiburadaAdapter } from './hepsiburada-adapter';
import { RestMarketplaceAdapter, type HttpAdapterOptions } from './http-adapter';
import { TrendyolAdapter } from './trendyol-adapter';
import type {
  AdapterCategory,
  AdapterConfig,
  AdapterContract,
  AdapterFactory,
  IntegrationPriority,
} from './adapter-contract';

export interface CatalogEntry {
  displayName: string;
  category: AdapterCategory;
  /** Defaults to `medium` */
  priority?: IntegrationPriority;
  /** Requests per rate-limit window */
  rateLimit?: number;
  apiEndpoint?: string;
  features: string[];
}

/**
 * Known integrations and their defaults. Anything else registers with
 * generic defaults derived from its name.
 */
export const INTEGRATION_CATALOG: Record<string, CatalogEntry> = {
  trendyol: {
    displayName: 'Trendyol',
    category: 'marketplace',
    priority: 'critical',
    rateLimit: 1000,
    apiEndpoint: 'https://api.trendyol.com/sapigw',
    features: ['products', 'orders', 'stock', 'price'],
  },
  hepsiburada: {
    displayName: 'Hepsiburada',
    category: 'marketplace',
    priority: 'critical',
    rateLimit: 800,
    apiEndpoint: 'https://listing-external.hepsiburada.com',
    features: ['products', 'orders', 'stock', 'price'],
  },
  n11: { displayName: 'N11', category: 'marketplace', priority: 'high', rateLimit: 500, features: ['products', 'orders', 'stock', 'price'] },
  amazon: { displayName: 'Amazon', category: 'marketplace', priority: 'high', rateLimit: 500, features: ['products', 'orders', 'stock', 'price'] },
  ciceksepeti: { displayName: 'ÇiçekSepeti', category: 'marketplace', rateLimit: 500, features: ['products', 'orders', 'stock', 'price'] },
  pttavm: { displayName: 'PTT AVM', category: 'marketplace', rateLimit: 500, features: ['products', 'orders', 'stock', 'price'] },
  shopify: { displayName: 'Shopify', category: 'ecommerce', priority: 'high', rateLimit: 2000, features: ['products', 'orders', 'stock', 'price'] },
  woocommerce: { displayName: 'WooCommerce', category: 'ecommerce', rateLimit: 1000, features: ['products', 'orders', 'stock', 'price'] },
  yurtici: { displayName: 'Yurtiçi Kargo', category: 'cargo', priority: 'high', features: ['shipments', 'tracking'] },
  aras: { displayName: 'Aras Kargo', category: 'cargo', priority: 'high', features: ['shipments', 'tracking'] },
  logo: { displayName: 'Logo', category: 'accounting', features: ['invoices', 'ledger'] },
  parasut: { displayName: 'Paraşüt', category: 'accounting', features: ['invoices', 'ledger'] },
  qnb_efatura: { displayName: 'QNB e-Fatura', category: 'invoice', features: ['invoices'] },
  iyzico: { displayName: 'iyzico', category: 'payment', priority: 'critical', features: ['payments', 'refunds'] },
  facebook: { displayName: 'Facebook Shop', category: 'social', priority: 'low', features: ['catalog'] },
};

export function catalogEntryFor(name: string): CatalogEntry | undefined {
  return INTEGRATION_CATALOG[name];
}

export class AdapterFactoryRegistry {
  private readonly factories = new Map<string, AdapterFactory>();

  constructor(private readonly fallback: AdapterFactory) {}

  register(name: string, factory: AdapterFactory): void {
    if (this.factories.has(name)) {
      logger.warn(`Adapter factory ${name} already registered, overwriting`, { integration: name });
    }
    this.factories.set(name, factory);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  create(config: AdapterConfig): AdapterContract {
    const factory = this.factories.get(config.name) ?? this.fallback;
    return factory(config);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }
}

/**
 * Factories for the adapters that ship with the service.
 */
export function createDefaultAdapterFactories(options?: HttpAdapterOptions): AdapterFactoryRegistry {
  const registry = new AdapterFactoryRegistry((config) => new RestMarketplaceAdapter(config, options));
  registry.register('trendyol', (config) => new TrendyolAdapter(config, options));
  registry.register('hepsiburada', (config) => new HepsiburadaAdapter(config, options));
  return registry;
}
