/**
 * Hepsiburada listing API adapter.
 *
 * Credentials: `merchant_id`, `username`, `password`.
 *
 * @module integrations/hepsiburada-adapter
 */

import { z } from 'zod';
import { HttpIntegrationAdapter } from './http-adapter';
import type {
  CallOptions,
  DateRange,
  Pagination,
  ProductPayload,
  PushProductResult,
  RawOrder,
  RawProduct,
} from './adapter-contract';

const DEFAULT_ENDPOINT = 'https://listing-external.hepsiburada.com';

const listingSchema = z.object({
  hepsiburadaSku: z.string(),
  merchantSku: z.string().optional(),
  productName: z.string().optional(),
  price: z.number().optional(),
  availableStock: z.number().optional(),
}).passthrough();

const orderSchema = z.object({
  orderId: z.string(),
  orderNumber: z.string().optional(),
  status: z.string().optional(),
  totalPrice: z.object({ amount: z.number(), currency: z.string() }).optional(),
  orderDate: z.string().optional(),
}).passthrough();

export class HepsiburadaAdapter extends HttpIntegrationAdapter {
  protected baseUrl(): string {
    return this.config.apiEndpoint ?? DEFAULT_ENDPOINT;
  }

  protected authHeaders(): Record<string, string> {
    const token = Buffer.from(`${this.credential('username')}:${this.credential('password')}`).toString('base64');
    return { Authorization: `Basic ${token}` };
  }

  protected healthPath(): string {
    return `/listings/merchantid/${this.merchantId()}?offset=0&limit=1`;
  }

  async connect(options?: CallOptions): Promise<boolean> {
    await this.request('GET', `/listings/merchantid/${this.merchantId()}`, {
      query: { offset: 0, limit: 1 },
      signal: options?.signal,
    });
    return true;
  }

  async fetchProducts(pagination: Pagination, options?: CallOptions): Promise<RawProduct[]> {
    const body = await this.request('GET', `/listings/merchantid/${this.merchantId()}`, {
      query: { offset: pagination.page * pagination.size, limit: pagination.size },
      signal: options?.signal,
    });
    const { listings } = this.parse(z.object({ listings: z.array(listingSchema) }), body, 'listing page');
    return listings.map(({ hepsiburadaSku, merchantSku, productName, price, availableStock, ...raw }) => ({
      externalId: hepsiburadaSku,
      sku: merchantSku,
      title: productName,
      price,
      stock: availableStock,
      raw,
    }));
  }

  async pushProduct(product: ProductPayload, options?: CallOptions): Promise<PushProductResult> {
    const body = await this.request('POST', `/listings/merchantid/${this.merchantId()}/inventory-uploads`, {
      body: [{
        merchantSku: product.sku,
        productName: product.title,
        price: product.price,
        availableStock: product.stock,
      }],
      signal: options?.signal,
    });
    const parsed = z.object({ hepsiburadaSku: z.string() }).safeParse(body);
    // Listings not yet matched to a catalog item are addressed by merchant SKU
    return { externalId: parsed.success ? parsed.data.hepsiburadaSku : product.sku };
  }

  async pushStockUpdate(externalId: string, quantity: number, options?: CallOptions): Promise<boolean> {
    await this.request('POST', `/listings/merchantid/${this.merchantId()}/stock-uploads`, {
      body: [{ hepsiburadaSku: externalId, availableStock: quantity }],
      signal: options?.signal,
    });
    return true;
  }

  async pushPriceUpdate(externalId: string, price: number, options?: CallOptions): Promise<boolean> {
    await this.request('POST', `/listings/merchantid/${this.merchantId()}/price-uploads`, {
      body: [{ hepsiburadaSku: externalId, price }],
      signal: options?.signal,
    });
    return true;
  }

  async fetchOrders(dateRange: DateRange, pagination: Pagination, options?: CallOptions): Promise<RawOrder[]> {
    const body = await this.request('GET', `/orders/merchantid/${this.merchantId()}`, {
      query: {
        begindate: dateRange.from,
        enddate: dateRange.to,
        offset: pagination.page * pagination.size,
        limit: pagination.size,
      },
      signal: options?.signal,
    });
    const { items } = this.parse(z.object({ items: z.array(orderSchema) }), body, 'order page');
    return items.map(({ orderId, orderNumber, status, totalPrice, orderDate, ...raw }) => ({
      externalOrderId: orderId,
      orderNumber,
      status,
      totalAmount: totalPrice?.amount,
      currency: totalPrice?.currency,
      orderDate,
      raw,
    }));
  }

  private merchantId(): string {
    return encodeURIComponent(this.credential('merchant_id'));
  }
}
