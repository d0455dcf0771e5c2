/**
 * Trendyol supplier API adapter.
 *
 * Credentials: `supplier_id`, `api_key`, `api_secret`.
 *
 * @module integrations/trendyol-adapter
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

const DEFAULT_ENDPOINT = 'https://api.trendyol.com/sapigw';

// List price is published 10% above the sale price
const LIST_PRICE_MARKUP = 1.1;

const productSchema = z.object({
  barcode: z.string(),
  stockCode: z.string().optional(),
  title: z.string().optional(),
  salePrice: z.number().optional(),
  quantity: z.number().optional(),
}).passthrough();

const orderSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  orderNumber: z.string().optional(),
  status: z.string().optional(),
  totalPrice: z.number().optional(),
  currencyCode: z.string().optional(),
  orderDate: z.number().optional(),
}).passthrough();

const pageSchema = <T extends z.ZodTypeAny>(item: T) => z.object({ content: z.array(item) });

export class TrendyolAdapter extends HttpIntegrationAdapter {
  protected baseUrl(): string {
    const endpoint = this.config.apiEndpoint ?? DEFAULT_ENDPOINT;
    return `${endpoint.replace(/\/$/, '')}/suppliers/${encodeURIComponent(this.credential('supplier_id'))}`;
  }

  protected authHeaders(): Record<string, string> {
    const token = Buffer.from(`${this.credential('api_key')}:${this.credential('api_secret')}`).toString('base64');
    return { Authorization: `Basic ${token}` };
  }

  protected healthPath(): string {
    return '/addresses';
  }

  async connect(options?: CallOptions): Promise<boolean> {
    await this.request('GET', '/addresses', { signal: options?.signal });
    return true;
  }

  async fetchProducts(pagination: Pagination, options?: CallOptions): Promise<RawProduct[]> {
    const body = await this.request('GET', '/products', {
      query: { page: pagination.page, size: pagination.size },
      signal: options?.signal,
    });
    const { content } = this.parse(pageSchema(productSchema), body, 'product page');
    return content.map(({ barcode, stockCode, title, salePrice, quantity, ...raw }) => ({
      externalId: barcode,
      sku: stockCode,
      title,
      price: salePrice,
      stock: quantity,
      raw,
    }));
  }

  async pushProduct(product: ProductPayload, options?: CallOptions): Promise<PushProductResult> {
    // Trendyol keys listings by barcode; the merchant SKU doubles as barcode
    await this.request('POST', '/v2/products', {
      body: {
        items: [{
          barcode: product.sku,
          stockCode: product.sku,
          title: product.title,
          description: product.description ?? product.title,
          quantity: product.stock,
          salePrice: product.price,
          listPrice: roundPrice(product.price * LIST_PRICE_MARKUP),
          currencyType: product.currency ?? 'TRY',
          attributes: Object.entries(product.attributes ?? {}).map(([name, value]) => ({ name, value })),
        }],
      },
      signal: options?.signal,
    });
    return { externalId: product.sku };
  }

  async pushStockUpdate(externalId: string, quantity: number, options?: CallOptions): Promise<boolean> {
    await this.request('POST', '/products/price-and-inventory', {
      body: { items: [{ barcode: externalId, quantity }] },
      signal: options?.signal,
    });
    return true;
  }

  async pushPriceUpdate(externalId: string, price: number, options?: CallOptions): Promise<boolean> {
    await this.request('POST', '/products/price-and-inventory', {
      body: { items: [{ barcode: externalId, salePrice: price, listPrice: roundPrice(price * LIST_PRICE_MARKUP) }] },
      signal: options?.signal,
    });
    return true;
  }

  async fetchOrders(dateRange: DateRange, pagination: Pagination, options?: CallOptions): Promise<RawOrder[]> {
    const body = await this.request('GET', '/orders', {
      query: {
        startDate: Date.parse(dateRange.from),
        endDate: Date.parse(dateRange.to),
        page: pagination.page,
        size: pagination.size,
      },
      signal: options?.signal,
    });
    const { content } = this.parse(pageSchema(orderSchema), body, 'order page');
    return content.map(({ id, orderNumber, status, totalPrice, currencyCode, orderDate, ...raw }) => ({
      externalOrderId: id,
      orderNumber,
      status,
      totalAmount: totalPrice,
      currency: currencyCode,
      orderDate: orderDate === undefined ? undefined : new Date(orderDate).toISOString(),
      raw,
    }));
  }
}

function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}
