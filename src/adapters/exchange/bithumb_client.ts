import { createHash, createHmac, randomUUID } from 'node:crypto';
import { z } from 'zod';

const DEFAULT_TIMEOUT_MS = 7000;

type HttpMethod = 'GET' | 'POST' | 'DELETE';
type Params = Record<string, string>;

const numeric = z
  .union([z.string(), z.number()])
  .transform((value) => Number(value))
  .pipe(z.number().finite());

const tickerResponseSchema = z
  .array(
    z.object({
      market: z.string(),
      trade_price: numeric
    })
  )
  .min(1);

const accountSchema = z.object({
  currency: z.string(),
  balance: numeric,
  locked: numeric.optional(),
  avg_buy_price: numeric.optional()
});

const marketSideSchema = z.object({
  currency: z.string().optional(),
  min_total: numeric.optional()
});

const chanceResponseSchema = z.object({
  bid_fee: numeric.optional(),
  ask_fee: numeric.optional(),
  market: z
    .object({
      id: z.string(),
      bid: marketSideSchema.optional(),
      ask: marketSideSchema.optional()
    })
    .optional(),
  bid_account: accountSchema,
  ask_account: accountSchema
});

const orderResponseSchema = z.object({
  uuid: z.string().min(1),
  side: z.string().optional(),
  ord_type: z.string().optional(),
  state: z.string().optional(),
  price: numeric.nullish(),
  volume: numeric.nullish(),
  executed_volume: numeric.optional(),
  paid_fee: numeric.optional(),
  trades: z
    .array(
      z.object({
        price: numeric,
        volume: numeric,
        funds: numeric
      })
    )
    .optional()
});

export type BithumbTicker = z.infer<typeof tickerResponseSchema>[number];
export type BithumbChance = z.infer<typeof chanceResponseSchema>;
export type BithumbOrder = z.infer<typeof orderResponseSchema>;

export interface BithumbOrderRequest {
  market: string;
  side: 'bid' | 'ask';
  ord_type: 'limit' | 'price' | 'market';
  price?: string;
  volume?: string;
}

export interface BithumbClientOptions {
  baseUrl: string;
  accessKey?: string;
  secretKey?: string;
  timeoutMs?: number;
}

export class ExchangeHttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    path: string
  ) {
    super(`Bithumb HTTP ${status} on ${path}: ${body.slice(0, 250)}`);
    this.name = 'ExchangeHttpError';
  }
}

function base64UrlJson(value: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

export function encodeParams(params: Params): string {
  return new URLSearchParams(params).toString();
}

export function buildAuthToken(
  accessKey: string,
  secretKey: string,
  params: Params | undefined,
  now: number = Date.now(),
  nonce: string = randomUUID()
): string {
  const payload: Record<string, unknown> = {
    access_key: accessKey,
    nonce,
    timestamp: now
  };

  if (params && Object.keys(params).length > 0) {
    payload.query_hash = createHash('sha512').update(encodeParams(params), 'utf8').digest('hex');
    payload.query_hash_alg = 'SHA512';
  }

  const signingInput = `${base64UrlJson({ alg: 'HS256', typ: 'JWT' })}.${base64UrlJson(payload)}`;
  const signature = createHmac('sha256', secretKey).update(signingInput).digest('base64url');
  return `${signingInput}.${signature}`;
}

export class BithumbClient {
  private readonly baseUrl: string;
  private readonly accessKey?: string;
  private readonly secretKey?: string;
  private readonly timeoutMs: number;

  constructor(options: BithumbClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.accessKey = options.accessKey;
    this.secretKey = options.secretKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async getTicker(market: string): Promise<BithumbTicker> {
    const payload = await this.request('GET', '/v1/ticker', { markets: market });
    const ticker = tickerResponseSchema.parse(payload)[0];
    if (!ticker) {
      throw new Error(`Bithumb ticker response is empty for ${market}`);
    }

    return ticker;
  }

  async getTradePrice(market: string): Promise<number> {
    const ticker = await this.getTicker(market);
    return ticker.trade_price;
  }

  async getOrderChance(market: string): Promise<BithumbChance> {
    const payload = await this.request('GET', '/v1/orders/chance', { market }, true);
    return chanceResponseSchema.parse(payload);
  }

  async createOrder(order: BithumbOrderRequest): Promise<BithumbOrder> {
    const params: Params = {
      market: order.market,
      side: order.side,
      ord_type: order.ord_type
    };
    if (order.price !== undefined) {
      params.price = order.price;
    }
    if (order.volume !== undefined) {
      params.volume = order.volume;
    }

    const payload = await this.request('POST', '/v1/orders', params, true);
    return orderResponseSchema.parse(payload);
  }

  async cancelOrder(uuid: string): Promise<BithumbOrder> {
    const payload = await this.request('DELETE', '/v1/order', { uuid }, true);
    return orderResponseSchema.parse(payload);
  }

  async getOrder(uuid: string): Promise<BithumbOrder> {
    const payload = await this.request('GET', '/v1/order', { uuid }, true);
    return orderResponseSchema.parse(payload);
  }

  private authorize(params: Params): string {
    if (!this.accessKey || !this.secretKey) {
      throw new Error('Missing Bithumb access/secret key for private request');
    }

    return `Bearer ${buildAuthToken(this.accessKey, this.secretKey, params)}`;
  }

  private async request(
    method: HttpMethod,
    path: string,
    params: Params,
    signed = false
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    const headers: Record<string, string> = { accept: 'application/json' };
    let body: string | undefined;

    if (method === 'POST') {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(params);
    } else {
      url.search = encodeParams(params);
    }

    if (signed) {
      headers.authorization = this.authorize(params);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        signal: controller.signal
      });

      if (!response.ok) {
        const text = await response.text().catch(() => '');
        throw new ExchangeHttpError(response.status, text, path);
      }

      const payload: unknown = await response.json();
      return payload;
    } finally {
      clearTimeout(timer);
    }
  }
}
