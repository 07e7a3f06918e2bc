import { createHash, createHmac } from 'node:crypto';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  BithumbClient,
  buildAuthToken,
  encodeParams,
  ExchangeHttpError
} from '../../../src/adapters/exchange/bithumb_client';
import { BithumbExchange, formatDecimal } from '../../../src/adapters/exchange/bithumb_exchange';

const BASE_URL = 'https://api.bithumb.com';
const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

function lastRequest(): { url: string; init: RequestInit | undefined } {
  const call = fetchMock.mock.lastCall;
  if (!call) {
    throw new Error('fetch was not called');
  }

  const [input, init] = call;
  return { url: String(input), init };
}

function decodeJwtPart(token: string, index: number): unknown {
  const part = token.split('.')[index] ?? '';
  const decoded: unknown = JSON.parse(Buffer.from(part, 'base64url').toString('utf8'));
  return decoded;
}

function sha512(value: string): string {
  return createHash('sha512').update(value, 'utf8').digest('hex');
}

function createClient(withKeys = true): BithumbClient {
  return new BithumbClient({
    baseUrl: `${BASE_URL}/`,
    accessKey: withKeys ? 'test-access' : undefined,
    secretKey: withKeys ? 'test-secret' : undefined
  });
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('buildAuthToken', () => {
  it('signs the access key, nonce, timestamp and query hash with HS256', () => {
    const token = buildAuthToken('test-access', 'test-secret', { market: 'KRW-BTC' }, 1_700_000_000_000, 'nonce-1');
    const [header, payload, signature] = token.split('.');

    expect(decodeJwtPart(token, 0)).toEqual({ alg: 'HS256', typ: 'JWT' });
    expect(decodeJwtPart(token, 1)).toEqual({
      access_key: 'test-access',
      nonce: 'nonce-1',
      timestamp: 1_700_000_000_000,
      query_hash: sha512('market=KRW-BTC'),
      query_hash_alg: 'SHA512'
    });
    expect(signature).toBe(
      createHmac('sha256', 'test-secret').update(`${header}.${payload}`).digest('base64url')
    );
  });

  it('omits the query hash when there are no parameters', () => {
    const token = buildAuthToken('test-access', 'test-secret', {}, 1, 'nonce-2');

    expect(decodeJwtPart(token, 1)).toEqual({ access_key: 'test-access', nonce: 'nonce-2', timestamp: 1 });
  });

  it('url-encodes parameters in insertion order', () => {
    expect(encodeParams({ market: 'KRW-BTC', side: 'bid', price: '1 000' })).toBe(
      'market=KRW-BTC&side=bid&price=1+000'
    );
  });
});

describe('BithumbClient', () => {
  it('reads the trade price from the public ticker without signing', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([{ market: 'KRW-BTC', trade_price: '98000000' }]));

    const price = await createClient(false).getTradePrice('KRW-BTC');
    const { url, init } = lastRequest();

    expect(price).toBe(98_000_000);
    expect(url).toBe(`${BASE_URL}/v1/ticker?markets=KRW-BTC`);
    expect(init?.method).toBe('GET');
    expect(new Headers(init?.headers).get('authorization')).toBeNull();
  });

  it('rejects an empty ticker response', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));

    await expect(createClient().getTradePrice('KRW-BTC')).rejects.toThrow();
  });

  it('raises ExchangeHttpError with status and body on non-2xx replies', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"bad"}', { status: 400 }));

    const error = await createClient()
      .getOrderChance('KRW-BTC')
      .catch((caught: unknown) => caught);

    if (!(error instanceof ExchangeHttpError)) {
      throw new Error('expected an ExchangeHttpError');
    }
    expect(error.status).toBe(400);
    expect(error.body).toBe('{"error":"bad"}');
    expect(error.message).toBe('Bithumb HTTP 400 on /v1/orders/chance: {"error":"bad"}');
  });

  it('refuses private requests without keys', async () => {
    await expect(createClient(false).getOrderChance('KRW-BTC')).rejects.toThrow(
      'Missing Bithumb access/secret key for private request'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('BithumbExchange', () => {
  const exchange = () => new BithumbExchange(createClient());

  it('maps order chance balances, minimums and average price', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        market: {
          id: 'KRW-BTC',
          bid: { currency: 'KRW', min_total: '5000' },
          ask: { currency: 'BTC', min_total: '5000' }
        },
        bid_account: { currency: 'KRW', balance: '120000.5', locked: '0' },
        ask_account: { currency: 'BTC', balance: '0.0021', locked: '0', avg_buy_price: '95000000' }
      })
    );

    const chance = await exchange().getOrderChance('KRW-BTC');

    expect(chance).toEqual({
      bid: { balance: 120_000.5, minTotal: 5000 },
      ask: { balance: 0.0021, minTotal: 5000, avgBuyPrice: 95_000_000 }
    });
    expect(lastRequest().url).toBe(`${BASE_URL}/v1/orders/chance?market=KRW-BTC`);
  });

  it('falls back to the default minimum and a zero average', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        bid_account: { currency: 'KRW', balance: '10000' },
        ask_account: { currency: 'BTC', balance: '0' }
      })
    );

    const chance = await exchange().getOrderChance('KRW-BTC');

    expect(chance.bid.minTotal).toBe(5000);
    expect(chance.ask).toEqual({ balance: 0, minTotal: 5000, avgBuyPrice: 0 });
  });

  it('posts a signed limit buy with the body hashed into the token', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ uuid: 'order-1', state: 'wait' }));

    const handle = await exchange().placeLimitBuy('KRW-BTC', 995, 5.02512563);
    const { url, init } = lastRequest();
    const body: unknown = JSON.parse(String(init?.body));
    const authorization = new Headers(init?.headers).get('authorization') ?? '';

    expect(handle).toEqual({ uuid: 'order-1' });
    expect(url).toBe(`${BASE_URL}/v1/orders`);
    expect(init?.method).toBe('POST');
    expect(body).toEqual({
      market: 'KRW-BTC',
      side: 'bid',
      ord_type: 'limit',
      price: '995',
      volume: '5.02512563'
    });
    expect(authorization.startsWith('Bearer ')).toBe(true);
    expect(decodeJwtPart(authorization.slice('Bearer '.length), 1)).toMatchObject({
      access_key: 'test-access',
      query_hash: sha512('market=KRW-BTC&side=bid&ord_type=limit&price=995&volume=5.02512563'),
      query_hash_alg: 'SHA512'
    });
  });

  it('sends a market buy by notional and a market sell by volume', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ uuid: 'order-2' }))
      .mockResolvedValueOnce(jsonResponse({ uuid: 'order-3' }));

    await exchange().placeMarketBuy('KRW-BTC', 5000);
    const buyBody: unknown = JSON.parse(String(lastRequest().init?.body));
    await exchange().placeMarketSell('KRW-BTC', 0.01234568);
    const sellBody: unknown = JSON.parse(String(lastRequest().init?.body));

    expect(buyBody).toEqual({ market: 'KRW-BTC', side: 'bid', ord_type: 'price', price: '5000' });
    expect(sellBody).toEqual({ market: 'KRW-BTC', side: 'ask', ord_type: 'market', volume: '0.01234568' });
  });

  it('cancels by uuid with DELETE', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ uuid: 'order-1', state: 'cancel' }));

    await exchange().cancelOrder('order-1');
    const { url, init } = lastRequest();

    expect(url).toBe(`${BASE_URL}/v1/order?uuid=order-1`);
    expect(init?.method).toBe('DELETE');
  });

  it('sums trade funds into the filled notional', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        uuid: 'order-2',
        state: 'done',
        executed_volume: '5',
        paid_fee: '2',
        trades: [
          { price: '1000', volume: '2', funds: '2000' },
          { price: '1000', volume: '3', funds: '3000' }
        ]
      })
    );

    await expect(exchange().getOrderStatus('order-2')).resolves.toEqual({
      uuid: 'order-2',
      state: 'done',
      filledVolume: 5,
      filledNotional: 5000,
      feePaid: 2
    });
  });

  it('treats a reserved order as still open', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ uuid: 'order-4', state: 'watch' }));

    await expect(exchange().getOrderStatus('order-4')).resolves.toMatchObject({
      state: 'wait',
      filledVolume: 0,
      filledNotional: 0
    });
  });
});

describe('formatDecimal', () => {
  it('prints fixed-point decimals without trailing zeros', () => {
    expect(formatDecimal(995)).toBe('995');
    expect(formatDecimal(0.0000001)).toBe('0.0000001');
    expect(formatDecimal(0.1)).toBe('0.1');
    expect(formatDecimal(5000, 0)).toBe('5000');
  });
});
