import { describe, expect, it } from 'vitest';
import { BithumbExchange } from '../../src/adapters/exchange/bithumb_exchange';
import { PaperExchange } from '../../src/adapters/exchange/paper_exchange';
import type { BotConfig } from '../../src/domain/model/types';
import { createExchange } from '../../src/infra/bootstrap';
import { MemoryLogger } from '../helpers/fakes';

function configFor(mode: BotConfig['execution']['mode']): BotConfig {
  return {
    ticker: 'KRW-BTC',
    execution: { mode, paper_start_krw: 1_000_000 },
    exchange: {
      base_url: 'https://api.bithumb.com',
      access_key: 'test-access',
      secret_key: 'test-secret'
    },
    strategy: { take_profit_pct: 1, base_amount_krw: 5000, sizing_mode: 'SCALED', fee_rate: 0.0004 }
  };
}

describe('createExchange', () => {
  it('simulates orders in PAPER mode', async () => {
    const exchange = createExchange(configFor('PAPER'), new MemoryLogger());

    expect(exchange).toBeInstanceOf(PaperExchange);
    await expect(exchange.getOrderChance('KRW-BTC')).resolves.toEqual({
      bid: { balance: 1_000_000, minTotal: 5000 },
      ask: { balance: 0, minTotal: 5000, avgBuyPrice: 0 }
    });
  });

  it('talks to the exchange in LIVE mode and says so', () => {
    const logger = new MemoryLogger();

    expect(createExchange(configFor('LIVE'), logger)).toBeInstanceOf(BithumbExchange);
    expect(logger.messages('warn')).toEqual(['LIVE mode: orders will be sent to the exchange']);
  });
});
