import 'dotenv/config';
import { runBuySellRoundTrip } from '../src/app/usecases/buy_sell_round_trip';
import { SystemClock } from '../src/adapters/clock/system_clock';
import { BithumbClient } from '../src/adapters/exchange/bithumb_client';
import { BithumbExchange } from '../src/adapters/exchange/bithumb_exchange';
import { DEFAULT_BITHUMB_BASE_URL } from '../src/infra/config/schema';
import { createLogger } from '../src/infra/logging/logger';

interface CliArgs {
  amountKrw: number;
  ticker: string;
}

function parseArgs(argv: string[]): CliArgs {
  const argMap = new Map<string, string>();

  for (let i = 0; i < argv.length; i += 1) {
    const key = argv[i];
    const value = argv[i + 1];

    if (!key?.startsWith('--') || !value) {
      continue;
    }

    argMap.set(key, value);
  }

  const amountKrw = Number(argMap.get('--amount') ?? process.env.TEST_AMOUNT_KRW ?? 5000);
  if (!Number.isFinite(amountKrw) || amountKrw <= 0) {
    throw new Error('Usage: npm run smoke -- [--amount 5000] [--ticker KRW-BTC]');
  }

  return {
    amountKrw,
    ticker: argMap.get('--ticker') ?? process.env.TICKER ?? 'KRW-BTC'
  };
}

async function main(): Promise<void> {
  const { amountKrw, ticker } = parseArgs(process.argv.slice(2));
  const accessKey = process.env.BITHUMB_ACCESS_KEY;
  const secretKey = process.env.BITHUMB_SECRET_KEY;

  if (!accessKey || !secretKey) {
    throw new Error('BITHUMB_ACCESS_KEY and BITHUMB_SECRET_KEY are required');
  }

  await runBuySellRoundTrip(
    {
      exchange: new BithumbExchange(
        new BithumbClient({
          baseUrl: process.env.BITHUMB_BASE_URL ?? DEFAULT_BITHUMB_BASE_URL,
          accessKey,
          secretKey
        })
      ),
      clock: new SystemClock(),
      logger: createLogger('smoke')
    },
    { ticker, amountKrw }
  );
}

void main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] smoke-buy-sell failed: ${message}`);
  process.exit(1);
});
