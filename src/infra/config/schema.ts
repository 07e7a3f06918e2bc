import { z } from 'zod';

export const DEFAULT_BITHUMB_BASE_URL = 'https://api.bithumb.com';

export const configSchema = z
  .object({
    ticker: z.string().regex(/^KRW-[A-Z0-9]+$/, 'ticker must look like KRW-BTC'),
    execution: z.object({
      mode: z.enum(['PAPER', 'LIVE']).default('PAPER'),
      paper_start_krw: z.number().positive().default(1_000_000)
    }),
    exchange: z.object({
      base_url: z.string().url().default(DEFAULT_BITHUMB_BASE_URL),
      access_key: z.string().min(1).optional(),
      secret_key: z.string().min(1).optional()
    }),
    strategy: z.object({
      take_profit_pct: z.number().positive(),
      base_amount_krw: z.number().positive().default(5000),
      sizing_mode: z.enum(['SCALED', 'STEP']).default('SCALED'),
      fee_rate: z.number().min(0).max(0.01).default(0.0004)
    })
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.execution.mode !== 'LIVE') {
      return;
    }

    if (!config.exchange.access_key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['exchange', 'access_key'],
        message: 'BITHUMB_ACCESS_KEY is required in LIVE mode'
      });
    }
    if (!config.exchange.secret_key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['exchange', 'secret_key'],
        message: 'BITHUMB_SECRET_KEY is required in LIVE mode'
      });
    }
  });
