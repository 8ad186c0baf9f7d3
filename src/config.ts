import { z } from 'zod';
import 'dotenv/config';

const configSchema = z.object({
  // Input / output
  DATASET_DIR: z.string().min(1).default('dataset'),
  OUTPUT_DIR: z.string().min(1).default('dataset/processed'),

  // App
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  SERVE_DASHBOARD: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),

  // Analysis parameters (with sane defaults)
  GAP_THRESHOLD_DAYS: z.coerce.number().int().positive().default(4),
  EXPECTED_TRADING_DAYS_PER_MONTH: z.coerce.number().int().positive().default(22),
  HIGH_VOLUME_PERCENTILE: z.coerce.number().min(0).max(1).default(0.9),
  ATM_BAND: z.coerce.number().positive().default(0.005),            // |moneyness| below this is ATM
  MONEYNESS_TOLERANCE: z.coerce.number().nonnegative().default(0.005), // 0.5% of spot
  PRICE_LEVEL_TOLERANCE: z.coerce.number().nonnegative().default(10),  // dollars
  SURFACE_SAMPLE_EVERY: z.coerce.number().int().positive().default(1),
  HEATMAP_BINS: z.coerce.number().int().positive().default(20),
});

type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const invalid = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${invalid}`);
  }
  return result.data;
}

export const config = loadConfig();
export type { Config };
