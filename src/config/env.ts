import dotenv from 'dotenv';

dotenv.config();

const nodeEnv = process.env.NODE_ENV || 'development';

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const env = {
  port: parsePositiveInt(process.env.PORT, 3001),
  nodeEnv,
  databaseUrl: process.env.DATABASE_URL || '',
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:3000',
  shopify: {
    shopDomain: process.env.SHOPIFY_SHOP_DOMAIN || '',
    accessToken: process.env.SHOPIFY_ACCESS_TOKEN || '',
    apiVersion: process.env.SHOPIFY_API_VERSION || '2024-10',
    requestTimeoutMs: parsePositiveInt(process.env.SHOPIFY_REQUEST_TIMEOUT_MS, 30000),
  },
  webhookSecret: process.env.SHOPIFY_WEBHOOK_SECRET || '',
  // Unsigned webhooks are accepted outside production unless explicitly required
  webhookSignatureRequired: parseBoolean(process.env.WEBHOOK_SIGNATURE_REQUIRED, nodeEnv === 'production'),
  storeCurrency: process.env.STORE_CURRENCY || 'TRY',
};

export type Env = typeof env;

/**
 * Collect configuration problems that must stop the server from starting.
 */
export function validateEnv(config: Env = env): string[] {
  const problems: string[] = [];

  if (!config.databaseUrl) {
    problems.push('DATABASE_URL is not defined');
  }
  if (!config.shopify.shopDomain || !config.shopify.accessToken) {
    problems.push('SHOPIFY_SHOP_DOMAIN and SHOPIFY_ACCESS_TOKEN are required');
  }
  if (config.webhookSignatureRequired && !config.webhookSecret) {
    problems.push('WEBHOOK_SIGNATURE_REQUIRED is on but SHOPIFY_WEBHOOK_SECRET is empty');
  }

  return problems;
}
