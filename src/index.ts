import { createServer } from 'http';
import { env, validateEnv, createDatabase, closeDatabase } from './config/index.js';
import { migrateToLatest } from './db/migrate.js';
import { createApp } from './app.js';
import { ShopifyService } from './services/integrations/shopify.service.js';
import { KyselyLocalStore } from './services/store/kysely-local-store.js';
import { CatalogSyncService } from './services/catalog-sync.service.js';
import { CustomerService } from './services/customer.service.js';
import { PosOrderService } from './services/pos-order.service.js';
import { ProductService } from './services/product.service.js';
import { SalesReportService } from './services/sales-report.service.js';
import { WebhookProcessorService } from './services/webhook-processor.service.js';

const problems = validateEnv();
if (problems.length > 0) {
  console.error('❌ Invalid configuration:');
  for (const problem of problems) {
    console.error(`   - ${problem}`);
  }
  process.exit(1);
}

const db = createDatabase(env.databaseUrl);
const store = new KyselyLocalStore(db);
const shopify = new ShopifyService(env.shopify, { currency: env.storeCurrency });
const customers = new CustomerService(store, shopify);

const app = createApp(env, {
  sync: new CatalogSyncService(store, shopify),
  products: new ProductService(store),
  customers,
  orders: new PosOrderService(store, shopify, customers),
  reports: new SalesReportService(shopify),
  webhooks: new WebhookProcessorService(store, { secret: env.webhookSecret }),
});

// Create HTTP server
const httpServer = createServer(app);

const PORT = env.port;
const HOST = env.nodeEnv === 'production' ? '0.0.0.0' : 'localhost';

const start = async () => {
  await migrateToLatest(db);
  console.log('✅ Database schema is up to date');

  httpServer.listen(PORT, HOST, () => {
    console.log(`\n🚀 Server running on ${HOST}:${PORT} in ${env.nodeEnv} mode`);
    console.log(`📍 FRONTEND_URL: ${env.frontendUrl}`);
    console.log(`🛍️  Shopify store: ${env.shopify.shopDomain} (API ${env.shopify.apiVersion})`);
    console.log(`🔐 Webhook signatures: ${env.webhookSecret ? 'enforced' : 'disabled (development mode)'}`);
    console.log('\n✨ All systems operational!\n');
  });
};

start().catch(async error => {
  console.error('❌ Failed to start server:', error);
  await closeDatabase();
  process.exit(1);
});

// Graceful shutdown
const shutdown = async () => {
  console.log('\n🛑 Shutting down gracefully...');

  // Force close after 10 seconds
  setTimeout(() => {
    console.error('⚠️ Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();

  // Stop accepting requests, let in-flight commits finish
  await new Promise<void>(resolve => httpServer.close(() => resolve()));
  console.log('✅ HTTP server closed');

  await closeDatabase();
  console.log('✅ Database connection closed');

  process.exit(0);
};

const onSignal = () => {
  shutdown().catch(error => {
    console.error('❌ Shutdown failed:', error);
    process.exit(1);
  });
};

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);
