/**
 * Agrarian BNPL - Main Entry Point
 * Risk scoring, product matching and BNPL terms for farm input financing
 */

import { loadConfig, loadEnvFile } from './config/env';
import { getPool, testConnection, closePool } from './database';
import {
  DecisionService,
  DecisionRepository,
  InMemoryDecisionRepository,
  PgDecisionRepository,
} from './modules/decisioning';
import { createApp } from './api';

async function bootstrap(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();

  console.log('='.repeat(60));
  console.log('  AGRARIAN BNPL - RISK SCORING SERVICE');
  console.log('  Scoring → Product Matching → BNPL Terms');
  console.log('='.repeat(60));

  console.log('\n[Boot] Testing database connection...');
  const dbConnected = await testConnection(config.DATABASE_URL);
  if (!dbConnected) {
    console.error('[Boot] FATAL: Database connection failed');
    process.exit(1);
  }

  const pool = getPool(config.DATABASE_URL);
  const repository: DecisionRepository = pool
    ? new PgDecisionRepository(pool)
    : new InMemoryDecisionRepository();
  console.log(`[Boot] Decision audit store: ${pool ? 'PostgreSQL' : 'in-memory (mock mode)'}`);

  const decisions = new DecisionService(repository);

  console.log('[Boot] Configuring Express server...');
  const app = createApp({
    decisions,
    batchMaxSize: config.BATCH_MAX_SIZE,
    rateLimit: { windowMs: config.RATE_LIMIT_WINDOW_MS, max: config.RATE_LIMIT_MAX },
    dashboard: { sampleSize: config.DASHBOARD_SAMPLE_SIZE, seed: config.DASHBOARD_SEED },
  });

  const server = app.listen(config.PORT, () => {
    console.log(`\n[Boot] Server listening on port ${config.PORT}`);
    console.log('[Boot] Endpoints:');
    console.log('  - GET  /health');
    console.log('  - GET  /v1/products');
    console.log('  - POST /v1/score');
    console.log('  - POST /v1/recommend-product');
    console.log('  - POST /v1/batch-score');
    console.log('  - GET  /v1/decisions/:id');
    console.log('  - GET  /dashboard');
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
    });

    await closePool();

    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      console.error('[Shutdown] Error:', error);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      console.error('[Shutdown] Error:', error);
      process.exit(1);
    });
  });
}

// Run
bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
