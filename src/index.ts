import { initializeDatabase } from './db/schema.js';
import { startScheduler, stopScheduler } from './scheduler/jobs.js';
import { closeProxyAgents } from './core/http.js';
import { logger } from './core/logger.js';
import { config, hasUsableSessionCookie } from './config.js';

async function main() {
  logger.info('='.repeat(50));
  logger.info('Group Feed Extractor');
  logger.info('='.repeat(50));

  if (!hasUsableSessionCookie()) {
    logger.warn('SESSION_COOKIE is not configured; feed requests will be rejected as logged out');
  }

  // Initialize database
  logger.info('Initializing database...');
  initializeDatabase();

  // Start scheduler
  startScheduler();

  logger.info('');
  logger.info(`System is running (${config.groupUrls.length} group(s) on "${config.cron}")`);
  logger.info('');
  logger.info('Manual scrape command:');
  logger.info('  npm run scrape -- <groupUrl...>');
  logger.info('');
}

// Handle graceful shutdown
async function shutdown(): Promise<void> {
  logger.info('Shutting down...');
  stopScheduler();
  await closeProxyAgents();
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

main().catch(error => {
  logger.error('Failed to start:', error);
  process.exit(1);
});
