import dotenv from 'dotenv';
import { loadAppConfig } from './common/config.js';
import { initPool, closePool } from './database/pool.js';
import { runMigrations } from './database/migrate.js';
import { seedDefaultConfig } from './database/repositories/bot-config-repository.js';
import { createServer } from './api/server.js';
import { createTelegramBot, TelegramRelay } from './forwarding/telegram-relay.js';
import { repositoryStore } from './forwarding/store-port.js';

dotenv.config();

async function main() {
  const config = loadAppConfig(process.env);

  initPool(config.databaseUrl, config.databasePoolSize);
  await runMigrations();
  await seedDefaultConfig();

  if (!config.adminApiToken) {
    console.warn('[startup] ADMIN_API_TOKEN not set: the admin API accepts unauthenticated requests.');
  }

  const server = await createServer({ adminApiToken: config.adminApiToken });
  await server.listen({ port: config.port, host: config.host });
  console.log(`[startup] Admin API running on ${config.host}:${config.port}`);

  let relay: TelegramRelay | null = null;
  if (config.botToken) {
    relay = new TelegramRelay(createTelegramBot(config.botToken), repositoryStore);
    await relay.start();
  } else {
    console.warn('[startup] BOT_TOKEN not set: message forwarding is disabled.');
  }

  const shutdown = async (signal: string) => {
    console.log(`[shutdown] ${signal} received, stopping...`);
    await relay?.stop();
    await server.close();
    await closePool();
    process.exit(0);
  };

  process.once('SIGINT', (signal) => {
    shutdown(signal).catch((err) => {
      console.error('[shutdown] Failed to stop cleanly:', err);
      process.exit(1);
    });
  });
  process.once('SIGTERM', (signal) => {
    shutdown(signal).catch((err) => {
      console.error('[shutdown] Failed to stop cleanly:', err);
      process.exit(1);
    });
  });
}

main().catch((err) => {
  console.error('Failed to start relay:', err);
  process.exit(1);
});
