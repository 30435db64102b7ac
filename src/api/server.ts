import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { topicRoutes } from './routes/topic-routes.js';
import { sourceChatRoutes } from './routes/source-chat-routes.js';
import { configRoutes } from './routes/config-routes.js';
import { statsRoutes } from './routes/stats-routes.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerAdminAuth } from './middleware/auth.js';

export interface ServerConfig {
  adminApiToken: string | null;
  logger?: boolean;
}

/**
 * Admin API over the relay's store. Expects the database pool to be
 * initialized by the caller.
 */
export async function createServer(config: ServerConfig) {
  const app = Fastify({ logger: config.logger ?? true });

  // Plugins
  await app.register(cors, { origin: true });
  await app.register(helmet);

  registerErrorHandler(app);

  // Admin routes share one encapsulated context so the auth hook covers
  // every route in it, however the request path is spelled.
  await app.register(async (api) => {
    registerAdminAuth(api, config.adminApiToken);
    await api.register(topicRoutes);
    await api.register(sourceChatRoutes);
    await api.register(configRoutes);
    await api.register(statsRoutes);
  });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  return app;
}
