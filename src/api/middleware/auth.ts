import type { FastifyInstance } from 'fastify';
import { AuthenticationError } from '../../common/errors/index.js';

/**
 * Require `Authorization: Bearer <token>` on every route registered in
 * `app`'s context. Without a configured token the admin API is left open.
 */
export function registerAdminAuth(app: FastifyInstance, token: string | null): void {
  if (!token) return;

  const expected = `Bearer ${token}`;
  app.addHook('onRequest', async (request) => {
    if (request.headers.authorization !== expected) {
      throw new AuthenticationError('A valid admin bearer token is required');
    }
  });
}
