import type { FastifyInstance } from 'fastify';
import * as configRepo from '../../database/repositories/bot-config-repository.js';

const configValueSchema = {
  type: 'object',
  required: ['value'],
  additionalProperties: false,
  properties: {
    value: { type: 'string' },
    description: { type: 'string' },
  },
} as const;

export async function configRoutes(app: FastifyInstance): Promise<void> {

  app.get('/api/config', async () => {
    const entries = await configRepo.listConfigEntries();
    return { config: entries };
  });

  app.get<{
    Params: { key: string };
  }>('/api/config/:key', async (request) => {
    const entry = await configRepo.getConfigEntry(request.params.key);
    return { entry };
  });

  app.put<{
    Params: { key: string };
    Body: { value: string; description?: string };
  }>('/api/config/:key', { schema: { body: configValueSchema } }, async (request) => {
    const entry = await configRepo.setConfigValue(
      request.params.key,
      request.body.value,
      request.body.description,
    );
    return { entry };
  });
}
