import type { FastifyInstance } from 'fastify';
import * as topicRepo from '../../database/repositories/topic-repository.js';
import type { TopicCreateInput, TopicUpdateInput } from '../../common/types/topic.js';

const topicCreateSchema = {
  type: 'object',
  required: ['prefix', 'name', 'threadId'],
  additionalProperties: false,
  properties: {
    prefix: { type: 'string' },
    name: { type: 'string' },
    threadId: { type: 'integer' },
  },
} as const;

const topicUpdateSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    name: { type: 'string' },
    threadId: { type: 'integer' },
  },
} as const;

/**
 * Topic management routes: prefix -> destination thread mappings.
 */
export async function topicRoutes(app: FastifyInstance): Promise<void> {

  app.get('/api/topics', async () => {
    const topics = await topicRepo.listTopics();
    return { topics };
  });

  app.get<{
    Params: { prefix: string };
  }>('/api/topics/:prefix', async (request) => {
    const topic = await topicRepo.getTopicByPrefix(request.params.prefix);
    return { topic };
  });

  app.post<{
    Body: TopicCreateInput;
  }>('/api/topics', { schema: { body: topicCreateSchema } }, async (request, reply) => {
    const topic = await topicRepo.createTopic(request.body);
    reply.code(201);
    return { topic };
  });

  app.patch<{
    Params: { prefix: string };
    Body: TopicUpdateInput;
  }>('/api/topics/:prefix', { schema: { body: topicUpdateSchema } }, async (request) => {
    const topic = await topicRepo.updateTopic(request.params.prefix, request.body);
    return { topic };
  });

  app.delete<{
    Params: { prefix: string };
  }>('/api/topics/:prefix', async (request, reply) => {
    await topicRepo.deleteTopic(request.params.prefix);
    reply.code(204);
  });
}
