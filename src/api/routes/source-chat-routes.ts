import type { FastifyInstance } from 'fastify';
import * as sourceChatRepo from '../../database/repositories/source-chat-repository.js';
import type { SourceChatCreateInput } from '../../common/types/source-chat.js';

const sourceChatCreateSchema = {
  type: 'object',
  required: ['chatId'],
  additionalProperties: false,
  properties: {
    chatId: { type: 'string' },
    name: { type: ['string', 'null'] },
  },
} as const;

const sourceChatToggleSchema = {
  type: 'object',
  required: ['isActive'],
  additionalProperties: false,
  properties: {
    isActive: { type: 'boolean' },
  },
} as const;

/**
 * Source chat routes: which chats the forwarder listens to.
 */
export async function sourceChatRoutes(app: FastifyInstance): Promise<void> {

  // ?active=true narrows the list to chats that are forwarded
  app.get<{
    Querystring: { active?: string };
  }>('/api/source-chats', async (request) => {
    const chats = await sourceChatRepo.listSourceChats();
    if (request.query.active === 'true') {
      return { sourceChats: chats.filter((c) => c.isActive) };
    }
    return { sourceChats: chats };
  });

  app.get<{
    Params: { chatId: string };
  }>('/api/source-chats/:chatId', async (request) => {
    const sourceChat = await sourceChatRepo.getSourceChat(request.params.chatId);
    return { sourceChat };
  });

  app.post<{
    Body: SourceChatCreateInput;
  }>('/api/source-chats', { schema: { body: sourceChatCreateSchema } }, async (request, reply) => {
    const sourceChat = await sourceChatRepo.addSourceChat(request.body);
    reply.code(201);
    return { sourceChat };
  });

  // Activate / deactivate
  app.patch<{
    Params: { chatId: string };
    Body: { isActive: boolean };
  }>('/api/source-chats/:chatId', { schema: { body: sourceChatToggleSchema } }, async (request) => {
    const sourceChat = await sourceChatRepo.setSourceChatActive(request.params.chatId, request.body.isActive);
    return { sourceChat };
  });

  app.delete<{
    Params: { chatId: string };
  }>('/api/source-chats/:chatId', async (request, reply) => {
    await sourceChatRepo.deleteSourceChat(request.params.chatId);
    reply.code(204);
  });
}
