import type { FastifyInstance } from 'fastify';
import * as topicRepo from '../../database/repositories/topic-repository.js';
import * as sourceChatRepo from '../../database/repositories/source-chat-repository.js';
import * as configRepo from '../../database/repositories/bot-config-repository.js';

export interface RelayStats {
  topics: number;
  sourceChats: { total: number; active: number };
  targetChatConfigured: boolean;
}

/** Overview of what the forwarder is set up to do. */
export async function statsRoutes(app: FastifyInstance): Promise<void> {
  app.get('/api/stats', async (): Promise<{ stats: RelayStats }> => {
    const [topics, chats, config] = await Promise.all([
      topicRepo.listTopics(),
      sourceChatRepo.listSourceChats(),
      configRepo.getAllConfig(),
    ]);

    return {
      stats: {
        topics: topics.length,
        sourceChats: {
          total: chats.length,
          active: chats.filter((c) => c.isActive).length,
        },
        targetChatConfigured: (config.target_chat_id ?? '').trim().length > 0,
      },
    };
  });
}
