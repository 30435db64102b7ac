import * as topicRepo from '../database/repositories/topic-repository.js';
import * as sourceChatRepo from '../database/repositories/source-chat-repository.js';
import * as configRepo from '../database/repositories/bot-config-repository.js';
import type { ForwardingStorePort } from './message-forwarder.js';

/** Forwarder store backed by the Postgres repositories. No caching. */
export const repositoryStore: ForwardingStorePort = {
  loadActiveSourceChatIds: () => sourceChatRepo.listActiveSourceChatIds(),
  loadTopics: () => topicRepo.listTopics(),
  loadConfig: () => configRepo.getAllConfig(),
};
