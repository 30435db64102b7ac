export interface Topic {
  id: number;
  prefix: string;        // lower-cased command prefix, e.g. "sky" for "/sky ..."
  name: string;
  threadId: number;      // Telegram message_thread_id in the target chat
  createdAt: Date;
  updatedAt: Date;
}

export interface TopicCreateInput {
  prefix: string;
  name: string;
  threadId: number;
}

export type TopicUpdateInput = Partial<Pick<Topic, 'name' | 'threadId'>>;
