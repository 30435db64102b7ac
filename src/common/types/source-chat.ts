export interface SourceChat {
  id: number;
  chatId: string;        // Telegram chat id, kept as text ("-100...")
  name: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface SourceChatCreateInput {
  chatId: string;
  name?: string | null;
}
