export type BanOptions = { permanent: true } | { durationMs: number };

/**
 * Chat platform adapter. The moderation core only ever calls these operations and
 * never assumes a particular messenger.
 */
export interface IModerationTransport {
  isAdmin(chatId: string, userId: string): Promise<boolean>;
  isSudo(userId: string): boolean;
  deleteMessage(chatId: string, messageId: string): Promise<void>;
  mute(chatId: string, userId: string, durationMs: number): Promise<void>;
  ban(chatId: string, userId: string, options: BanOptions): Promise<void>;
  warn(chatId: string, userId: string, reason: string): Promise<void>;
  unban(chatId: string, userId: string): Promise<void>;
  /** Tell the chat's administrators (and the sudo user) about an action taken. */
  notifyAdmins(chatId: string, text: string): Promise<void>;
}
