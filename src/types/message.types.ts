import type { messageHistory, messages, notifications, users } from '../db/schema';

export type User = typeof users.$inferSelect;
export type Message = typeof messages.$inferSelect;
export type MessageHistoryEntry = typeof messageHistory.$inferSelect;
export type Notification = typeof notifications.$inferSelect;
export type NotificationKind = Notification['kind'];

export interface UserSummary {
  id: string;
  username: string;
  email: string | null;
  firstName: string;
  lastName: string;
}

export interface UserProfileInput {
  id: string;
  username: string;
  email?: string | null;
  firstName?: string;
  lastName?: string;
}

export interface MessageCreateInput {
  senderId: string;
  receiverId: string;
  content: string;
  parentId?: string | null;
}

export interface MessageUpdateInput {
  content: string;
  reason?: string | null;
}

export interface EditResult {
  message: Message;
  /** false when the new content matched the stored content and nothing was written */
  changed: boolean;
}

export type ThreadNode = Message & {
  depth: number;
  replies: ThreadNode[];
};
