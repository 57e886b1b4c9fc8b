import { and, count, desc, eq, inArray } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import { inBatches } from '../db/batch';
import type { DB, Executor } from '../db/client';
import { notifications, users } from '../db/schema';
import type { MessageHooks } from '../hooks/message.hooks';
import type { Message, Notification, NotificationKind, User } from '../types/message.types';
import { NotFoundError, PermissionError } from '../utils/errors';
import { displayName, preview } from '../utils/text';

export interface NotificationListOptions {
  unreadOnly?: boolean;
}

const loadUser = (executor: Executor, userId: string): User => {
  const user = executor.select().from(users).where(eq(users.id, userId)).get();
  if (!user) {
    throw new NotFoundError(`User ${userId} not found`);
  }
  return user;
};

export class NotificationService {
  constructor(
    private readonly db: DB,
    private readonly now: () => Date,
  ) {}

  /** Wires the fan-out handlers into the message lifecycle. */
  register(hooks: MessageHooks): void {
    hooks.on('created', ({ message }, tx) => {
      const sender = loadUser(tx, message.senderId);
      this.insert(tx, message, 'new-message', {
        title: `New message from ${sender.username}`,
        body: `${displayName(sender)} sent you a message: "${preview(message.content)}"`,
      });
    });

    hooks.on('edited', ({ message, editorId }, tx) => {
      const editor = loadUser(tx, editorId);
      this.insert(tx, message, 'edit', {
        title: `Message edited by ${editor.username}`,
        body: `${displayName(editor)} edited a message: "${preview(message.content)}"`,
      });
    });

    hooks.on('read', ({ messageIds, receiverId }, tx) => {
      for (const batch of inBatches(messageIds)) {
        tx.update(notifications)
          .set({ isRead: true })
          .where(and(
            inArray(notifications.messageId, batch),
            eq(notifications.userId, receiverId),
            eq(notifications.isRead, false),
          ))
          .run();
      }
    });
  }

  private insert(
    executor: Executor,
    message: Message,
    kind: NotificationKind,
    text: { title: string; body: string },
  ): Notification {
    return executor
      .insert(notifications)
      .values({
        id: uuidv4(),
        userId: message.receiverId,
        messageId: message.id,
        kind,
        title: text.title,
        body: text.body,
        isRead: false,
        createdAt: this.now(),
      })
      .returning()
      .get();
  }

  /** Newest first, with the triggering message's sender in the same query. */
  async listForUser(userId: string, options: NotificationListOptions = {}) {
    return this.db.query.notifications.findMany({
      where: options.unreadOnly
        ? and(eq(notifications.userId, userId), eq(notifications.isRead, false))
        : eq(notifications.userId, userId),
      with: {
        message: {
          columns: { id: true, parentId: true, sentAt: true },
          with: {
            sender: { columns: { id: true, username: true } },
          },
        },
      },
      orderBy: [desc(notifications.createdAt)],
    });
  }

  async unreadCount(userId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(notifications)
      .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)));
    return row?.value ?? 0;
  }

  async markRead(notificationId: string, userId: string): Promise<Notification> {
    const notification = this.db
      .select()
      .from(notifications)
      .where(eq(notifications.id, notificationId))
      .get();

    if (!notification) {
      throw new NotFoundError(`Notification ${notificationId} not found`);
    }
    if (notification.userId !== userId) {
      throw new PermissionError('Not authorized to update this notification');
    }
    if (notification.isRead) return notification;

    return this.db
      .update(notifications)
      .set({ isRead: true })
      .where(eq(notifications.id, notificationId))
      .returning()
      .get();
  }

  async markAllRead(userId: string): Promise<number> {
    const result = this.db
      .update(notifications)
      .set({ isRead: true })
      .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)))
      .run();
    return result.changes;
  }
}
