import { count, eq, inArray, or } from 'drizzle-orm';
import { inBatches } from '../db/batch';
import type { DB, Executor } from '../db/client';
import { messageHistory, messages, notifications, users } from '../db/schema';
import type { User, UserProfileInput } from '../types/message.types';
import { NotFoundError } from '../utils/errors';
import { collectReplies, deleteMessages } from './thread.service';

export interface DeletedUserCounts {
  messages: number;
  notifications: number;
  histories: number;
}

const firstCount = (rows: { value: number }[]): number => rows[0]?.value ?? 0;

export class UserService {
  constructor(
    private readonly db: DB,
    private readonly now: () => Date,
  ) {}

  /** Mirrors an authenticated identity into the users table. */
  async upsert(profile: UserProfileInput): Promise<User> {
    const values = {
      username: profile.username,
      email: profile.email ?? null,
      firstName: profile.firstName ?? '',
      lastName: profile.lastName ?? '',
    };

    return this.db
      .insert(users)
      .values({ id: profile.id, createdAt: this.now(), ...values })
      .onConflictDoUpdate({ target: users.id, set: values })
      .returning()
      .get();
  }

  async getById(userId: string): Promise<User> {
    const user = this.db.select().from(users).where(eq(users.id, userId)).get();
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return user;
  }

  /** What `deleteUser` would touch, for showing before an account is removed. */
  async dataSummary(userId: string) {
    const user = await this.getById(userId);
    const db = this.db;

    const sent = firstCount(db.select({ value: count() }).from(messages).where(eq(messages.senderId, userId)).all());
    const received = firstCount(db.select({ value: count() }).from(messages).where(eq(messages.receiverId, userId)).all());
    const userNotifications = firstCount(db.select({ value: count() }).from(notifications).where(eq(notifications.userId, userId)).all());
    const editsMade = firstCount(db.select({ value: count() }).from(messageHistory).where(eq(messageHistory.editorId, userId)).all());
    const editsReceived = firstCount(
      db
        .select({ value: count() })
        .from(messageHistory)
        .innerJoin(messages, eq(messageHistory.messageId, messages.id))
        .where(eq(messages.receiverId, userId))
        .all(),
    );

    const impact = this.deletionImpact(db, userId);

    return {
      user: {
        id: user.id,
        username: user.username,
        email: user.email,
        createdAt: user.createdAt,
      },
      data: {
        sentMessages: sent,
        receivedMessages: received,
        totalMessages: sent + received,
        notifications: userNotifications,
        editsMade,
        editsOnReceivedMessages: editsReceived,
      },
      deletionImpact: {
        messages: impact.messageIds.length,
        notifications: impact.notificationIds.size,
        histories: impact.historyIds.size,
      },
    };
  }

  private deletionImpact(executor: Executor, userId: string) {
    const involved = executor
      .select({ id: messages.id })
      .from(messages)
      .where(or(eq(messages.senderId, userId), eq(messages.receiverId, userId)))
      .all()
      .map((row) => row.id);

    const messageIds = [...involved, ...collectReplies(executor, involved).map((message) => message.id)];

    const notificationIds = new Set(
      executor
        .select({ id: notifications.id })
        .from(notifications)
        .where(eq(notifications.userId, userId))
        .all()
        .map((row) => row.id),
    );
    const historyIds = new Set(
      executor
        .select({ id: messageHistory.id })
        .from(messageHistory)
        .where(eq(messageHistory.editorId, userId))
        .all()
        .map((row) => row.id),
    );

    for (const batch of inBatches(messageIds)) {
      for (const row of executor
        .select({ id: notifications.id })
        .from(notifications)
        .where(inArray(notifications.messageId, batch))
        .all()) {
        notificationIds.add(row.id);
      }
      for (const row of executor
        .select({ id: messageHistory.id })
        .from(messageHistory)
        .where(inArray(messageHistory.messageId, batch))
        .all()) {
        historyIds.add(row.id);
      }
    }

    return { messageIds, notificationIds, historyIds };
  }

  /**
   * Removes the user and everything that would otherwise point at them, in a
   * single transaction: every message they sent or received (with each one's
   * reply subtree), notifications targeted at them, and history rows they
   * authored even on messages that survive.
   */
  async deleteUser(userId: string): Promise<DeletedUserCounts> {
    return this.db.transaction((tx) => {
      const user = tx.select({ id: users.id }).from(users).where(eq(users.id, userId)).get();
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }

      const impact = this.deletionImpact(tx, userId);

      tx.delete(messageHistory).where(eq(messageHistory.editorId, userId)).run();
      tx.delete(notifications).where(eq(notifications.userId, userId)).run();
      deleteMessages(tx, impact.messageIds);
      tx.delete(users).where(eq(users.id, userId)).run();

      console.log(`[users] deleted ${userId}: ${impact.messageIds.length} messages, ${impact.notificationIds.size} notifications, ${impact.historyIds.size} history entries`);

      return {
        messages: impact.messageIds.length,
        notifications: impact.notificationIds.size,
        histories: impact.historyIds.size,
      };
    });
  }
}
