import { and, count, desc, eq, isNull } from 'drizzle-orm';
import type { DB } from '../db/client';
import { messages } from '../db/schema';
import { preview } from '../utils/text';

// Every read here is a single statement: related rows come back through
// drizzle's relational joins, so walking sender/parent on the result costs
// nothing further. Keep it that way when adding fields.

const senderColumns = {
  id: true,
  username: true,
  email: true,
  firstName: true,
  lastName: true,
} as const;

const unreadFilter = (userId: string) =>
  and(eq(messages.receiverId, userId), eq(messages.isRead, false));

export class UnreadService {
  constructor(private readonly db: DB) {}

  /** Unread messages received by the user, newest first, with sender and parent preview. */
  async unreadFor(userId: string) {
    const rows = await this.db.query.messages.findMany({
      where: unreadFilter(userId),
      columns: {
        id: true,
        content: true,
        sentAt: true,
        isRead: true,
        parentId: true,
      },
      with: {
        sender: { columns: senderColumns },
        parent: { columns: { id: true, content: true } },
      },
      orderBy: [desc(messages.sentAt)],
    });

    return rows.map((row) => ({
      ...row,
      parent: row.parent && { id: row.parent.id, preview: preview(row.parent.content) },
    }));
  }

  /** Same set as `unreadFor`, plus the parent's sender for rendering thread context. */
  async inbox(userId: string) {
    const rows = await this.db.query.messages.findMany({
      where: unreadFilter(userId),
      columns: {
        id: true,
        content: true,
        sentAt: true,
        isRead: true,
        edited: true,
        editCount: true,
        parentId: true,
      },
      with: {
        sender: { columns: senderColumns },
        parent: {
          columns: { id: true, content: true, sentAt: true },
          with: {
            sender: { columns: { id: true, username: true } },
          },
        },
      },
      orderBy: [desc(messages.sentAt)],
    });

    return rows.map((row) => ({
      ...row,
      parent: row.parent && {
        id: row.parent.id,
        preview: preview(row.parent.content),
        sentAt: row.parent.sentAt,
        sender: row.parent.sender,
      },
    }));
  }

  async unreadCount(userId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(messages)
      .where(unreadFilter(userId));
    return row?.value ?? 0;
  }

  /** Unread messages that start a thread. */
  async unreadThreadRoots(userId: string) {
    return this.db.query.messages.findMany({
      where: and(unreadFilter(userId), isNull(messages.parentId)),
      columns: {
        id: true,
        content: true,
        sentAt: true,
        isRead: true,
      },
      with: {
        sender: { columns: senderColumns },
      },
      orderBy: [desc(messages.sentAt)],
    });
  }
}
