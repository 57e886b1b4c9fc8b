import { and, eq, sql } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DB } from '../db/client';
import { messages, users } from '../db/schema';
import type { MessageHooks } from '../hooks/message.hooks';
import type {
  EditResult,
  Message,
  MessageCreateInput,
  MessageUpdateInput,
} from '../types/message.types';
import { InvalidParentError, NotFoundError, PermissionError, ValidationError } from '../utils/errors';
import { contentSchema, parse } from '../validators/message.validators';
import type { HistoryService } from './history.service';
import { type ThreadService, collectReplies, deleteMessages, findMessage } from './thread.service';

const participantColumns = {
  id: true,
  username: true,
  email: true,
  firstName: true,
  lastName: true,
} as const;

export class MessageService {
  constructor(
    private readonly db: DB,
    private readonly hooks: MessageHooks,
    private readonly threads: ThreadService,
    private readonly history: HistoryService,
    private readonly now: () => Date,
  ) {}

  private requireUser(userId: string, role: string): void {
    const user = this.db.select({ id: users.id }).from(users).where(eq(users.id, userId)).get();
    if (!user) {
      throw new NotFoundError(`${role} ${userId} not found`);
    }
  }

  async create(data: MessageCreateInput): Promise<Message> {
    const content = parse(contentSchema, data.content);

    if (data.senderId === data.receiverId) {
      throw new ValidationError('Cannot send a message to yourself');
    }
    this.requireUser(data.senderId, 'Sender');
    this.requireUser(data.receiverId, 'Receiver');

    const parentId = data.parentId ?? null;
    if (parentId !== null) {
      const parent = findMessage(this.db, parentId);
      if (!parent) {
        throw new InvalidParentError(parentId);
      }
      if (!(await this.threads.canReply(parent, data.senderId))) {
        throw new PermissionError("You don't have permission to reply to this message");
      }
    }

    return this.db.transaction((tx) => {
      // The parent may have been deleted since the permission check.
      if (parentId !== null && !findMessage(tx, parentId)) {
        throw new InvalidParentError(parentId);
      }

      const now = this.now();
      const message = tx
        .insert(messages)
        .values({
          id: uuidv4(),
          senderId: data.senderId,
          receiverId: data.receiverId,
          parentId,
          content,
          sentAt: now,
          isRead: false,
          edited: false,
          editCount: 0,
          createdAt: now,
          updatedAt: now,
        })
        .returning()
        .get();

      this.hooks.emit('created', { message }, tx);
      return message;
    });
  }

  /** The message with both participants, in one query. */
  async getById(messageId: string) {
    const message = await this.db.query.messages.findFirst({
      where: eq(messages.id, messageId),
      with: {
        sender: { columns: participantColumns },
        receiver: { columns: participantColumns },
      },
    });

    if (!message) {
      throw new NotFoundError(`Message ${messageId} not found`);
    }
    return message;
  }

  /**
   * Identical content is a no-op: no history row, no counter bump, no hooks.
   * The comparison is against the row read in this transaction, so two
   * concurrent edits from stale views both get recorded.
   */
  async edit(messageId: string, editorId: string, data: MessageUpdateInput): Promise<EditResult> {
    const content = parse(contentSchema, data.content);

    return this.db.transaction((tx) => {
      const current = findMessage(tx, messageId);
      if (!current) {
        throw new NotFoundError(`Message ${messageId} not found`);
      }
      if (current.senderId !== editorId) {
        throw new PermissionError('Not authorized to update this message');
      }
      if (current.content === content) {
        return { message: current, changed: false };
      }

      const now = this.now();
      this.history.recordEdit(tx, {
        messageId,
        editorId,
        oldContent: current.content,
        newContent: content,
        reason: data.reason,
        editedAt: now,
      });

      const message = tx
        .update(messages)
        .set({
          content,
          edited: true,
          editCount: sql`${messages.editCount} + 1`,
          updatedAt: now,
        })
        .where(eq(messages.id, messageId))
        .returning()
        .get();

      this.hooks.emit('edited', { message, previousContent: current.content, editorId }, tx);
      return { message, changed: true };
    });
  }

  /**
   * Receiver only. An already-read message is left as it is, but the read
   * hooks still run so notifications raised since (an edit) are cleared too.
   */
  async markRead(messageId: string, readerId: string): Promise<Message> {
    return this.db.transaction((tx) => {
      const current = findMessage(tx, messageId);
      if (!current) {
        throw new NotFoundError(`Message ${messageId} not found`);
      }
      if (current.receiverId !== readerId) {
        throw new PermissionError('Only the receiver can mark this message as read');
      }

      const message = current.isRead
        ? current
        : tx
          .update(messages)
          .set({ isRead: true, updatedAt: this.now() })
          .where(eq(messages.id, messageId))
          .returning()
          .get();

      this.hooks.emit('read', { messageIds: [message.id], receiverId: readerId }, tx);
      return message;
    });
  }

  /** Returns how many messages flipped to read. */
  async markAllRead(receiverId: string): Promise<number> {
    return this.db.transaction((tx) => {
      const updated = tx
        .update(messages)
        .set({ isRead: true, updatedAt: this.now() })
        .where(and(eq(messages.receiverId, receiverId), eq(messages.isRead, false)))
        .returning({ id: messages.id })
        .all();

      if (updated.length > 0) {
        this.hooks.emit('read', { messageIds: updated.map((row) => row.id), receiverId }, tx);
      }
      return updated.length;
    });
  }

  /**
   * Sender only. Removes the message and its whole reply subtree; history and
   * notification rows go with them through the foreign key cascades.
   * Returns the ids that were deleted.
   */
  async delete(messageId: string, actorId: string): Promise<string[]> {
    return this.db.transaction((tx) => {
      const target = findMessage(tx, messageId);
      if (!target) {
        throw new NotFoundError(`Message ${messageId} not found`);
      }
      if (target.senderId !== actorId) {
        throw new PermissionError('Not authorized to delete this message');
      }

      const ids = [target.id, ...collectReplies(tx, [target.id]).map((message) => message.id)];
      this.hooks.emit('deleted', { messageIds: ids, rootId: target.id }, tx);
      deleteMessages(tx, ids);
      return ids;
    });
  }
}
