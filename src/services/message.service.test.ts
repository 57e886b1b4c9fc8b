import { count, eq, inArray } from 'drizzle-orm';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { messageHistory, messages, notifications } from '../db/schema';
import { createTestContext, insertMessages, type TestContext } from '../test-utils';
import {
  InvalidParentError,
  NotFoundError,
  PermissionError,
  ValidationError,
} from '../utils/errors';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('MessageService', () => {
  let t: TestContext;

  beforeEach(async () => {
    t = await createTestContext();
  });

  afterEach(() => {
    t.close();
  });

  const notificationsFor = (userId: string) =>
    t.database.db.select().from(notifications).where(eq(notifications.userId, userId)).all();

  describe('create', () => {
    it('stores a new unread, unedited root message', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'hello' });

      expect(message).toMatchObject({
        senderId: alice.id,
        receiverId: bob.id,
        parentId: null,
        content: 'hello',
        isRead: false,
        edited: false,
        editCount: 0,
      });
      expect(message.createdAt.getTime()).toBe(message.sentAt.getTime());
      expect(message.updatedAt.getTime()).toBe(message.sentAt.getTime());
      expect(await ctx.threads.depthOf(message)).toBe(0);
    });

    it('keeps content exactly as sent', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: '  spaced  ' });
      expect(message.content).toBe('  spaced  ');
    });

    it('notifies the receiver', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'hello' });

      const rows = notificationsFor(bob.id);
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({ messageId: message.id, kind: 'new-message', isRead: false });
      expect(notificationsFor(alice.id)).toHaveLength(0);
    });

    it('rejects a parent that does not exist', async () => {
      const { ctx, alice, bob } = t;
      const attempt = ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'hi', parentId: MISSING_ID });

      await expect(attempt).rejects.toBeInstanceOf(InvalidParentError);
      await expect(attempt).rejects.toMatchObject({ parentId: MISSING_ID, statusCode: 404 });
      expect(t.database.db.select().from(messages).all()).toHaveLength(0);
    });

    it('rejects messages to oneself', async () => {
      const { ctx, alice } = t;
      await expect(ctx.messages.create({ senderId: alice.id, receiverId: alice.id, content: 'me' }))
        .rejects.toThrow('Cannot send a message to yourself');
    });

    it('rejects empty and whitespace-only content', async () => {
      const { ctx, alice, bob } = t;
      await expect(ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: '' }))
        .rejects.toBeInstanceOf(ValidationError);
      await expect(ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: ' \n\t ' }))
        .rejects.toThrow('Content cannot be empty');
    });

    it('rejects an unknown receiver', async () => {
      const { ctx, alice } = t;
      await expect(ctx.messages.create({ senderId: alice.id, receiverId: 'user-nobody', content: 'hi' }))
        .rejects.toThrow(new NotFoundError('Receiver user-nobody not found'));
    });

    it('only lets thread participants reply', async () => {
      const { ctx, alice, bob, carol } = t;
      const root = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'private' });

      await expect(ctx.messages.create({ senderId: carol.id, receiverId: alice.id, content: 'me too', parentId: root.id }))
        .rejects.toBeInstanceOf(PermissionError);

      const reply = await ctx.messages.create({ senderId: bob.id, receiverId: alice.id, content: 'sure', parentId: root.id });
      expect(reply.parentId).toBe(root.id);
    });
  });

  describe('edit', () => {
    it('records history, bumps the counter and notifies the receiver', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'hello' });

      const result = await ctx.messages.edit(message.id, alice.id, { content: 'hello world', reason: 'typo' });

      expect(result.changed).toBe(true);
      expect(result.message).toMatchObject({ content: 'hello world', edited: true, editCount: 1 });
      expect(result.message.updatedAt.getTime()).toBeGreaterThan(message.updatedAt.getTime());
      expect(result.message.sentAt.getTime()).toBe(message.sentAt.getTime());

      const history = t.database.db.select().from(messageHistory).all();
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        messageId: message.id,
        editorId: alice.id,
        oldContent: 'hello',
        newContent: 'hello world',
        editReason: 'typo',
      });

      const kinds = notificationsFor(bob.id).map((row) => row.kind).sort();
      expect(kinds).toEqual(['edit', 'new-message']);
    });

    it('counts every successive edit', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'one' });
      await ctx.messages.edit(message.id, alice.id, { content: 'two' });
      const { message: edited } = await ctx.messages.edit(message.id, alice.id, { content: 'three' });

      expect(edited.editCount).toBe(2);
      expect(t.database.db.select().from(messageHistory).all()).toHaveLength(2);
    });

    it('treats identical content as a no-op', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'same' });

      const result = await ctx.messages.edit(message.id, alice.id, { content: 'same' });

      expect(result.changed).toBe(false);
      expect(result.message).toMatchObject({ edited: false, editCount: 0 });
      expect(t.database.db.select().from(messageHistory).all()).toHaveLength(0);
      expect(notificationsFor(bob.id)).toHaveLength(1);
    });

    it('is restricted to the sender', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'mine' });

      await expect(ctx.messages.edit(message.id, bob.id, { content: 'yours' })).rejects.toBeInstanceOf(PermissionError);
      await expect(ctx.messages.edit(MISSING_ID, alice.id, { content: 'x' })).rejects.toBeInstanceOf(NotFoundError);
      await expect(ctx.messages.edit(message.id, alice.id, { content: '   ' })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('markRead', () => {
    it('marks the message and its notifications read', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'read me' });

      const read = await ctx.messages.markRead(message.id, bob.id);

      expect(read.isRead).toBe(true);
      expect(notificationsFor(bob.id).map((row) => row.isRead)).toEqual([true]);
    });

    it('leaves a read message as it is', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'read me' });
      const first = await ctx.messages.markRead(message.id, bob.id);

      const again = await ctx.messages.markRead(message.id, bob.id);

      expect(again.isRead).toBe(true);
      expect(again.updatedAt.getTime()).toBe(first.updatedAt.getTime());
    });

    it('clears notifications raised after the message was first read', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'hello' });
      await ctx.messages.markRead(message.id, bob.id);
      await ctx.messages.edit(message.id, alice.id, { content: 'hello again' });
      expect(await ctx.notifications.unreadCount(bob.id)).toBe(1);

      await ctx.messages.markRead(message.id, bob.id);

      const states = notificationsFor(bob.id).map((row) => `${row.kind}:${row.isRead}`).sort();
      expect(states).toEqual(['edit:true', 'new-message:true']);
    });

    it('is restricted to the receiver', async () => {
      const { ctx, alice, bob } = t;
      const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'for bob' });
      await expect(ctx.messages.markRead(message.id, alice.id)).rejects.toBeInstanceOf(PermissionError);
    });

    it('marks everything unread for the receiver at once', async () => {
      const { ctx, alice, bob, carol } = t;
      await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'one' });
      await ctx.messages.create({ senderId: carol.id, receiverId: bob.id, content: 'two' });
      await ctx.messages.create({ senderId: bob.id, receiverId: alice.id, content: 'not for bob' });

      expect(await ctx.messages.markAllRead(bob.id)).toBe(2);
      expect(await ctx.messages.markAllRead(bob.id)).toBe(0);
      expect(notificationsFor(bob.id).every((row) => row.isRead)).toBe(true);
      expect(notificationsFor(alice.id).map((row) => row.isRead)).toEqual([false]);
    });
  });

  it('marks more messages read than fit in one statement', async () => {
    const { ctx, alice, bob, database } = t;
    insertMessages(database.db, 33_000, { senderId: bob.id, receiverId: alice.id, withNotifications: true });
    expect(await ctx.notifications.unreadCount(alice.id)).toBe(33_000);

    expect(await ctx.messages.markAllRead(alice.id)).toBe(33_000);

    expect(await ctx.notifications.unreadCount(alice.id)).toBe(0);
    expect(await ctx.unread.unreadCount(alice.id)).toBe(0);
  }, 60_000);

  describe('delete', () => {
    it('removes the whole reply subtree with its history and notifications', async () => {
      const { ctx, alice, bob } = t;
      const root = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'root' });
      const reply = await ctx.messages.create({ senderId: bob.id, receiverId: alice.id, content: 'reply', parentId: root.id });
      const nested = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'nested', parentId: reply.id });
      await ctx.messages.edit(nested.id, alice.id, { content: 'nested, edited' });

      const deleted = await ctx.messages.delete(root.id, alice.id);

      expect(deleted).toEqual([root.id, reply.id, nested.id]);
      const { db } = t.database;
      expect(db.select().from(messages).all()).toHaveLength(0);
      expect(db.select().from(messageHistory).all()).toHaveLength(0);
      expect(db.select().from(notifications).all()).toHaveLength(0);
    });

    it('leaves the rest of the thread when a reply is deleted', async () => {
      const { ctx, alice, bob } = t;
      const root = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'root' });
      const reply = await ctx.messages.create({ senderId: bob.id, receiverId: alice.id, content: 'reply', parentId: root.id });

      expect(await ctx.messages.delete(reply.id, bob.id)).toEqual([reply.id]);
      expect(await ctx.threads.replyCount(root.id)).toBe(0);
    });

    it('lets deleted handlers see the subtree before it goes', async () => {
      const { ctx, alice, bob } = t;
      const root = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'root' });
      const reply = await ctx.messages.create({ senderId: bob.id, receiverId: alice.id, content: 'reply', parentId: root.id });

      const seen: { rootId: string; messageIds: string[]; stored: number }[] = [];
      ctx.hooks.on('deleted', ({ rootId, messageIds }, tx) => {
        const [row] = tx.select({ value: count() }).from(messages).where(inArray(messages.id, messageIds)).all();
        seen.push({ rootId, messageIds, stored: row?.value ?? 0 });
      });

      await ctx.messages.delete(root.id, alice.id);

      expect(seen).toEqual([{ rootId: root.id, messageIds: [root.id, reply.id], stored: 2 }]);
    });

    it('removes a subtree wider than fits in one statement', async () => {
      const { ctx, alice, bob, database } = t;
      const root = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'root' });
      insertMessages(database.db, 33_000, { senderId: bob.id, receiverId: alice.id, parentId: root.id, withNotifications: true });

      const deleted = await ctx.messages.delete(root.id, alice.id);

      expect(deleted).toHaveLength(33_001);
      expect(deleted[0]).toBe(root.id);
      expect(database.db.select({ value: count() }).from(messages).all()).toEqual([{ value: 0 }]);
      expect(database.db.select({ value: count() }).from(notifications).all()).toEqual([{ value: 0 }]);
    }, 60_000);

    it('is restricted to the sender', async () => {
      const { ctx, alice, bob } = t;
      const root = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'root' });

      await expect(ctx.messages.delete(root.id, bob.id)).rejects.toBeInstanceOf(PermissionError);
      await expect(ctx.messages.delete(MISSING_ID, alice.id)).rejects.toBeInstanceOf(NotFoundError);
      expect(await ctx.messages.getById(root.id)).toMatchObject({ id: root.id });
    });
  });

  it('loads a message with both participants', async () => {
    const { ctx, alice, bob } = t;
    const message = await ctx.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'hello' });

    const loaded = await ctx.messages.getById(message.id);

    expect(loaded.sender).toEqual({ id: alice.id, username: 'alice', email: 'alice@example.com', firstName: 'Alice', lastName: 'Smith' });
    expect(loaded.receiver.username).toBe('bob');
  });
});
