import { relations } from 'drizzle-orm';
import { index, integer, sqliteTable, text, type AnySQLiteColumn } from 'drizzle-orm/sqlite-core';

// Mirrors db/schema.sql, which is what actually creates the tables.

export const users = sqliteTable('users', {
  id: text('id').primaryKey(),
  username: text('username').notNull().unique(),
  email: text('email'),
  firstName: text('first_name').notNull().default(''),
  lastName: text('last_name').notNull().default(''),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

export const messages = sqliteTable('messages', {
  id: text('id').primaryKey(),
  senderId: text('sender_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  receiverId: text('receiver_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  parentId: text('parent_id').references((): AnySQLiteColumn => messages.id, { onDelete: 'cascade' }),
  content: text('content').notNull(),
  sentAt: integer('sent_at', { mode: 'timestamp_ms' }).notNull(),
  isRead: integer('is_read', { mode: 'boolean' }).notNull().default(false),
  edited: integer('edited', { mode: 'boolean' }).notNull().default(false),
  editCount: integer('edit_count').notNull().default(0),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => ({
  // Covers every unread/inbox read path: WHERE receiver = ? AND is_read = 0 ORDER BY sent_at DESC
  receiverUnreadIdx: index('idx_messages_receiver_unread').on(table.receiverId, table.isRead, table.sentAt),
  senderSentIdx: index('idx_messages_sender_sent').on(table.senderId, table.sentAt),
  // One lookup per tree level when expanding replies
  parentIdx: index('idx_messages_parent').on(table.parentId),
}));

export const messageHistory = sqliteTable('message_history', {
  id: text('id').primaryKey(),
  messageId: text('message_id').notNull().references(() => messages.id, { onDelete: 'cascade' }),
  editorId: text('editor_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  oldContent: text('old_content').notNull(),
  newContent: text('new_content').notNull(),
  editReason: text('edit_reason'),
  editedAt: integer('edited_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => ({
  messageIdx: index('idx_message_history_message').on(table.messageId, table.editedAt),
  editorIdx: index('idx_message_history_editor').on(table.editorId),
}));

export const NOTIFICATION_KINDS = ['new-message', 'edit', 'system'] as const;

export const notifications = sqliteTable('notifications', {
  id: text('id').primaryKey(),
  userId: text('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  messageId: text('message_id').notNull().references(() => messages.id, { onDelete: 'cascade' }),
  kind: text('kind', { enum: NOTIFICATION_KINDS }).notNull(),
  title: text('title').notNull(),
  body: text('body').notNull(),
  isRead: integer('is_read', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => ({
  userUnreadIdx: index('idx_notifications_user_unread').on(table.userId, table.isRead),
  userCreatedIdx: index('idx_notifications_user_created').on(table.userId, table.createdAt),
  messageIdx: index('idx_notifications_message').on(table.messageId),
}));

export const usersRelations = relations(users, ({ many }) => ({
  sentMessages: many(messages, { relationName: 'sender' }),
  receivedMessages: many(messages, { relationName: 'receiver' }),
  edits: many(messageHistory),
  notifications: many(notifications),
}));

export const messagesRelations = relations(messages, ({ one, many }) => ({
  sender: one(users, {
    fields: [messages.senderId],
    references: [users.id],
    relationName: 'sender',
  }),
  receiver: one(users, {
    fields: [messages.receiverId],
    references: [users.id],
    relationName: 'receiver',
  }),
  parent: one(messages, {
    fields: [messages.parentId],
    references: [messages.id],
    relationName: 'thread',
  }),
  replies: many(messages, { relationName: 'thread' }),
  history: many(messageHistory),
  notifications: many(notifications),
}));

export const messageHistoryRelations = relations(messageHistory, ({ one }) => ({
  message: one(messages, {
    fields: [messageHistory.messageId],
    references: [messages.id],
  }),
  editor: one(users, {
    fields: [messageHistory.editorId],
    references: [users.id],
  }),
}));

export const notificationsRelations = relations(notifications, ({ one }) => ({
  user: one(users, {
    fields: [notifications.userId],
    references: [users.id],
  }),
  message: one(messages, {
    fields: [notifications.messageId],
    references: [messages.id],
  }),
}));
