/**
 * Shared set-up for service tests: a fresh in-memory database per call, a
 * clock that advances one second per reading, and a record of every SQL
 * statement issued so tests can assert round-trip counts.
 */
import type { Logger } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import { createMessagingContext, type MessagingContext } from './context';
import { inBatches } from './db/batch';
import { createDatabase, type DB, type DatabaseHandle } from './db/client';
import { messages, notifications } from './db/schema';
import type { User } from './types/message.types';

export const CLOCK_START = new Date('2024-01-01T00:00:00.000Z');

export interface TestClock {
  now: () => Date;
  /** How many times the clock has been read */
  readings: () => number;
}

export const createTestClock = (start: Date = CLOCK_START, stepMs = 1000): TestClock => {
  let ticks = 0;
  return {
    now: () => new Date(start.getTime() + stepMs * ticks++),
    readings: () => ticks,
  };
};

export interface QueryLog extends Logger {
  queries: string[];
  reset: () => void;
}

export const createQueryLog = (): QueryLog => {
  const queries: string[] = [];
  return {
    queries,
    logQuery: (query: string) => {
      queries.push(query);
    },
    reset: () => {
      queries.length = 0;
    },
  };
};

export interface BulkMessageOptions {
  senderId: string;
  receiverId: string;
  parentId?: string | null;
  /** Also insert the receiver's unread new-message notification for each row */
  withNotifications?: boolean;
}

/**
 * Inserts `count` messages straight into the tables, bypassing hooks, in
 * chunks small enough for SQLite's bound-parameter limit. Returns the ids.
 */
export const insertMessages = (db: DB, count: number, options: BulkMessageOptions): string[] => {
  const ids = Array.from({ length: count }, () => uuidv4());
  const sentAt = CLOCK_START;

  db.transaction((tx) => {
    for (const batch of inBatches(ids)) {
      tx.insert(messages)
        .values(batch.map((id) => ({
          id,
          senderId: options.senderId,
          receiverId: options.receiverId,
          parentId: options.parentId ?? null,
          content: 'bulk',
          sentAt,
          createdAt: sentAt,
          updatedAt: sentAt,
        })))
        .run();

      if (options.withNotifications) {
        tx.insert(notifications)
          .values(batch.map((messageId) => ({
            id: uuidv4(),
            userId: options.receiverId,
            messageId,
            kind: 'new-message' as const,
            title: 'bulk',
            body: 'bulk',
            createdAt: sentAt,
          })))
          .run();
      }
    }
  });

  return ids;
};

export interface TestContext {
  ctx: MessagingContext;
  database: DatabaseHandle;
  clock: TestClock;
  queryLog: QueryLog;
  alice: User;
  bob: User;
  carol: User;
  close: () => void;
}

export const createTestContext = async (): Promise<TestContext> => {
  const queryLog = createQueryLog();
  const clock = createTestClock();
  const database = createDatabase({ url: ':memory:', logger: queryLog });
  const ctx = createMessagingContext({ db: database.db, now: clock.now });

  const alice = await ctx.users.upsert({
    id: 'user-alice',
    username: 'alice',
    email: 'alice@example.com',
    firstName: 'Alice',
    lastName: 'Smith',
  });
  const bob = await ctx.users.upsert({
    id: 'user-bob',
    username: 'bob',
    email: 'bob@example.com',
  });
  const carol = await ctx.users.upsert({
    id: 'user-carol',
    username: 'carol',
    firstName: 'Carol',
  });

  queryLog.reset();

  return {
    ctx,
    database,
    clock,
    queryLog,
    alice,
    bob,
    carol,
    close: database.close,
  };
};
