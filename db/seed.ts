import dotenv from 'dotenv';

dotenv.config();

import { loadConfig } from '../src/config';
import { createMessagingContext } from '../src/context';
import { createDatabase } from '../src/db/client';

const config = loadConfig();
const database = createDatabase({ url: config.databaseUrl, schemaPath: config.schemaPath });
const ctx = createMessagingContext({ db: database.db });

async function main() {
  const alice = await ctx.users.upsert({
    id: 'seed-user-alice',
    username: 'alice',
    email: 'alice@example.com',
    firstName: 'Alice',
    lastName: 'Smith',
  });
  const bob = await ctx.users.upsert({
    id: 'seed-user-bob',
    username: 'bob',
    email: 'bob@example.com',
    firstName: 'Bob',
    lastName: 'Johnson',
  });

  const root = await ctx.messages.create({
    senderId: alice.id,
    receiverId: bob.id,
    content: "Hey Bob! How's the project going?",
  });
  const reply = await ctx.messages.create({
    senderId: bob.id,
    receiverId: alice.id,
    content: "It's going well, we're ahead of schedule.",
    parentId: root.id,
  });
  await ctx.messages.create({
    senderId: alice.id,
    receiverId: bob.id,
    content: 'Great! What about the testing phase?',
    parentId: reply.id,
  });

  console.log({
    users: [alice.username, bob.username],
    thread: await ctx.threads.threadMessages(root.id).then((messages) => messages.length),
    unreadForBob: await ctx.unread.unreadCount(bob.id),
  });
}

main()
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  })
  .finally(() => {
    database.close();
  });
