import { asc, eq, inArray } from 'drizzle-orm';
import { inBatches } from '../db/batch';
import type { DB, Executor } from '../db/client';
import { messages } from '../db/schema';
import type { Message, ThreadNode } from '../types/message.types';
import { NotFoundError } from '../utils/errors';

export type MessageRef = Message | string;

export const findMessage = (executor: Executor, id: string): Message | undefined =>
  executor.select().from(messages).where(eq(messages.id, id)).get();

/**
 * The message followed by its ancestors, ending at the thread root.
 * One lookup per hop; parents are fixed at creation so the walk terminates.
 */
export const ancestorChain = (executor: Executor, message: Message): Message[] => {
  const chain = [message];
  let current = message;

  while (current.parentId !== null) {
    const parent = findMessage(executor, current.parentId);
    if (!parent) break;
    chain.push(parent);
    current = parent;
  }

  return chain;
};

const childrenOf = (executor: Executor, parentIds: string[]): Message[] => {
  let children: Message[] = [];
  for (const batch of inBatches(parentIds)) {
    children = children.concat(
      executor
        .select()
        .from(messages)
        .where(inArray(messages.parentId, batch))
        .orderBy(asc(messages.sentAt))
        .all(),
    );
  }
  return children;
};

/**
 * Every message below the given roots, expanded level by level: one query per
 * tree level (per batch of ids on very wide levels), never one per message.
 * The roots themselves are not included. Returned in breadth-first order.
 */
export const collectReplies = (executor: Executor, rootIds: string[]): Message[] => {
  const seen = new Set(rootIds);
  const collected: Message[] = [];
  let frontier = [...seen];

  while (frontier.length > 0) {
    const level = childrenOf(executor, frontier).filter((message) => !seen.has(message.id));

    for (const message of level) {
      seen.add(message.id);
      collected.push(message);
    }
    frontier = level.map((message) => message.id);
  }

  return collected;
};

/**
 * Deletes messages in batches, deepest first when given breadth-first ids, so
 * the parent cascade never has to walk a long reply chain.
 */
export const deleteMessages = (executor: Executor, breadthFirstIds: string[]): void => {
  for (const batch of inBatches([...breadthFirstIds].reverse())) {
    executor.delete(messages).where(inArray(messages.id, batch)).run();
  }
};

export const buildThreadTree = (root: Message, descendants: Message[]): ThreadNode => {
  const children = new Map<string, Message[]>();
  for (const message of descendants) {
    if (message.parentId === null) continue;
    const siblings = children.get(message.parentId) ?? [];
    siblings.push(message);
    children.set(message.parentId, siblings);
  }

  const rootNode: ThreadNode = { ...root, depth: 0, replies: [] };
  const queue: ThreadNode[] = [rootNode];

  // Iterative so deep threads cannot exhaust the call stack.
  for (let node = queue.shift(); node; node = queue.shift()) {
    const siblings = (children.get(node.id) ?? [])
      .slice()
      .sort((a, b) => a.sentAt.getTime() - b.sentAt.getTime());
    for (const child of siblings) {
      const childNode: ThreadNode = { ...child, depth: node.depth + 1, replies: [] };
      node.replies.push(childNode);
      queue.push(childNode);
    }
  }

  return rootNode;
};

export class ThreadService {
  constructor(private readonly db: DB) {}

  async getMessage(ref: MessageRef): Promise<Message> {
    if (typeof ref !== 'string') return ref;

    const message = findMessage(this.db, ref);
    if (!message) {
      throw new NotFoundError(`Message ${ref} not found`);
    }
    return message;
  }

  async rootOf(ref: MessageRef): Promise<Message> {
    const chain = ancestorChain(this.db, await this.getMessage(ref));
    return chain[chain.length - 1];
  }

  /** Parent hops to the root; a root has depth 0. */
  async depthOf(ref: MessageRef): Promise<number> {
    return ancestorChain(this.db, await this.getMessage(ref)).length - 1;
  }

  /** The whole tree containing the message, root first, then level by level. */
  async threadMessages(ref: MessageRef): Promise<Message[]> {
    const root = await this.rootOf(ref);
    return [root, ...collectReplies(this.db, [root.id])];
  }

  async threadTree(ref: MessageRef): Promise<ThreadNode> {
    const root = await this.rootOf(ref);
    return buildThreadTree(root, collectReplies(this.db, [root.id]));
  }

  /** Direct and indirect replies, not including the message itself. */
  async allReplies(ref: MessageRef): Promise<Message[]> {
    const message = await this.getMessage(ref);
    return collectReplies(this.db, [message.id]);
  }

  async directReplies(ref: MessageRef): Promise<Message[]> {
    const message = await this.getMessage(ref);
    return this.db
      .select()
      .from(messages)
      .where(eq(messages.parentId, message.id))
      .orderBy(asc(messages.sentAt))
      .all();
  }

  async replyCount(ref: MessageRef): Promise<number> {
    return (await this.allReplies(ref)).length;
  }

  /**
   * Participants of the message itself and of the thread root may reply;
   * either pair is enough.
   */
  async canReply(ref: MessageRef, userId: string): Promise<boolean> {
    const message = await this.getMessage(ref);
    if (message.senderId === userId || message.receiverId === userId) return true;

    const root = await this.rootOf(message);
    return root.senderId === userId || root.receiverId === userId;
  }
}
