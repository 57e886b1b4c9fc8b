import type { Transaction } from '../db/client';
import type { Message } from '../types/message.types';

export interface MessageEventMap {
  created: { message: Message };
  edited: { message: Message; previousContent: string; editorId: string };
  read: { messageIds: string[]; receiverId: string };
  deleted: { messageIds: string[]; rootId: string };
}

export type MessageEvent = keyof MessageEventMap;

export type MessageHook<E extends MessageEvent> = (payload: MessageEventMap[E], tx: Transaction) => void;

type HookTable = { [E in MessageEvent]: MessageHook<E>[] };

const label = (event: MessageEvent, payload: MessageEventMap[MessageEvent]): string => {
  if ('message' in payload) return `${event} ${payload.message.id}`;
  return `${event} [${payload.messageIds.join(', ')}]`;
};

/**
 * Ordered handler lists per message lifecycle event.
 *
 * Handlers run synchronously, in registration order, inside the transaction
 * that made the primary change. Each one gets its own savepoint: a handler
 * that throws has its writes rolled back and is logged, and the primary write
 * and the remaining handlers go ahead.
 */
export class MessageHooks {
  private readonly hooks: HookTable = {
    created: [],
    edited: [],
    read: [],
    deleted: [],
  };

  on<E extends MessageEvent>(event: E, hook: MessageHook<E>): () => void {
    const list: MessageHook<E>[] = this.hooks[event];
    list.push(hook);
    return () => {
      const index = list.indexOf(hook);
      if (index !== -1) list.splice(index, 1);
    };
  }

  count(event: MessageEvent): number {
    return this.hooks[event].length;
  }

  /** Returns how many handlers failed. */
  emit<E extends MessageEvent>(event: E, payload: MessageEventMap[E], tx: Transaction): number {
    const list: MessageHook<E>[] = this.hooks[event];
    let failures = 0;

    for (const hook of [...list]) {
      try {
        tx.transaction((savepoint) => hook(payload, savepoint));
      } catch (error) {
        failures += 1;
        console.error(`[hooks] ${label(event, payload)} handler failed:`, error);
      }
    }

    return failures;
  }
}
