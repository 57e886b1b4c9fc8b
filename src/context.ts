import type { DB } from './db/client';
import { MessageHooks } from './hooks/message.hooks';
import { HistoryService } from './services/history.service';
import { MessageService } from './services/message.service';
import { NotificationService } from './services/notification.service';
import { ThreadService } from './services/thread.service';
import { UnreadService } from './services/unread.service';
import { UserService } from './services/user.service';

export interface MessagingContextOptions {
  db: DB;
  /** Source of every stored timestamp */
  now?: () => Date;
}

export interface MessagingContext {
  db: DB;
  hooks: MessageHooks;
  messages: MessageService;
  threads: ThreadService;
  history: HistoryService;
  notifications: NotificationService;
  unread: UnreadService;
  users: UserService;
}

/**
 * Builds the services once at start-up. Hook registration is scoped to the
 * returned context; nothing is registered globally.
 */
export const createMessagingContext = ({ db, now = () => new Date() }: MessagingContextOptions): MessagingContext => {
  const hooks = new MessageHooks();
  const threads = new ThreadService(db);
  const history = new HistoryService(db);
  const notifications = new NotificationService(db, now);
  notifications.register(hooks);

  return {
    db,
    hooks,
    threads,
    history,
    notifications,
    messages: new MessageService(db, hooks, threads, history, now),
    unread: new UnreadService(db),
    users: new UserService(db, now),
  };
};
