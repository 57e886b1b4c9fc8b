import { Router } from 'express';
import type { MessagingContext } from '../context';
import { MessageController } from '../controllers/message.controller';
import { handleRequest } from './handle-request';

export const createMessageRoutes = (ctx: MessagingContext): Router => {
  const router = Router();
  const controller = new MessageController(ctx);

  // Fixed paths first so they are not captured by /:messageId
  router.get('/unread', handleRequest(controller.getUnread));
  router.get('/unread/count', handleRequest(controller.getUnreadCount));
  router.get('/unread/threads', handleRequest(controller.getUnreadThreads));
  router.get('/inbox', handleRequest(controller.getInbox));
  router.post('/read-all', handleRequest(controller.markAllRead));

  router.post('/', handleRequest(controller.createMessage));
  router.get('/:messageId', handleRequest(controller.getMessage));
  router.put('/:messageId', handleRequest(controller.updateMessage));
  router.delete('/:messageId', handleRequest(controller.deleteMessage));
  router.post('/:messageId/read', handleRequest(controller.markRead));
  router.get('/:messageId/history', handleRequest(controller.getHistory));

  return router;
};
