import { Router } from 'express';
import type { MessagingContext } from '../context';
import { NotificationController } from '../controllers/notification.controller';
import { handleRequest } from './handle-request';

export const createNotificationRoutes = (ctx: MessagingContext): Router => {
  const router = Router();
  const controller = new NotificationController(ctx);

  router.get('/', handleRequest(controller.listNotifications));
  router.get('/unread/count', handleRequest(controller.getUnreadCount));
  router.post('/read-all', handleRequest(controller.markAllRead));
  router.post('/:notificationId/read', handleRequest(controller.markRead));

  return router;
};
