import type { NextFunction, Response } from 'express';
import type { MessagingContext } from '../context';
import type { AuthenticatedRequest } from '../types/request.types';
import { idSchema, notificationListQuerySchema, parse } from '../validators/message.validators';

export class NotificationController {
  constructor(private readonly ctx: MessagingContext) {}

  listNotifications = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const query = parse(notificationListQuerySchema, req.query);
      const notifications = await this.ctx.notifications.listForUser(req.userId, {
        unreadOnly: query.unread === 'true',
      });
      res.json(notifications);
    } catch (error) {
      next(error);
    }
  };

  getUnreadCount = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json({ count: await this.ctx.notifications.unreadCount(req.userId) });
    } catch (error) {
      next(error);
    }
  };

  markRead = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const notificationId = parse(idSchema, req.params.notificationId);
      res.json(await this.ctx.notifications.markRead(notificationId, req.userId));
    } catch (error) {
      next(error);
    }
  };

  markAllRead = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json({ updated: await this.ctx.notifications.markAllRead(req.userId) });
    } catch (error) {
      next(error);
    }
  };
}
