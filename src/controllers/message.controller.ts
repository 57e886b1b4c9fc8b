import type { NextFunction, Response } from 'express';
import type { MessagingContext } from '../context';
import type { AuthenticatedRequest } from '../types/request.types';
import { PermissionError } from '../utils/errors';
import {
  createMessageSchema,
  idSchema,
  parse,
  updateMessageSchema,
} from '../validators/message.validators';

export class MessageController {
  constructor(private readonly ctx: MessagingContext) {}

  private async loadVisible(messageId: string, userId: string) {
    const message = await this.ctx.messages.getById(messageId);
    if (message.senderId !== userId && message.receiverId !== userId) {
      throw new PermissionError('Not authorized to view this message');
    }
    return message;
  }

  createMessage = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const body = parse(createMessageSchema, req.body);
      const message = await this.ctx.messages.create({
        senderId: req.userId,
        receiverId: body.receiverId,
        content: body.content,
        parentId: body.parentId,
      });
      res.status(201).json(message);
    } catch (error) {
      next(error);
    }
  };

  getMessage = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const messageId = parse(idSchema, req.params.messageId);
      const message = await this.loadVisible(messageId, req.userId);
      const [depth, replyCount] = await Promise.all([
        this.ctx.threads.depthOf(messageId),
        this.ctx.threads.replyCount(messageId),
      ]);
      res.json({ ...message, threadDepth: depth, replyCount });
    } catch (error) {
      next(error);
    }
  };

  updateMessage = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const messageId = parse(idSchema, req.params.messageId);
      const body = parse(updateMessageSchema, req.body);
      const result = await this.ctx.messages.edit(messageId, req.userId, body);
      res.json(result);
    } catch (error) {
      next(error);
    }
  };

  deleteMessage = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const messageId = parse(idSchema, req.params.messageId);
      const deleted = await this.ctx.messages.delete(messageId, req.userId);
      res.json({ deleted });
    } catch (error) {
      next(error);
    }
  };

  markRead = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const messageId = parse(idSchema, req.params.messageId);
      const message = await this.ctx.messages.markRead(messageId, req.userId);
      res.json(message);
    } catch (error) {
      next(error);
    }
  };

  markAllRead = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const updated = await this.ctx.messages.markAllRead(req.userId);
      res.json({ updated });
    } catch (error) {
      next(error);
    }
  };

  getHistory = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const messageId = parse(idSchema, req.params.messageId);
      await this.loadVisible(messageId, req.userId);
      res.json(await this.ctx.history.listForMessage(messageId));
    } catch (error) {
      next(error);
    }
  };

  getUnread = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json(await this.ctx.unread.unreadFor(req.userId));
    } catch (error) {
      next(error);
    }
  };

  getInbox = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json(await this.ctx.unread.inbox(req.userId));
    } catch (error) {
      next(error);
    }
  };

  getUnreadCount = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json({ count: await this.ctx.unread.unreadCount(req.userId) });
    } catch (error) {
      next(error);
    }
  };

  getUnreadThreads = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json(await this.ctx.unread.unreadThreadRoots(req.userId));
    } catch (error) {
      next(error);
    }
  };
}
