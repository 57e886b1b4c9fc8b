import type { NextFunction, Response } from 'express';
import type { MessagingContext } from '../context';
import type { AuthenticatedRequest } from '../types/request.types';
import type { Message } from '../types/message.types';
import { PermissionError } from '../utils/errors';
import { idSchema, parse } from '../validators/message.validators';

export class ThreadController {
  constructor(private readonly ctx: MessagingContext) {}

  // Anyone allowed to reply in the thread may read it.
  private async loadForParticipant(req: AuthenticatedRequest): Promise<Message> {
    const messageId = parse(idSchema, req.params.messageId);
    const message = await this.ctx.threads.getMessage(messageId);
    if (!(await this.ctx.threads.canReply(message, req.userId))) {
      throw new PermissionError('Not a participant in this thread');
    }
    return message;
  }

  getThread = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const message = await this.loadForParticipant(req);
      res.json(await this.ctx.threads.threadTree(message));
    } catch (error) {
      next(error);
    }
  };

  getThreadMessages = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const message = await this.loadForParticipant(req);
      res.json(await this.ctx.threads.threadMessages(message));
    } catch (error) {
      next(error);
    }
  };

  getReplies = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const message = await this.loadForParticipant(req);
      res.json(await this.ctx.threads.allReplies(message));
    } catch (error) {
      next(error);
    }
  };

  getDirectReplies = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const message = await this.loadForParticipant(req);
      res.json(await this.ctx.threads.directReplies(message));
    } catch (error) {
      next(error);
    }
  };

  canReply = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const messageId = parse(idSchema, req.params.messageId);
      res.json({ canReply: await this.ctx.threads.canReply(messageId, req.userId) });
    } catch (error) {
      next(error);
    }
  };
}
