import type { NextFunction, Response } from 'express';
import type { MessagingContext } from '../context';
import type { AuthenticatedRequest } from '../types/request.types';

export class UserController {
  constructor(private readonly ctx: MessagingContext) {}

  getDataSummary = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json(await this.ctx.users.dataSummary(req.userId));
    } catch (error) {
      next(error);
    }
  };

  deleteAccount = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const { username } = await this.ctx.users.getById(req.userId);
      const removed = await this.ctx.users.deleteUser(req.userId);
      res.json({
        success: true,
        message: `User account ${username} has been deleted.`,
        deletedUserId: req.userId,
        removed,
      });
    } catch (error) {
      next(error);
    }
  };
}
