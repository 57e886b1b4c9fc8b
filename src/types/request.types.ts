import type { Request } from 'express';

export interface AuthenticatedRequest extends Request {
  userId: string;
}

export const isAuthenticated = (req: Request): req is AuthenticatedRequest =>
  typeof req.userId === 'string' && req.userId.length > 0;
