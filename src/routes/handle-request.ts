import type { NextFunction, RequestHandler, Response } from 'express';
import { isAuthenticated, type AuthenticatedRequest } from '../types/request.types';
import { AuthenticationError } from '../utils/errors';

export type AuthenticatedHandler = (
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction,
) => Promise<void>;

export const handleRequest = (handler: AuthenticatedHandler): RequestHandler => {
  return (req, res, next) => {
    if (!isAuthenticated(req)) {
      next(new AuthenticationError());
      return;
    }
    handler(req, res, next).catch(next);
  };
};
