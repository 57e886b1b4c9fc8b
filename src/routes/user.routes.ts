import { Router } from 'express';
import type { MessagingContext } from '../context';
import { UserController } from '../controllers/user.controller';
import { handleRequest } from './handle-request';

export const createUserRoutes = (ctx: MessagingContext): Router => {
  const router = Router();
  const controller = new UserController(ctx);

  router.get('/me/data-summary', handleRequest(controller.getDataSummary));
  router.delete('/me', handleRequest(controller.deleteAccount));

  return router;
};
