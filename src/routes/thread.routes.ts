import { Router } from 'express';
import type { MessagingContext } from '../context';
import { ThreadController } from '../controllers/thread.controller';
import { handleRequest } from './handle-request';

export const createThreadRoutes = (ctx: MessagingContext): Router => {
  const router = Router();
  const controller = new ThreadController(ctx);

  router.get('/:messageId', handleRequest(controller.getThread));
  router.get('/:messageId/messages', handleRequest(controller.getThreadMessages));
  router.get('/:messageId/replies', handleRequest(controller.getReplies));
  router.get('/:messageId/replies/direct', handleRequest(controller.getDirectReplies));
  router.get('/:messageId/can-reply', handleRequest(controller.canReply));

  return router;
};
