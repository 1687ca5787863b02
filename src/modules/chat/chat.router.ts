/**
 * Chat Router
 */

import { Router } from 'express';
import { ChatController } from './chat.controller';

export const createChatRouter = (controller: ChatController): Router => {
  const router = Router();

  /**
   * @route   GET /api/chat
   * @desc    Usage hint
   * @access  Public
   */
  router.get('/', controller.getInfo);

  /**
   * @route   POST /api/chat
   * @desc    Ask the farm advisor a question
   * @access  Public
   */
  router.post('/', controller.sendMessage);

  return router;
};

export default createChatRouter;
