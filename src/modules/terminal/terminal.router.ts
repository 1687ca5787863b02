/**
 * Terminal Router
 * Route definitions for market terminal endpoints
 */

import { Router } from 'express';
import { TerminalController } from './terminal.controller';

export const createTerminalRouter = (controller: TerminalController): Router => {
  const router = Router();

  /**
   * @route   GET /api/terminal/cached
   * @desc    Cached terminal snapshot for a commodity (default wheat)
   * @access  Public
   */
  router.get('/cached', controller.getCachedTerminal);

  /**
   * @route   GET /api/terminal/international-options
   * @desc    Commodities and ports available for international comparison
   * @access  Public
   */
  router.get('/international-options', controller.getInternationalOptions);

  /**
   * @route   GET /api/terminal
   * @desc    Market terminal snapshot (mandi prices, forecast, AI insight)
   * @access  Public
   */
  router.get('/', controller.getTerminal);

  return router;
};

export default createTerminalRouter;
