/**
 * Dashboard Router
 * Route definitions for dashboard endpoints
 */

import { Router } from 'express';
import { DashboardController } from './dashboard.controller';

export const createDashboardRouter = (controller: DashboardController): Router => {
  const router = Router();

  /**
   * @route   GET /api/dashboard/cached
   * @desc    Last refreshed dashboard snapshot
   * @access  Public
   */
  router.get('/cached', controller.getCachedDashboard);

  /**
   * @route   GET /api/dashboard
   * @desc    Dashboard snapshot (weather, mandi prices, news, AI advisory)
   * @access  Public
   */
  router.get('/', controller.getDashboard);

  return router;
};

export default createDashboardRouter;
