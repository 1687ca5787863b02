/**
 * Detect Router
 */

import { Router } from 'express';
import { DetectController } from './detect.controller';

export const createDetectRouter = (controller: DetectController): Router => {
  const router = Router();

  /**
   * @route   POST /api/detect
   * @desc    Analyze a base64 leaf image for crop disease
   * @access  Public
   */
  router.post('/', controller.detectDisease);

  return router;
};

export default createDetectRouter;
