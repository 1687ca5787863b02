/**
 * Dashboard Controller
 * HTTP request/response handling for dashboard endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { SnapshotReader } from '../../lib/cache/snapshot.reader';
import { buildTopicKey } from '../../lib/cache/topic-key';
import { titleCase } from '../../lib/utils';
import { DashboardService } from './dashboard.service';
import { cachedDashboardQuerySchema, dashboardQuerySchema } from './dashboard.validation';

export const DASHBOARD_DOMAIN = 'dashboard';

export const dashboardTopicKey = (location: string): string => buildTopicKey(DASHBOARD_DOMAIN, location);

export class DashboardController {
  private reader: SnapshotReader;
  private service: DashboardService;

  constructor(reader: SnapshotReader, service: DashboardService) {
    this.reader = reader;
    this.service = service;
  }

  /**
   * GET /api/dashboard
   * Cached dashboard, produced on a miss or when use_cache=false
   */
  getDashboard = asyncHandler(async (req: Request, res: Response) => {
    const query = dashboardQuerySchema.parse(req.query);
    const location = titleCase(query.location);

    const snapshot = await this.reader.read(
      dashboardTopicKey(location),
      () => this.service.produceSnapshot({ location }),
      { allowCache: query.use_cache }
    );

    res.json(snapshot);
  });

  /**
   * GET /api/dashboard/cached
   * Cache-only read; 503 until the first refresh has completed
   */
  getCachedDashboard = asyncHandler(async (req: Request, res: Response) => {
    const { location } = cachedDashboardQuerySchema.parse(req.query);

    const snapshot = this.reader.peek(dashboardTopicKey(titleCase(location)));
    if (!snapshot) {
      throw new ApiError(503, 'Cache not ready yet');
    }

    res.json(snapshot);
  });
}
