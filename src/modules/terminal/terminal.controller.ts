/**
 * Terminal Controller
 * HTTP request/response handling for market terminal endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../../middleware/error-handler';
import { SnapshotReader } from '../../lib/cache/snapshot.reader';
import { buildTopicKey } from '../../lib/cache/topic-key';
import { titleCase } from '../../lib/utils';
import { TerminalService } from './terminal.service';
import { InternationalOptionsService } from './international-options.service';
import { cachedTerminalQuerySchema, terminalQuerySchema } from './terminal.validation';

export const TERMINAL_DOMAIN = 'terminal';

export const terminalTopicKey = (commodity: string, location: string, harvestDays: number): string =>
  buildTopicKey(TERMINAL_DOMAIN, commodity, location, harvestDays);

export const INTERNATIONAL_OPTIONS_KEY = buildTopicKey(TERMINAL_DOMAIN, 'international-options');

export class TerminalController {
  private reader: SnapshotReader;
  private service: TerminalService;
  private optionsService: InternationalOptionsService;
  private defaultHarvestDays: number;

  constructor(
    reader: SnapshotReader,
    service: TerminalService,
    optionsService: InternationalOptionsService,
    defaultHarvestDays: number
  ) {
    this.reader = reader;
    this.service = service;
    this.optionsService = optionsService;
    this.defaultHarvestDays = defaultHarvestDays;
  }

  /**
   * GET /api/terminal
   * Cached terminal snapshot, produced on a miss or when use_cache=false
   */
  getTerminal = asyncHandler(async (req: Request, res: Response) => {
    const query = terminalQuerySchema.parse(req.query);
    const location = titleCase(query.location);
    const harvestDays = query.harvest_days ?? this.defaultHarvestDays;

    const snapshot = await this.reader.read(
      terminalTopicKey(query.commodity, location, harvestDays),
      () => this.service.produceSnapshot({ commodity: query.commodity, location, harvestDays }),
      { allowCache: query.use_cache }
    );

    res.json(snapshot);
  });

  /**
   * GET /api/terminal/cached
   * Always prefers the cache; rebuilds the topic when it is missing
   */
  getCachedTerminal = asyncHandler(async (req: Request, res: Response) => {
    const query = cachedTerminalQuerySchema.parse(req.query);
    const location = titleCase(query.location);
    const harvestDays = this.defaultHarvestDays;

    const snapshot = await this.reader.read(
      terminalTopicKey(query.commodity, location, harvestDays),
      () => this.service.produceSnapshot({ commodity: query.commodity, location, harvestDays }),
      { allowCache: true }
    );

    res.json(snapshot);
  });

  /**
   * GET /api/terminal/international-options
   */
  getInternationalOptions = asyncHandler(async (_req: Request, res: Response) => {
    const snapshot = await this.reader.read(INTERNATIONAL_OPTIONS_KEY, () => this.optionsService.produceSnapshot(), {
      allowCache: true,
    });

    res.json(snapshot);
  });
}
