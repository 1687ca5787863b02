/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { AppContext } from './context';
import { errorHandler, notFoundHandler } from './middleware/error-handler';

// Import routers
import { createDashboardRouter } from './modules/dashboard/dashboard.router';
import { createTerminalRouter } from './modules/terminal/terminal.router';
import { createChatRouter } from './modules/chat/chat.router';
import { createDetectRouter } from './modules/detect/detect.router';

export const createApp = (context: AppContext): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  // Helmet for security headers
  app.use(helmet());

  // CORS configuration
  app.use(
    cors({
      origin: env.CLIENT_URLS,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  // Body parsing middleware (base64 images arrive in JSON)
  app.use(express.json({ limit: '10mb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Welcome to the Agri Snapshot API 🚜',
      routes: ['/api/chat', '/api/dashboard', '/api/detect', '/api/terminal'],
    });
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Agri Snapshot API is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
      uptime: Math.round(process.uptime()),
      cache: context.store.getStats(),
      schedulers: context.schedulers.map((scheduler) => scheduler.getStatus()),
      upstreams: context.breakerStats(),
    });
  });

  // API Routes
  app.use('/api/dashboard', createDashboardRouter(context.dashboard));
  app.use('/api/terminal', createTerminalRouter(context.terminal));
  app.use('/api/chat', createChatRouter(context.chat));
  app.use('/api/detect', createDetectRouter(context.detect));

  // 404 Handler
  app.use(notFoundHandler);

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
