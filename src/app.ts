import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import cookieParser from 'cookie-parser';
import { env } from './config/env';
import { AgentManager } from './agents/manager/AgentManager';
import { createDefaultAgentManager } from './agents';
import { createAgentRoutes } from './routes/agents';
import { createHealthRoutes } from './routes/health';
import { Logger } from './utils/logger';
import ApiResponse from './utils/ApiResponse';

/**
 * Builds the HTTP app around an agent manager. Kept separate from the
 * server so tests can drive it in process.
 */
export function createApp(manager: AgentManager = createDefaultAgentManager()): express.Application {
  const app = express();
  app.set('trust proxy', 1);

  // Security
  app.use(
    helmet({
      contentSecurityPolicy: env.NODE_ENV === 'production' ? undefined : false,
      hsts: {
        maxAge: 31536000,
        includeSubDomains: true,
      },
    })
  );

  app.use(
    cors({
      origin: env.CORS_ORIGINS,
      credentials: true,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(cookieParser());

  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 300,
    message: {
      success: false,
      error: 'Too many requests from this IP. Please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api/', limiter);

  // Routes
  app.use('/health', createHealthRoutes(manager));
  app.use('/api/agents', createAgentRoutes(manager));

  // 404 handler
  app.use((req: Request, res: Response) => {
    ApiResponse.notFound(res, `Endpoint ${req.path}`);
  });

  // Malformed JSON bodies arrive here from express.json()
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      ApiResponse.badRequest(res, 'Malformed JSON body');
      return;
    }
    Logger.error('Server error', err);
    ApiResponse.internalError(res, env.NODE_ENV === 'production' ? 'Internal server error' : err.message);
  });

  return app;
}
