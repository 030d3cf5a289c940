import express, { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import { config } from './config/environment';
import { corsMiddleware } from './middleware/cors';
import { apiLimiter } from './middleware/rateLimit';
import { requestLogger, securityHeaders } from './middleware/security';
import { createRoutes } from './routes';
import { LobbyCoordinationService } from './domains/lobby-management/application/LobbyCoordinationService';
import { loggingService } from './services/LoggingService';

/**
 * Builds the HTTP side of the service. Kept apart from the listener so
 * tests can drive it with supertest.
 */
export const createApp = (lobbyService: LobbyCoordinationService): express.Express => {
  const app = express();

  app.use(helmet());
  app.use(securityHeaders);
  app.use(requestLogger);
  app.use(corsMiddleware);
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
      lobbies: lobbyService.lobbyCount
    });
  });

  app.use('/api', apiLimiter);
  app.use('/api', createRoutes(lobbyService));

  app.use((_req, res) => {
    res.status(404).json({ success: false, message: 'Not found' });
  });

  // Express recognises error handlers by arity
  app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
    loggingService.logError(error, { method: req.method, url: req.originalUrl });
    res.status(500).json({ success: false, message: 'Internal server error' });
  });

  return app;
};
