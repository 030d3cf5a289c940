import cors from 'cors';
import { config } from '../config/environment';
import { loggingService } from '../services/LoggingService';

export const corsOptions: cors.CorsOptions = {
  origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
    if (config.nodeEnv !== 'production') {
      // Development mode - allow all origins
      callback(null, true);
      return;
    }

    // Production mode - only allow the configured frontend URL
    if (!origin || origin === config.cors.frontendUrl) {
      callback(null, true);
    } else {
      loggingService.logSecurityEvent('CORS origin blocked', {
        origin,
        expectedOrigin: config.cors.frontendUrl,
        mode: 'production'
      }, 'warn');
      callback(new Error('Not allowed by CORS'));
    }
  },
  credentials: config.cors.credentials,
  methods: ['GET', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
  exposedHeaders: ['RateLimit-Limit', 'RateLimit-Remaining', 'RateLimit-Reset'],
};

export const corsMiddleware = cors(corsOptions);
