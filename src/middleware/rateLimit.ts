import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import { loggingService } from '../services/LoggingService';

// HTTP API rate limiting
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 300, // discovery is polled by lobby browsers
  message: {
    error: 'Too many requests from this IP, please try again later.',
    retryAfter: '15 minutes'
  },
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req: Request, res: Response) => {
    loggingService.logSecurityEvent('HTTP Rate Limit Exceeded', {
      ip: req.ip,
      method: req.method,
      url: req.url,
      userAgent: req.get('User-Agent'),
    }, 'warn');

    res.status(429).json({
      error: 'Too many requests from this IP, please try again later.',
      retryAfter: '15 minutes'
    });
  }
});

// Socket rate limiting configuration
export interface RateLimitConfig {
  maxEvents: number;
  windowMs: number;
  eventType: 'chat' | 'lobby' | 'query';
}

export const socketRateLimits: Record<string, RateLimitConfig> = {
  'create_lobby': {
    maxEvents: 5, // 5 lobbies per minute per connection
    windowMs: 60 * 1000,
    eventType: 'lobby'
  },
  'join_lobby': {
    maxEvents: 20,
    windowMs: 60 * 1000,
    eventType: 'lobby'
  },
  'set_lobby_properties': {
    maxEvents: 120,
    windowMs: 60 * 1000,
    eventType: 'lobby'
  },
  'set_my_lobby_properties': {
    maxEvents: 120,
    windowMs: 60 * 1000,
    eventType: 'lobby'
  },
  'lobby_send_chat_message': {
    maxEvents: 30, // 30 messages per minute per connection
    windowMs: 60 * 1000,
    eventType: 'chat'
  },
  'get_public_games': {
    maxEvents: 60,
    windowMs: 60 * 1000,
    eventType: 'query'
  }
};

// Socket rate limiting storage
const socketRateLimitStore = new Map<string, Map<string, { count: number; resetTime: number }>>();

// Check if socket event is within rate limit
export const checkSocketRateLimit = (connectionId: string, eventName: string): { allowed: boolean; retryAfter?: number } => {
  const rateLimitConfig = socketRateLimits[eventName];
  if (!rateLimitConfig) {
    // No rate limit configured for this event
    return { allowed: true };
  }

  const now = Date.now();

  let connectionLimits = socketRateLimitStore.get(connectionId);
  if (!connectionLimits) {
    connectionLimits = new Map();
    socketRateLimitStore.set(connectionId, connectionLimits);
  }

  let eventLimit = connectionLimits.get(eventName);
  if (!eventLimit || now > eventLimit.resetTime) {
    eventLimit = { count: 0, resetTime: now + rateLimitConfig.windowMs };
    connectionLimits.set(eventName, eventLimit);
  }

  if (eventLimit.count >= rateLimitConfig.maxEvents) {
    const retryAfter = Math.ceil((eventLimit.resetTime - now) / 1000);

    loggingService.logSecurityEvent('Socket Rate Limit Exceeded', {
      connectionId,
      eventName,
      limit: rateLimitConfig.maxEvents,
      windowMs: rateLimitConfig.windowMs,
      retryAfter
    }, 'warn');

    return { allowed: false, retryAfter };
  }

  eventLimit.count++;
  return { allowed: true };
};

export const clearSocketRateLimits = (connectionId: string): void => {
  socketRateLimitStore.delete(connectionId);
};

// Clean up expired rate limit entries
export const cleanupExpiredRateLimits = (): number => {
  const now = Date.now();
  let cleanedCount = 0;

  for (const [connectionId, connectionLimits] of socketRateLimitStore.entries()) {
    for (const [eventName, limit] of connectionLimits.entries()) {
      if (now > limit.resetTime) {
        connectionLimits.delete(eventName);
        cleanedCount++;
      }
    }

    if (connectionLimits.size === 0) {
      socketRateLimitStore.delete(connectionId);
    }
  }

  return cleanedCount;
};

/**
 * Starts the periodic cleanup. The caller owns the timer and clears it on shutdown.
 */
export const startRateLimitCleanup = (intervalMs: number = 5 * 60 * 1000): NodeJS.Timeout => {
  return setInterval(() => {
    const cleaned = cleanupExpiredRateLimits();
    if (cleaned > 0) {
      loggingService.logInfo('Expired rate limit entries removed', {
        cleaned,
        activeConnections: socketRateLimitStore.size
      });
    }
  }, intervalMs);
};
