import { Request, Response, NextFunction } from 'express';
import { Socket } from 'socket.io';
import { loggingService } from '../services/LoggingService';

// HTTP request logging middleware
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = Date.now();

  res.on('finish', () => {
    loggingService.logHttpRequest(req.method, req.originalUrl, res.statusCode, Date.now() - startTime, req.ip);
  });

  next();
};

// Socket connection security middleware
export const socketSecurityMiddleware = (socket: Socket, next: (err?: Error) => void): void => {
  const userAgent = socket.handshake.headers['user-agent'] || '';
  const clientInfo = {
    socketId: socket.id,
    ip: socket.handshake.address,
    userAgent,
    timestamp: new Date().toISOString()
  };

  loggingService.logSocketEvent('connection_attempt', socket, clientInfo);

  if (!socket.handshake.address) {
    loggingService.logSecurityEvent('Socket connection without IP address', clientInfo, 'warn');
    return next(new Error('Invalid connection'));
  }

  const suspiciousUserAgents = ['curl', 'wget', 'python', 'bot', 'crawler', 'spider'];
  const isSuspicious = suspiciousUserAgents.some(agent => userAgent.toLowerCase().includes(agent));

  if (isSuspicious) {
    // Logged for monitoring only, game clients often send odd agents
    loggingService.logSecurityEvent('Suspicious user agent detected', {
      ...clientInfo,
      reason: 'Suspicious user agent'
    }, 'warn');
  }

  next();
};

// Security headers middleware
export const securityHeaders = (_req: Request, res: Response, next: NextFunction): void => {
  // Additional security headers beyond Helmet
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('X-Frame-Options', 'DENY');
  res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
  res.setHeader('Permissions-Policy', 'geolocation=(), microphone=(), camera=()');

  next();
};
