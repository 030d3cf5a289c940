import { Server } from 'socket.io';
import { Server as HttpServer } from 'http';
import { config } from './environment';
import { loggingService } from '../services/LoggingService';

const MAX_USERNAME_LENGTH = 50;

/**
 * Picks the display name a client sent in its handshake, or a guest name.
 */
export const resolveUsername = (auth: unknown, socketId: string): string => {
  if (typeof auth === 'object' && auth !== null && 'username' in auth && typeof auth.username === 'string') {
    const username = auth.username.trim();
    if (username.length > 0) {
      return username.substring(0, MAX_USERNAME_LENGTH);
    }
  }
  return `guest-${socketId.substring(0, 6)}`;
};

export const createSocketServer = (httpServer: HttpServer): Server => {
  // Clean up the frontend URL by removing trailing slash
  const frontendUrl = config.cors.frontendUrl.replace(/\/$/, '');

  loggingService.logInfo('Socket.IO CORS configuration', {
    origin: frontendUrl,
    nodeEnv: config.nodeEnv
  });

  const io = new Server(httpServer, {
    cors: {
      origin: config.nodeEnv === 'production' ? frontendUrl : '*',
      methods: ['GET', 'POST'],
      credentials: true
    }
  });

  // Identity is established by the handshake; permission assignment lives elsewhere
  io.of('/lobby').use((socket, next) => {
    socket.data.username = resolveUsername(socket.handshake.auth, socket.id);
    socket.data.permissionLevel = config.lobby.defaultPermissionLevel;
    next();
  });

  return io;
};
