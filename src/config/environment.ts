import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

// Load environment variables based on NODE_ENV
// In production the variables are injected directly, so we only load local files otherwise
if (process.env.NODE_ENV !== 'production') {
  // Try .env.local first, then fall back to .env
  const envLocalPath = path.resolve(process.cwd(), '.env.local');
  const envPath = path.resolve(process.cwd(), '.env');

  if (fs.existsSync(envLocalPath)) {
    dotenv.config({ path: envLocalPath });
  } else if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

const parseInteger = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const config = {
  // Server configuration
  port: parseInteger(process.env.PORT, 3001),
  nodeEnv: process.env.NODE_ENV || 'development',

  cors: {
    frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
    credentials: process.env.CORS_CREDENTIALS === 'true',
  },

  // Logging configuration
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    toFile: process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false',
  },

  lobby: {
    createLobbiesPermissionLevel: parseInteger(process.env.LOBBY_CREATE_PERMISSION_LEVEL, 0),
    // Set LOBBY_ALLOW_CREATE_IF_JOINED=true to let members of a lobby create another one
    dontAllowCreatingIfJoined: process.env.LOBBY_ALLOW_CREATE_IF_JOINED !== 'true',
    joinedLobbiesLimit: parseInteger(process.env.LOBBY_JOINED_LIMIT, 1),
    defaultPermissionLevel: parseInteger(process.env.LOBBY_DEFAULT_PERMISSION_LEVEL, 0),
    startGameTimeoutMs: parseInteger(process.env.LOBBY_START_TIMEOUT_MS, 15000),
    maxChatMessageLength: parseInteger(process.env.LOBBY_MAX_CHAT_LENGTH, 500),
    emptyLobbyTimeoutMs: parseInteger(process.env.LOBBY_EMPTY_TIMEOUT_MS, 60000),
  },

  // Address handed to clients once a lobby's game session is running
  gameServers: {
    publicAddress: process.env.GAME_SERVER_ADDRESS || '127.0.0.1',
    portRangeStart: parseInteger(process.env.GAME_SERVER_PORT_START, 7777),
    portRangeEnd: parseInteger(process.env.GAME_SERVER_PORT_END, 7877),
  },
} as const;

export type Config = typeof config;
