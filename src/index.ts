import { createServer } from "http";

import { config } from "./config/environment";
import { createApp } from "./app";
import { createSocketServer } from "./config/socket";
import { SocketManager } from "./socket/socketManager";
import { startRateLimitCleanup } from "./middleware/rateLimit";
import { loggingService } from "./services/LoggingService";

// Lobby domain
import { LobbyCoordinationService } from "./domains/lobby-management/application/LobbyCoordinationService";
import { DEFAULT_LOBBY_FACTORIES } from "./domains/lobby-management/infrastructure/lobbies";
import { LocalGameSpawner } from "./domains/lobby-management/infrastructure/spawners/LocalGameSpawner";
import { LobbyNamespaceHandlers } from "./domains/lobby-management/infrastructure/handlers/LobbyNamespaceHandlers";
import {
  LobbyEventHandlers,
  namespaceBroadcastTarget,
} from "./domains/lobby-management/infrastructure/handlers/LobbyEventHandlers";

// Event System
import { InMemoryEventBus } from "./shared/domain/events/InMemoryEventBus";

const eventBus = new InMemoryEventBus();
const spawner = new LocalGameSpawner(config.gameServers);

const lobbyService = new LobbyCoordinationService(
  config.lobby,
  spawner,
  eventBus,
  DEFAULT_LOBBY_FACTORIES
);
lobbyService.initialize();

const app = createApp(lobbyService);
const server = createServer(app);
const io = createSocketServer(server);

const socketManager = new SocketManager(
  io,
  new LobbyNamespaceHandlers(lobbyService, config.lobby.defaultPermissionLevel)
);
const lobbyNamespace = socketManager.initialize();
const lobbyEventHandlers = new LobbyEventHandlers(
  eventBus,
  namespaceBroadcastTarget(lobbyNamespace)
);

const rateLimitCleanup = startRateLimitCleanup();

server.listen(config.port, "0.0.0.0", () => {
  loggingService.logInfo("Lobby server started", {
    port: config.port,
    environment: config.nodeEnv,
    factories: DEFAULT_LOBBY_FACTORIES.map(([factoryId]) => factoryId),
  });
});

// Graceful shutdown handling
let shuttingDown = false;

const gracefulShutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  loggingService.logInfo(`Received ${signal}, starting graceful shutdown`);

  // Force shutdown after 30 seconds
  const forceExit = setTimeout(() => {
    loggingService.logError(new Error("Forced shutdown after timeout"));
    process.exit(1);
  }, 30000);
  forceExit.unref();

  clearInterval(rateLimitCleanup);

  // Lobbies go first so members still receive lobby_destroyed
  await lobbyService.shutdown();
  lobbyEventHandlers.dispose();
  await socketManager.shutdown();

  server.close(() => {
    loggingService.logInfo("Graceful shutdown complete");
    process.exit(0);
  });
};

const handleSignal = (signal: string): void => {
  gracefulShutdown(signal).catch((error: unknown) => {
    loggingService.logError(error instanceof Error ? error : new Error(String(error)), {
      context: "graceful shutdown",
    });
    process.exit(1);
  });
};

process.on("SIGTERM", () => handleSignal("SIGTERM"));
process.on("SIGINT", () => handleSignal("SIGINT"));
