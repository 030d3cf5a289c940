import { Namespace, Server } from 'socket.io';
import { LobbyNamespaceHandlers } from '../domains/lobby-management/infrastructure/handlers/LobbyNamespaceHandlers';
import { socketSecurityMiddleware } from '../middleware/security';
import { loggingService } from '../services/LoggingService';

export const LOBBY_NAMESPACE = '/lobby';

export class SocketManager {
  private lobbyNamespace: Namespace | null = null;

  constructor(private io: Server, private lobbyHandlers: LobbyNamespaceHandlers) {}

  initialize(): Namespace {
    const namespace = this.io.of(LOBBY_NAMESPACE);

    // Apply socket security middleware
    namespace.use(socketSecurityMiddleware);
    this.lobbyHandlers.setupLobbyNamespaceHandlers(namespace);

    this.lobbyNamespace = namespace;
    loggingService.logInfo('Lobby namespace ready', { namespacePath: LOBBY_NAMESPACE });
    return namespace;
  }

  async shutdown(): Promise<void> {
    if (this.lobbyNamespace) {
      this.lobbyNamespace.disconnectSockets(true);
      this.lobbyNamespace = null;
    }
    await new Promise<void>((resolve) => {
      this.io.close(() => resolve());
    });
  }
}
