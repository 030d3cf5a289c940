import { LobbyModuleConfig, LobbyCoordinationService } from '../../src/domains/lobby-management/application/LobbyCoordinationService';
import { LobbyDependencies } from '../../src/domains/lobby-management/domain/models/BaseLobby';
import { LobbyConnection, RoomAccess } from '../../src/domains/lobby-management/domain/models/LobbyTypes';
import { LobbyUserContext } from '../../src/domains/lobby-management/domain/models/LobbyUserContext';
import { GameProvisionRequest, GameSession, GameSpawner } from '../../src/domains/lobby-management/domain/services/GameSpawner';
import { LobbySocket } from '../../src/domains/lobby-management/infrastructure/handlers/LobbyNamespaceHandlers';
import { DEFAULT_LOBBY_FACTORIES } from '../../src/domains/lobby-management/infrastructure/lobbies';
import { InMemoryEventBus } from '../../src/shared/domain/events/InMemoryEventBus';

export interface MockGameSpawner extends GameSpawner {
  provision: jest.Mock<Promise<GameSession>, [GameProvisionRequest, AbortSignal]>;
  getRoomAccess: jest.Mock<Promise<RoomAccess>, [GameSession, LobbyConnection]>;
  release: jest.Mock<void, [GameSession]>;
}

export interface FakeLobbySocket extends LobbySocket {
  data: { username?: string; permissionLevel?: number };
  join: jest.Mock<void, [string]>;
  leave: jest.Mock<void, [string]>;
}

export const TEST_LOBBY_CONFIG: LobbyModuleConfig = {
  createLobbiesPermissionLevel: 0,
  dontAllowCreatingIfJoined: true,
  joinedLobbiesLimit: 1,
  startGameTimeoutMs: 1000,
  maxChatMessageLength: 100,
  emptyLobbyTimeoutMs: 60000
};

/**
 * MockFactory - Creates lobby test doubles
 */
export class MockFactory {
  private connectionCounter = 0;

  createConnection(overrides: Partial<LobbyConnection> = {}): LobbyConnection {
    const id = overrides.id ?? `conn-${++this.connectionCounter}`;
    return {
      id,
      username: overrides.username ?? `player-${id}`,
      permissionLevel: overrides.permissionLevel ?? 0
    };
  }

  createContext(overrides: Partial<LobbyConnection> = {}): LobbyUserContext {
    return new LobbyUserContext(this.createConnection(overrides));
  }

  /**
   * Spawner that succeeds immediately with port 7777 on 127.0.0.1.
   */
  createSpawner(): MockGameSpawner {
    return {
      provision: jest.fn<Promise<GameSession>, [GameProvisionRequest, AbortSignal]>(async (request) => ({
        roomId: `room-${request.lobbyId}`,
        address: '127.0.0.1',
        port: 7777
      })),
      getRoomAccess: jest.fn<Promise<RoomAccess>, [GameSession, LobbyConnection]>(async (session, requester) => ({
        roomId: session.roomId,
        address: session.address,
        port: session.port,
        token: `token-${requester.id}`
      })),
      release: jest.fn<void, [GameSession]>()
    };
  }

  createLobbyDependencies(
    spawner: GameSpawner,
    contexts: Map<string, LobbyUserContext> = new Map()
  ): LobbyDependencies {
    return {
      spawner,
      resolveUserContext: (connectionId) => contexts.get(connectionId),
      startGameTimeoutMs: TEST_LOBBY_CONFIG.startGameTimeoutMs,
      maxChatMessageLength: TEST_LOBBY_CONFIG.maxChatMessageLength
    };
  }

  createService(config: Partial<LobbyModuleConfig> = {}, spawner: GameSpawner = this.createSpawner()): {
    service: LobbyCoordinationService;
    eventBus: InMemoryEventBus;
  } {
    const eventBus = new InMemoryEventBus();
    const service = new LobbyCoordinationService(
      { ...TEST_LOBBY_CONFIG, ...config },
      spawner,
      eventBus,
      DEFAULT_LOBBY_FACTORIES
    );
    service.initialize();
    return { service, eventBus };
  }

  createSocket(overrides: { id?: string; username?: string; permissionLevel?: number } = {}): FakeLobbySocket {
    const id = overrides.id ?? `socket-${++this.connectionCounter}`;
    return {
      id,
      data: {
        username: overrides.username ?? `player-${id}`,
        permissionLevel: overrides.permissionLevel ?? 0
      },
      join: jest.fn<void, [string]>(),
      leave: jest.fn<void, [string]>()
    };
  }
}
