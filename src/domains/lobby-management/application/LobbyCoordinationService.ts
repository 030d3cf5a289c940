import { DomainEvent } from '../../../shared/domain/events/DomainEvent';
import { EventBus } from '../../../shared/domain/events/EventBus';
import { loggingService } from '../../../services/LoggingService';
import { LobbyCreated } from '../domain/events/LobbyEvents';
import { LobbyDependencies } from '../domain/models/BaseLobby';
import { Lobby } from '../domain/models/Lobby';
import { LobbyMember } from '../domain/models/LobbyMember';
import {
  AlreadyInLobbyError,
  InsufficientLobbyPermissionsError,
  InvalidLobbyRequestError,
  LobbyError,
  LobbyErrorKind,
  LobbyMemberNotFoundError,
  LobbyNotFoundError,
  LobbyRegistrationError,
  UnknownLobbyFactoryError
} from '../domain/models/LobbyErrors';
import {
  GameInfo,
  LobbyConnection,
  LobbyData,
  LobbyMemberData,
  LobbyState,
  PropertyMap,
  RoomAccess
} from '../domain/models/LobbyTypes';
import { LobbyUserContext } from '../domain/models/LobbyUserContext';
import { LobbyConstructor, LobbyFactoryRegistry } from '../domain/repositories/LobbyFactoryRegistry';
import { LobbyRegistry } from '../domain/repositories/LobbyRegistry';
import { GameSpawner } from '../domain/services/GameSpawner';
import { InMemoryLobbyRegistry } from '../infrastructure/repositories/InMemoryLobbyRegistry';

export enum ResponseStatus {
  SUCCESS = 'success',
  FAILED = 'failed',
  UNAUTHORIZED = 'unauthorized',
  ERROR = 'error'
}

export interface LobbyResponse<T = undefined> {
  status: ResponseStatus;
  data?: T;
  message?: string;
  errorKind?: LobbyErrorKind;
}

export interface LobbyModuleConfig {
  createLobbiesPermissionLevel: number;
  dontAllowCreatingIfJoined: boolean;
  /** Advisory: a connection is only ever in one lobby */
  joinedLobbiesLimit: number;
  startGameTimeoutMs: number;
  maxChatMessageLength: number;
  /** How long a lobby created without its creator may stay empty */
  emptyLobbyTimeoutMs: number;
}

export interface CreatedLobby {
  lobbyId: number;
  /** Whether the creator was added as the first member */
  joined: boolean;
}

export const statusForErrorKind = (kind: LobbyErrorKind): ResponseStatus => {
  switch (kind) {
    case 'Unauthorized':
      return ResponseStatus.UNAUTHORIZED;
    case 'InternalError':
      return ResponseStatus.ERROR;
    default:
      return ResponseStatus.FAILED;
  }
};

/**
 * LobbyCoordinationService
 *
 * Entry point for every lobby request. Resolves the caller's context and
 * the target lobby, enforces creation and membership policy, and runs the
 * lobby operation under that lobby's lock. Domain events raised by the
 * lobby are published on the event bus before the lock is released.
 */
export class LobbyCoordinationService {
  private readonly factories = new LobbyFactoryRegistry();
  private readonly lobbies: LobbyRegistry;
  private readonly contexts = new Map<string, LobbyUserContext>();
  private readonly emptyLobbyTimers = new Map<number, NodeJS.Timeout>();
  private readonly lobbyDependencies: LobbyDependencies;
  private initialized = false;

  constructor(
    private readonly config: LobbyModuleConfig,
    spawner: GameSpawner,
    private readonly eventBus: EventBus,
    private readonly defaultFactories: ReadonlyArray<readonly [string, LobbyConstructor]> = [],
    lobbies: LobbyRegistry = new InMemoryLobbyRegistry()
  ) {
    this.lobbies = lobbies;
    this.lobbyDependencies = {
      spawner,
      resolveUserContext: (connectionId) => this.contexts.get(connectionId),
      startGameTimeoutMs: config.startGameTimeoutMs,
      maxChatMessageLength: config.maxChatMessageLength
    };
  }

  // Lifecycle

  initialize(): void {
    if (this.initialized) {
      return;
    }

    if (this.config.joinedLobbiesLimit > 1) {
      loggingService.logWarning('joinedLobbiesLimit above 1 is not supported, connections stay limited to one lobby', {
        joinedLobbiesLimit: this.config.joinedLobbiesLimit
      });
    }

    for (const [factoryId, constructor] of this.defaultFactories) {
      this.factories.register(factoryId, constructor);
    }

    this.initialized = true;
    loggingService.logInfo('Lobby module initialized', { factories: this.factories.factoryIds });
  }

  async shutdown(): Promise<void> {
    for (const timer of this.emptyLobbyTimers.values()) {
      clearTimeout(timer);
    }
    this.emptyLobbyTimers.clear();

    for (const lobby of this.lobbies.allLobbies()) {
      await this.withLobby(lobby, () => lobby.destroy());
    }

    this.lobbies.clear();
    this.factories.clear();
    for (const context of this.contexts.values()) {
      context.close();
    }
    this.contexts.clear();
    this.initialized = false;
    loggingService.logInfo('Lobby module stopped');
  }

  registerFactory(factoryId: string, constructor: LobbyConstructor): void {
    this.factories.register(factoryId, constructor);
  }

  generateLobbyId(): number {
    return this.lobbies.generateLobbyId();
  }

  getOrCreateUserContext(connection: LobbyConnection): LobbyUserContext {
    let context = this.contexts.get(connection.id);
    if (!context) {
      context = new LobbyUserContext(connection);
      this.contexts.set(connection.id, context);
    }
    return context;
  }

  getCurrentLobbyId(connectionId: string): number | null {
    return this.contexts.get(connectionId)?.currentLobbyId ?? null;
  }

  getLobby(lobbyId: number): Lobby | undefined {
    return this.lobbies.get(lobbyId);
  }

  get lobbyCount(): number {
    return this.lobbies.size;
  }

  // Requests

  async createLobby(connection: LobbyConnection, factoryId: string, options: PropertyMap): Promise<LobbyResponse<CreatedLobby>> {
    try {
      if (connection.permissionLevel < this.config.createLobbiesPermissionLevel) {
        throw new InsufficientLobbyPermissionsError('Insufficient permissions to create a lobby');
      }

      const context = this.getOrCreateUserContext(connection);
      if (this.config.dontAllowCreatingIfJoined && context.isInLobby) {
        throw new AlreadyInLobbyError();
      }

      const constructor = this.factories.resolve(factoryId);
      if (!constructor) {
        throw new UnknownLobbyFactoryError(factoryId);
      }

      const lobby = constructor({
        id: this.generateLobbyId(),
        options,
        creator: connection,
        dependencies: this.lobbyDependencies
      });

      if (!this.lobbies.add(lobby)) {
        throw new LobbyRegistrationError();
      }

      loggingService.logLobbyActivity('created', lobby.id, connection.id, { factoryId, name: lobby.name });
      await this.publishSafely([new LobbyCreated(lobby.id, lobby.type, lobby.name, connection.id)]);

      let joined = false;
      if (!context.isInLobby) {
        await this.withLobby(lobby, () => {
          try {
            lobby.addPlayer(context);
          } catch (error) {
            lobby.destroy();
            throw error;
          }
        });
        joined = true;
        loggingService.logLobbyActivity('joined', lobby.id, connection.id);
      } else {
        this.scheduleEmptyLobbyCheck(lobby);
      }

      return { status: ResponseStatus.SUCCESS, data: { lobbyId: lobby.id, joined } };
    } catch (error) {
      return this.failure(error, 'Failed to create a lobby', { factoryId, connectionId: connection.id });
    }
  }

  async joinLobby(connection: LobbyConnection, lobbyId: number): Promise<LobbyResponse<LobbyData>> {
    try {
      const context = this.getOrCreateUserContext(connection);
      if (context.isInLobby) {
        throw new AlreadyInLobbyError();
      }

      const lobby = this.requireLobby(lobbyId);
      const data = await this.withLobby(lobby, () => {
        const member = lobby.addPlayer(context);
        return lobby.generateLobbyData(member);
      });

      loggingService.logLobbyActivity('joined', lobbyId, connection.id);
      return { status: ResponseStatus.SUCCESS, data };
    } catch (error) {
      return this.failure(error, 'Failed to join the lobby', { lobbyId, connectionId: connection.id });
    }
  }

  async leaveLobby(connection: LobbyConnection, lobbyId: number): Promise<LobbyResponse> {
    try {
      const context = this.getOrCreateUserContext(connection);
      const lobby = this.lobbies.get(lobbyId);
      if (!lobby) {
        context.detachFrom(lobbyId);
        return { status: ResponseStatus.SUCCESS };
      }

      const wasMember = lobby.getMember(connection.id) !== undefined;
      await this.withLobby(lobby, () => lobby.removePlayer(context));

      if (wasMember) {
        loggingService.logLobbyActivity('left', lobbyId, connection.id);
      }
      return { status: ResponseStatus.SUCCESS };
    } catch (error) {
      return this.failure(error, 'Failed to leave the lobby', { lobbyId, connectionId: connection.id });
    }
  }

  /**
   * Writes each property in order and stops at the first one the lobby
   * rejects. Earlier writes stay applied.
   */
  async setLobbyProperties(connection: LobbyConnection, lobbyId: number, properties: PropertyMap): Promise<LobbyResponse> {
    try {
      const lobby = this.requireLobby(lobbyId);
      await this.withLobby(lobby, () => {
        const setter = lobby.getMember(connection.id) ?? null;
        for (const [key, value] of Object.entries(properties)) {
          if (!lobby.setProperty(setter, key, value)) {
            throw new InvalidLobbyRequestError(`Failed to set the property: ${key}`);
          }
        }
      });
      return { status: ResponseStatus.SUCCESS };
    } catch (error) {
      return this.failure(error, 'Failed to set lobby properties', { lobbyId, connectionId: connection.id });
    }
  }

  async setMyProperties(connection: LobbyConnection, properties: PropertyMap): Promise<LobbyResponse> {
    try {
      const lobby = this.requireCurrentLobby(connection);
      await this.withLobby(lobby, () => {
        const member = this.requireMember(lobby, connection);
        for (const [key, value] of Object.entries(properties)) {
          if (!lobby.setPlayerProperty(member, key, value)) {
            throw new InvalidLobbyRequestError(`Failed to set property: ${key}`);
          }
        }
      });
      return { status: ResponseStatus.SUCCESS };
    } catch (error) {
      return this.failure(error, 'Failed to set player properties', { connectionId: connection.id });
    }
  }

  async joinTeam(connection: LobbyConnection, teamName: string): Promise<LobbyResponse> {
    try {
      const lobby = this.requireCurrentLobby(connection);
      await this.withLobby(lobby, () => {
        const member = this.requireMember(lobby, connection);
        if (!lobby.tryJoinTeam(teamName, member)) {
          throw new InvalidLobbyRequestError(`Failed to join a team: ${teamName}`);
        }
      });
      return { status: ResponseStatus.SUCCESS };
    } catch (error) {
      return this.failure(error, 'Failed to join a team', { teamName, connectionId: connection.id });
    }
  }

  /**
   * Chat has no response. Returns whether the message was accepted.
   */
  async sendChatMessage(connection: LobbyConnection, message: string): Promise<boolean> {
    const lobbyId = this.getCurrentLobbyId(connection.id);
    const lobby = lobbyId === null ? undefined : this.lobbies.get(lobbyId);
    if (!lobby) {
      return false;
    }

    try {
      return await this.withLobby(lobby, () => {
        const member = lobby.getMember(connection.id);
        if (!member) {
          return false;
        }
        lobby.chatMessageHandler(member, message);
        return true;
      });
    } catch (error) {
      if (error instanceof LobbyError) {
        loggingService.logWarning('Chat message dropped', { lobbyId: lobby.id, connectionId: connection.id, reason: error.message });
        return false;
      }
      throw error;
    }
  }

  async setReady(connection: LobbyConnection, isReady: boolean): Promise<LobbyResponse> {
    try {
      const lobby = this.requireCurrentLobby(connection);
      await this.withLobby(lobby, async () => {
        const member = this.requireMember(lobby, connection);
        lobby.setReadyState(member, isReady);

        if (isReady && lobby.shouldAutoStart()) {
          try {
            await lobby.startGame();
            loggingService.logLobbyActivity('started', lobby.id, null, { trigger: 'ready' });
          } catch (error) {
            // The ready flag stays set; the lobby is back in FORMING
            loggingService.logError(error instanceof Error ? error : new Error(String(error)), {
              lobbyId: lobby.id,
              operation: 'autoStart'
            });
          }
        }
      });
      return { status: ResponseStatus.SUCCESS };
    } catch (error) {
      return this.failure(error, 'Failed to change ready state', { connectionId: connection.id });
    }
  }

  async startGame(connection: LobbyConnection): Promise<LobbyResponse> {
    try {
      const lobby = this.requireCurrentLobby(connection);
      const context = this.getOrCreateUserContext(connection);
      await this.withLobby(lobby, () => lobby.startGameManually(context));

      loggingService.logLobbyActivity('started', lobby.id, connection.id);
      return { status: ResponseStatus.SUCCESS };
    } catch (error) {
      return this.failure(error, 'Failed starting the game', { connectionId: connection.id });
    }
  }

  async getRoomAccess(connection: LobbyConnection): Promise<LobbyResponse<RoomAccess>> {
    try {
      const lobby = this.requireCurrentLobby(connection);
      const data = await lobby.gameAccessRequestHandler(connection);
      return { status: ResponseStatus.SUCCESS, data };
    } catch (error) {
      return this.failure(error, 'Failed to get room access', { connectionId: connection.id });
    }
  }

  getMemberData(connection: LobbyConnection, lobbyId: number, memberId: string): LobbyResponse<LobbyMemberData> {
    try {
      const lobby = this.requireLobby(lobbyId);
      const member = lobby.getMember(memberId);
      if (!member) {
        throw new LobbyMemberNotFoundError();
      }
      return { status: ResponseStatus.SUCCESS, data: member.generateDataPacket(memberId === connection.id) };
    } catch (error) {
      return this.failure(error, 'Failed to get member data', { lobbyId, memberId });
    }
  }

  getLobbyInfo(connection: LobbyConnection | null, lobbyId: number): LobbyResponse<LobbyData> {
    try {
      const lobby = this.requireLobby(lobbyId);
      const requester = connection ? lobby.getMember(connection.id) : undefined;
      return { status: ResponseStatus.SUCCESS, data: lobby.generateLobbyData(requester) };
    } catch (error) {
      return this.failure(error, 'Failed to get lobby info', { lobbyId });
    }
  }

  /**
   * Discovery feed. Filters are equality matches on public properties.
   */
  getPublicGames(requester: LobbyConnection, filters: PropertyMap = {}): GameInfo[] {
    const games: GameInfo[] = [];

    for (const lobby of this.lobbies.allLobbies()) {
      if (lobby.state === LobbyState.DESTROYED) {
        continue;
      }

      const properties = lobby.getPublicProperties(requester);
      const matches = Object.entries(filters).every(([key, value]) => properties[key] === value);
      if (!matches) {
        continue;
      }

      games.push({
        address: lobby.gameAddress !== null && lobby.gamePort !== null
          ? `${lobby.gameAddress}:${lobby.gamePort}`
          : null,
        id: lobby.id,
        maxPlayers: lobby.maxPlayers,
        name: lobby.name,
        onlinePlayers: lobby.playerCount,
        properties,
        type: 'lobby'
      });
    }

    return games;
  }

  // Connection and game session lifecycle

  async handleDisconnect(connectionId: string): Promise<void> {
    const context = this.contexts.get(connectionId);
    if (!context) {
      return;
    }

    // Requests still queued on a lobby lock must not join for this connection
    context.close();
    const lobbyId = context.currentLobbyId;
    const lobby = lobbyId === null ? undefined : this.lobbies.get(lobbyId);
    if (lobby) {
      await this.withLobby(lobby, () => lobby.removePlayer(context));
      loggingService.logLobbyActivity('left', lobby.id, connectionId, { reason: 'disconnect' });
    }

    this.contexts.delete(connectionId);
  }

  async handleGameSessionEnded(lobbyId: number): Promise<boolean> {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby) {
      return false;
    }

    await this.withLobby(lobby, () => lobby.handleGameSessionEnded());
    loggingService.logLobbyActivity('game ended', lobbyId, null, { state: lobby.state });
    return true;
  }

  // Helpers

  private requireLobby(lobbyId: number): Lobby {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby) {
      throw new LobbyNotFoundError();
    }
    return lobby;
  }

  private requireCurrentLobby(connection: LobbyConnection): Lobby {
    const lobbyId = this.getCurrentLobbyId(connection.id);
    if (lobbyId === null) {
      throw new LobbyMemberNotFoundError("You're not in a lobby");
    }
    return this.requireLobby(lobbyId);
  }

  private requireMember(lobby: Lobby, connection: LobbyConnection): LobbyMember {
    const member = lobby.getMember(connection.id);
    if (!member) {
      throw new LobbyMemberNotFoundError();
    }
    return member;
  }

  /**
   * Runs `operation` under the lobby's lock and publishes whatever events
   * it raised, including those raised before a failure.
   */
  private scheduleEmptyLobbyCheck(lobby: Lobby): void {
    if (!lobby.lobbySettings.destroyWhenEmpty) {
      return;
    }

    const timer = setTimeout(() => {
      this.emptyLobbyTimers.delete(lobby.id);
      this.destroyIfEmpty(lobby).catch((error) => {
        loggingService.logError(error instanceof Error ? error : new Error(String(error)), {
          context: 'empty lobby check',
          lobbyId: lobby.id
        });
      });
    }, this.config.emptyLobbyTimeoutMs);
    timer.unref();
    this.emptyLobbyTimers.set(lobby.id, timer);
  }

  private async destroyIfEmpty(lobby: Lobby): Promise<void> {
    if (this.lobbies.get(lobby.id) !== lobby) {
      return;
    }

    await this.withLobby(lobby, () => {
      if (lobby.playerCount === 0 && lobby.state !== LobbyState.DESTROYED) {
        lobby.destroy();
      }
    });
  }

  private async withLobby<T>(lobby: Lobby, operation: () => T | Promise<T>): Promise<T> {
    return lobby.lock.runExclusive(async () => {
      const stateBefore: LobbyState = lobby.state;
      try {
        return await operation();
      } finally {
        await this.publishSafely(lobby.pullDomainEvents());
        if (stateBefore !== LobbyState.DESTROYED && lobby.state === LobbyState.DESTROYED) {
          loggingService.logLobbyActivity('destroyed', lobby.id, null);
        }
      }
    });
  }

  private async publishSafely(events: DomainEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }
    try {
      await this.eventBus.publishAll(events);
    } catch (error) {
      loggingService.logError(error instanceof Error ? error : new Error(String(error)), {
        operation: 'publishLobbyEvents'
      });
    }
  }

  private failure<T>(error: unknown, fallbackMessage: string, context: Record<string, unknown>): LobbyResponse<T> {
    if (error instanceof LobbyError) {
      if (error.kind === 'InternalError') {
        loggingService.logError(error, context);
      }
      return {
        status: statusForErrorKind(error.kind),
        message: error.message,
        errorKind: error.kind
      };
    }

    loggingService.logError(error instanceof Error ? error : new Error(String(error)), context);
    return {
      status: ResponseStatus.ERROR,
      message: fallbackMessage,
      errorKind: 'InternalError'
    };
  }
}
