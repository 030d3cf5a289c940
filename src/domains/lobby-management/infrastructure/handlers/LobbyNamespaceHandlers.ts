import Joi from 'joi';
import { Namespace, Socket } from 'socket.io';
import {
  LobbyCoordinationService,
  LobbyResponse,
  ResponseStatus
} from '../../application/LobbyCoordinationService';
import { LobbyConnection } from '../../domain/models/LobbyTypes';
import { loggingService } from '../../../../services/LoggingService';
import { calculateProcessingTime, getHighResolutionTime } from '../../../../shared/utils/timing';
import { checkSocketRateLimit, clearSocketRateLimits } from '../../../../middleware/rateLimit';
import {
  chatMessageSchema,
  createLobbySchema,
  emptyPayloadSchema,
  joinTeamSchema,
  lobbyIdSchema,
  memberDataSchema,
  publicGamesSchema,
  setLobbyPropertiesSchema,
  setMyPropertiesSchema,
  setReadySchema,
  validateData
} from '../../../../validation/schemas';

/**
 * The parts of a socket.io socket the handlers use.
 */
export interface LobbySocket {
  readonly id: string;
  readonly data: unknown;
  join(room: string): unknown;
  leave(room: string): unknown;
}

export type LobbyAck<T> = (response: LobbyResponse<T>) => void;

export const lobbyRoomName = (lobbyId: number): string => `lobby:${lobbyId}`;

/**
 * Reads the identity the connection middleware stored on the socket.
 */
export const connectionFromSocket = (socket: LobbySocket, defaultPermissionLevel: number = 0): LobbyConnection => {
  let username = socket.id;
  let permissionLevel = defaultPermissionLevel;

  const data = socket.data;
  if (typeof data === 'object' && data !== null) {
    if ('username' in data && typeof data.username === 'string') {
      username = data.username;
    }
    if ('permissionLevel' in data && typeof data.permissionLevel === 'number') {
      permissionLevel = data.permissionLevel;
    }
  }

  return { id: socket.id, username, permissionLevel };
};

const toAck = <T>(ack: unknown): LobbyAck<T> | undefined => {
  if (typeof ack !== 'function') {
    return undefined;
  }
  return (response) => {
    ack(response);
  };
};

/**
 * LobbyNamespaceHandlers
 *
 * Binds the lobby protocol to the /lobby namespace. Every event is rate
 * limited, validated with joi and answered through its acknowledgement
 * callback exactly once.
 */
export class LobbyNamespaceHandlers {
  constructor(
    private lobbyService: LobbyCoordinationService,
    private defaultPermissionLevel: number = 0
  ) {}

  /**
   * Set up event handlers for the lobby namespace
   */
  setupLobbyNamespaceHandlers(namespace: Namespace): void {
    namespace.on('connection', (socket: Socket) => {
      loggingService.logInfo('Socket connected to lobby namespace', {
        socketId: socket.id,
        namespacePath: '/lobby'
      });

      this.bindLobbyEventHandlers(socket);

      socket.on('disconnect', (reason) => {
        loggingService.logInfo('Socket disconnected from lobby namespace', {
          socketId: socket.id,
          reason,
          namespacePath: '/lobby'
        });
        this.handleDisconnect(socket).catch((error: unknown) => {
          loggingService.logError(error instanceof Error ? error : new Error(String(error)), {
            context: 'Lobby disconnect cleanup',
            socketId: socket.id
          });
        });
      });

      socket.on('error', (error) => {
        loggingService.logError(error, {
          context: 'Lobby namespace socket error',
          socketId: socket.id,
          namespacePath: '/lobby'
        });
      });
    });
  }

  private bindLobbyEventHandlers(socket: Socket): void {
    const bindings: Record<string, (socket: LobbySocket, payload: unknown, ack: unknown) => Promise<void>> = {
      create_lobby: (s, p, a) => this.handleCreateLobby(s, p, a),
      join_lobby: (s, p, a) => this.handleJoinLobby(s, p, a),
      leave_lobby: (s, p, a) => this.handleLeaveLobby(s, p, a),
      set_lobby_properties: (s, p, a) => this.handleSetLobbyProperties(s, p, a),
      set_my_lobby_properties: (s, p, a) => this.handleSetMyProperties(s, p, a),
      join_lobby_team: (s, p, a) => this.handleJoinTeam(s, p, a),
      lobby_send_chat_message: (s, p) => this.handleSendChatMessage(s, p),
      lobby_set_ready: (s, p, a) => this.handleSetReady(s, p, a),
      lobby_start_game: (s, p, a) => this.handleStartGame(s, p, a),
      get_lobby_room_access: (s, p, a) => this.handleGetRoomAccess(s, p, a),
      get_lobby_member_data: (s, p, a) => this.handleGetMemberData(s, p, a),
      get_lobby_info: (s, p, a) => this.handleGetLobbyInfo(s, p, a),
      get_public_games: (s, p, a) => this.handleGetPublicGames(s, p, a)
    };

    for (const [eventName, handler] of Object.entries(bindings)) {
      socket.on(eventName, (...args: unknown[]) => {
        // The ack is always the last argument; events without a payload send only the ack
        const ack = typeof args[args.length - 1] === 'function' ? args.pop() : undefined;
        handler(socket, args[0], ack).catch((error: unknown) => {
          loggingService.logError(error instanceof Error ? error : new Error(String(error)), {
            context: 'Unhandled lobby event error',
            socketId: socket.id,
            eventName
          });
        });
      });
    }
  }

  // Event handlers

  async handleCreateLobby(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'create_lobby', createLobbySchema, payload, ack, async (connection, data) => {
      const response = await this.lobbyService.createLobby(connection, data.factoryId, data.options);
      if (response.status === ResponseStatus.SUCCESS && response.data?.joined) {
        await socket.join(lobbyRoomName(response.data.lobbyId));
      }
      return response;
    });
  }

  async handleJoinLobby(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'join_lobby', lobbyIdSchema, payload, ack, async (connection, data) => {
      const response = await this.lobbyService.joinLobby(connection, data.lobbyId);
      if (response.status === ResponseStatus.SUCCESS) {
        await socket.join(lobbyRoomName(data.lobbyId));
      }
      return response;
    });
  }

  async handleLeaveLobby(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'leave_lobby', lobbyIdSchema, payload, ack, async (connection, data) => {
      const response = await this.lobbyService.leaveLobby(connection, data.lobbyId);
      await socket.leave(lobbyRoomName(data.lobbyId));
      return response;
    });
  }

  async handleSetLobbyProperties(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'set_lobby_properties', setLobbyPropertiesSchema, payload, ack,
      (connection, data) => this.lobbyService.setLobbyProperties(connection, data.lobbyId, data.properties));
  }

  async handleSetMyProperties(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'set_my_lobby_properties', setMyPropertiesSchema, payload, ack,
      (connection, data) => this.lobbyService.setMyProperties(connection, data.properties));
  }

  async handleJoinTeam(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'join_lobby_team', joinTeamSchema, payload, ack,
      (connection, data) => this.lobbyService.joinTeam(connection, data.teamName));
  }

  /**
   * Chat is fire and forget: invalid messages and non-members get no reply.
   */
  async handleSendChatMessage(socket: LobbySocket, payload: unknown): Promise<void> {
    const connection = connectionFromSocket(socket, this.defaultPermissionLevel);
    const eventName = 'lobby_send_chat_message';

    if (!checkSocketRateLimit(connection.id, eventName).allowed) {
      return;
    }

    const validation = validateData(chatMessageSchema, payload);
    if (validation.error !== undefined) {
      loggingService.logValidationFailure(eventName, payload, [validation.error]);
      return;
    }

    const startTime = getHighResolutionTime();
    const accepted = await this.lobbyService.sendChatMessage(connection, validation.value.message);
    loggingService.logSocketEvent(eventName, connection, { accepted }, calculateProcessingTime(startTime));
  }

  async handleSetReady(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'lobby_set_ready', setReadySchema, payload, ack, (connection, data) => {
      const isReady = typeof data.isReady === 'number' ? data.isReady > 0 : data.isReady;
      return this.lobbyService.setReady(connection, isReady);
    });
  }

  async handleStartGame(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'lobby_start_game', emptyPayloadSchema, payload, ack,
      (connection) => this.lobbyService.startGame(connection));
  }

  async handleGetRoomAccess(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'get_lobby_room_access', emptyPayloadSchema, payload, ack,
      (connection) => this.lobbyService.getRoomAccess(connection));
  }

  async handleGetMemberData(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'get_lobby_member_data', memberDataSchema, payload, ack,
      async (connection, data) => this.lobbyService.getMemberData(connection, data.lobbyId, data.connectionId));
  }

  async handleGetLobbyInfo(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'get_lobby_info', lobbyIdSchema, payload, ack,
      async (connection, data) => this.lobbyService.getLobbyInfo(connection, data.lobbyId));
  }

  async handleGetPublicGames(socket: LobbySocket, payload: unknown, ack: unknown): Promise<void> {
    await this.runEvent(socket, 'get_public_games', publicGamesSchema, payload, ack,
      async (connection, data) => ({
        status: ResponseStatus.SUCCESS,
        data: this.lobbyService.getPublicGames(connection, data.filters)
      }));
  }

  async handleDisconnect(socket: LobbySocket): Promise<void> {
    const lobbyId = this.lobbyService.getCurrentLobbyId(socket.id);
    await this.lobbyService.handleDisconnect(socket.id);
    clearSocketRateLimits(socket.id);
    if (lobbyId !== null) {
      await socket.leave(lobbyRoomName(lobbyId));
    }
  }

  // Helpers

  /**
   * Rate limit, validate, run and acknowledge one request.
   */
  private async runEvent<TPayload, TResult>(
    socket: LobbySocket,
    eventName: string,
    schema: Joi.ObjectSchema<TPayload>,
    payload: unknown,
    rawAck: unknown,
    run: (connection: LobbyConnection, data: TPayload) => Promise<LobbyResponse<TResult>>
  ): Promise<void> {
    const ack = toAck<TResult>(rawAck);
    const connection = connectionFromSocket(socket, this.defaultPermissionLevel);
    const startTime = getHighResolutionTime();

    const rateLimit = checkSocketRateLimit(connection.id, eventName);
    if (!rateLimit.allowed) {
      ack?.({
        status: ResponseStatus.FAILED,
        message: `Rate limit exceeded for ${eventName}. Try again in ${rateLimit.retryAfter} seconds.`,
        errorKind: 'Conflict'
      });
      return;
    }

    const validation = validateData(schema, payload);
    if (validation.error !== undefined) {
      loggingService.logValidationFailure(eventName, payload, [validation.error]);
      ack?.({ status: ResponseStatus.FAILED, message: validation.error, errorKind: 'InvalidRequest' });
      return;
    }

    let response: LobbyResponse<TResult>;
    try {
      response = await run(connection, validation.value);
    } catch (error) {
      loggingService.logSocketEvent(eventName, connection, payload, calculateProcessingTime(startTime), error);
      ack?.({ status: ResponseStatus.ERROR, message: 'Internal server error', errorKind: 'InternalError' });
      return;
    }

    loggingService.logSocketEvent(eventName, connection, validation.value, calculateProcessingTime(startTime));
    ack?.(response);
  }
}
