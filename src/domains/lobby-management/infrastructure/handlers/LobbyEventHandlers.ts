import { Namespace } from 'socket.io';
import { DomainEvent } from '../../../../shared/domain/events/DomainEvent';
import { EventBus, EventHandler, EventType } from '../../../../shared/domain/events/EventBus';
import {
  LobbyChatMessageSent,
  LobbyDestroyed,
  LobbyGameMasterChanged,
  LobbyMemberJoined,
  LobbyMemberLeft,
  LobbyMemberPropertyChanged,
  LobbyMemberReadyChanged,
  LobbyMemberTeamChanged,
  LobbyPropertyChanged,
  LobbyStateChanged
} from '../../domain/events/LobbyEvents';
import { isPrivatePropertyKey } from '../../domain/models/LobbyTypes';
import { loggingService } from '../../../../services/LoggingService';
import { lobbyRoomName } from './LobbyNamespaceHandlers';

/**
 * Where lobby broadcasts go. Backed by the /lobby namespace in production.
 */
export interface LobbyBroadcastTarget {
  emitToRoom(room: string, event: string, payload: unknown): void;
  emitToConnection(connectionId: string, event: string, payload: unknown): void;
  closeRoom(room: string): void;
}

export const namespaceBroadcastTarget = (namespace: Namespace): LobbyBroadcastTarget => ({
  emitToRoom: (room, event, payload) => {
    namespace.to(room).emit(event, payload);
  },
  // Every socket is in a room named after its own id
  emitToConnection: (connectionId, event, payload) => {
    namespace.to(connectionId).emit(event, payload);
  },
  closeRoom: (room) => {
    namespace.in(room).socketsLeave(room);
  }
});

/**
 * LobbyEventHandlers
 *
 * Relays lobby domain events from the event bus to the lobby's socket.io
 * room. A member's private properties are only sent to that member.
 */
export class LobbyEventHandlers {
  private subscriptions: Array<() => void> = [];

  constructor(
    private eventBus: EventBus,
    private target: LobbyBroadcastTarget
  ) {
    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.on(LobbyMemberJoined, (event) => {
      this.toLobby(event.lobbyId, 'lobby_member_joined', { lobbyId: event.lobbyId, member: event.member });
    });

    this.on(LobbyMemberLeft, (event) => {
      this.toLobby(event.lobbyId, 'lobby_member_left', {
        lobbyId: event.lobbyId,
        connectionId: event.connectionId,
        username: event.username
      });
    });

    this.on(LobbyGameMasterChanged, (event) => {
      this.toLobby(event.lobbyId, 'lobby_game_master_changed', { lobbyId: event.lobbyId, ownerId: event.ownerId });
    });

    // Only members are in the room, so private lobby properties can go there
    this.on(LobbyPropertyChanged, (event) => {
      this.toLobby(event.lobbyId, 'lobby_property_changed', {
        lobbyId: event.lobbyId,
        key: event.key,
        value: event.value
      });
    });

    this.on(LobbyMemberPropertyChanged, (event) => {
      const payload = {
        lobbyId: event.lobbyId,
        connectionId: event.connectionId,
        key: event.key,
        value: event.value
      };
      if (isPrivatePropertyKey(event.key)) {
        this.target.emitToConnection(event.connectionId, 'lobby_member_property_changed', payload);
      } else {
        this.toLobby(event.lobbyId, 'lobby_member_property_changed', payload);
      }
    });

    this.on(LobbyMemberReadyChanged, (event) => {
      this.toLobby(event.lobbyId, 'lobby_member_ready_changed', {
        lobbyId: event.lobbyId,
        connectionId: event.connectionId,
        isReady: event.isReady
      });
    });

    this.on(LobbyMemberTeamChanged, (event) => {
      this.toLobby(event.lobbyId, 'lobby_member_team_changed', {
        lobbyId: event.lobbyId,
        connectionId: event.connectionId,
        fromTeam: event.fromTeam,
        toTeam: event.toTeam
      });
    });

    this.on(LobbyStateChanged, (event) => {
      this.toLobby(event.lobbyId, 'lobby_state_changed', {
        lobbyId: event.lobbyId,
        state: event.state,
        statusText: event.statusText
      });
    });

    this.on(LobbyChatMessageSent, (event) => {
      this.toLobby(event.lobbyId, 'lobby_chat_message', {
        lobbyId: event.lobbyId,
        sender: event.sender,
        message: event.message
      });
    });

    this.on(LobbyDestroyed, (event) => {
      const room = lobbyRoomName(event.lobbyId);
      this.target.emitToRoom(room, 'lobby_destroyed', { lobbyId: event.lobbyId });
      this.target.closeRoom(room);
      loggingService.logLobbyActivity('room closed', event.lobbyId, null);
    });
  }

  /**
   * Unsubscribe everything from the event bus
   */
  dispose(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
  }

  private on<T extends DomainEvent>(eventType: EventType<T>, handler: EventHandler<T>): void {
    this.eventBus.subscribe(eventType, handler);
    this.subscriptions.push(() => this.eventBus.unsubscribe(eventType, handler));
  }

  private toLobby(lobbyId: number, event: string, payload: unknown): void {
    this.target.emitToRoom(lobbyRoomName(lobbyId), event, payload);
  }
}
