import { DomainEvent } from '../../../../shared/domain/events/DomainEvent';
import { LobbyMemberData, LobbyState } from '../models/LobbyTypes';

/**
 * Lobby Management Domain Events
 * 
 * Raised by lobbies as they change and relayed to the lobby's members.
 */

export class LobbyCreated extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly lobbyType: string,
    public readonly name: string,
    public readonly creatorId: string
  ) {
    super(String(lobbyId));
  }
}

export class LobbyMemberJoined extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly member: LobbyMemberData
  ) {
    super(String(lobbyId));
  }
}

export class LobbyMemberLeft extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly connectionId: string,
    public readonly username: string
  ) {
    super(String(lobbyId));
  }
}

export class LobbyGameMasterChanged extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly ownerId: string | null
  ) {
    super(String(lobbyId));
  }
}

export class LobbyPropertyChanged extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly key: string,
    public readonly value: string
  ) {
    super(String(lobbyId));
  }
}

export class LobbyMemberPropertyChanged extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly connectionId: string,
    public readonly key: string,
    public readonly value: string
  ) {
    super(String(lobbyId));
  }
}

export class LobbyMemberReadyChanged extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly connectionId: string,
    public readonly isReady: boolean
  ) {
    super(String(lobbyId));
  }
}

export class LobbyMemberTeamChanged extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly connectionId: string,
    public readonly fromTeam: string | null,
    public readonly toTeam: string
  ) {
    super(String(lobbyId));
  }
}

export class LobbyStateChanged extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly state: LobbyState,
    public readonly statusText: string
  ) {
    super(String(lobbyId));
  }
}

export class LobbyChatMessageSent extends DomainEvent {
  constructor(
    public readonly lobbyId: number,
    public readonly connectionId: string,
    public readonly sender: string,
    public readonly message: string
  ) {
    super(String(lobbyId));
  }
}

export class LobbyDestroyed extends DomainEvent {
  constructor(public readonly lobbyId: number) {
    super(String(lobbyId));
  }
}
