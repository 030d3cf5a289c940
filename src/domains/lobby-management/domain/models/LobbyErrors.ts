/**
 * Lobby domain exceptions. Every failure a lobby operation can report
 * carries one of these kinds, which the coordination service maps to a
 * response status.
 */
export type LobbyErrorKind = 'Unauthorized' | 'InvalidRequest' | 'Conflict' | 'NotFound' | 'InternalError';

export class LobbyError extends Error {
  constructor(message: string, public readonly kind: LobbyErrorKind) {
    super(message);
    this.name = 'LobbyError';
  }
}

export class InsufficientLobbyPermissionsError extends LobbyError {
  constructor(message: string = 'Insufficient permissions') {
    super(message, 'Unauthorized');
    this.name = 'InsufficientLobbyPermissionsError';
  }
}

export class InvalidLobbyRequestError extends LobbyError {
  constructor(message: string) {
    super(message, 'InvalidRequest');
    this.name = 'InvalidLobbyRequestError';
  }
}

export class UnknownLobbyFactoryError extends LobbyError {
  constructor(factoryId: string) {
    super(`Unavailable lobby factory: ${factoryId}`, 'InvalidRequest');
    this.name = 'UnknownLobbyFactoryError';
  }
}

export class AlreadyInLobbyError extends LobbyError {
  constructor(message: string = 'You are already in a lobby') {
    super(message, 'Conflict');
    this.name = 'AlreadyInLobbyError';
  }
}

export class LobbyFullError extends LobbyError {
  constructor(message: string = 'Lobby is full') {
    super(message, 'Conflict');
    this.name = 'LobbyFullError';
  }
}

export class LobbyStateError extends LobbyError {
  constructor(message: string) {
    super(message, 'Conflict');
    this.name = 'LobbyStateError';
  }
}

export class LobbyStartConditionsError extends LobbyError {
  constructor(message: string) {
    super(message, 'Conflict');
    this.name = 'LobbyStartConditionsError';
  }
}

export class LobbyNotFoundError extends LobbyError {
  constructor(lobbyId?: number) {
    super(lobbyId === undefined ? 'Lobby was not found' : `Lobby ${lobbyId} was not found`, 'NotFound');
    this.name = 'LobbyNotFoundError';
  }
}

export class LobbyMemberNotFoundError extends LobbyError {
  constructor(message: string = 'Player is not in the lobby') {
    super(message, 'NotFound');
    this.name = 'LobbyMemberNotFoundError';
  }
}

export class LobbyRegistrationError extends LobbyError {
  constructor(message: string = 'Lobby registration failed') {
    super(message, 'InternalError');
    this.name = 'LobbyRegistrationError';
  }
}

export class GameProvisioningError extends LobbyError {
  constructor(message: string, public readonly cause?: Error) {
    super(message, 'InternalError');
    this.name = 'GameProvisioningError';
  }
}
