import { LobbyConnection } from './LobbyTypes';

/**
 * Per-connection lobby state, created on the first lobby request.
 *
 * Only the id of the current lobby is kept; the lobby is resolved through
 * the registry, which owns it.
 */
export class LobbyUserContext {
  private _currentLobbyId: number | null = null;
  private _closed = false;

  constructor(public readonly connection: LobbyConnection) {}

  get connectionId(): string {
    return this.connection.id;
  }

  get username(): string {
    return this.connection.username;
  }

  get currentLobbyId(): number | null {
    return this._currentLobbyId;
  }

  get isInLobby(): boolean {
    return this._currentLobbyId !== null;
  }

  /** Set once the connection has gone; a closed context can join nothing. */
  get isClosed(): boolean {
    return this._closed;
  }

  close(): void {
    this._closed = true;
  }

  attachTo(lobbyId: number): void {
    this._currentLobbyId = lobbyId;
  }

  /**
   * Clears the current lobby if it is `lobbyId`. Returns whether anything changed.
   */
  detachFrom(lobbyId: number): boolean {
    if (this._currentLobbyId !== lobbyId) {
      return false;
    }
    this._currentLobbyId = null;
    return true;
  }
}
