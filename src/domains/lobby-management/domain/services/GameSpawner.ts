import { LobbyConnection, PropertyMap, RoomAccess } from '../models/LobbyTypes';

export interface GameProvisionRequest {
  lobbyId: number;
  lobbyType: string;
  lobbyName: string;
  maxPlayers: number;
  properties: PropertyMap;
  memberIds: string[];
}

export interface GameSession {
  roomId: string;
  address: string;
  port: number;
}

/**
 * Room/spawner collaborator that turns a started lobby into a playable
 * game session.
 */
export interface GameSpawner {
  /**
   * Must stop work and reject once `signal` is aborted.
   */
  provision(request: GameProvisionRequest, signal: AbortSignal): Promise<GameSession>;
  getRoomAccess(session: GameSession, requester: LobbyConnection): Promise<RoomAccess>;
  release(session: GameSession): void;
}
