/**
 * Shared lobby types and the packets sent to clients.
 */

export type PropertyMap = Record<string, string>;

/**
 * Conceptual lobby states. A lobby only moves forward, except that a failed
 * start returns to FORMING and a finished game may return to FORMING when
 * play-again is enabled.
 */
export enum LobbyState {
  FORMING = 'forming',
  STARTING = 'starting',
  IN_PROGRESS = 'in_progress',
  DESTROYED = 'destroyed'
}

/**
 * Identity of a connected client, as established by the transport.
 */
export interface LobbyConnection {
  readonly id: string;
  readonly username: string;
  readonly permissionLevel: number;
}

export interface LobbySettings {
  enableTeamSwitching: boolean;
  enableReadySystem: boolean;
  enableManualStart: boolean;
  allowPlayersChangeLobbyProperties: boolean;
  allowJoiningWhenGameIsLive: boolean;
  destroyWhenEmpty: boolean;
  playAgainEnabled: boolean;
  minPlayers: number;
}

export const DEFAULT_LOBBY_SETTINGS: LobbySettings = {
  enableTeamSwitching: false,
  enableReadySystem: false,
  enableManualStart: true,
  allowPlayersChangeLobbyProperties: false,
  allowJoiningWhenGameIsLive: false,
  destroyWhenEmpty: true,
  playAgainEnabled: false,
  minPlayers: 1
};

// Keys starting with an underscore are never shown outside the lobby
export const isPrivatePropertyKey = (key: string): boolean => key.startsWith('_');

export interface LobbyMemberData {
  connectionId: string;
  username: string;
  isReady: boolean;
  team: string | null;
  properties: PropertyMap;
}

export interface LobbyTeamData {
  name: string;
  minPlayers: number;
  maxPlayers: number;
  members: string[];
}

export interface LobbyData {
  lobbyId: number;
  lobbyType: string;
  name: string;
  state: LobbyState;
  statusText: string;
  ownerId: string | null;
  maxPlayers: number;
  playerCount: number;
  properties: PropertyMap;
  members: Record<string, LobbyMemberData>;
  teams: Record<string, LobbyTeamData>;
  settings: LobbySettings;
  /** Set when the snapshot was generated for a specific member */
  currentMemberId?: string;
}

export interface GameInfo {
  /** `address:port` of the running game, null while the lobby is forming */
  address: string | null;
  id: number;
  maxPlayers: number;
  name: string;
  onlinePlayers: number;
  properties: PropertyMap;
  type: 'lobby';
}

export interface RoomAccess {
  roomId: string;
  address: string;
  port: number;
  token: string;
}
