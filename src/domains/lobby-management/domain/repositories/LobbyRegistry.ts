/**
 * Lobby registry interface
 */

import { Lobby } from '../models/Lobby';

export interface LobbyRegistry {
  /** Fresh, strictly increasing id; never reused */
  generateLobbyId(): number;
  add(lobby: Lobby): boolean;
  remove(lobbyId: number): boolean;
  get(lobbyId: number): Lobby | undefined;
  /** Point-in-time copy, safe to iterate while lobbies come and go */
  allLobbies(): Lobby[];
  readonly size: number;
  /** Removes every lobby and returns them */
  clear(): Lobby[];
}
