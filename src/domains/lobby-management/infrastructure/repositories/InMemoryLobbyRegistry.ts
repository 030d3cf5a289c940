/**
 * In-Memory Lobby Registry
 * 
 * Map-based storage for live lobbies. A lobby removes itself from the
 * registry through its destroyed notification.
 */

import { LobbyRegistry } from '../../domain/repositories/LobbyRegistry';
import { Lobby, LobbyDestroyedListener } from '../../domain/models/Lobby';
import { loggingService } from '../../../../services/LoggingService';

export class InMemoryLobbyRegistry implements LobbyRegistry {
  private lobbies = new Map<number, Lobby>();
  private destroyedHandlers = new Map<number, LobbyDestroyedListener>();
  private nextLobbyId = 0;

  generateLobbyId(): number {
    return this.nextLobbyId++;
  }

  add(lobby: Lobby): boolean {
    if (this.lobbies.has(lobby.id)) {
      loggingService.logError(new Error('Failed to add a lobby - lobby with same id already exists'), {
        lobbyId: lobby.id
      });
      return false;
    }

    this.lobbies.set(lobby.id, lobby);

    const handler: LobbyDestroyedListener = (destroyed) => {
      destroyed.offDestroyed(handler);
      // Only drop the entry this handler was registered for
      if (this.lobbies.get(destroyed.id) === destroyed) {
        this.remove(destroyed.id);
      }
    };
    this.destroyedHandlers.set(lobby.id, handler);
    lobby.onDestroyed(handler);

    return true;
  }

  remove(lobbyId: number): boolean {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby) {
      return false;
    }

    const handler = this.destroyedHandlers.get(lobbyId);
    if (handler) {
      lobby.offDestroyed(handler);
      this.destroyedHandlers.delete(lobbyId);
    }

    return this.lobbies.delete(lobbyId);
  }

  get(lobbyId: number): Lobby | undefined {
    return this.lobbies.get(lobbyId);
  }

  allLobbies(): Lobby[] {
    return Array.from(this.lobbies.values());
  }

  get size(): number {
    return this.lobbies.size;
  }

  clear(): Lobby[] {
    const removed = this.allLobbies();
    for (const lobby of removed) {
      this.remove(lobby.id);
    }
    return removed;
  }
}
