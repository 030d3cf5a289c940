import { randomUUID } from 'crypto';
import { loggingService } from '../../../../services/LoggingService';
import { GameProvisionRequest, GameSession, GameSpawner } from '../../domain/services/GameSpawner';
import { LobbyConnection, RoomAccess } from '../../domain/models/LobbyTypes';

export interface LocalGameSpawnerOptions {
  publicAddress: string;
  portRangeStart: number;
  portRangeEnd: number;
}

/**
 * Hands out game server slots on this host from a fixed port range.
 *
 * No process is launched; the slot is what the room subsystem binds to.
 */
export class LocalGameSpawner implements GameSpawner {
  private readonly portsInUse = new Set<number>();
  private readonly tokens = new Map<string, Map<string, string>>();

  constructor(private readonly options: LocalGameSpawnerOptions) {
    if (options.portRangeEnd < options.portRangeStart) {
      throw new Error('Game server port range is empty');
    }
  }

  get activeSessions(): number {
    return this.portsInUse.size;
  }

  async provision(request: GameProvisionRequest, signal: AbortSignal): Promise<GameSession> {
    if (signal.aborted) {
      throw new Error('Provisioning was cancelled');
    }

    const port = this.allocatePort();
    if (port === null) {
      throw new Error('No free game server ports');
    }

    const session: GameSession = {
      roomId: `lobby-${request.lobbyId}-${randomUUID()}`,
      address: this.options.publicAddress,
      port
    };
    this.tokens.set(session.roomId, new Map());

    loggingService.logInfo('Game session provisioned', {
      lobbyId: request.lobbyId,
      roomId: session.roomId,
      port,
      players: request.memberIds.length
    });

    return session;
  }

  async getRoomAccess(session: GameSession, requester: LobbyConnection): Promise<RoomAccess> {
    const sessionTokens = this.tokens.get(session.roomId);
    if (!sessionTokens) {
      throw new Error(`Unknown game session ${session.roomId}`);
    }

    let token = sessionTokens.get(requester.id);
    if (!token) {
      token = randomUUID();
      sessionTokens.set(requester.id, token);
    }

    return {
      roomId: session.roomId,
      address: session.address,
      port: session.port,
      token
    };
  }

  release(session: GameSession): void {
    this.portsInUse.delete(session.port);
    this.tokens.delete(session.roomId);
  }

  private allocatePort(): number | null {
    for (let port = this.options.portRangeStart; port <= this.options.portRangeEnd; port++) {
      if (!this.portsInUse.has(port)) {
        this.portsInUse.add(port);
        return port;
      }
    }
    return null;
  }
}
