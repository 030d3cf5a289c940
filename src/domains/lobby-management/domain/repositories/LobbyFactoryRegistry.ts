import { loggingService } from '../../../../services/LoggingService';
import { LobbyDependencies } from '../models/BaseLobby';
import { Lobby } from '../models/Lobby';
import { LobbyConnection, PropertyMap } from '../models/LobbyTypes';

export interface LobbyCreationContext {
  id: number;
  options: PropertyMap;
  creator: LobbyConnection;
  dependencies: LobbyDependencies;
}

export type LobbyConstructor = (context: LobbyCreationContext) => Lobby;

/**
 * Maps factory ids to lobby constructors.
 */
export class LobbyFactoryRegistry {
  private factories = new Map<string, LobbyConstructor>();

  /**
   * Registers a constructor. A second registration under the same id replaces
   * the first.
   */
  register(factoryId: string, constructor: LobbyConstructor): void {
    if (this.factories.has(factoryId)) {
      loggingService.logWarning('Overriding a lobby factory with the same id', { factoryId });
    }

    this.factories.set(factoryId, constructor);
  }

  resolve(factoryId: string): LobbyConstructor | undefined {
    return this.factories.get(factoryId);
  }

  has(factoryId: string): boolean {
    return this.factories.has(factoryId);
  }

  get factoryIds(): string[] {
    return Array.from(this.factories.keys());
  }

  clear(): void {
    this.factories.clear();
  }
}
