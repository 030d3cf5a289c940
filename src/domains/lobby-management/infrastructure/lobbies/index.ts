import { LobbyConstructor } from '../../domain/repositories/LobbyFactoryRegistry';
import { DeathmatchLobby } from './DeathmatchLobby';
import { TeamLobby } from './TeamLobby';

export { DeathmatchLobby } from './DeathmatchLobby';
export { TeamLobby } from './TeamLobby';

/**
 * Factories registered when the coordination service starts.
 */
export const DEFAULT_LOBBY_FACTORIES: ReadonlyArray<readonly [string, LobbyConstructor]> = [
  [DeathmatchLobby.TYPE, (context) => DeathmatchLobby.create(context)],
  [TeamLobby.TYPE, (context) => TeamLobby.create(context)]
];
