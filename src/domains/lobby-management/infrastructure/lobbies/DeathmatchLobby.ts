import { BaseLobby } from '../../domain/models/BaseLobby';
import { LobbyMember } from '../../domain/models/LobbyMember';
import { LobbyTeam } from '../../domain/models/LobbyTeam';
import { LobbyCreationContext } from '../../domain/repositories/LobbyFactoryRegistry';
import { isNonNegativeInteger, parseLobbyOptions } from './lobbyOptions';

const NUMERIC_PROPERTIES = new Set(['rounds', 'scoreLimit', 'timeLimit']);
const MAX_PROPERTY_LENGTH = 256;

/**
 * Free-for-all lobby: every player goes into a single team.
 */
export class DeathmatchLobby extends BaseLobby {
  static readonly TYPE = 'deathmatch';
  static readonly TEAM_NAME = 'players';

  static create(context: LobbyCreationContext): DeathmatchLobby {
    const { name, maxPlayers, properties } = parseLobbyOptions(context.options, {
      name: 'Deathmatch',
      maxPlayers: 10
    });

    const lobby = new DeathmatchLobby(context, name, maxPlayers);
    lobby.applyInitialProperties(properties);
    return lobby;
  }

  private constructor(context: LobbyCreationContext, name: string, maxPlayers: number) {
    super({
      id: context.id,
      type: DeathmatchLobby.TYPE,
      name,
      maxPlayers,
      teams: [new LobbyTeam(DeathmatchLobby.TEAM_NAME, 1, maxPlayers)],
      settings: {
        enableManualStart: true,
        enableReadySystem: false,
        enableTeamSwitching: false,
        minPlayers: 1
      },
      dependencies: context.dependencies
    });
  }

  protected validateLobbyProperty(key: string, value: string): boolean {
    if (NUMERIC_PROPERTIES.has(key)) {
      return isNonNegativeInteger(value);
    }
    if (key === 'map') {
      return value.trim().length > 0 && value.length <= 64;
    }
    return value.length <= MAX_PROPERTY_LENGTH;
  }

  protected validatePlayerProperty(_member: LobbyMember, _key: string, value: string): boolean {
    return value.length <= MAX_PROPERTY_LENGTH;
  }
}
