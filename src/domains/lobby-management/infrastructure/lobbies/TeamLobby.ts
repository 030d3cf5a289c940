import { BaseLobby } from '../../domain/models/BaseLobby';
import { LobbyMember } from '../../domain/models/LobbyMember';
import { LobbyTeam } from '../../domain/models/LobbyTeam';
import { LobbyCreationContext } from '../../domain/repositories/LobbyFactoryRegistry';
import { isNonNegativeInteger, parseLobbyOptions } from './lobbyOptions';

const MAX_PROPERTY_LENGTH = 256;

/**
 * Red vs blue. Players pick their side, everyone readies up and the game
 * master starts the match.
 */
export class TeamLobby extends BaseLobby {
  static readonly TYPE = 'two-teams';

  static create(context: LobbyCreationContext): TeamLobby {
    const { name, maxPlayers, properties } = parseLobbyOptions(context.options, {
      name: 'Team match',
      maxPlayers: 8
    });

    const lobby = new TeamLobby(context, name, Math.max(maxPlayers, 2));
    lobby.applyInitialProperties(properties);
    return lobby;
  }

  private constructor(context: LobbyCreationContext, name: string, maxPlayers: number) {
    super({
      id: context.id,
      type: TeamLobby.TYPE,
      name,
      maxPlayers,
      teams: [
        new LobbyTeam('red', 1, Math.ceil(maxPlayers / 2)),
        new LobbyTeam('blue', 1, Math.floor(maxPlayers / 2))
      ],
      settings: {
        enableManualStart: true,
        enableReadySystem: true,
        enableTeamSwitching: true,
        minPlayers: 2
      },
      dependencies: context.dependencies
    });
  }

  protected validateLobbyProperty(key: string, value: string): boolean {
    if (key === 'rounds') {
      return isNonNegativeInteger(value);
    }
    return value.length <= MAX_PROPERTY_LENGTH;
  }

  protected validatePlayerProperty(_member: LobbyMember, key: string, value: string): boolean {
    // Team membership is changed through team switching only
    if (key === 'team') {
      return false;
    }
    return value.length <= MAX_PROPERTY_LENGTH;
  }

  protected canSwitchTeam(member: LobbyMember, _from: LobbyTeam | null, _to: LobbyTeam): boolean {
    // Ready players stay where they are until they unready
    return !member.isReady;
  }
}
