import { LobbyFactoryRegistry, LobbyConstructor } from '../LobbyFactoryRegistry';
import { DeathmatchLobby } from '../../../infrastructure/lobbies/DeathmatchLobby';
import { TeamLobby } from '../../../infrastructure/lobbies/TeamLobby';

jest.mock('../../../../../services/LoggingService', () => ({
  loggingService: {
    logInfo: jest.fn(),
    logError: jest.fn(),
    logWarning: jest.fn(),
  },
}));

import { loggingService } from '../../../../../services/LoggingService';

describe('LobbyFactoryRegistry', () => {
  let registry: LobbyFactoryRegistry;
  const deathmatch: LobbyConstructor = (context) => DeathmatchLobby.create(context);
  const teams: LobbyConstructor = (context) => TeamLobby.create(context);

  beforeEach(() => {
    registry = new LobbyFactoryRegistry();
  });

  it('should resolve a registered constructor', () => {
    registry.register('deathmatch', deathmatch);

    expect(registry.resolve('deathmatch')).toBe(deathmatch);
    expect(registry.has('deathmatch')).toBe(true);
  });

  it('should return undefined for unknown factory ids', () => {
    expect(registry.resolve('capture-the-flag')).toBeUndefined();
    expect(registry.has('capture-the-flag')).toBe(false);
  });

  it('should overwrite a registration and log a warning', () => {
    registry.register('deathmatch', deathmatch);
    registry.register('deathmatch', teams);

    expect(registry.resolve('deathmatch')).toBe(teams);
    expect(loggingService.logWarning).toHaveBeenCalledWith(
      'Overriding a lobby factory with the same id',
      { factoryId: 'deathmatch' }
    );
  });

  it('should not warn on a first registration', () => {
    registry.register('two-teams', teams);

    expect(loggingService.logWarning).not.toHaveBeenCalled();
  });

  it('should list and clear factory ids', () => {
    registry.register('deathmatch', deathmatch);
    registry.register('two-teams', teams);

    expect(registry.factoryIds).toEqual(['deathmatch', 'two-teams']);

    registry.clear();
    expect(registry.factoryIds).toEqual([]);
  });
});
