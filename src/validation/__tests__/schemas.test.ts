import {
  createLobbySchema,
  chatMessageSchema,
  emptyPayloadSchema,
  lobbyIdSchema,
  memberDataSchema,
  publicGamesSchema,
  setLobbyPropertiesSchema,
  setReadySchema,
  validateData
} from '../schemas';

describe('validation schemas', () => {
  describe('createLobbySchema', () => {
    it('should default the options to an empty map', () => {
      expect(validateData(createLobbySchema, { factoryId: 'deathmatch' })).toEqual({
        value: { factoryId: 'deathmatch', options: {} }
      });
    });

    it('should require string option values', () => {
      const result = validateData(createLobbySchema, { factoryId: 'deathmatch', options: { maxPlayers: 8 } });

      expect(result.error).toBe('"options.maxPlayers" must be a string');
    });
  });

  describe('setLobbyPropertiesSchema', () => {
    it('should report keys that are too long instead of dropping them', () => {
      const longKey = 'k'.repeat(65);

      const result = validateData(setLobbyPropertiesSchema, {
        lobbyId: 0,
        properties: { map: 'arena2', [longKey]: 'x' }
      });

      expect(result).toEqual({ error: `"properties.${longKey}" is not allowed` });
    });

    it('should keep keys up to 64 characters', () => {
      const key = 'k'.repeat(64);

      expect(validateData(setLobbyPropertiesSchema, { lobbyId: 0, properties: { [key]: 'x' } })).toEqual({
        value: { lobbyId: 0, properties: { [key]: 'x' } }
      });
    });
  });

  describe('lobbyIdSchema', () => {
    it('should convert numeric strings and strip unknown keys', () => {
      expect(validateData(lobbyIdSchema, { lobbyId: '3', extra: 'ignored' })).toEqual({ value: { lobbyId: 3 } });
    });

    it('should reject fractional ids', () => {
      expect(validateData(lobbyIdSchema, { lobbyId: 1.5 }).error).toBe('"lobbyId" must be an integer');
    });
  });

  describe('memberDataSchema', () => {
    it('should report every missing field', () => {
      expect(validateData(memberDataSchema, {}).error).toBe('"lobbyId" is required, "connectionId" is required');
    });
  });

  describe('setReadySchema', () => {
    it('should accept booleans and integers', () => {
      expect(validateData(setReadySchema, { isReady: true }).value).toEqual({ isReady: true });
      expect(validateData(setReadySchema, { isReady: 2 }).value).toEqual({ isReady: 2 });
    });

    it('should reject other values', () => {
      expect(validateData(setReadySchema, { isReady: 'maybe' }).error).toBeDefined();
    });
  });

  describe('chatMessageSchema', () => {
    it('should reject empty messages', () => {
      expect(validateData(chatMessageSchema, { message: '' }).error).toBe('"message" is not allowed to be empty');
    });
  });

  describe('missing payloads', () => {
    it('should validate an absent payload as an empty object', () => {
      expect(validateData(publicGamesSchema, undefined)).toEqual({ value: { filters: {} } });
      expect(validateData(emptyPayloadSchema, null)).toEqual({ value: {} });
    });
  });
});
