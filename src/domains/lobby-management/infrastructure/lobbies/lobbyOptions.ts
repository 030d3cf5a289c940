import { InvalidLobbyRequestError } from '../../domain/models/LobbyErrors';
import { PropertyMap } from '../../domain/models/LobbyTypes';

export const MAX_LOBBY_PLAYERS = 64;
const MAX_LOBBY_NAME_LENGTH = 64;

export interface ParsedLobbyOptions {
  name: string;
  maxPlayers: number;
  /** Options left over once name and maxPlayers are consumed */
  properties: PropertyMap;
}

export const parseLobbyOptions = (
  options: PropertyMap,
  defaults: { name: string; maxPlayers: number }
): ParsedLobbyOptions => {
  const { name: rawName, maxPlayers: rawMaxPlayers, ...properties } = options;

  const name = rawName?.trim() || defaults.name;
  if (name.length > MAX_LOBBY_NAME_LENGTH) {
    throw new InvalidLobbyRequestError(`Lobby name cannot exceed ${MAX_LOBBY_NAME_LENGTH} characters`);
  }

  let maxPlayers = defaults.maxPlayers;
  if (rawMaxPlayers !== undefined) {
    if (!/^\d+$/.test(rawMaxPlayers)) {
      throw new InvalidLobbyRequestError('maxPlayers must be a whole number');
    }
    maxPlayers = parseInt(rawMaxPlayers, 10);
  }
  if (maxPlayers < 1 || maxPlayers > MAX_LOBBY_PLAYERS) {
    throw new InvalidLobbyRequestError(`maxPlayers must be between 1 and ${MAX_LOBBY_PLAYERS}`);
  }

  return { name, maxPlayers, properties };
};

export const isNonNegativeInteger = (value: string): boolean => /^\d{1,9}$/.test(value);
