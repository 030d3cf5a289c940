import Joi from 'joi';
import { PropertyMap } from '../domains/lobby-management/domain/models/LobbyTypes';

const PROPERTY_KEY = Joi.string().min(1).max(64);
const PROPERTY_VALUE = Joi.string().allow('').max(1024);

// string -> string map, insertion order is the order writes are applied in.
// Keys failing PROPERTY_KEY are reported, not stripped.
const propertyMap = () => Joi.object().pattern(PROPERTY_KEY, PROPERTY_VALUE).prefs({ stripUnknown: false });

const lobbyId = Joi.number().integer().min(0);

export type EmptyPayload = Record<string, never>;

export interface CreateLobbyPayload {
  factoryId: string;
  options: PropertyMap;
}

export interface LobbyIdPayload {
  lobbyId: number;
}

export interface SetLobbyPropertiesPayload {
  lobbyId: number;
  properties: PropertyMap;
}

export interface SetMyPropertiesPayload {
  properties: PropertyMap;
}

export interface JoinTeamPayload {
  teamName: string;
}

export interface ChatMessagePayload {
  message: string;
}

export interface SetReadyPayload {
  isReady: boolean | number;
}

export interface MemberDataPayload {
  lobbyId: number;
  connectionId: string;
}

export interface PublicGamesPayload {
  filters: PropertyMap;
}

// Events without a payload; anything sent along is stripped
export const emptyPayloadSchema = Joi.object<EmptyPayload>({});

// Lobby creation validation
export const createLobbySchema = Joi.object<CreateLobbyPayload>({
  factoryId: Joi.string().min(1).max(64).required(),
  options: propertyMap().default({}),
});

export const lobbyIdSchema = Joi.object<LobbyIdPayload>({
  lobbyId: lobbyId.required(),
});

export const setLobbyPropertiesSchema = Joi.object<SetLobbyPropertiesPayload>({
  lobbyId: lobbyId.required(),
  properties: propertyMap().min(1).required(),
});

export const setMyPropertiesSchema = Joi.object<SetMyPropertiesPayload>({
  properties: propertyMap().min(1).required(),
});

export const joinTeamSchema = Joi.object<JoinTeamPayload>({
  teamName: Joi.string().min(1).max(64).required(),
});

// Length is checked again by the lobby after trimming
export const chatMessageSchema = Joi.object<ChatMessagePayload>({
  message: Joi.string().min(1).max(2000).required(),
});

// Clients may send the flag as an int, anything above 0 means ready
export const setReadySchema = Joi.object<SetReadyPayload>({
  isReady: Joi.alternatives().try(Joi.boolean(), Joi.number().integer()).required(),
});

export const memberDataSchema = Joi.object<MemberDataPayload>({
  lobbyId: lobbyId.required(),
  connectionId: Joi.string().min(1).max(100).required(),
});

export const publicGamesSchema = Joi.object<PublicGamesPayload>({
  filters: propertyMap().default({}),
});

export type ValidationResult<T> =
  | { error: string; value?: undefined }
  | { error?: undefined; value: T };

// Validation middleware helper
export const validateData = <T>(schema: Joi.ObjectSchema<T>, data: unknown): ValidationResult<T> => {
  try {
    const { error, value } = schema.validate(data ?? {}, {
      abortEarly: false,
      stripUnknown: true
    });

    if (error) {
      const errorMessage = error.details.map((detail: Joi.ValidationErrorItem) => detail.message).join(', ');
      return { error: errorMessage };
    }

    return { value };
  } catch (validationError) {
    return { error: `Validation error: ${validationError instanceof Error ? validationError.message : 'Unknown error'}` };
  }
};
