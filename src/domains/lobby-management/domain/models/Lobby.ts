import { DomainEvent } from '../../../../shared/domain/events/DomainEvent';
import { Mutex } from '../../../../shared/utils/mutex';
import { LobbyMember } from './LobbyMember';
import { LobbyUserContext } from './LobbyUserContext';
import {
  LobbyConnection,
  LobbyData,
  LobbySettings,
  LobbyState,
  PropertyMap,
  RoomAccess
} from './LobbyTypes';

export type LobbyDestroyedListener = (lobby: Lobby) => void;

/**
 * Capability every lobby type provides to the coordination service.
 *
 * Operations that can fail for a reason throw a LobbyError; the boolean
 * ones report a rejected validation hook.
 */
export interface Lobby {
  readonly id: number;
  readonly type: string;
  readonly name: string;
  readonly maxPlayers: number;
  readonly playerCount: number;
  readonly state: LobbyState;
  readonly ownerId: string | null;
  readonly gameAddress: string | null;
  readonly gamePort: number | null;
  readonly lobbySettings: LobbySettings;
  /** Serializes mutating operations on this lobby */
  readonly lock: Mutex;

  addPlayer(context: LobbyUserContext): LobbyMember;
  removePlayer(context: LobbyUserContext): void;
  getMember(connectionId: string): LobbyMember | undefined;

  setProperty(setter: LobbyMember | null, key: string, value: string): boolean;
  setPlayerProperty(member: LobbyMember, key: string, value: string): boolean;
  setReadyState(member: LobbyMember, isReady: boolean): void;
  tryJoinTeam(teamName: string, member: LobbyMember): boolean;

  startGameManually(context: LobbyUserContext): Promise<void>;
  /** True when the last ready flag should start the game without the owner */
  shouldAutoStart(): boolean;
  startGame(): Promise<void>;
  handleGameSessionEnded(): void;

  generateLobbyData(requester?: LobbyMember): LobbyData;
  getPublicProperties(requester: LobbyConnection): PropertyMap;
  chatMessageHandler(member: LobbyMember, message: string): void;
  gameAccessRequestHandler(requester: LobbyConnection): Promise<RoomAccess>;

  destroy(): void;
  onDestroyed(listener: LobbyDestroyedListener): void;
  offDestroyed(listener: LobbyDestroyedListener): void;

  pullDomainEvents(): DomainEvent[];
}
