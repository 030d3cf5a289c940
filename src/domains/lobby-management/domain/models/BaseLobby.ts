import { AggregateRoot } from '../../../../shared/domain/models/AggregateRoot';
import { Mutex } from '../../../../shared/utils/mutex';
import { TimeoutError, runWithTimeout } from '../../../../shared/utils/timing';
import {
  LobbyChatMessageSent,
  LobbyDestroyed,
  LobbyGameMasterChanged,
  LobbyMemberJoined,
  LobbyMemberLeft,
  LobbyMemberPropertyChanged,
  LobbyMemberReadyChanged,
  LobbyMemberTeamChanged,
  LobbyPropertyChanged,
  LobbyStateChanged
} from '../events/LobbyEvents';
import { GameSession, GameSpawner } from '../services/GameSpawner';
import { Lobby, LobbyDestroyedListener } from './Lobby';
import {
  AlreadyInLobbyError,
  GameProvisioningError,
  InsufficientLobbyPermissionsError,
  InvalidLobbyRequestError,
  LobbyFullError,
  LobbyMemberNotFoundError,
  LobbyStartConditionsError,
  LobbyStateError
} from './LobbyErrors';
import { LobbyMember } from './LobbyMember';
import { LobbyTeam } from './LobbyTeam';
import {
  DEFAULT_LOBBY_SETTINGS,
  LobbyConnection,
  LobbyData,
  LobbyMemberData,
  LobbySettings,
  LobbyState,
  LobbyTeamData,
  PropertyMap,
  RoomAccess,
  isPrivatePropertyKey
} from './LobbyTypes';
import { LobbyUserContext } from './LobbyUserContext';

/**
 * Services a lobby needs from its surroundings.
 */
export interface LobbyDependencies {
  spawner: GameSpawner;
  resolveUserContext(connectionId: string): LobbyUserContext | undefined;
  startGameTimeoutMs: number;
  maxChatMessageLength: number;
}

export interface BaseLobbyParams {
  id: number;
  type: string;
  name: string;
  maxPlayers: number;
  teams: LobbyTeam[];
  settings?: Partial<LobbySettings>;
  dependencies: LobbyDependencies;
}

/**
 * BaseLobby
 *
 * Membership, teams, properties and the FORMING → STARTING → IN_PROGRESS →
 * DESTROYED state machine shared by every lobby type. Concrete types plug
 * in their rules through the protected validation hooks.
 */
export abstract class BaseLobby extends AggregateRoot implements Lobby {
  readonly lock = new Mutex();

  private readonly members = new Map<string, LobbyMember>();
  private readonly teams = new Map<string, LobbyTeam>();
  private readonly properties = new Map<string, string>();
  private readonly destroyedListeners = new Set<LobbyDestroyedListener>();
  private readonly settings: LobbySettings;

  private _state: LobbyState = LobbyState.FORMING;
  private _statusText = 'Waiting for players';
  private _ownerId: string | null = null;
  private gameSession: GameSession | null = null;

  readonly id: number;
  readonly type: string;
  readonly name: string;
  readonly maxPlayers: number;

  protected readonly dependencies: LobbyDependencies;

  protected constructor(params: BaseLobbyParams) {
    super();

    if (params.maxPlayers < 1) {
      throw new InvalidLobbyRequestError('maxPlayers must be at least 1');
    }
    if (params.teams.length === 0) {
      throw new InvalidLobbyRequestError('A lobby needs at least one team');
    }

    this.id = params.id;
    this.dependencies = params.dependencies;
    this.type = params.type;
    this.name = params.name;
    this.maxPlayers = params.maxPlayers;
    this.settings = { ...DEFAULT_LOBBY_SETTINGS, ...params.settings };

    for (const team of params.teams) {
      this.teams.set(team.name, team);
    }
  }

  // Getters
  get playerCount(): number {
    return this.members.size;
  }

  get state(): LobbyState {
    return this._state;
  }

  get statusText(): string {
    return this._statusText;
  }

  get ownerId(): string | null {
    return this._ownerId;
  }

  get gameAddress(): string | null {
    return this.gameSession?.address ?? null;
  }

  get gamePort(): number | null {
    return this.gameSession?.port ?? null;
  }

  get lobbySettings(): LobbySettings {
    return { ...this.settings };
  }

  getMember(connectionId: string): LobbyMember | undefined {
    return this.members.get(connectionId);
  }

  getProperty(key: string): string | undefined {
    return this.properties.get(key);
  }

  // Validation hooks for concrete lobby types

  /**
   * Called for every lobby property write, including creation options.
   */
  protected validateLobbyProperty(_key: string, _value: string): boolean {
    return true;
  }

  protected validatePlayerProperty(_member: LobbyMember, _key: string, _value: string): boolean {
    return true;
  }

  protected canSwitchTeam(_member: LobbyMember, _from: LobbyTeam | null, _to: LobbyTeam): boolean {
    return true;
  }

  /**
   * Picks the least populated team with a free slot.
   */
  protected pickTeamForPlayer(_member: LobbyMember): LobbyTeam | null {
    let best: LobbyTeam | null = null;
    for (const team of this.teams.values()) {
      if (team.hasRoom() && (best === null || team.playerCount < best.playerCount)) {
        best = team;
      }
    }
    return best;
  }

  /**
   * Applies creation options as initial properties. Throws on the first
   * option the lobby rejects.
   */
  applyInitialProperties(options: PropertyMap): void {
    for (const [key, value] of Object.entries(options)) {
      if (!this.validateLobbyProperty(key, value)) {
        throw new InvalidLobbyRequestError(`Invalid lobby option: ${key}`);
      }
      this.properties.set(key, value);
    }
  }

  // Membership

  addPlayer(context: LobbyUserContext): LobbyMember {
    if (context.isClosed) {
      throw new LobbyMemberNotFoundError('Connection is closed');
    }

    if (this.members.has(context.connectionId)) {
      throw new AlreadyInLobbyError('Already in the lobby');
    }

    if (context.currentLobbyId !== null) {
      throw new AlreadyInLobbyError();
    }

    if (this._state === LobbyState.DESTROYED) {
      throw new LobbyStateError('Lobby is closed');
    }

    const joinable = this._state === LobbyState.FORMING
      || (this._state === LobbyState.IN_PROGRESS && this.settings.allowJoiningWhenGameIsLive);
    if (!joinable) {
      throw new LobbyStateError('Game is already in progress');
    }

    if (this.members.size >= this.maxPlayers) {
      throw new LobbyFullError();
    }

    const member = new LobbyMember(context.connectionId, context.username);
    const team = this.pickTeamForPlayer(member);
    if (!team) {
      throw new LobbyFullError('No team has a free slot');
    }

    team.add(member.connectionId);
    member.assignTeam(team.name);
    this.members.set(member.connectionId, member);
    context.attachTo(this.id);

    this.addDomainEvent(new LobbyMemberJoined(this.id, member.generateDataPacket()));

    if (this._ownerId === null) {
      this.changeOwner(member.connectionId);
    }

    return member;
  }

  removePlayer(context: LobbyUserContext): void {
    const member = this.members.get(context.connectionId);

    // Clearing a stale back-reference is all there is to do for non-members
    context.detachFrom(this.id);
    if (!member) {
      return;
    }

    if (member.team) {
      this.teams.get(member.team)?.remove(member.connectionId);
    }
    member.assignTeam(null);
    this.members.delete(member.connectionId);

    this.addDomainEvent(new LobbyMemberLeft(this.id, member.connectionId, member.username));

    if (this._ownerId === member.connectionId) {
      this.changeOwner(this.pickNewOwner());
    }

    if (this.members.size === 0 && this.settings.destroyWhenEmpty) {
      this.destroy();
    }
  }

  // Properties

  setProperty(setter: LobbyMember | null, key: string, value: string): boolean {
    if (this._state === LobbyState.DESTROYED || !setter || !this.isMember(setter)) {
      return false;
    }

    if (!this.settings.allowPlayersChangeLobbyProperties && setter.connectionId !== this._ownerId) {
      return false;
    }

    if (!this.validateLobbyProperty(key, value)) {
      return false;
    }

    this.properties.set(key, value);
    this.addDomainEvent(new LobbyPropertyChanged(this.id, key, value));
    return true;
  }

  setPlayerProperty(member: LobbyMember, key: string, value: string): boolean {
    if (!this.isMember(member) || !this.validatePlayerProperty(member, key, value)) {
      return false;
    }

    member.setProperty(key, value);
    this.addDomainEvent(new LobbyMemberPropertyChanged(this.id, member.connectionId, key, value));
    return true;
  }

  setReadyState(member: LobbyMember, isReady: boolean): void {
    if (!this.isMember(member)) {
      return;
    }

    member.setReady(isReady);
    this.addDomainEvent(new LobbyMemberReadyChanged(this.id, member.connectionId, isReady));
  }

  // Teams

  tryJoinTeam(teamName: string, member: LobbyMember): boolean {
    if (!this.settings.enableTeamSwitching || this._state !== LobbyState.FORMING || !this.isMember(member)) {
      return false;
    }

    const team = this.teams.get(teamName);
    if (!team) {
      return false;
    }

    if (member.team === team.name) {
      return true;
    }

    const currentTeam = member.team ? this.teams.get(member.team) ?? null : null;
    if (!team.hasRoom() || !this.canSwitchTeam(member, currentTeam, team)) {
      return false;
    }

    currentTeam?.remove(member.connectionId);
    team.add(member.connectionId);
    member.assignTeam(team.name);

    this.addDomainEvent(new LobbyMemberTeamChanged(this.id, member.connectionId, currentTeam?.name ?? null, team.name));
    return true;
  }

  // Game start

  async startGameManually(context: LobbyUserContext): Promise<void> {
    const member = this.members.get(context.connectionId);
    if (!member) {
      throw new LobbyMemberNotFoundError('You are not a member of this lobby');
    }

    if (!this.settings.enableManualStart) {
      throw new LobbyStartConditionsError('Manual start is disabled for this lobby');
    }

    if (member.connectionId !== this._ownerId) {
      throw new InsufficientLobbyPermissionsError('Only the game master can start the game');
    }

    await this.startGame();
  }

  shouldAutoStart(): boolean {
    return this._state === LobbyState.FORMING
      && this.settings.enableReadySystem
      && !this.settings.enableManualStart
      && this.startConditionsError() === null;
  }

  async startGame(): Promise<void> {
    if (this._state !== LobbyState.FORMING) {
      throw new LobbyStateError('Game has already been started');
    }

    const conditionsError = this.startConditionsError();
    if (conditionsError) {
      throw new LobbyStartConditionsError(conditionsError);
    }

    this.changeState(LobbyState.STARTING, 'Starting game server');

    let session: GameSession;
    try {
      session = await runWithTimeout(
        (signal) => this.dependencies.spawner.provision({
          lobbyId: this.id,
          lobbyType: this.type,
          lobbyName: this.name,
          maxPlayers: this.maxPlayers,
          properties: Object.fromEntries(this.properties),
          memberIds: Array.from(this.members.keys())
        }, signal),
        this.dependencies.startGameTimeoutMs
      );
    } catch (error) {
      if (this.currentState() === LobbyState.STARTING) {
        this.changeState(LobbyState.FORMING, 'Waiting for players');
      }
      const reason = error instanceof TimeoutError
        ? 'Game server did not start in time'
        : 'Game server could not be started';
      throw new GameProvisioningError(reason, error instanceof Error ? error : undefined);
    }

    // Destroyed while the spawner was working
    if (this.currentState() !== LobbyState.STARTING) {
      this.dependencies.spawner.release(session);
      throw new LobbyStateError('Lobby was closed while the game was starting');
    }

    this.gameSession = session;
    this.changeState(LobbyState.IN_PROGRESS, 'Game in progress');
  }

  handleGameSessionEnded(): void {
    if (this._state !== LobbyState.IN_PROGRESS || !this.gameSession) {
      return;
    }

    this.dependencies.spawner.release(this.gameSession);
    this.gameSession = null;

    if (!this.settings.playAgainEnabled) {
      this.destroy();
      return;
    }

    for (const member of this.members.values()) {
      if (member.isReady) {
        member.setReady(false);
        this.addDomainEvent(new LobbyMemberReadyChanged(this.id, member.connectionId, false));
      }
    }
    this.changeState(LobbyState.FORMING, 'Waiting for players');
  }

  async gameAccessRequestHandler(requester: LobbyConnection): Promise<RoomAccess> {
    if (!this.members.has(requester.id)) {
      throw new LobbyMemberNotFoundError('You are not a member of this lobby');
    }

    if (this._state !== LobbyState.IN_PROGRESS || !this.gameSession) {
      throw new LobbyStateError('Game is not running');
    }

    return this.dependencies.spawner.getRoomAccess(this.gameSession, requester);
  }

  // Chat

  chatMessageHandler(member: LobbyMember, message: string): void {
    if (!this.isMember(member)) {
      return;
    }

    const text = message.trim();
    if (text.length === 0) {
      throw new InvalidLobbyRequestError('Chat message is empty');
    }
    if (text.length > this.dependencies.maxChatMessageLength) {
      throw new InvalidLobbyRequestError('Chat message is too long');
    }

    this.addDomainEvent(new LobbyChatMessageSent(this.id, member.connectionId, member.username, text));
  }

  // Snapshots

  generateLobbyData(requester?: LobbyMember): LobbyData {
    const isMemberRequest = requester !== undefined && this.isMember(requester);

    const properties: PropertyMap = {};
    for (const [key, value] of this.properties) {
      if (isMemberRequest || !isPrivatePropertyKey(key)) {
        properties[key] = value;
      }
    }

    const members: Record<string, LobbyMemberData> = {};
    for (const member of this.members.values()) {
      members[member.connectionId] = member.generateDataPacket(isMemberRequest && member === requester);
    }

    const teams: Record<string, LobbyTeamData> = {};
    for (const team of this.teams.values()) {
      teams[team.name] = team.generateData();
    }

    const data: LobbyData = {
      lobbyId: this.id,
      lobbyType: this.type,
      name: this.name,
      state: this._state,
      statusText: this._statusText,
      ownerId: this._ownerId,
      maxPlayers: this.maxPlayers,
      playerCount: this.members.size,
      properties,
      members,
      teams,
      settings: this.lobbySettings
    };

    if (requester && isMemberRequest) {
      data.currentMemberId = requester.connectionId;
    }

    return data;
  }

  getPublicProperties(_requester: LobbyConnection): PropertyMap {
    const publicProperties: PropertyMap = {};
    for (const [key, value] of this.properties) {
      if (!isPrivatePropertyKey(key)) {
        publicProperties[key] = value;
      }
    }
    return publicProperties;
  }

  // Destruction

  destroy(): void {
    if (this._state === LobbyState.DESTROYED) {
      return;
    }

    for (const member of this.members.values()) {
      this.dependencies.resolveUserContext(member.connectionId)?.detachFrom(this.id);
      member.assignTeam(null);
    }
    this.members.clear();
    for (const team of this.teams.values()) {
      team.clear();
    }

    if (this.gameSession) {
      this.dependencies.spawner.release(this.gameSession);
      this.gameSession = null;
    }

    this._ownerId = null;
    this.changeState(LobbyState.DESTROYED, 'Lobby closed');
    this.addDomainEvent(new LobbyDestroyed(this.id));

    const listeners = Array.from(this.destroyedListeners);
    this.destroyedListeners.clear();
    for (const listener of listeners) {
      listener(this);
    }
  }

  onDestroyed(listener: LobbyDestroyedListener): void {
    if (this._state !== LobbyState.DESTROYED) {
      this.destroyedListeners.add(listener);
    }
  }

  offDestroyed(listener: LobbyDestroyedListener): void {
    this.destroyedListeners.delete(listener);
  }

  // Helpers

  private isMember(member: LobbyMember): boolean {
    return this.members.get(member.connectionId) === member;
  }

  private startConditionsError(): string | null {
    if (this.members.size < this.settings.minPlayers) {
      return `At least ${this.settings.minPlayers} players are required`;
    }

    for (const team of this.teams.values()) {
      if (!team.meetsMinimum()) {
        return `Team ${team.name} needs at least ${team.minPlayers} players`;
      }
    }

    if (this.settings.enableReadySystem) {
      for (const member of this.members.values()) {
        if (!member.isReady) {
          return 'Not all players are ready';
        }
      }
    }

    return null;
  }

  // Members are kept in join order, so the first one has been here longest
  private pickNewOwner(): string | null {
    for (const member of this.members.values()) {
      return member.connectionId;
    }
    return null;
  }

  private changeOwner(ownerId: string | null): void {
    if (this._ownerId === ownerId) {
      return;
    }
    this._ownerId = ownerId;
    this.addDomainEvent(new LobbyGameMasterChanged(this.id, ownerId));
  }

  // Read through a call so checks after an await see the widened type
  private currentState(): LobbyState {
    return this._state;
  }

  private changeState(state: LobbyState, statusText: string): void {
    this._state = state;
    this._statusText = statusText;
    this.addDomainEvent(new LobbyStateChanged(this.id, state, statusText));
  }
}
