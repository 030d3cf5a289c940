import { LobbyMemberData, PropertyMap, isPrivatePropertyKey } from './LobbyTypes';

/**
 * A connection's participation in one lobby.
 *
 * Holds the connection id only; the connection itself is looked up through
 * the coordination service when needed.
 */
export class LobbyMember {
  private readonly _properties = new Map<string, string>();
  private _isReady = false;
  private _team: string | null = null;

  constructor(
    public readonly connectionId: string,
    public readonly username: string,
    public readonly joinedAt: Date = new Date()
  ) {}

  get isReady(): boolean {
    return this._isReady;
  }

  get team(): string | null {
    return this._team;
  }

  get properties(): PropertyMap {
    return Object.fromEntries(this._properties);
  }

  getProperty(key: string): string | undefined {
    return this._properties.get(key);
  }

  setProperty(key: string, value: string): void {
    this._properties.set(key, value);
  }

  setReady(isReady: boolean): void {
    this._isReady = isReady;
  }

  assignTeam(teamName: string | null): void {
    this._team = teamName;
  }

  /**
   * @param includePrivate include underscore-prefixed properties; only the member itself should see them
   */
  generateDataPacket(includePrivate: boolean = false): LobbyMemberData {
    const properties: PropertyMap = {};
    for (const [key, value] of this._properties) {
      if (includePrivate || !isPrivatePropertyKey(key)) {
        properties[key] = value;
      }
    }

    return {
      connectionId: this.connectionId,
      username: this.username,
      isReady: this._isReady,
      team: this._team,
      properties
    };
  }
}
