import { LobbyTeamData } from './LobbyTypes';

export class LobbyTeam {
  private readonly memberIds = new Set<string>();

  constructor(
    public readonly name: string,
    public readonly minPlayers: number,
    public readonly maxPlayers: number
  ) {
    if (maxPlayers < 1 || minPlayers < 0 || minPlayers > maxPlayers) {
      throw new Error(`Invalid team size for ${name}: ${minPlayers}..${maxPlayers}`);
    }
  }

  get playerCount(): number {
    return this.memberIds.size;
  }

  hasRoom(): boolean {
    return this.memberIds.size < this.maxPlayers;
  }

  meetsMinimum(): boolean {
    return this.memberIds.size >= this.minPlayers;
  }

  has(connectionId: string): boolean {
    return this.memberIds.has(connectionId);
  }

  add(connectionId: string): void {
    this.memberIds.add(connectionId);
  }

  remove(connectionId: string): void {
    this.memberIds.delete(connectionId);
  }

  clear(): void {
    this.memberIds.clear();
  }

  generateData(): LobbyTeamData {
    return {
      name: this.name,
      minPlayers: this.minPlayers,
      maxPlayers: this.maxPlayers,
      members: Array.from(this.memberIds)
    };
  }
}
