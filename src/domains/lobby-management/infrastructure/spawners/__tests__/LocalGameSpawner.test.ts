import { GameProvisionRequest } from '../../../domain/services/GameSpawner';
import { LocalGameSpawner } from '../LocalGameSpawner';

const request = (lobbyId: number): GameProvisionRequest => ({
  lobbyId,
  lobbyType: 'deathmatch',
  lobbyName: 'Deathmatch',
  maxPlayers: 4,
  properties: {},
  memberIds: ['c1']
});

const player = (id: string) => ({ id, username: id, permissionLevel: 0 });

describe('LocalGameSpawner', () => {
  let spawner: LocalGameSpawner;
  let signal: AbortSignal;

  beforeEach(() => {
    spawner = new LocalGameSpawner({ publicAddress: '10.0.0.5', portRangeStart: 7000, portRangeEnd: 7001 });
    signal = new AbortController().signal;
  });

  it('should refuse an empty port range', () => {
    expect(() => new LocalGameSpawner({ publicAddress: '10.0.0.5', portRangeStart: 7001, portRangeEnd: 7000 }))
      .toThrow('Game server port range is empty');
  });

  it('should hand out the lowest free port', async () => {
    const first = await spawner.provision(request(0), signal);
    const second = await spawner.provision(request(1), signal);

    expect(first.port).toBe(7000);
    expect(second.port).toBe(7001);
    expect(first.address).toBe('10.0.0.5');
    expect(first.roomId).toMatch(/^lobby-0-/);
    expect(spawner.activeSessions).toBe(2);
  });

  it('should reject when the range is exhausted and reuse released ports', async () => {
    const first = await spawner.provision(request(0), signal);
    await spawner.provision(request(1), signal);

    await expect(spawner.provision(request(2), signal)).rejects.toThrow('No free game server ports');

    spawner.release(first);
    await expect(spawner.provision(request(2), signal)).resolves.toMatchObject({ port: 7000 });
  });

  it('should not provision once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(spawner.provision(request(0), controller.signal)).rejects.toThrow('Provisioning was cancelled');
    expect(spawner.activeSessions).toBe(0);
  });

  it('should give each player a stable token of their own', async () => {
    const session = await spawner.provision(request(0), signal);

    const first = await spawner.getRoomAccess(session, player('c1'));
    const again = await spawner.getRoomAccess(session, player('c1'));
    const other = await spawner.getRoomAccess(session, player('c2'));

    expect(again).toEqual(first);
    expect(other.token).not.toBe(first.token);
    expect(first).toMatchObject({ roomId: session.roomId, address: '10.0.0.5', port: 7000 });
  });

  it('should refuse access to released sessions', async () => {
    const session = await spawner.provision(request(0), signal);
    spawner.release(session);

    await expect(spawner.getRoomAccess(session, player('c1'))).rejects.toThrow(`Unknown game session ${session.roomId}`);
  });
});
