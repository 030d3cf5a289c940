import { InMemoryEventBus } from '../../../../../shared/domain/events/InMemoryEventBus';
import {
  LobbyChatMessageSent,
  LobbyDestroyed,
  LobbyMemberJoined,
  LobbyMemberPropertyChanged,
  LobbyMemberTeamChanged,
  LobbyStateChanged
} from '../../../domain/events/LobbyEvents';
import { LobbyState } from '../../../domain/models/LobbyTypes';
import { LobbyBroadcastTarget, LobbyEventHandlers } from '../LobbyEventHandlers';

describe('LobbyEventHandlers', () => {
  let eventBus: InMemoryEventBus;
  let target: jest.Mocked<LobbyBroadcastTarget>;
  let handlers: LobbyEventHandlers;

  beforeEach(() => {
    eventBus = new InMemoryEventBus();
    target = {
      emitToRoom: jest.fn(),
      emitToConnection: jest.fn(),
      closeRoom: jest.fn()
    };
    handlers = new LobbyEventHandlers(eventBus, target);
  });

  it('should broadcast joins to the lobby room', async () => {
    const member = { connectionId: 'c2', username: 'bob', isReady: false, team: 'players', properties: {} };

    await eventBus.publish(new LobbyMemberJoined(4, member));

    expect(target.emitToRoom).toHaveBeenCalledWith('lobby:4', 'lobby_member_joined', { lobbyId: 4, member });
  });

  it('should send public member properties to the room', async () => {
    await eventBus.publish(new LobbyMemberPropertyChanged(4, 'c2', 'color', 'red'));

    expect(target.emitToRoom).toHaveBeenCalledWith('lobby:4', 'lobby_member_property_changed', {
      lobbyId: 4,
      connectionId: 'c2',
      key: 'color',
      value: 'red'
    });
    expect(target.emitToConnection).not.toHaveBeenCalled();
  });

  it('should send private member properties only to their owner', async () => {
    await eventBus.publish(new LobbyMemberPropertyChanged(4, 'c2', '_loadout', 'sniper'));

    expect(target.emitToConnection).toHaveBeenCalledWith('c2', 'lobby_member_property_changed', {
      lobbyId: 4,
      connectionId: 'c2',
      key: '_loadout',
      value: 'sniper'
    });
    expect(target.emitToRoom).not.toHaveBeenCalled();
  });

  it('should relay team changes, state changes and chat', async () => {
    await eventBus.publishAll([
      new LobbyMemberTeamChanged(4, 'c2', 'red', 'blue'),
      new LobbyStateChanged(4, LobbyState.STARTING, 'Starting game server'),
      new LobbyChatMessageSent(4, 'c2', 'bob', 'gg')
    ]);

    expect(target.emitToRoom.mock.calls).toEqual([
      ['lobby:4', 'lobby_member_team_changed', { lobbyId: 4, connectionId: 'c2', fromTeam: 'red', toTeam: 'blue' }],
      ['lobby:4', 'lobby_state_changed', { lobbyId: 4, state: LobbyState.STARTING, statusText: 'Starting game server' }],
      ['lobby:4', 'lobby_chat_message', { lobbyId: 4, sender: 'bob', message: 'gg' }]
    ]);
  });

  it('should announce destruction and then close the room', async () => {
    await eventBus.publish(new LobbyDestroyed(4));

    expect(target.emitToRoom).toHaveBeenCalledWith('lobby:4', 'lobby_destroyed', { lobbyId: 4 });
    expect(target.closeRoom).toHaveBeenCalledWith('lobby:4');
  });

  it('should stop relaying after dispose', async () => {
    handlers.dispose();

    await eventBus.publish(new LobbyDestroyed(4));

    expect(target.emitToRoom).not.toHaveBeenCalled();
    expect(eventBus.getHandlerCount(LobbyDestroyed)).toBe(0);
  });
});
