import { LobbyChatMessageSent, LobbyDestroyed } from '../../../../domains/lobby-management/domain/events/LobbyEvents';
import { InMemoryEventBus } from '../InMemoryEventBus';

describe('InMemoryEventBus', () => {
  let eventBus: InMemoryEventBus;

  beforeEach(() => {
    eventBus = new InMemoryEventBus();
  });

  describe('subscribe and publish', () => {
    it('should call every handler of the published event type', async () => {
      const first = jest.fn();
      const second = jest.fn();
      const event = new LobbyDestroyed(3);

      eventBus.subscribe(LobbyDestroyed, first);
      eventBus.subscribe(LobbyDestroyed, second);
      await eventBus.publish(event);

      expect(first).toHaveBeenCalledWith(event);
      expect(second).toHaveBeenCalledWith(event);
    });

    it('should not call handlers of other event types', async () => {
      const chatHandler = jest.fn();

      eventBus.subscribe(LobbyChatMessageSent, chatHandler);
      await eventBus.publish(new LobbyDestroyed(3));

      expect(chatHandler).not.toHaveBeenCalled();
    });

    it('should wait for async handlers', async () => {
      const seen: number[] = [];
      eventBus.subscribe(LobbyDestroyed, async (event) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        seen.push(event.lobbyId);
      });

      await eventBus.publish(new LobbyDestroyed(7));

      expect(seen).toEqual([7]);
    });
  });

  describe('publishAll', () => {
    it('should publish events in order', async () => {
      const seen: string[] = [];
      eventBus.subscribe(LobbyChatMessageSent, (event) => {
        seen.push(event.message);
      });
      eventBus.subscribe(LobbyDestroyed, () => {
        seen.push('destroyed');
      });

      await eventBus.publishAll([
        new LobbyChatMessageSent(1, 'c1', 'ada', 'bye'),
        new LobbyDestroyed(1)
      ]);

      expect(seen).toEqual(['bye', 'destroyed']);
    });

    it('should resolve for an empty batch', async () => {
      await expect(eventBus.publishAll([])).resolves.toBeUndefined();
    });
  });

  describe('unsubscribe', () => {
    it('should only remove the given handler', async () => {
      const first = jest.fn();
      const second = jest.fn();

      eventBus.subscribe(LobbyDestroyed, first);
      eventBus.subscribe(LobbyDestroyed, second);
      eventBus.unsubscribe(LobbyDestroyed, first);
      await eventBus.publish(new LobbyDestroyed(1));

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
      expect(eventBus.getHandlerCount(LobbyDestroyed)).toBe(1);
    });

    it('should ignore handlers that were never subscribed', () => {
      expect(() => eventBus.unsubscribe(LobbyDestroyed, jest.fn())).not.toThrow();
    });
  });

  describe('clear', () => {
    it('should drop every handler', async () => {
      const handler = jest.fn();
      eventBus.subscribe(LobbyDestroyed, handler);

      eventBus.clear();
      await eventBus.publish(new LobbyDestroyed(1));

      expect(handler).not.toHaveBeenCalled();
      expect(eventBus.getHandlerCount(LobbyDestroyed)).toBe(0);
    });
  });

  describe('error handling', () => {
    it('should run the remaining handlers and reject when one throws', async () => {
      const failing = jest.fn(() => {
        throw new Error('Handler error');
      });
      const healthy = jest.fn();
      const event = new LobbyDestroyed(1);

      eventBus.subscribe(LobbyDestroyed, failing);
      eventBus.subscribe(LobbyDestroyed, healthy);

      await expect(eventBus.publish(event)).rejects.toThrow('Handler error');
      expect(healthy).toHaveBeenCalledWith(event);
    });
  });
});
