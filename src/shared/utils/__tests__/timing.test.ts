import { calculateProcessingTime, getHighResolutionTime, measureExecutionTime, runWithTimeout, TimeoutError } from '../timing';

describe('timing', () => {
  describe('calculateProcessingTime', () => {
    it('should return a non-negative duration in milliseconds', () => {
      const start = getHighResolutionTime();

      expect(calculateProcessingTime(start)).toBeGreaterThanOrEqual(0);
    });
  });

  describe('measureExecutionTime', () => {
    it('should return the result with its duration', async () => {
      const { result, duration } = await measureExecutionTime(async () => 'done');

      expect(result).toBe('done');
      expect(duration).toBeGreaterThanOrEqual(0);
    });
  });

  describe('runWithTimeout', () => {
    it('should resolve with the result when it finishes in time', async () => {
      await expect(runWithTimeout(async () => 'ready', 100)).resolves.toBe('ready');
    });

    it('should pass failures through', async () => {
      await expect(runWithTimeout(async () => {
        throw new Error('spawn failed');
      }, 100)).rejects.toThrow('spawn failed');
    });

    it('should clear the deadline when the function throws synchronously', async () => {
      jest.useFakeTimers();

      await expect(runWithTimeout(() => {
        throw new Error('spawner misconfigured');
      }, 1000)).rejects.toThrow('spawner misconfigured');

      expect(jest.getTimerCount()).toBe(0);
      jest.useRealTimers();
    });

    it('should reject with TimeoutError and abort the signal when the deadline passes', async () => {
      let received: AbortSignal | undefined;

      const pending = runWithTimeout((signal) => {
        received = signal;
        return new Promise<string>((resolve) => setTimeout(() => resolve('late'), 50));
      }, 10);

      await expect(pending).rejects.toBeInstanceOf(TimeoutError);
      await expect(pending).rejects.toThrow('Operation timed out after 10ms');
      expect(received?.aborted).toBe(true);
    });
  });
});
