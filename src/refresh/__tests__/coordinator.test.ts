import { describe, it, expect, vi } from 'vitest';
import { RefreshCoordinator } from '../coordinator.js';
import { InMemoryLogger, LogLevel } from '../../observability/logging.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('RefreshCoordinator', () => {
  it('should return false without a handler', async () => {
    const coordinator = new RefreshCoordinator();

    await expect(coordinator.attemptRefresh()).resolves.toBe(false);
    expect(coordinator.state).toBe('idle');
  });

  it('should run one refresh for concurrent callers', async () => {
    const gate = deferred<boolean>();
    const refresh = vi.fn(() => gate.promise);
    const coordinator = new RefreshCoordinator();
    coordinator.register({ refresh });

    const waiters = Array.from({ length: 5 }, () => coordinator.attemptRefresh());
    expect(coordinator.state).toBe('inFlight');

    gate.resolve(true);
    const results = await Promise.all(waiters);

    expect(results).toEqual([true, true, true, true, true]);
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(coordinator.state).toBe('idle');
  });

  it('should start a new refresh after the previous one settled', async () => {
    const refresh = vi.fn(async () => true);
    const coordinator = new RefreshCoordinator();
    coordinator.register({ refresh });

    await coordinator.attemptRefresh();
    await coordinator.attemptRefresh();

    expect(refresh).toHaveBeenCalledTimes(2);
  });

  it('should resolve false when the handler throws', async () => {
    const logger = new InMemoryLogger();
    const coordinator = new RefreshCoordinator(logger);
    coordinator.register({
      refresh: async () => {
        throw new Error('refresh endpoint down');
      },
    });

    const [a, b] = await Promise.all([coordinator.attemptRefresh(), coordinator.attemptRefresh()]);

    expect(a).toBe(false);
    expect(b).toBe(false);
    expect(coordinator.state).toBe('idle');
    expect(logger.getEntriesByLevel(LogLevel.Warn)[0]?.context).toEqual({ error: 'refresh endpoint down' });
  });

  it('should treat a synchronous throw as failure', async () => {
    const coordinator = new RefreshCoordinator();
    coordinator.register({
      refresh: () => {
        throw new Error('sync');
      },
    });

    await expect(coordinator.attemptRefresh()).resolves.toBe(false);
  });

  it('should let an in-flight refresh finish after clear', async () => {
    const gate = deferred<boolean>();
    const coordinator = new RefreshCoordinator();
    coordinator.register({ refresh: () => gate.promise });

    const pending = coordinator.attemptRefresh();
    coordinator.clear();
    gate.resolve(true);

    await expect(pending).resolves.toBe(true);
    await expect(coordinator.attemptRefresh()).resolves.toBe(false);
    expect(coordinator.hasHandler).toBe(false);
  });
});
