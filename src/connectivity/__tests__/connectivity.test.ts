import { afterEach, describe, it, expect, vi } from 'vitest';
import { AlwaysOnlineProbe, DnsConnectivityProbe, StaticConnectivityProbe } from '../index.js';

describe('AlwaysOnlineProbe', () => {
  it('should report online', async () => {
    await expect(new AlwaysOnlineProbe().isOnline()).resolves.toBe(true);
  });
});

describe('StaticConnectivityProbe', () => {
  it('should report the configured state and notify changes', async () => {
    const probe = new StaticConnectivityProbe(false);
    const listener = vi.fn();
    const unsubscribe = probe.onChange(listener);

    await expect(probe.isOnline()).resolves.toBe(false);
    probe.setOnline(true);
    probe.setOnline(true);
    unsubscribe();
    probe.setOnline(false);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(true);
    expect(probe.getCheckCount()).toBe(1);
  });
});

describe('DnsConnectivityProbe', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should be online when the lookup succeeds', async () => {
    const lookup = vi.fn(async () => ({ address: '127.0.0.1', family: 4 }));
    const probe = new DnsConnectivityProbe({ host: 'probe.test', lookup });

    await expect(probe.isOnline()).resolves.toBe(true);
    expect(lookup).toHaveBeenCalledWith('probe.test');
  });

  it('should be offline when the lookup fails', async () => {
    const probe = new DnsConnectivityProbe({
      lookup: async () => {
        throw new Error('getaddrinfo ENOTFOUND');
      },
    });

    await expect(probe.isOnline()).resolves.toBe(false);
  });

  it('should emit transitions while polling', async () => {
    vi.useFakeTimers();
    let online = true;
    const probe = new DnsConnectivityProbe({
      intervalMs: 1000,
      lookup: async () => {
        if (!online) {
          throw new Error('offline');
        }
        return {};
      },
    });
    const listener = vi.fn();

    const unsubscribe = probe.onChange(listener);
    await vi.advanceTimersByTimeAsync(0);

    online = false;
    await vi.advanceTimersByTimeAsync(1000);
    online = true;
    await vi.advanceTimersByTimeAsync(1000);
    unsubscribe();

    expect(listener.mock.calls).toEqual([[false], [true]]);
  });
});
