/**
 * Connectivity probes consulted before a request is sent.
 */

import { EventEmitter } from 'node:events';
import { promises as dns } from 'node:dns';
import { NoopLogger, type Logger } from '../observability/logging.js';

export type ConnectivityListener = (online: boolean) => void;

/**
 * Reports whether the host currently has network access.
 */
export interface ConnectivityProbe {
  isOnline(): Promise<boolean>;
  /** Subscribes to online/offline transitions. Returns the unsubscribe function. */
  onChange?(listener: ConnectivityListener): () => void;
}

/**
 * Probe that never reports offline.
 */
export class AlwaysOnlineProbe implements ConnectivityProbe {
  async isOnline(): Promise<boolean> {
    return true;
  }
}

/**
 * Probe with a settable state.
 */
export class StaticConnectivityProbe implements ConnectivityProbe {
  private online: boolean;
  private readonly emitter = new EventEmitter();
  private checks = 0;

  constructor(online = true) {
    this.online = online;
  }

  async isOnline(): Promise<boolean> {
    this.checks++;
    return this.online;
  }

  setOnline(online: boolean): void {
    if (this.online === online) {
      return;
    }
    this.online = online;
    this.emitter.emit('change', online);
  }

  onChange(listener: ConnectivityListener): () => void {
    this.emitter.on('change', listener);
    return () => {
      this.emitter.off('change', listener);
    };
  }

  /** Number of times isOnline was called. */
  getCheckCount(): number {
    return this.checks;
  }
}

export interface DnsConnectivityProbeOptions {
  /** Hostname resolved to decide connectivity. */
  host?: string;
  /** Polling interval while listeners are attached. */
  intervalMs?: number;
  /** Resolver override. */
  lookup?: (host: string) => Promise<unknown>;
  logger?: Logger;
}

/**
 * Treats a successful DNS lookup of a well-known host as online.
 */
export class DnsConnectivityProbe implements ConnectivityProbe {
  private readonly host: string;
  private readonly intervalMs: number;
  private readonly lookup: (host: string) => Promise<unknown>;
  private readonly logger: Logger;
  private readonly emitter = new EventEmitter();
  private timer?: NodeJS.Timeout;
  private last?: boolean;

  constructor(options: DnsConnectivityProbeOptions = {}) {
    this.host = options.host ?? 'example.com';
    this.intervalMs = options.intervalMs ?? 10000;
    this.lookup = options.lookup ?? ((host) => dns.lookup(host));
    this.logger = options.logger ?? new NoopLogger();
  }

  async isOnline(): Promise<boolean> {
    try {
      await this.lookup(this.host);
      return true;
    } catch (error) {
      this.logger.debug('Connectivity lookup failed', {
        host: this.host,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  onChange(listener: ConnectivityListener): () => void {
    this.emitter.on('change', listener);
    this.startPolling();
    return () => {
      this.emitter.off('change', listener);
      if (this.emitter.listenerCount('change') === 0) {
        this.stop();
      }
    };
  }

  /**
   * Runs one check and notifies listeners if the state changed.
   */
  async poll(): Promise<boolean> {
    const online = await this.isOnline();
    if (this.last !== undefined && this.last !== online) {
      this.logger.info(online ? 'Network connection restored' : 'Network connection lost', { host: this.host });
      this.emitter.emit('change', online);
    }
    this.last = online;
    return online;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private startPolling(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.pollSafely(), this.intervalMs);
    this.timer.unref();
    this.pollSafely();
  }

  private pollSafely(): void {
    this.poll().catch((error: unknown) => {
      this.logger.error('Connectivity listener failed', error instanceof Error ? error : undefined);
    });
  }
}
