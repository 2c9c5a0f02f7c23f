/**
 * Single-flight token refresh.
 */

import { NoopLogger, type Logger } from '../observability/logging.js';

/**
 * Refreshes the session's credentials. Resolves true when new
 * credentials are in place.
 */
export interface TokenRefreshHandler {
  refresh(): Promise<boolean>;
}

export type RefreshState = 'idle' | 'inFlight';

/**
 * Ensures at most one refresh runs at a time. Callers arriving while a
 * refresh is in flight share its outcome.
 */
export class RefreshCoordinator {
  private handler?: TokenRefreshHandler;
  private pending?: Promise<boolean>;
  private readonly logger: Logger;

  constructor(logger: Logger = new NoopLogger()) {
    this.logger = logger;
  }

  get state(): RefreshState {
    return this.pending ? 'inFlight' : 'idle';
  }

  get hasHandler(): boolean {
    return this.handler !== undefined;
  }

  /**
   * Installs the refresh handler, replacing any previous one.
   */
  register(handler: TokenRefreshHandler): void {
    this.handler = handler;
  }

  /**
   * Removes the handler. A refresh already in flight still settles.
   */
  clear(): void {
    this.handler = undefined;
  }

  /**
   * Runs or joins a refresh. Never rejects.
   */
  attemptRefresh(): Promise<boolean> {
    if (this.pending) {
      this.logger.debug('Joining token refresh in flight');
      return this.pending;
    }

    const handler = this.handler;
    if (!handler) {
      this.logger.debug('No token refresh handler registered');
      return Promise.resolve(false);
    }

    // Claimed before the first await so concurrent callers see it.
    const pending = this.run(handler).finally(() => {
      if (this.pending === pending) {
        this.pending = undefined;
      }
    });
    this.pending = pending;
    return pending;
  }

  private async run(handler: TokenRefreshHandler): Promise<boolean> {
    this.logger.debug('Starting token refresh');
    try {
      const refreshed = (await handler.refresh()) === true;
      if (refreshed) {
        this.logger.debug('Token refresh succeeded');
      } else {
        this.logger.warn('Token refresh did not produce new credentials');
      }
      return refreshed;
    } catch (error) {
      this.logger.warn('Token refresh failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
