// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@leaselock/config-service';
import { Logger } from 'pino';

import { LockHandle, LockStrategy } from '../../types';
import { toMilliseconds, waitFor } from '../../utils/durations';
import { LockMetricsService } from './LockMetricsService';

/**
 * Hooks the owner of a handle uses to follow the renewal loop.
 */
export interface RenewalEvents {
  /**
   * Called right before each extend call.
   */
  onRenewing?: () => void;
  /**
   * Called after an extend call succeeded; `handle.expiresAt` is already updated.
   */
  onExtended?: () => void;
  /**
   * Called once when the loop stops because the lease is gone.
   * `error` is set when the extend call itself failed.
   */
  onLost?: (error?: unknown) => void;
}

/**
 * Keeps a lease alive by re-extending it every `extendInterval` seconds.
 *
 * The loop runs on the event loop next to the code holding the lock and interleaves with it at
 * await points. Extend calls are strictly sequential. After `stop()` resolves no further extend
 * call is issued; an extend already in flight is awaited for at most `stopTimeoutMs`.
 */
export class RenewalScheduler {
  private readonly abortController = new AbortController();
  private readonly logger: Logger;
  private loop: Promise<void> | null = null;
  private finished = false;

  /**
   * @param strategy - Strategy the lease was acquired with
   * @param handle - Handle of the held lease; its `expiresAt` is moved forward on each extension
   * @param extendInterval - Seconds between two extensions
   * @param logger - Logger
   * @param metrics - Optional lock metrics
   * @param events - Optional renewal hooks
   * @param stopTimeoutMs - Longest time `stop()` waits for an extend call in flight
   */
  constructor(
    private readonly strategy: LockStrategy,
    private readonly handle: LockHandle,
    private readonly extendInterval: number,
    logger: Logger,
    private readonly metrics?: LockMetricsService,
    private readonly events: RenewalEvents = {},
    private readonly stopTimeoutMs: number = ConfigService.get('LOCK_RENEWAL_STOP_TIMEOUT_MS'),
  ) {
    this.logger = logger.child({ name: 'renewal-scheduler' });
  }

  /**
   * True between `start()` and the end of the loop, whether stopped or because the lease was lost.
   */
  get running(): boolean {
    return this.loop !== null && !this.finished;
  }

  start(): void {
    if (this.loop || this.abortController.signal.aborted) {
      return;
    }
    this.loop = this.run().finally(() => {
      this.finished = true;
    });
  }

  /**
   * Cancels the pending wait and resolves once the loop has finished, including an extend call
   * that was already in flight, or once `stopTimeoutMs` has passed.
   *
   * Giving up on a hung extend is safe for the release that follows: the extend script only acts
   * while the key still holds this token.
   */
  async stop(): Promise<void> {
    this.abortController.abort();
    if (!this.loop || this.finished) {
      return;
    }

    const timeout = new AbortController();
    const stopped = await Promise.race([
      this.loop.then(() => true),
      waitFor(this.stopTimeoutMs, timeout.signal).then(() => false),
    ]);
    timeout.abort();

    if (!stopped) {
      this.logger.warn(
        `Lease renewal did not stop within ${this.stopTimeoutMs}ms: key=${this.handle.key}. An extend call is still pending.`,
      );
    }
  }

  private async run(): Promise<void> {
    const { key, token, ttlSeconds } = this.handle;
    const { signal } = this.abortController;
    const intervalMs = toMilliseconds(this.extendInterval);

    while (await waitFor(intervalMs, signal)) {
      this.events.onRenewing?.();

      let extended: boolean;
      try {
        extended = await this.strategy.extend(key, token, ttlSeconds);
      } catch (error) {
        this.logger.error(error, `Lease renewal failed: key=${key}, token=${token}. Renewal stopped.`);
        this.metrics?.recordExtension(this.strategy.label, 'lost');
        this.events.onLost?.(error);
        return;
      }

      if (!extended) {
        this.logger.warn(`Lease lost before renewal: key=${key}, token=${token}. Renewal stopped.`);
        this.metrics?.recordExtension(this.strategy.label, 'lost');
        this.events.onLost?.();
        return;
      }

      this.handle.expiresAt = Date.now() + toMilliseconds(ttlSeconds);
      this.metrics?.recordExtension(this.strategy.label, 'success');
      if (this.logger.isLevelEnabled('trace')) {
        this.logger.trace(`Lease renewed: key=${key}, expiresAt=${new Date(this.handle.expiresAt).toISOString()}`);
      }
      this.events.onExtended?.();
    }
  }
}
