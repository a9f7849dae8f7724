// SPDX-License-Identifier: Apache-2.0

import { Logger } from 'pino';

import { buildResourceKey } from '../../config/lockConfig';
import { LockConfigurationError, LockConflictError } from '../../errors/LockError';
import { LockHandle, LockState, LockStrategy, ScopedLockOptions } from '../../types';
import { toMilliseconds } from '../../utils/durations';
import { LockMetricsService } from './LockMetricsService';
import { RenewalScheduler } from './RenewalScheduler';

export const DEFAULT_SCOPED_LOCK_OPTIONS: ScopedLockOptions = {
  timeout: 10,
  extendInterval: 5,
  autoExtend: true,
};

/**
 * Critical section over one resource key.
 *
 * `acquire()` takes the lease (raising LockConflictError if someone else holds it) and starts the
 * renewal loop when `autoExtend` is set. `release()` stops the renewal loop first and only then
 * releases the lease, so no extension can reach the store after the release was issued.
 *
 * Losing the lease mid-section does not interrupt the caller: the state turns to LOST and
 * `signal` aborts, which long-running work can observe to stop early.
 */
export class ScopedLock {
  public readonly key: string;
  public readonly options: ScopedLockOptions;

  private currentState: LockState = LockState.IDLE;
  private currentHandle: LockHandle | null = null;
  private scheduler: RenewalScheduler | null = null;
  private releasing: Promise<boolean> | null = null;
  private readonly lostController = new AbortController();
  private readonly logger: Logger;

  /**
   * @param strategy - Lease primitives to use
   * @param collection - Namespace of the resource
   * @param resourceId - Identifier of the protected resource
   * @param options - Lease options; omitted fields take the defaults
   * @param logger - Logger
   * @param metrics - Optional lock metrics
   * @throws LockConfigurationError if the options are invalid
   */
  constructor(
    private readonly strategy: LockStrategy,
    collection: string,
    resourceId: string,
    options: Partial<ScopedLockOptions>,
    logger: Logger,
    private readonly metrics?: LockMetricsService,
  ) {
    this.options = { ...DEFAULT_SCOPED_LOCK_OPTIONS, ...options };
    ScopedLock.validateOptions(this.options);
    this.key = buildResourceKey(collection, resourceId);
    this.logger = logger.child({ name: 'scoped-lock' });
  }

  /**
   * @throws LockConfigurationError unless `timeout > 0` and `0 < extendInterval < timeout`
   */
  static validateOptions({ timeout, extendInterval }: ScopedLockOptions): void {
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new LockConfigurationError(`Lock timeout must be greater than 0, got ${timeout}`);
    }
    if (!Number.isFinite(extendInterval) || extendInterval <= 0) {
      throw new LockConfigurationError(`Lock extend interval must be greater than 0, got ${extendInterval}`);
    }
    if (extendInterval >= timeout) {
      throw new LockConfigurationError(
        `Lock extend interval (${extendInterval}s) must be less than the timeout (${timeout}s)`,
      );
    }
  }

  get state(): LockState {
    return this.currentState;
  }

  /**
   * True while the lease is believed to be held.
   */
  get acquired(): boolean {
    return this.currentState === LockState.HELD || this.currentState === LockState.RENEWING;
  }

  get handle(): LockHandle | null {
    return this.currentHandle;
  }

  /**
   * Aborted when the lease is lost while the scope is open.
   */
  get signal(): AbortSignal {
    return this.lostController.signal;
  }

  /**
   * Takes the lease.
   *
   * @throws LockConflictError if the key is already held
   */
  async acquire(): Promise<this> {
    if (this.currentState !== LockState.IDLE) {
      throw new LockConfigurationError(`Scoped lock for ${this.key} has already been entered`);
    }

    const { timeout, extendInterval, autoExtend } = this.options;
    this.currentState = LockState.ACQUIRING;

    let token: string;
    try {
      const result = await this.strategy.acquire(this.key, timeout);
      if (!result.acquired) {
        this.metrics?.recordAcquisition(this.strategy.label, 'conflict');
        throw new LockConflictError(this.key);
      }
      token = result.token;
    } catch (error) {
      this.currentState = LockState.FAILED;
      throw error;
    }

    const now = Date.now();
    this.currentHandle = {
      key: this.key,
      token,
      ttlSeconds: timeout,
      createdAt: now,
      expiresAt: now + toMilliseconds(timeout),
    };
    this.currentState = LockState.HELD;
    this.metrics?.recordAcquisition(this.strategy.label, 'success');
    this.metrics?.incrementActiveCount(this.strategy.label);

    if (autoExtend) {
      this.scheduler = new RenewalScheduler(
        this.strategy,
        this.currentHandle,
        extendInterval,
        this.logger,
        this.metrics,
        {
          onRenewing: () => this.transition(LockState.HELD, LockState.RENEWING),
          onExtended: () => this.transition(LockState.RENEWING, LockState.HELD),
          onLost: (error) => this.markLost(error),
        },
      );
      this.scheduler.start();
    }

    return this;
  }

  /**
   * Stops renewal, then releases the lease. Safe to call more than once.
   *
   * @returns true if the lease was still held and has been deleted; false if it had already been lost
   */
  async release(): Promise<boolean> {
    const handle = this.currentHandle;
    if (!handle) {
      return false;
    }
    if (!this.releasing) {
      this.releasing = this.teardown(handle);
    }
    return this.releasing;
  }

  private async teardown(handle: LockHandle): Promise<boolean> {
    if (this.scheduler) {
      await this.scheduler.stop();
      this.scheduler = null;
    }

    let released = false;
    try {
      released = await this.strategy.release(handle.key, handle.token);
    } finally {
      const label = this.strategy.label;
      this.currentHandle = null;
      if (this.currentState !== LockState.LOST) {
        this.currentState = LockState.RELEASED;
      }
      this.metrics?.decrementActiveCount(label);
      this.metrics?.recordRelease(label, released ? 'released' : 'lost');
      this.metrics?.recordHoldDuration(label, (Date.now() - handle.createdAt) / 1000);
    }

    if (!released && this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Lease was already lost at release: key=${handle.key}, token=${handle.token}`);
    }
    return released;
  }

  private transition(from: LockState, to: LockState): void {
    if (this.currentState === from) {
      this.currentState = to;
    }
  }

  private markLost(error?: unknown): void {
    // an extend that outlived stop() may report after the scope was released
    if (!this.acquired) {
      return;
    }
    this.currentState = LockState.LOST;
    this.lostController.abort(error ?? new Error(`Lease for ${this.key} was lost`));
  }
}
