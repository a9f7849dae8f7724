// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@leaselock/config-service';
import { Logger } from 'pino';

import { LockConfig } from '../../config/lockConfig';
import { LockStrategy, ScopedLockOptions } from '../../types';
import { LockMetricsService } from './LockMetricsService';
import { ScopedLock } from './ScopedLock';

/**
 * Service that hands out scoped locks for the resources of one lock namespace.
 * Uses a strategy pattern to support both local (in-memory) and distributed (Redis) locking.
 */
export class LockService {
  private readonly logger: Logger;

  /**
   * Creates a new LockService instance.
   *
   * @param config - The namespace the service locks in.
   * @param strategy - The lock strategy implementation to use.
   * @param logger - Logger.
   * @param metrics - Optional lock metrics.
   */
  constructor(
    public readonly config: LockConfig,
    private readonly strategy: LockStrategy,
    logger: Logger,
    private readonly metrics?: LockMetricsService,
  ) {
    this.logger = logger.child({ name: 'lock-service', collection: config.collection });
  }

  /**
   * Acquires the lock of a resource and returns the open scope.
   * The caller must call `release()` on it, typically in a `finally` block.
   *
   * @param resourceId - Identifier of the resource, usually an entity id.
   * @param options - Lease options; omitted fields come from configuration.
   * @throws LockConfigurationError if the options are invalid (nothing is sent to the store).
   * @throws LockConflictError if the resource is already locked.
   */
  async lock(resourceId: string, options: Partial<ScopedLockOptions> = {}): Promise<ScopedLock> {
    const scope = new ScopedLock(
      this.strategy,
      this.config.collection,
      resourceId,
      { ...LockService.configuredDefaults(), ...options },
      this.logger,
      this.metrics,
    );
    return scope.acquire();
  }

  /**
   * Runs `fn` while holding the lock of a resource.
   *
   * The lock is released on every exit path. An error thrown by `fn` is rethrown unchanged after
   * the release; a failing release never replaces it.
   *
   * @param resourceId - Identifier of the resource, usually an entity id.
   * @param fn - The critical section.
   * @param options - Lease options; omitted fields come from configuration.
   * @returns Whatever `fn` returns.
   */
  async withLock<T>(
    resourceId: string,
    fn: (scope: ScopedLock) => Promise<T> | T,
    options: Partial<ScopedLockOptions> = {},
  ): Promise<T> {
    const scope = await this.lock(resourceId, options);

    let result: T;
    try {
      result = await fn(scope);
    } catch (error) {
      await scope.release().catch((releaseError: unknown) => {
        this.logger.error(releaseError, `Failed to release lock after critical section error: key=${scope.key}`);
      });
      throw error;
    }

    await scope.release();
    return result;
  }

  /**
   * Reports whether the lock store is reachable.
   */
  async health(): Promise<boolean> {
    return this.strategy.health();
  }

  private static configuredDefaults(): Pick<ScopedLockOptions, 'timeout' | 'extendInterval'> {
    return {
      timeout: ConfigService.get('LOCK_DEFAULT_TIMEOUT_SECONDS'),
      extendInterval: ConfigService.get('LOCK_DEFAULT_EXTEND_INTERVAL_SECONDS'),
    };
  }
}
