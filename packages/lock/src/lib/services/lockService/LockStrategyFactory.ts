// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@leaselock/config-service';
import { Logger } from 'pino';

import { RedisClientManager } from '../../clients/redisClientManager';
import { LockConfig } from '../../config/lockConfig';
import { LockConfigurationError } from '../../errors/LockError';
import { LockStoreClient, LockStrategy } from '../../types';
import { LocalLockStrategy } from './LocalLockStrategy';
import { RedisLockStrategy } from './RedisLockStrategy';

/**
 * Factory for creating LockStrategy instances.
 *
 * Encapsulates the logic for selecting the appropriate lock strategy implementation
 * based on the configured backend (Redis vs in-memory).
 */
export class LockStrategyFactory {
  /**
   * Creates a LockStrategy instance.
   *
   * @param config - Lock config the strategy serves.
   * @param logger - Logger instance for the lock strategy.
   * @param store - Optional store client; defaults to the one RedisClientManager provides for `config`.
   * @returns A LockStrategy implementation.
   */
  static create(config: LockConfig, logger: Logger, store?: LockStoreClient): LockStrategy {
    const backend = ConfigService.get('LOCK_BACKEND');

    switch (backend) {
      case 'redis':
        return new RedisLockStrategy(store ?? RedisClientManager.getStore(config, logger), logger);
      case 'local':
        return new LocalLockStrategy(logger);
      default:
        throw new LockConfigurationError(`Unknown lock backend "${backend}", expected "redis" or "local"`);
    }
  }
}
