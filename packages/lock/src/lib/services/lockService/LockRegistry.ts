// SPDX-License-Identifier: Apache-2.0

import { Logger } from 'pino';

import { isDefaultLockConfig, LockConfig, validateLockConfig } from '../../config/lockConfig';
import { LockConfigurationError } from '../../errors/LockError';
import { LockStrategy } from '../../types';
import { LockMetricsService } from './LockMetricsService';
import { LockService } from './LockService';
import { LockStrategyFactory } from './LockStrategyFactory';

export interface LockNamespace {
  databaseIndex: number;
  collection: string;
}

/**
 * Keeps one LockService per lock namespace, discriminated by database index and collection.
 */
export class LockRegistry {
  private readonly services = new Map<number, Map<string, LockService>>();
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly metrics?: LockMetricsService,
  ) {
    this.logger = logger.child({ name: 'lock-registry' });
  }

  /**
   * Registers a namespace and returns its service. Registering a namespace twice returns the
   * service created the first time.
   *
   * @param config - Lock config of the namespace.
   * @param strategy - Optional strategy; defaults to the one LockStrategyFactory creates.
   * @throws LockConfigurationError if the config still uses the default collection.
   */
  register(config: LockConfig, strategy?: LockStrategy): LockService {
    validateLockConfig(config);
    if (isDefaultLockConfig(config)) {
      throw new LockConfigurationError('Cannot register a lock config that uses the default collection');
    }

    const existing = this.get(config.databaseIndex, config.collection);
    if (existing) {
      return existing;
    }

    const service = new LockService(
      config,
      strategy ?? LockStrategyFactory.create(config, this.logger),
      this.logger,
      this.metrics,
    );

    let byCollection = this.services.get(config.databaseIndex);
    if (!byCollection) {
      byCollection = new Map();
      this.services.set(config.databaseIndex, byCollection);
    }
    byCollection.set(config.collection, service);

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Registered lock namespace ${config.databaseIndex}.${config.collection}`);
    }
    return service;
  }

  get(databaseIndex: number, collection: string): LockService | undefined {
    return this.services.get(databaseIndex)?.get(collection);
  }

  namespaces(): LockNamespace[] {
    return [...this.services.entries()].flatMap(([databaseIndex, byCollection]) =>
      [...byCollection.keys()].map((collection) => ({ databaseIndex, collection })),
    );
  }
}
