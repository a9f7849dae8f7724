// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@leaselock/config-service';
import { randomUUID } from 'crypto';
import { LRUCache } from 'lru-cache';
import { Logger } from 'pino';

import { LockCapacityError } from '../../errors/LockError';
import { LockAcquisition, LockStrategy, LockStrategyLabel } from '../../types';
import { toMilliseconds } from '../../utils/durations';

/**
 * Implements the lease primitives in process memory.
 *
 * Each key maps to the token of its holder, with the lease as the entry TTL. Every primitive runs
 * synchronously between two awaits, so compare-and-act needs no further coordination. Only callers
 * within this process are excluded. A live lease is never evicted: once `maxEntries` live leases are
 * held, new acquisitions fail with LockCapacityError until one is released or expires.
 */
export class LocalLockStrategy implements LockStrategy {
  public readonly label: LockStrategyLabel = 'local';

  /**
   * LRU cache of lease tokens, keyed by lock key.
   */
  private readonly leases: LRUCache<string, string>;

  /**
   * Logger.
   *
   * @private
   */
  private readonly logger: Logger;

  /**
   * Creates a new LocalLockStrategy instance.
   *
   * @param logger - The logger
   * @param maxEntries - Capacity of the lease table
   */
  constructor(
    logger: Logger,
    private readonly maxEntries: number = ConfigService.get('LOCAL_LOCK_MAX_ENTRIES'),
  ) {
    this.logger = logger.child({ name: 'local-lock-strategy' });
    this.leases = new LRUCache<string, string>({ max: maxEntries });
  }

  async acquire(key: string, ttlSeconds: number, token: string = randomUUID()): Promise<LockAcquisition> {
    if (this.leases.has(key)) {
      if (this.logger.isLevelEnabled('trace')) {
        this.logger.trace(`Local lock acquisition refused, key already held: key=${key}`);
      }
      return { acquired: false, token: null };
    }

    // live leases are never evicted
    if (this.leases.size >= this.maxEntries) {
      this.leases.purgeStale();
      if (this.leases.size >= this.maxEntries) {
        this.logger.warn(`Local lock table is full: key=${key}, maxEntries=${this.maxEntries}`);
        throw new LockCapacityError(this.maxEntries);
      }
    }

    this.leases.set(key, token, { ttl: toMilliseconds(ttlSeconds) });
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Local lock acquired: key=${key}, token=${token}, ttl=${ttlSeconds}s`);
    }
    return { acquired: true, token };
  }

  async release(key: string, token: string): Promise<boolean> {
    if (this.leases.get(key) !== token) {
      return false;
    }

    this.leases.delete(key);
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Local lock released: key=${key}, token=${token}`);
    }
    return true;
  }

  async extend(key: string, token: string, ttlSeconds: number): Promise<boolean> {
    if (this.leases.get(key) !== token) {
      return false;
    }

    this.leases.set(key, token, { ttl: toMilliseconds(ttlSeconds) });
    return true;
  }

  async health(): Promise<boolean> {
    return true;
  }

  /**
   * Returns the token currently holding `key`, if any.
   */
  holder(key: string): string | undefined {
    return this.leases.get(key);
  }
}
