// SPDX-License-Identifier: Apache-2.0

import { randomUUID } from 'crypto';
import { Logger } from 'pino';

import { LockAcquisition, LockStoreClient, LockStrategy, LockStrategyLabel } from '../../types';
import { toMilliseconds } from '../../utils/durations';

/**
 * Redis-based lease strategy.
 *
 * Acquisition is a single `SET key token NX PX ttl`. Release and extension run as Lua scripts so the
 * ownership check and the mutation happen in one atomic server-side step.
 *
 * @remarks
 * - The value stored at a lock key is the holder's token.
 * - The key TTL is the lease: a holder that stops renewing loses the lock when the key expires.
 */
export class RedisLockStrategy implements LockStrategy {
  public readonly label: LockStrategyLabel = 'redis';

  /**
   * Lua script for compare-and-delete.
   *
   * - `KEYS[1]`: The lock key.
   * - `ARGV[1]`: The token of the caller.
   *
   * Returns 1 if the key held the token and was deleted, 0 otherwise.
   *
   * @private
   */
  private static RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
      return redis.call("del", KEYS[1])
    else
      return 0
    end
  `;

  /**
   * Lua script for compare-and-set-expiry.
   *
   * - `KEYS[1]`: The lock key.
   * - `ARGV[1]`: The token of the caller.
   * - `ARGV[2]`: The new lease duration in milliseconds, counted from now.
   *
   * Returns 1 if the key held the token and its expiry was reset, 0 otherwise.
   *
   * @private
   */
  private static EXTEND_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
      return redis.call("pexpire", KEYS[1], ARGV[2])
    else
      return 0
    end
  `;

  private readonly logger: Logger;

  /**
   * Creates a Redis-backed lease strategy.
   *
   * @param store - Store client for the lock namespace.
   * @param logger - Logger instance for logging.
   */
  constructor(
    private readonly store: LockStoreClient,
    logger: Logger,
  ) {
    this.logger = logger.child({ name: 'redis-lock-strategy' });
  }

  async acquire(key: string, ttlSeconds: number, token: string = this.generateToken()): Promise<LockAcquisition> {
    const acquired = await this.store.setIfAbsent(key, token, toMilliseconds(ttlSeconds));

    if (!acquired) {
      if (this.logger.isLevelEnabled('trace')) {
        this.logger.trace(`Lock acquisition refused, key already held: key=${key}`);
      }
      return { acquired: false, token: null };
    }

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Lock acquired: key=${key}, token=${token}, ttl=${ttlSeconds}s`);
    }
    return { acquired: true, token };
  }

  async release(key: string, token: string): Promise<boolean> {
    const result = await this.store.evaluate(RedisLockStrategy.RELEASE_SCRIPT, [key], [token]);
    const released = result === 1;

    if (released) {
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(`Lock released: key=${key}, token=${token}`);
      }
    } else if (this.logger.isLevelEnabled('trace')) {
      // Lock expired or is owned by someone else
      this.logger.trace(`Lock release ignored (not owner or already expired): key=${key}, token=${token}`);
    }

    return released;
  }

  async extend(key: string, token: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.store.evaluate(
      RedisLockStrategy.EXTEND_SCRIPT,
      [key],
      [token, String(toMilliseconds(ttlSeconds))],
    );
    const extended = result === 1;

    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`Lock ${extended ? 'extended' : 'extension refused'}: key=${key}, ttl=${ttlSeconds}s`);
    }

    return extended;
  }

  async health(): Promise<boolean> {
    return (await this.store.ping()) === 'PONG';
  }

  /**
   * Generates a unique token for lock acquisition.
   * Protected to allow test mocking.
   *
   * @returns A unique token.
   */
  protected generateToken(): string {
    return randomUUID();
  }
}
