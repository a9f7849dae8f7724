// SPDX-License-Identifier: Apache-2.0

/**
 * Strategy label values, used for logging and metrics.
 */
export type LockStrategyLabel = 'local' | 'redis';

/**
 * Outcome of a single acquisition attempt.
 */
export type LockAcquisition = { acquired: true; token: string } | { acquired: false; token: null };

/**
 * Strategy interface for the lease primitives.
 * All lock implementations must conform to this contract.
 *
 * Every operation is a single attempt: no retries, no waiting for the key to free up.
 * Transport errors are propagated to the caller unchanged.
 */
export interface LockStrategy {
  /**
   * Strategy label used in logs and metrics.
   */
  readonly label: LockStrategyLabel;

  /**
   * Sets `key` to `token` only if `key` does not exist, with an expiry of `ttlSeconds`.
   *
   * @param key - Resource key to lock
   * @param ttlSeconds - Lease duration in seconds, fractions allowed
   * @param token - Ownership token; a fresh one is generated when omitted
   */
  acquire(key: string, ttlSeconds: number, token?: string): Promise<LockAcquisition>;

  /**
   * Deletes `key` only if it still holds `token`.
   *
   * @returns true if the key was deleted, false if the lease had already been lost
   */
  release(key: string, token: string): Promise<boolean>;

  /**
   * Resets the expiry of `key` to `ttlSeconds` from now, only if it still holds `token`.
   *
   * @returns true if the lease was extended, false if it had already been lost
   */
  extend(key: string, token: string, ttlSeconds: number): Promise<boolean>;

  /**
   * Reports whether the backing store is reachable.
   */
  health(): Promise<boolean>;
}

/**
 * Minimal command surface the Redis strategy needs from a store connection.
 */
export interface LockStoreClient {
  /**
   * `SET key value NX PX ttlMs`.
   *
   * @returns true if the key was set
   */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;

  /**
   * Evaluates a Lua script atomically on the server.
   */
  evaluate(script: string, keys: string[], args: string[]): Promise<unknown>;

  /**
   * `PING`.
   */
  ping(): Promise<string>;
}

/**
 * Runtime record of a held lease. Never persisted.
 */
export interface LockHandle {
  key: string;
  token: string;
  ttlSeconds: number;
  /**
   * Epoch milliseconds of the successful acquisition.
   */
  createdAt: number;
  /**
   * Epoch milliseconds at which the store will expire the key unless extended again.
   */
  expiresAt: number;
}

export enum LockState {
  IDLE = 'IDLE',
  ACQUIRING = 'ACQUIRING',
  HELD = 'HELD',
  RENEWING = 'RENEWING',
  RELEASED = 'RELEASED',
  LOST = 'LOST',
  FAILED = 'FAILED',
}

export interface ScopedLockOptions {
  /**
   * Initial lease duration in seconds. Must be greater than zero.
   */
  timeout: number;
  /**
   * Renewal cadence in seconds. Must be greater than zero and less than `timeout`.
   */
  extendInterval: number;
  /**
   * Whether a renewal loop keeps the lease alive while the scope is open.
   */
  autoExtend: boolean;
}
