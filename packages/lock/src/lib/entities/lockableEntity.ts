// SPDX-License-Identifier: Apache-2.0

import { LockService } from '../services/lockService/LockService';
import { ScopedLock } from '../services/lockService/ScopedLock';
import { ScopedLockOptions } from '../types';

/**
 * Base class for entities whose instances can be locked.
 * Subclasses provide their id and the LockService of their namespace.
 *
 * @example
 * ```typescript
 * class Order extends LockableEntity {
 *   constructor(public readonly id: string) { super(); }
 *   protected lockService(): LockService { return registry.register(orderLockConfig); }
 * }
 *
 * await new Order('order-42').withLock(async () => { ... });
 * ```
 */
export abstract class LockableEntity {
  abstract readonly id: string | number;

  protected abstract lockService(): LockService;

  /**
   * Locks this instance. The returned scope must be released by the caller.
   */
  lock(options: Partial<ScopedLockOptions> = {}): Promise<ScopedLock> {
    return this.lockService().lock(String(this.id), options);
  }

  /**
   * Runs `fn` while this instance is locked.
   */
  withLock<T>(fn: (scope: ScopedLock) => Promise<T> | T, options: Partial<ScopedLockOptions> = {}): Promise<T> {
    return this.lockService().withLock(String(this.id), fn, options);
  }
}
