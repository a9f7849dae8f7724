// SPDX-License-Identifier: Apache-2.0

export type LockErrorCode = 'LOCK_CONFLICT' | 'LOCK_CONFIGURATION' | 'LOCK_CAPACITY';

export class LockError extends Error {
  public readonly code: LockErrorCode;

  constructor(code: LockErrorCode, message: string) {
    super(message);
    this.name = 'LockError';
    this.code = code;
    Object.setPrototypeOf(this, LockError.prototype);
  }

  public isConflict(): boolean {
    return this.code === 'LOCK_CONFLICT';
  }

  public isConfiguration(): boolean {
    return this.code === 'LOCK_CONFIGURATION';
  }

  public isCapacity(): boolean {
    return this.code === 'LOCK_CAPACITY';
  }
}

/**
 * Raised when a resource is already locked by another holder.
 */
export class LockConflictError extends LockError {
  public readonly key: string;

  constructor(key: string) {
    super('LOCK_CONFLICT', `Resource ${key} is already locked`);
    this.name = 'LockConflictError';
    this.key = key;
    Object.setPrototypeOf(this, LockConflictError.prototype);
  }
}

/**
 * Raised for invalid lock options or lock configuration, before any store access.
 */
export class LockConfigurationError extends LockError {
  constructor(message: string) {
    super('LOCK_CONFIGURATION', message);
    this.name = 'LockConfigurationError';
    Object.setPrototypeOf(this, LockConfigurationError.prototype);
  }
}

/**
 * Raised by the in-process strategy when its lease table is full of live leases.
 */
export class LockCapacityError extends LockError {
  public readonly maxEntries: number;

  constructor(maxEntries: number) {
    super('LOCK_CAPACITY', `Local lock table is full (${maxEntries} live leases)`);
    this.name = 'LockCapacityError';
    this.maxEntries = maxEntries;
    Object.setPrototypeOf(this, LockCapacityError.prototype);
  }
}
