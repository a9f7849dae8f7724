// SPDX-License-Identifier: Apache-2.0

export { RedisClientManager } from './lib/clients/redisClientManager';
export {
  buildRedisUrl,
  buildResourceKey,
  computeCollection,
  createLockConfig,
  DEFAULT_COLLECTION,
  isDefaultLockConfig,
  lockConfigFromEnv,
  validateLockConfig,
} from './lib/config/lockConfig';
export type { LockConfig, LockConfigInput, LockCredentials } from './lib/config/lockConfig';
export { LockableEntity } from './lib/entities/lockableEntity';
export { LockCapacityError, LockConfigurationError, LockConflictError, LockError } from './lib/errors/LockError';
export type { LockErrorCode } from './lib/errors/LockError';
export { createLogger } from './lib/logger';
export { LocalLockStrategy } from './lib/services/lockService/LocalLockStrategy';
export { LockMetricsService } from './lib/services/lockService/LockMetricsService';
export { LockRegistry } from './lib/services/lockService/LockRegistry';
export type { LockNamespace } from './lib/services/lockService/LockRegistry';
export { LockService } from './lib/services/lockService/LockService';
export { LockStrategyFactory } from './lib/services/lockService/LockStrategyFactory';
export { RedisLockStrategy } from './lib/services/lockService/RedisLockStrategy';
export { RenewalScheduler } from './lib/services/lockService/RenewalScheduler';
export type { RenewalEvents } from './lib/services/lockService/RenewalScheduler';
export { DEFAULT_SCOPED_LOCK_OPTIONS, ScopedLock } from './lib/services/lockService/ScopedLock';
export * from './lib/types';
