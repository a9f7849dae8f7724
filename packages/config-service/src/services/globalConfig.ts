// SPDX-License-Identifier: Apache-2.0

export type ConfigType = 'string' | 'number' | 'boolean';

/**
 * Declaration of a single environment-backed configuration property.
 */
export interface ConfigProperty {
  envName: string;
  type: ConfigType;
  defaultValue: string | number | boolean | null;
}

export class GlobalConfig {
  public static readonly ENTRIES = {
    LOG_LEVEL: {
      envName: 'LOG_LEVEL',
      type: 'string',
      defaultValue: 'info',
    },
    LOCK_BACKEND: {
      envName: 'LOCK_BACKEND',
      type: 'string',
      defaultValue: 'redis',
    },
    LOCK_COLLECTION: {
      envName: 'LOCK_COLLECTION',
      type: 'string',
      defaultValue: 'default',
    },
    LOCK_REDIS_HOST: {
      envName: 'LOCK_REDIS_HOST',
      type: 'string',
      defaultValue: 'localhost',
    },
    LOCK_REDIS_PORT: {
      envName: 'LOCK_REDIS_PORT',
      type: 'number',
      defaultValue: null,
    },
    LOCK_REDIS_USERNAME: {
      envName: 'LOCK_REDIS_USERNAME',
      type: 'string',
      defaultValue: null,
    },
    LOCK_REDIS_PASSWORD: {
      envName: 'LOCK_REDIS_PASSWORD',
      type: 'string',
      defaultValue: null,
    },
    LOCK_REDIS_DATABASE: {
      envName: 'LOCK_REDIS_DATABASE',
      type: 'number',
      defaultValue: 0,
    },
    LOCK_SHARED_CONNECTION: {
      envName: 'LOCK_SHARED_CONNECTION',
      type: 'boolean',
      defaultValue: false,
    },
    LOCK_DEFAULT_TIMEOUT_SECONDS: {
      envName: 'LOCK_DEFAULT_TIMEOUT_SECONDS',
      type: 'number',
      defaultValue: 10,
    },
    LOCK_DEFAULT_EXTEND_INTERVAL_SECONDS: {
      envName: 'LOCK_DEFAULT_EXTEND_INTERVAL_SECONDS',
      type: 'number',
      defaultValue: 5,
    },
    LOCAL_LOCK_MAX_ENTRIES: {
      envName: 'LOCAL_LOCK_MAX_ENTRIES',
      type: 'number',
      defaultValue: 1000,
    },
    REDIS_RECONNECT_DELAY_MS: {
      envName: 'REDIS_RECONNECT_DELAY_MS',
      type: 'number',
      defaultValue: 1000,
    },
    REDIS_RECONNECT_MAX_RETRIES: {
      envName: 'REDIS_RECONNECT_MAX_RETRIES',
      type: 'number',
      defaultValue: 5,
    },
    REDIS_CONNECT_TIMEOUT_MS: {
      envName: 'REDIS_CONNECT_TIMEOUT_MS',
      type: 'number',
      defaultValue: 5000,
    },
    LOCK_RENEWAL_STOP_TIMEOUT_MS: {
      envName: 'LOCK_RENEWAL_STOP_TIMEOUT_MS',
      type: 'number',
      defaultValue: 5000,
    },
  } as const satisfies Record<string, ConfigProperty>;
}

export type ConfigKey = keyof typeof GlobalConfig.ENTRIES;

export function isConfigKey(name: string): name is ConfigKey {
  return Object.prototype.hasOwnProperty.call(GlobalConfig.ENTRIES, name);
}
