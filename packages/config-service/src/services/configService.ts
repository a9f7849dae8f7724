// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';

import { ConfigKey, GlobalConfig } from './globalConfig';

interface StringEntry<D extends string | null> {
  envName: string;
  type: 'string';
  defaultValue: D;
}

interface NumberEntry<D extends number | null> {
  envName: string;
  type: 'number';
  defaultValue: D;
}

interface BooleanEntry {
  envName: string;
  type: 'boolean';
  defaultValue: boolean;
}

type Entries = typeof GlobalConfig.ENTRIES;

/**
 * Value type of an entry: its declared `type`, optional when the entry has no default.
 */
type EntryValue<E> = E extends { type: 'boolean' }
  ? boolean
  : E extends { type: 'number'; defaultValue: number }
    ? number
    : E extends { type: 'number' }
      ? number | undefined
      : E extends { defaultValue: string }
        ? string
        : string | undefined;

/**
 * Resolved values of every configuration key.
 */
export type ConfigValues = { [K in ConfigKey]: EntryValue<Entries[K]> };

export class ConfigService {
  private static envLoaded = false;

  /**
   * One reader per key, picked by the entry's `type`. Only the requested entry is parsed.
   */
  private static readonly readers: { [K in ConfigKey]: () => ConfigValues[K] } = {
    LOG_LEVEL: () => ConfigService.readString(GlobalConfig.ENTRIES.LOG_LEVEL),
    LOCK_BACKEND: () => ConfigService.readString(GlobalConfig.ENTRIES.LOCK_BACKEND),
    LOCK_COLLECTION: () => ConfigService.readString(GlobalConfig.ENTRIES.LOCK_COLLECTION),
    LOCK_REDIS_HOST: () => ConfigService.readString(GlobalConfig.ENTRIES.LOCK_REDIS_HOST),
    LOCK_REDIS_PORT: () => ConfigService.readNumber(GlobalConfig.ENTRIES.LOCK_REDIS_PORT),
    LOCK_REDIS_USERNAME: () => ConfigService.readString(GlobalConfig.ENTRIES.LOCK_REDIS_USERNAME),
    LOCK_REDIS_PASSWORD: () => ConfigService.readString(GlobalConfig.ENTRIES.LOCK_REDIS_PASSWORD),
    LOCK_REDIS_DATABASE: () => ConfigService.readNumber(GlobalConfig.ENTRIES.LOCK_REDIS_DATABASE),
    LOCK_SHARED_CONNECTION: () => ConfigService.readBoolean(GlobalConfig.ENTRIES.LOCK_SHARED_CONNECTION),
    LOCK_DEFAULT_TIMEOUT_SECONDS: () => ConfigService.readNumber(GlobalConfig.ENTRIES.LOCK_DEFAULT_TIMEOUT_SECONDS),
    LOCK_DEFAULT_EXTEND_INTERVAL_SECONDS: () =>
      ConfigService.readNumber(GlobalConfig.ENTRIES.LOCK_DEFAULT_EXTEND_INTERVAL_SECONDS),
    LOCAL_LOCK_MAX_ENTRIES: () => ConfigService.readNumber(GlobalConfig.ENTRIES.LOCAL_LOCK_MAX_ENTRIES),
    REDIS_RECONNECT_DELAY_MS: () => ConfigService.readNumber(GlobalConfig.ENTRIES.REDIS_RECONNECT_DELAY_MS),
    REDIS_RECONNECT_MAX_RETRIES: () => ConfigService.readNumber(GlobalConfig.ENTRIES.REDIS_RECONNECT_MAX_RETRIES),
    REDIS_CONNECT_TIMEOUT_MS: () => ConfigService.readNumber(GlobalConfig.ENTRIES.REDIS_CONNECT_TIMEOUT_MS),
    LOCK_RENEWAL_STOP_TIMEOUT_MS: () => ConfigService.readNumber(GlobalConfig.ENTRIES.LOCK_RENEWAL_STOP_TIMEOUT_MS),
  };

  /**
   * Returns the typed value of a configuration key.
   * Values are read from `process.env` on every call, so overrides made at runtime are honoured.
   *
   * @param name - The configuration key
   * @throws Error if the variable is set to a value that cannot be parsed as the declared type
   */
  public static get<K extends ConfigKey>(name: K): ConfigValues[K] {
    this.loadEnv();
    return this.readers[name]();
  }

  private static loadEnv(): void {
    if (!this.envLoaded) {
      dotenv.config();
      this.envLoaded = true;
    }
  }

  private static rawValue(envName: string): string | undefined {
    const raw = process.env[envName];
    return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
  }

  private static readString(entry: StringEntry<string>): string;
  private static readString(entry: StringEntry<null>): string | undefined;
  private static readString(entry: StringEntry<string | null>): string | undefined {
    return this.rawValue(entry.envName) ?? entry.defaultValue ?? undefined;
  }

  private static readNumber(entry: NumberEntry<number>): number;
  private static readNumber(entry: NumberEntry<null>): number | undefined;
  private static readNumber(entry: NumberEntry<number | null>): number | undefined {
    const raw = this.rawValue(entry.envName);
    if (raw === undefined) {
      return entry.defaultValue ?? undefined;
    }

    const parsed = Number(raw);
    if (Number.isNaN(parsed)) {
      throw new Error(`Configuration property ${entry.envName} must be a number, got "${raw}"`);
    }
    return parsed;
  }

  private static readBoolean(entry: BooleanEntry): boolean {
    const raw = this.rawValue(entry.envName);
    if (raw === undefined) {
      return entry.defaultValue;
    }

    switch (raw.toLowerCase()) {
      case 'true':
        return true;
      case 'false':
        return false;
      default:
        throw new Error(`Configuration property ${entry.envName} must be true or false, got "${raw}"`);
    }
  }
}
