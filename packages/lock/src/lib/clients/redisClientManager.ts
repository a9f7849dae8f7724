// SPDX-License-Identifier: Apache-2.0
import { ConfigService } from '@leaselock/config-service';
import { Logger } from 'pino';
import { createClient, RedisClientOptions, RedisClientType, RedisDefaultModules } from 'redis';

import { buildRedisUrl, LockConfig } from '../config/lockConfig';
import { LockStoreClient } from '../types';

/**
 * Owns the Redis connections used by lock strategies.
 *
 * Configs with `sharedConnection` reuse one long-lived client per URL, created and connected on
 * first use. Other configs open a connection per operation and close it before returning.
 *
 * Shared clients run without an offline queue and give up reconnecting after
 * `REDIS_RECONNECT_MAX_RETRIES`, so commands fail instead of waiting for an unreachable store.
 */
export class RedisClientManager {
  private static clients = new Map<string, RedisClientType>();
  private static pending = new Map<string, Promise<RedisClientType>>();

  /**
   * Returns the store client for a config.
   *
   * @param config - Resolved lock config
   * @param logger - Logger for connection events
   */
  public static getStore(config: LockConfig, logger: Logger): LockStoreClient {
    const run = <T>(command: (client: RedisClientType) => Promise<T>): Promise<T> =>
      config.sharedConnection
        ? this.withSharedClient(config, logger, command)
        : this.withEphemeralClient(config, logger, command);

    return {
      setIfAbsent: async (key, value, ttlMs) =>
        (await run((client) => client.set(key, value, { NX: true, PX: ttlMs }))) === 'OK',
      evaluate: (script, keys, args) => run((client) => client.eval(script, { keys, arguments: args })),
      ping: () => run((client) => client.ping()),
    };
  }

  /**
   * Returns the shared client for a config, connecting it on first use.
   * A client that gave up reconnecting is replaced by a new one.
   */
  public static async getClient(config: LockConfig, logger: Logger): Promise<RedisClientType> {
    const url = buildRedisUrl(config);
    const existing = this.clients.get(url);
    if (existing?.isOpen) {
      return existing;
    }
    if (existing) {
      this.clients.delete(url);
    }

    let connecting = this.pending.get(url);
    if (!connecting) {
      const client = this.createClient(url, logger, true);
      connecting = client
        .connect()
        .then(() => {
          this.clients.set(url, client);
          return client;
        })
        .finally(() => this.pending.delete(url));
      this.pending.set(url, connecting);
    }

    return connecting;
  }

  public static isConnected(config: LockConfig): boolean {
    return this.clients.get(buildRedisUrl(config))?.isReady ?? false;
  }

  /**
   * Closes every shared client, including those still connecting.
   */
  public static async disconnectAll(): Promise<void> {
    await Promise.allSettled([...this.pending.values()]);

    const clients = [...this.clients.values()];
    this.clients.clear();
    await Promise.all(clients.map((client) => client.quit()));
  }

  private static async withSharedClient<T>(
    config: LockConfig,
    logger: Logger,
    command: (client: RedisClientType) => Promise<T>,
  ): Promise<T> {
    const client = await this.getClient(config, logger);
    return command(client);
  }

  private static async withEphemeralClient<T>(
    config: LockConfig,
    logger: Logger,
    command: (client: RedisClientType) => Promise<T>,
  ): Promise<T> {
    const url = buildRedisUrl(config);
    const client = this.createClient(url, logger, false);
    await client.connect();

    let result: T;
    try {
      result = await command(client);
    } catch (error) {
      await client.quit().catch((quitError: unknown) => {
        logger.error(quitError, `Failed to close Redis connection to ${RedisClientManager.redactUrl(url)}`);
      });
      throw error;
    }

    await client.quit();
    return result;
  }

  /**
   * Seam over `createClient` from `redis`.
   */
  public static newClient(
    options: RedisClientOptions<RedisDefaultModules, Record<string, never>, Record<string, never>>
  ): RedisClientType {
    return createClient(options);
  }

  /**
   * Reconnect delay for a shared client, or an error once `REDIS_RECONNECT_MAX_RETRIES` is exceeded,
   * which makes node-redis stop reconnecting and reject pending work.
   */
  public static reconnectDelay(retries: number): number | Error {
    const maxRetries = ConfigService.get('REDIS_RECONNECT_MAX_RETRIES');
    if (retries > maxRetries) {
      return new Error(`Gave up reconnecting to Redis after ${maxRetries} retries`);
    }
    return retries * ConfigService.get('REDIS_RECONNECT_DELAY_MS');
  }

  private static createClient(url: string, logger: Logger, reconnect: boolean): RedisClientType {
    const client = this.newClient({
      url,
      disableOfflineQueue: true,
      socket: {
        connectTimeout: ConfigService.get('REDIS_CONNECT_TIMEOUT_MS'),
        reconnectStrategy: reconnect ? (retries: number) => RedisClientManager.reconnectDelay(retries) : false,
      },
    });
    const address = RedisClientManager.redactUrl(url);

    client.on('ready', () => {
      if (logger.isLevelEnabled('debug')) {
        logger.debug(`Redis client connected to ${address}`);
      }
    });

    client.on('end', () => {
      if (logger.isLevelEnabled('debug')) {
        logger.debug(`Disconnected from Redis server ${address}`);
      }
    });

    client.on('error', (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Error occurred with Redis connection to ${address}: ${message}`);
    });

    return client;
  }

  /**
   * Strips credentials from a Redis URL before it is logged.
   */
  public static redactUrl(url: string): string {
    return url.replace(/\/\/[^@/]*@/, '//');
  }
}
