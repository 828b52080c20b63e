/**
 * Admission Control - Redis Client
 * Connection management for the shared counter store
 */

import { createClient, type RedisClientOptions } from 'redis';

import type { RedisConfig } from '../config/schema.js';
import logger, { logLifecycle } from '../utils/logger.js';
import { toErrorMessage } from '../utils/errors.js';

// =============================================================================
// Types
// =============================================================================

export interface RedisConnectionOptions {
  config: RedisConfig;
  keyPrefix?: string;
  connectTimeout?: number;
}

/**
 * The slice of Redis the counter store needs: scripted calls and
 * connection lifecycle. Keys passed in are prefixed by the wrapper.
 */
export interface RedisClientWrapper {
  isConnected: boolean;
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  eval: (script: string, keys: string[], args: string[]) => Promise<unknown>;
}

type NodeRedisClient = ReturnType<typeof createClient>;

// =============================================================================
// Redis Client Class
// =============================================================================

export class RedisClient implements RedisClientWrapper {
  public client: NodeRedisClient;
  public isConnected = false;
  private config: RedisConfig;
  private keyPrefix: string;
  private reconnectAttempts = 0;
  private maxReconnectAttempts = 10;
  private reconnectDelay = 1000;

  constructor(options: RedisConnectionOptions) {
    this.config = options.config;
    this.keyPrefix = options.keyPrefix ?? 'admission:';

    const clientOptions: RedisClientOptions = {
      socket: {
        host: this.config.host,
        port: this.config.port,
        tls: this.config.tls,
        connectTimeout: options.connectTimeout ?? 10000,
        reconnectStrategy: (retries) => {
          if (retries > this.maxReconnectAttempts) {
            logger.error('Max Redis reconnection attempts reached');
            return new Error('Max reconnection attempts reached');
          }
          const delay = Math.min(retries * this.reconnectDelay, 30000);
          logger.warn(`Redis reconnecting in ${delay}ms (attempt ${retries})`);
          return delay;
        },
      },
      database: this.config.db,
      // Commands issued while disconnected fail immediately instead of queueing
      disableOfflineQueue: true,
    };

    if (this.config.password) {
      clientOptions.password = this.config.password;
    }

    this.client = createClient(clientOptions);

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.on('connect', () => {
      logger.debug('Redis client connecting...');
    });

    this.client.on('ready', () => {
      this.isConnected = true;
      this.reconnectAttempts = 0;
      logLifecycle('ready', 'Redis client connected', {
        host: this.config.host,
        port: this.config.port,
        db: this.config.db,
      });
    });

    this.client.on('error', (err: unknown) => {
      logger.error('Redis client error', { error: toErrorMessage(err) });
    });

    this.client.on('end', () => {
      this.isConnected = false;
      logger.warn('Redis client disconnected');
    });

    this.client.on('reconnecting', () => {
      this.reconnectAttempts++;
      logger.info('Redis client reconnecting...', {
        attempt: this.reconnectAttempts,
      });
    });
  }

  private prefixKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  public async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    try {
      await this.client.connect();
    } catch (error) {
      logger.error('Failed to connect to Redis', { error: toErrorMessage(error) });
      throw error;
    }
  }

  public async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    try {
      await this.client.quit();
      this.isConnected = false;
      logLifecycle('shutdown', 'Redis client disconnected');
    } catch (error) {
      logger.error('Error disconnecting from Redis', { error: toErrorMessage(error) });
      throw error;
    }
  }

  /**
   * Execute a Lua script
   */
  public async eval(script: string, keys: string[], args: string[]): Promise<unknown> {
    const prefixedKeys = keys.map((k) => this.prefixKey(k));
    const reply: unknown = await this.client.eval(script, {
      keys: prefixedKeys,
      arguments: args,
    });
    return reply;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createRedisClient(options: RedisConnectionOptions): RedisClient {
  return new RedisClient(options);
}

export default RedisClient;
