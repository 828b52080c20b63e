/**
 * Admission Control - Storage Module
 *
 * Barrel export file for the Redis client
 */

export { RedisClient, createRedisClient } from './redis.js';

export type { RedisConnectionOptions, RedisClientWrapper } from './redis.js';
