import {
  ConflictException,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import Redis from 'ioredis';

/** Deletes the lock only if it still holds the caller's token */
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

/**
 * RedisService – Shared Redis client used for cross-replica coordination.
 *
 * Design decisions:
 * - A single ioredis connection; the gateway only needs short commands.
 * - Per-attempt mutual exclusion uses the SET NX PX pattern with a random
 *   token, released through a compare-and-delete Lua script so a holder
 *   whose lease expired cannot release someone else's lock.
 * - Connection retry strategy with linear backoff capped at 10 seconds.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  public readonly client: Redis;

  private readonly lockTtlMs: number;
  private readonly lockRetries: number;
  private readonly lockRetryDelayMs: number;

  constructor(private readonly config: ConfigService) {
    this.client = new Redis({
      host: this.config.get<string>('REDIS_HOST', 'localhost'),
      port: this.config.get<number>('REDIS_PORT', 6379),
      password: this.config.get<string>('REDIS_PASSWORD'),
      retryStrategy: (times: number): number => {
        const delay = Math.min(times * 200, 10000);
        this.logger.warn(`Redis reconnect attempt #${times}, delay: ${delay}ms`);
        return delay;
      },
      maxRetriesPerRequest: 3,
    });

    this.lockTtlMs = this.config.get<number>('ATTEMPT_LOCK_TTL_MS', 5000);
    this.lockRetries = this.config.get<number>('ATTEMPT_LOCK_RETRIES', 40);
    this.lockRetryDelayMs = this.config.get<number>('ATTEMPT_LOCK_RETRY_DELAY_MS', 25);

    this.client.on('connect', () => this.logger.log('Redis client connected'));
    this.client.on('error', (err) => this.logger.error('Redis client error', err));
  }

  /**
   * Run `work` while holding the lock at `key`.
   *
   * Throws ConflictException when the lock stays taken for the whole
   * retry budget. The lock is released even when `work` throws.
   */
  async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const token = randomUUID();

    if (!(await this.acquire(key, token))) {
      this.logger.warn(`Lock contention: gave up on ${key} after ${this.lockRetries} retries`);
      throw new ConflictException('attempt is busy');
    }

    try {
      return await work();
    } finally {
      await this.release(key, token);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.client.quit();
    this.logger.log('Redis connection closed');
  }

  // ═══════════════════════════════════════════════════════════
  // PRIVATE
  // ═══════════════════════════════════════════════════════════

  private async acquire(key: string, token: string): Promise<boolean> {
    for (let attempt = 0; attempt <= this.lockRetries; attempt++) {
      const result = await this.client.set(key, token, 'PX', this.lockTtlMs, 'NX');
      if (result === 'OK') return true;
      await new Promise<void>((resolve) => setTimeout(resolve, this.lockRetryDelayMs));
    }
    return false;
  }

  private async release(key: string, token: string): Promise<void> {
    try {
      await this.client.eval(RELEASE_LOCK_SCRIPT, 1, key, token);
    } catch (error) {
      // The lease expires on its own after lockTtlMs
      this.logger.error(`Failed to release lock ${key}`, error instanceof Error ? error.stack : String(error));
    }
  }
}
