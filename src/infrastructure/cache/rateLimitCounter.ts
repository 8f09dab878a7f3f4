import type Redis from "ioredis";
import { RateLimitCounter } from "../../application/ports/services";

/** Fixed-window counter on INCR + EXPIRE. */
export class RedisRateLimitCounter implements RateLimitCounter {
  constructor(private readonly redis: Redis) {}

  async hit(key: string, windowSec: number): Promise<number> {
    const current = await this.redis.incr(key);
    if (current === 1) {
      await this.redis.expire(key, windowSec);
    }
    return current;
  }
}
