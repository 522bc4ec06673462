import { RedisService } from '../../../database/services/redis.service';
import { RedisStateCache } from '../services/redis-state-cache.service';
import { createTestConfig } from './support/test-config';

// In-memory ioredis: SET with EX, atomic GETDEL
jest.mock('ioredis', () => {
  class RedisMock {
    private store = new Map<string, string>();

    on() {
      return this;
    }

    set(key: string, value: string) {
      this.store.set(key, value);
      return Promise.resolve('OK');
    }

    getdel(key: string) {
      const value = this.store.get(key) ?? null;
      this.store.delete(key);
      return Promise.resolve(value);
    }

    ping() {
      return Promise.resolve('PONG');
    }

    quit() {
      return Promise.resolve('OK');
    }
  }

  return {
    __esModule: true,
    default: RedisMock,
    Redis: RedisMock,
  };
});

describe('RedisStateCache', () => {
  let redis: RedisService;
  let cache: RedisStateCache;

  beforeEach(() => {
    redis = new RedisService(createTestConfig());
    cache = new RedisStateCache(redis);
  });

  afterEach(async () => {
    await redis.onModuleDestroy();
  });

  it('stores the value with an expiry', async () => {
    const set = jest.spyOn(redis.client, 'set');

    await cache.put('oauth_state:abc', '{"provider":"google","role":"careseeker"}', 600);

    expect(set).toHaveBeenCalledWith(
      'oauth_state:abc',
      '{"provider":"google","role":"careseeker"}',
      'EX',
      600,
    );
  });

  it('hands a value out exactly once', async () => {
    await cache.put('oauth_state:abc', 'payload', 600);

    const [first, second] = await Promise.all([
      cache.take('oauth_state:abc'),
      cache.take('oauth_state:abc'),
    ]);

    expect([first, second]).toEqual(['payload', null]);
  });

  it('returns null for a key that was never stored', async () => {
    expect(await cache.take('oauth_state:missing')).toBeNull();
  });

  it('reports the connection as healthy when PING answers', async () => {
    expect(await redis.ping()).toBe(true);
  });
});
