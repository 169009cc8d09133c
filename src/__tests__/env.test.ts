import { DEV_JWT_SECRET, parseEnv } from '../config/env';

describe('parseEnv', () => {
  it('fills defaults for an empty environment', () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 8000,
      JWT_SECRET: DEV_JWT_SECRET,
      ACCESS_TOKEN_EXPIRE_MINUTES: 30,
      RATE_LIMIT_ENABLED: true,
      RATE_LIMIT_WINDOW_MS: 60_000,
      RATE_LIMIT_MAX_AUTH: 5,
      RATE_LIMIT_MAX_PUBLIC: 100,
      RATE_LIMIT_MAX_ADMIN: 200,
      RATE_LIMIT_MAX_WEBHOOKS: 1000,
    });
  });

  it('coerces numeric and boolean settings', () => {
    const env = parseEnv({ PORT: '9000', RATE_LIMIT_ENABLED: 'false', RATE_LIMIT_MAX_AUTH: '10' });

    expect(env.PORT).toBe(9000);
    expect(env.RATE_LIMIT_ENABLED).toBe(false);
    expect(env.RATE_LIMIT_MAX_AUTH).toBe(10);
  });

  it('refuses the development secret in production', () => {
    expect(() => parseEnv({ NODE_ENV: 'production' })).toThrow(
      'Invalid environment configuration: JWT_SECRET: JWT_SECRET must be set in production'
    );
  });

  it('accepts production with its own secret', () => {
    expect(parseEnv({ NODE_ENV: 'production', JWT_SECRET: 'test-secret' }).NODE_ENV).toBe('production');
  });

  it('lists every invalid variable', () => {
    expect(() => parseEnv({ PORT: 'abc', BCRYPT_ROUNDS: '2' })).toThrow(/PORT: .*; BCRYPT_ROUNDS: /);
  });
});
