import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '@/config/app.config';

describe('loadConfig', () => {
  it('fills defaults around the required secret', () => {
    const config = loadConfig({ JWT_SECRET_KEY: 'test-secret' });

    expect(config).toMatchObject({
      port: 4000,
      nodeEnv: 'development',
      jwt: { secretKey: 'test-secret', algorithm: 'HS256' },
      shopService: { url: 'http://127.0.0.1:8001/api/shops/', timeoutMs: 5000 },
      uploads: { path: './uploads', maxFileSize: 10 * 1024 * 1024 },
      requestTimeoutMs: 15000,
      pageSize: 20,
      defaultRadiusKm: 5,
      corsOrigins: ['http://localhost:3000'],
      logLevel: 'info',
    });
  });

  it('coerces numbers and splits origins', () => {
    const config = loadConfig({
      JWT_SECRET_KEY: 'test-secret',
      PORT: '8080',
      DEFAULT_RADIUS_KM: '12.5',
      CORS_ORIGIN: 'http://a.test, http://b.test,',
    });

    expect(config.port).toBe(8080);
    expect(config.defaultRadiusKm).toBe(12.5);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('returns a frozen object', () => {
    const config = loadConfig({ JWT_SECRET_KEY: 'test-secret' });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.jwt)).toBe(true);
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ JWT_ALGORITHM: 'none', PAGE_SIZE: '0' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues.map((i) => i.path).sort()).toEqual(['JWT_ALGORITHM', 'JWT_SECRET_KEY', 'PAGE_SIZE']);
  });

  it('rejects an empty secret', () => {
    expect(() => loadConfig({ JWT_SECRET_KEY: '' })).toThrow('JWT_SECRET_KEY: JWT_SECRET_KEY is required');
  });
});
