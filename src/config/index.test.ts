import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './index';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      port: 5000,
      databaseUrl: 'messaging.db',
      schemaPath: path.resolve(process.cwd(), 'db', 'schema.sql'),
      logQueries: false,
      allowedOrigins: ['http://localhost:3000'],
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      DATABASE_URL: ':memory:',
      FRONTEND_URL: 'https://chat.example.com',
      LOG_QUERIES: 'true',
    });

    expect(config).toMatchObject({
      env: 'production',
      port: 8080,
      databaseUrl: ':memory:',
      logQueries: true,
      allowedOrigins: ['http://localhost:3000', 'https://chat.example.com'],
    });
  });

  it('refuses invalid values', () => {
    expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow(/PORT/);
    expect(() => loadConfig({ FRONTEND_URL: 'nowhere' })).toThrow(/FRONTEND_URL/);
  });
});
