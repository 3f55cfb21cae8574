import express from 'express';
import request from 'supertest';
import { loadConfig } from '../config/env';
import { requestLogger } from '../middlewares/requestLogger.middleware';

describe('loadConfig', () => {
  it('falls back to development defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      isProduction: false,
      port: 5000,
      storeDriver: 'mongo',
      mongoURI: undefined,
      jwtSecret: 'dev-only-jwt-secret',
      jwtExpiresInSeconds: 604800,
      bcryptSaltRounds: 10,
      allowedOrigins: ['http://localhost:3000'],
      logRequests: true
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      PORT: '8080',
      STORE_DRIVER: 'memory',
      JWT_SECRET: 'test-secret',
      JWT_EXPIRES_IN_SECONDS: '60',
      BCRYPT_SALT_ROUNDS: '4',
      ALLOWED_ORIGINS: 'http://a.test, http://b.test'
    });

    expect(config).toMatchObject({
      port: 8080,
      storeDriver: 'memory',
      jwtSecret: 'test-secret',
      jwtExpiresInSeconds: 60,
      bcryptSaltRounds: 4,
      allowedOrigins: ['http://a.test', 'http://b.test'],
      logRequests: false
    });
  });

  it('refuses to start production without a JWT secret', () => {
    expect(() => loadConfig({ NODE_ENV: 'production', MONGODB_URI: 'mongodb://db/app' })).toThrow(
      'FATAL ERROR: JWT_SECRET is not defined in environment variables.'
    );
  });

  it('rejects unknown store drivers and bad numbers', () => {
    expect(() => loadConfig({ STORE_DRIVER: 'sqlite' })).toThrow('STORE_DRIVER must be "mongo" or "memory", got "sqlite"');
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be a non-negative integer, got "eighty"');
  });
});

describe('requestLogger', () => {
  it('logs one line per finished request', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const app = express();
    app.use(requestLogger);
    app.get('/ping', (req, res) => {
      res.status(204).end();
    });

    await request(app).get('/ping?x=1').expect(204);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - User: Anonymous - GET \/ping\?x=1 204 \(\d+ms\)$/
    );
  });
});
