// src/config/env.ts
import dotenv from 'dotenv';

dotenv.config();

export type StoreDriver = 'mongo' | 'memory';

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  port: number;
  storeDriver: StoreDriver;
  mongoURI?: string;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  bcryptSaltRounds: number;
  allowedOrigins: string[];
  logRequests: boolean;
}

const DEV_JWT_SECRET = 'dev-only-jwt-secret';

const parseInteger = (value: string | undefined, fallback: number, name: string): number => {
  if (value === undefined || value.trim() === '') return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
};

const parseStoreDriver = (value: string | undefined): StoreDriver => {
  if (!value) return 'mongo';
  if (value === 'mongo' || value === 'memory') return value;
  throw new Error(`STORE_DRIVER must be "mongo" or "memory", got "${value}"`);
};

/**
 * Read the application config from the environment (.env is loaded on import).
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const nodeEnv = env.NODE_ENV || 'development';
  const isProduction = nodeEnv === 'production';
  const storeDriver = parseStoreDriver(env.STORE_DRIVER);

  if (isProduction && !env.JWT_SECRET) {
    throw new Error('FATAL ERROR: JWT_SECRET is not defined in environment variables.');
  }

  if (storeDriver === 'mongo' && isProduction && !env.MONGODB_URI) {
    throw new Error('MongoDB connection string is not defined');
  }

  return {
    nodeEnv,
    isProduction,
    port: parseInteger(env.PORT, 5000, 'PORT'),
    storeDriver,
    mongoURI: env.MONGODB_URI,
    jwtSecret: env.JWT_SECRET || DEV_JWT_SECRET,
    jwtExpiresInSeconds: parseInteger(env.JWT_EXPIRES_IN_SECONDS, 7 * 24 * 60 * 60, 'JWT_EXPIRES_IN_SECONDS'),
    bcryptSaltRounds: parseInteger(env.BCRYPT_SALT_ROUNDS, 10, 'BCRYPT_SALT_ROUNDS'),
    allowedOrigins: env.ALLOWED_ORIGINS
      ? env.ALLOWED_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean)
      : ['http://localhost:3000'],
    logRequests: env.LOG_REQUESTS ? env.LOG_REQUESTS === 'true' : nodeEnv !== 'test'
  };
};
