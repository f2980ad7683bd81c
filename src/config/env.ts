import { config } from 'dotenv';
import path from 'path';

// Load environment variables
config();

export type NodeEnv = 'development' | 'test' | 'staging' | 'production';

export interface EventBranding {
  name: string;
  tagline: string;
  host: string;
  sponsors: string;
  schedule: string;
}

export interface EnvConfig {
  // Server
  NODE_ENV: NodeEnv;
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  CORS_ORIGIN: string;

  // Storage
  DATA_DIR: string;

  // Secrets
  ENCRYPTION_KEY: string;
  HMAC_SECRET: string;
  JWT_SECRET: string;
  JWT_EXPIRES_IN_SECONDS: number;

  // Security
  BCRYPT_ROUNDS: number;
  LOGIN_RATE_LIMIT_MAX: number;

  // Bootstrap admin
  ADMIN_USERNAME: string;
  ADMIN_PASSWORD: string;

  // Tickets
  TEAM_CODE_PREFIX: string;
  DEFAULT_SLOT: string;
  EVENT: EventBranding;
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'test', 'staging', 'production'];

const MIN_SECRET_LENGTH = 32;

function parseNodeEnv(value: string | undefined): NodeEnv {
  const candidate = value || 'development';
  const match = NODE_ENVS.find((envName) => envName === candidate);
  if (!match) {
    throw new Error(`Invalid NODE_ENV: ${candidate}`);
  }
  return match;
}

function parseIntVar(source: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = source[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

function readSecret(
  source: NodeJS.ProcessEnv,
  key: string,
  devFallback: string,
  isProduction: boolean
): string {
  const value = source[key];

  if (!value) {
    if (isProduction) {
      throw new Error(`Missing required production environment variable: ${key}`);
    }
    if (source.NODE_ENV !== 'test') {
      console.warn(`WARNING: ${key} not set. Using insecure default for development only.`);
    }
    return devFallback;
  }

  if (value.length < MIN_SECRET_LENGTH) {
    throw new Error(`${key} must be at least ${MIN_SECRET_LENGTH} characters`);
  }
  return value;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const nodeEnv = parseNodeEnv(source.NODE_ENV);
  const isProduction = nodeEnv === 'production';

  if (isProduction && !source.ADMIN_PASSWORD) {
    throw new Error('Missing required production environment variable: ADMIN_PASSWORD');
  }

  const prefix = (source.TEAM_CODE_PREFIX || 'HF26').toUpperCase();
  if (!/^[A-Z0-9]{1,8}$/.test(prefix)) {
    throw new Error('TEAM_CODE_PREFIX must be 1-8 letters or digits');
  }

  const schedule = source.EVENT_SCHEDULE || '20 Feb 9:00 AM - 21 Feb 9:00 AM';

  return {
    NODE_ENV: nodeEnv,
    PORT: parseIntVar(source, 'PORT', 3000),
    HOST: source.HOST || '0.0.0.0',
    LOG_LEVEL: source.LOG_LEVEL || 'info',
    CORS_ORIGIN: source.CORS_ORIGIN || '*',

    DATA_DIR: path.resolve(source.DATA_DIR || path.join(process.cwd(), 'data')),

    ENCRYPTION_KEY: readSecret(source, 'ENCRYPTION_KEY', 'dev-only-insecure-encryption-key-32chars', isProduction),
    HMAC_SECRET: readSecret(source, 'HMAC_SECRET', 'dev-only-insecure-hmac-secret-not-for-prod', isProduction),
    JWT_SECRET: readSecret(source, 'JWT_SECRET', 'dev-only-insecure-jwt-secret-not-for-prod', isProduction),
    JWT_EXPIRES_IN_SECONDS: parseIntVar(source, 'JWT_EXPIRES_IN_SECONDS', 8 * 60 * 60),

    BCRYPT_ROUNDS: parseIntVar(source, 'BCRYPT_ROUNDS', 12),
    LOGIN_RATE_LIMIT_MAX: parseIntVar(source, 'LOGIN_RATE_LIMIT_MAX', 10),

    ADMIN_USERNAME: source.ADMIN_USERNAME || 'admin',
    ADMIN_PASSWORD: source.ADMIN_PASSWORD || 'change-me-admin',

    TEAM_CODE_PREFIX: prefix,
    DEFAULT_SLOT: source.DEFAULT_SLOT || schedule,
    EVENT: {
      name: source.EVENT_NAME || 'HACKFEST2K26',
      tagline: source.EVENT_TAGLINE || '36-Hour Hackathon',
      host: source.EVENT_HOST || '',
      sponsors: source.EVENT_SPONSORS || '',
      schedule,
    },
  };
}

export const env = loadEnv();
