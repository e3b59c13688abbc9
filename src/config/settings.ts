import { HodStaffDeletePolicy } from '../types';
import {
  HOD_STAFF_DELETE_POLICIES,
  NOTICE_RETENTION_MINUTES,
  SALT_ROUNDS,
  SUBJECT_CODE_MAX_ATTEMPTS,
} from '../utils/constants';

export interface Settings {
  environment: string;
  port: number;
  mongoUri: string;
  corsOrigin: string;
  saltRounds: number;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  hodStaffDeletePolicy: HodStaffDeletePolicy;
  subjectCodeMaxAttempts: number;
  noticeRetentionMinutes: number;
}

function parseIntSafe(value: string | undefined, fallback: number, min = 1): number {
  const parsed = parseInt(value ?? '', 10);
  if (!Number.isFinite(parsed) || parsed < min) return fallback;
  return parsed;
}

const isDeletePolicy = (value: string): value is HodStaffDeletePolicy =>
  HOD_STAFF_DELETE_POLICIES.some((policy) => policy === value);

function parseDeletePolicy(value: string | undefined): HodStaffDeletePolicy {
  if (!value) return 'cascade-retire';
  const normalized = value.trim().toLowerCase();
  if (!isDeletePolicy(normalized)) {
    throw new Error(
      `HOD_STAFF_DELETE_POLICY must be one of ${HOD_STAFF_DELETE_POLICIES.join(', ')} (got "${value}")`
    );
  }
  return normalized;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const environment = env.NODE_ENV || 'development';
  const mongoUri =
    (environment === 'test' && env.MONGODB_TEST_URI) ||
    env.MONGODB_URI ||
    'mongodb://localhost:27017/campus_registry?replicaSet=rs0';

  return {
    environment,
    port: parseIntSafe(env.PORT, 5000),
    mongoUri,
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:3000',
    saltRounds: parseIntSafe(env.BCRYPT_SALT_ROUNDS, SALT_ROUNDS, 4),
    rateLimitWindowMs: parseIntSafe(env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000),
    rateLimitMax: parseIntSafe(env.RATE_LIMIT_MAX_REQUESTS, 100),
    hodStaffDeletePolicy: parseDeletePolicy(env.HOD_STAFF_DELETE_POLICY),
    subjectCodeMaxAttempts: parseIntSafe(env.SUBJECT_CODE_MAX_ATTEMPTS, SUBJECT_CODE_MAX_ATTEMPTS),
    noticeRetentionMinutes: parseIntSafe(env.NOTICE_RETENTION_MINUTES, NOTICE_RETENTION_MINUTES),
  };
}
