/**
 * Shared Configuration
 * Centralized process-level settings; module settings live in each module's config/
 */

import dotenv from 'dotenv';
import { parseIntEnv } from '../utils/env';

// Tests control their own environment
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseIntEnv(process.env.PORT, 8000),
  CORS_ORIGIN: process.env.CORS_ORIGIN || '*',

  // Provider credentials; absent keys switch the server to offline providers
  LLM_API_KEY: process.env.LLM_API_KEY || process.env.OPENAI_API_KEY,
  CARTESIA_API_KEY: process.env.CARTESIA_API_KEY,

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

/**
 * Validate required environment variables
 */
export function validateEnv(): void {
  if (!Number.isInteger(env.PORT) || env.PORT < 0 || env.PORT > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535 (got ${env.PORT})`);
  }
}

export const isDevelopment = env.NODE_ENV === 'development';

export const isProduction = env.NODE_ENV === 'production';

export const isTest = env.NODE_ENV === 'test';

export * from './socket';
