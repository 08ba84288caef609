/**
 * Centralized configuration for environment variables.
 * This file contains all environment variable parsing logic.
 */

import 'dotenv/config';
import os from 'os';

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  const parsed = parseFloat(val);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  return val !== 'false' && val !== '0';
}

function getEnvEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const val = process.env[key];
  const match = allowed.find(option => option === val);
  return match ?? defaultValue;
}

// String configurations
export const LOG_LEVEL = getEnvString('LOG_LEVEL', 'info');
export const LOG_FORMAT = getEnvEnum('LOG_FORMAT', ['text', 'json'] as const, 'text');
export const NODE_ENV = getEnvString('NODE_ENV', '');
export const DATABASE_URL = getEnvString('DATABASE_URL', '');
export const PROFILE_PATH = getEnvString('PROFILE_PATH', 'context-profile.json');
export const EMBEDDING_PROVIDER = getEnvEnum('EMBEDDING_PROVIDER', ['auto', 'openai', 'tei', 'none'] as const, 'auto');
export const OPENAI_API_KEY = getEnvString('OPENAI_API_KEY', '');
export const OPENAI_EMBEDDING_MODEL = getEnvString('OPENAI_EMBEDDING_MODEL', '');
export const TEI_BASE_URL = getEnvString('TEI_BASE_URL', '');
export const TEI_MODEL = getEnvString('TEI_MODEL', '');
export const TEI_API_KEY = getEnvString('TEI_API_KEY', '');
export const QDRANT_URL = getEnvString('QDRANT_URL', '');
export const QDRANT_API_KEY = getEnvString('QDRANT_API_KEY', '');
export const QDRANT_COLLECTION = getEnvString('QDRANT_COLLECTION', 'interaction_embeddings');
export const SEMANTIC_NARROWING = getEnvEnum('SEMANTIC_NARROWING', ['auto', 'off'] as const, 'auto');

// Int configurations
export const PORT = getEnvInt('PORT', 3300);
export const ACTIVE_TOP_K = getEnvInt('ACTIVE_TOP_K', 3);
export const RECENT_WINDOW_LIMIT = getEnvInt('RECENT_WINDOW_LIMIT', 200);
export const RECENT_WINDOW_DAYS = getEnvInt('RECENT_WINDOW_DAYS', 7);
export const MAX_EMBEDDINGS = getEnvInt('MAX_EMBEDDINGS', 2000);
export const EMBEDDING_TIMEOUT_MS = getEnvInt('EMBEDDING_TIMEOUT_MS', 300);
export const EMBEDDING_DIMENSION = getEnvInt('EMBEDDING_DIMENSION', 0);
export const SECTION_ITEM_LIMIT = getEnvInt('SECTION_ITEM_LIMIT', 5);
export const SEMANTIC_CANDIDATE_LIMIT = getEnvInt('SEMANTIC_CANDIDATE_LIMIT', 50);
export const SCORE_CACHE_TTL_MS = getEnvInt('SCORE_CACHE_TTL_MS', 0);
export const MAX_MESSAGE_CHARS = getEnvInt('MAX_MESSAGE_CHARS', 20000);
export const HEALTH_CHECK_TIMEOUT_MS = getEnvInt('HEALTH_CHECK_TIMEOUT_MS', 2000);
export const VECTOR_BACKEND_TIMEOUT_MS = getEnvInt('VECTOR_BACKEND_TIMEOUT_MS', 1000);
export const SESSION_HISTORY_LIMIT = getEnvInt('SESSION_HISTORY_LIMIT', 50);

// Float configurations
export const ACTIVE_WINDOW_HOURS = getEnvFloat('ACTIVE_WINDOW_HOURS', 24);
export const MIN_SIMILARITY = getEnvFloat('MIN_SIMILARITY', 0.7);

// Boolean configurations
export const METRICS_ENABLED = getEnvBoolean('METRICS_ENABLED', true);

// Derived configurations
export const INSTANCE_ID = getEnvString('INSTANCE_ID', os.hostname() || 'unknown');
