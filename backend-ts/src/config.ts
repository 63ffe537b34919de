/**
 * Configuration for the Ollama relay.
 * All configuration values are loaded from environment variables.
 */

import dotenv from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';
import type { PresetName } from '@ollama-relay/shared';
import { parseLogLevel, setLogLevel } from './logger.js';

dotenv.config();

function readInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readPreset(name: string, fallback: PresetName): PresetName {
  const value = process.env[name];
  return value === 'fast' || value === 'normal' || value === 'code' ? value : fallback;
}

// Ollama server
export const OLLAMA_ENDPOINT = (process.env.OLLAMA_ENDPOINT || 'http://localhost:11434').replace(/\/+$/, '');
export const DEFAULT_MODEL = process.env.DEFAULT_MODEL || 'codellama:7b-code-q4_K_M';
export const DEFAULT_PRESET = readPreset('DEFAULT_PRESET', 'normal');

// Response cache
export const CACHE_TTL_SECONDS = readInt('CACHE_TTL', 3600);
export const CACHE_MAX_SIZE = readInt('CACHE_MAX_SIZE', 1000);
// Unset keeps the cache in memory only
export const CACHE_DIR = process.env.CACHE_DIR || null;
// The CLI is a fresh process per call, so it always mirrors to disk
export const CLI_CACHE_DIR = CACHE_DIR ?? join(homedir(), '.cache', 'ollama-relay');

// Upper bound on requests in flight for batch asks
export const MAX_PARALLEL = readInt('MAX_PARALLEL', 2);

// Timeout for status checks against /api/tags (in seconds)
export const STATUS_TIMEOUT = readInt('STATUS_TIMEOUT', 5);

// HTTP relay
export const SERVER_PORT = readInt('SERVER_PORT', 8011);
export const SERVER_HOST = process.env.SERVER_HOST || '127.0.0.1';
export const CORS_ORIGINS = process.env.CORS_ORIGINS
  ? process.env.CORS_ORIGINS.split(',').map((origin) => origin.trim())
  : ['http://localhost:5173', 'http://localhost:3000'];

// Logging
export const LOG_LEVEL = parseLogLevel(process.env.LOG_LEVEL);

// Initialize logger with configured level
setLogLevel(LOG_LEVEL);
