/**
 * Environment configuration
 * =========================
 * Reads process.env (after dotenv) into a typed, frozen settings object.
 * Malformed numbers and booleans fall back to their defaults.
 */

import 'dotenv/config';

export type NodeEnv = 'development' | 'production' | 'test';

export interface Env {
  NODE_ENV: NodeEnv;
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  CORS_ORIGINS: string;

  CACHE_FILE: string;
  REFRESHER_ENABLED: boolean;
  REFRESH_INTERVAL_MS: number;
  REFRESH_COOLDOWN_MS: number;
  REFRESH_STOP_TIMEOUT_MS: number;

  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  OPENAI_TEMPERATURE: number;

  PERPLEXITY_API_KEY: string;
  PERPLEXITY_BASE_URL: string;
  PERPLEXITY_MODEL: string;

  HTTP_TIMEOUT_MS: number;
}

type Source = Record<string, string | undefined>;

function getStr(source: Source, key: string, defaultValue: string): string {
  const val = source[key]?.trim();
  return val ? val : defaultValue;
}

function getNum(source: Source, key: string, defaultValue: number): number {
  const val = source[key];
  if (val === undefined || val.trim() === '') return defaultValue;
  const num = Number(val);
  return Number.isFinite(num) ? num : defaultValue;
}

function getBool(source: Source, key: string, defaultValue: boolean): boolean {
  const val = source[key]?.trim().toLowerCase();
  if (val === 'true' || val === '1' || val === 'yes') return true;
  if (val === 'false' || val === '0' || val === 'no') return false;
  return defaultValue;
}

function getNodeEnv(source: Source): NodeEnv {
  const val = source.NODE_ENV;
  if (val === 'production' || val === 'test') return val;
  return 'development';
}

export function loadEnv(source: Source = process.env): Readonly<Env> {
  return Object.freeze({
    NODE_ENV: getNodeEnv(source),
    PORT: getNum(source, 'PORT', 8000),
    HOST: getStr(source, 'HOST', '0.0.0.0'),
    LOG_LEVEL: getStr(source, 'LOG_LEVEL', 'info'),
    CORS_ORIGINS: getStr(source, 'CORS_ORIGINS', '*'),

    CACHE_FILE: getStr(source, 'CACHE_FILE', 'data/market-levels-cache.json'),
    REFRESHER_ENABLED: getBool(source, 'REFRESHER_ENABLED', true),
    REFRESH_INTERVAL_MS: getNum(source, 'REFRESH_INTERVAL_MS', 60 * 60 * 1000),
    REFRESH_COOLDOWN_MS: getNum(source, 'REFRESH_COOLDOWN_MS', 60 * 1000),
    REFRESH_STOP_TIMEOUT_MS: getNum(source, 'REFRESH_STOP_TIMEOUT_MS', 10 * 1000),

    OPENAI_API_KEY: getStr(source, 'OPENAI_API_KEY', ''),
    OPENAI_MODEL: getStr(source, 'OPENAI_MODEL', 'gpt-4.1'),
    OPENAI_TEMPERATURE: getNum(source, 'OPENAI_TEMPERATURE', 0.1),

    PERPLEXITY_API_KEY: getStr(source, 'PERPLEXITY_API_KEY', ''),
    PERPLEXITY_BASE_URL: getStr(source, 'PERPLEXITY_BASE_URL', 'https://api.perplexity.ai'),
    PERPLEXITY_MODEL: getStr(source, 'PERPLEXITY_MODEL', 'sonar-pro'),

    HTTP_TIMEOUT_MS: getNum(source, 'HTTP_TIMEOUT_MS', 60_000),
  });
}

export const env = loadEnv();
