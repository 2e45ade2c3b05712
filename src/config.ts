import { readFileSync } from 'node:fs';
import process from 'node:process';

function readPackageVersion(): string {
  const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  throw new Error('package.json version is missing');
}

export const serverVersion: string = readPackageVersion();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const { env } = process;

function parseIntegerValue(
  envValue: string | undefined,
  min?: number,
  max?: number
): number | null {
  if (!envValue) return null;
  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return null;
  if (min !== undefined && parsed < min) return null;
  if (max !== undefined && parsed > max) return null;
  return parsed;
}

function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  return parseIntegerValue(envValue, min, max) ?? defaultValue;
}

function parseBoolean(
  envValue: string | undefined,
  defaultValue: boolean
): boolean {
  if (!envValue) return defaultValue;

  return envValue.trim().toLowerCase() !== 'false';
}

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const level = envValue.trim().toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function parseLogFormat(envValue: string | undefined): LogFormat {
  return envValue?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

const MIB = 1024 * 1024;

const DEFAULT_FETCH_TIMEOUT_MS = 30000;
const DEFAULT_PDF_MAX_BYTES = 500 * MIB;
const DEFAULT_PDF_TIMEOUT_MS = 30000;
const DEFAULT_CACHE_TTL_SECONDS = 3600;
const DEFAULT_CACHE_MAX_ENTRIES = 100;
const DEFAULT_USER_AGENT = `pageExtract-MCP/${serverVersion}`;

export const config = {
  server: {
    name: 'pageExtract',
    version: serverVersion,
  },
  fetcher: {
    timeout: parseInteger(
      env.FETCH_TIMEOUT_MS,
      DEFAULT_FETCH_TIMEOUT_MS,
      1000,
      60000
    ),
    maxRedirects: 5,
    userAgent: env.USER_AGENT ?? DEFAULT_USER_AGENT,
    /** 0 disables the limit. */
    maxContentLength: parseInteger(env.MAX_CONTENT_BYTES, 0, 0),
  },
  extraction: {
    headSniffBytes: 512,
    minDynamicTextChars: 180,
    pdfMaxBytes: parseInteger(env.PDF_MAX_BYTES, DEFAULT_PDF_MAX_BYTES, 1),
    pdfTimeoutMs: parseInteger(env.PDF_TIMEOUT_MS, DEFAULT_PDF_TIMEOUT_MS, 0),
  },
  tools: {
    defaultMaxLength: 10000,
    minMaxLength: 1000,
    maxMaxLength: 50000,
  },
  cache: {
    enabled: parseBoolean(env.CACHE_ENABLED, true),
    ttlSeconds: parseInteger(
      env.CACHE_TTL_SECONDS,
      DEFAULT_CACHE_TTL_SECONDS,
      1
    ),
    maxEntries: parseInteger(
      env.CACHE_MAX_ENTRIES,
      DEFAULT_CACHE_MAX_ENTRIES,
      1
    ),
  },
  logging: {
    level: parseLogLevel(env.LOG_LEVEL),
    format: parseLogFormat(env.LOG_FORMAT),
  },
};
