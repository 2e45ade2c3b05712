import { AsyncLocalStorage } from 'node:async_hooks';
import process from 'node:process';
import { inspect, stripVTControlCharacters } from 'node:util';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { config, type LogLevel } from './config.js';

type LogMetadata = Record<string, unknown>;

interface RequestContext {
  readonly requestId: string;
  readonly operationId?: string;
}

const requestContext = new AsyncLocalStorage<RequestContext>({
  name: 'requestContext',
});
let mcpServer: McpServer | undefined;
let stderrAvailable = true;

process.stderr.on('error', () => {
  stderrAvailable = false;
});

export function setMcpServer(server: McpServer | undefined): void {
  mcpServer = server;
}

export function runWithRequestContext<T>(
  context: RequestContext,
  fn: () => T
): T {
  return requestContext.run(context, fn);
}

export function getRequestId(): string | undefined {
  return requestContext.getStore()?.requestId;
}

function isDebugEnabled(): boolean {
  return config.logging.level === 'debug';
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[config.logging.level];
}

function buildContextMetadata(): LogMetadata | undefined {
  const ctx = requestContext.getStore();
  if (!ctx) return undefined;

  const meta: LogMetadata = { requestId: ctx.requestId };
  if (ctx.operationId && ctx.operationId !== ctx.requestId) {
    meta['operationId'] = ctx.operationId;
  }
  return meta;
}

function mergeMetadata(meta?: LogMetadata): LogMetadata | undefined {
  const contextMeta = buildContextMetadata();
  const hasMeta = meta !== undefined && Object.keys(meta).length > 0;

  if (!contextMeta && !hasMeta) return undefined;
  if (!contextMeta) return meta;
  if (!hasMeta) return contextMeta;

  return { ...contextMeta, ...meta };
}

function createTimestamp(): string {
  return new Date().toISOString();
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  const merged = mergeMetadata(meta);

  if (config.logging.format === 'json') {
    return JSON.stringify({
      timestamp: createTimestamp(),
      level: level.toUpperCase(),
      message,
      ...merged,
    });
  }

  const suffix = merged
    ? ` ${inspect(merged, { breakLength: Infinity, colors: false, compact: true, sorted: true })}`
    : '';
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${suffix}`;
}

function mapToMcpLevel(
  level: LogLevel
): 'debug' | 'info' | 'warning' | 'error' {
  return level === 'warn' ? 'warning' : level;
}

function safeWriteStderr(line: string): void {
  if (!stderrAvailable) return;
  if (process.stderr.destroyed || process.stderr.writableEnded) {
    stderrAvailable = false;
    return;
  }
  try {
    process.stderr.write(line);
  } catch {
    // EPIPE and friends: stop writing, keep the process alive.
    stderrAvailable = false;
  }
}

function forwardToMcp(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): void {
  const server = mcpServer;
  if (!server?.isConnected()) return;

  server.server
    .sendLoggingMessage({
      level: mapToMcpLevel(level),
      data: meta ? { message, ...meta } : message,
    })
    .catch((err: unknown) => {
      if (!isDebugEnabled()) return;
      const errorText = err instanceof Error ? err.message : String(err);
      safeWriteStderr(
        `[${createTimestamp()}] WARN: Failed to forward log to MCP: ${errorText}\n`
      );
    });
}

function writeLog(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (!shouldLog(level)) return;

  const line = formatLogEntry(level, message, meta);
  safeWriteStderr(`${stripVTControlCharacters(line)}\n`);
  forwardToMcp(level, message, meta);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  writeLog('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  writeLog('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  writeLog('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});
  writeLog('error', message, errorMeta);
}

export function redactUrl(rawUrl: string): string {
  if (!URL.canParse(rawUrl)) return rawUrl;

  const url = new URL(rawUrl);
  url.username = '';
  url.password = '';
  url.hash = '';
  url.search = '';
  return url.toString();
}
