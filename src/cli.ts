import { parseArgs } from 'node:util';

import { getErrorMessage } from './errors.js';

/** What the entrypoint should do for a given argv. */
export type CliCommand =
  | { readonly kind: 'serve' }
  | { readonly kind: 'help' }
  | { readonly kind: 'version' }
  | { readonly kind: 'invalid'; readonly message: string };

const USAGE = [
  'pageExtract MCP server',
  '',
  'Usage:',
  '  page-extract-mcp [--help|-h] [--version|-v]',
  '',
  'Serves the fetch-url, url-fetch and url-metadata tools over stdio.',
  '',
  'Environment:',
  '  FETCH_TIMEOUT_MS, USER_AGENT, MAX_CONTENT_BYTES, PDF_MAX_BYTES,',
  '  PDF_TIMEOUT_MS, CACHE_ENABLED, CACHE_TTL_SECONDS, CACHE_MAX_ENTRIES,',
  '  LOG_LEVEL, LOG_FORMAT',
  '',
  'Options:',
  '  --help, -h      Show this help message.',
  '  --version, -v   Show server version.',
  '',
].join('\n');

export function renderCliUsage(): string {
  return `${USAGE}\n`;
}

function readFlags(args: readonly string[]): { help: boolean; version: boolean } {
  const { values } = parseArgs({
    args: [...args],
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    strict: true,
    allowPositionals: false,
  });
  return values;
}

/** `--help` wins over `--version` when both are given. */
export function parseCliArgs(args: readonly string[]): CliCommand {
  let flags: { help: boolean; version: boolean };
  try {
    flags = readFlags(args);
  } catch (error: unknown) {
    return { kind: 'invalid', message: getErrorMessage(error) };
  }

  if (flags.help) return { kind: 'help' };
  if (flags.version) return { kind: 'version' };
  return { kind: 'serve' };
}
