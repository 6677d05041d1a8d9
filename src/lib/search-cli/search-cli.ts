/**
 * Search command parsing and output formatting for scripts/search-torrents.ts
 */

import type { LogLevel } from '../logger';
import type { AggregatedSearch, TorrentResult } from '../providers';

export type SearchCommand =
  | { kind: 'movie'; title: string; year: number; json: boolean }
  | { kind: 'series'; title: string; season: number; episode: number; json: boolean };

export const USAGE = [
  'Usage:',
  '  tsx scripts/search-torrents.ts movie <title> [year] [--json]',
  '  tsx scripts/search-torrents.ts series <title> <season> <episode> [--json]',
].join('\n');

function parseNonNegative(value: string, label: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return parsed;
}

/**
 * Parse CLI arguments (without the node and script paths)
 *
 * @throws Error with a usage hint when the arguments are incomplete or invalid
 */
export function parseSearchCommand(args: string[]): SearchCommand {
  const json = args.includes('--json');
  const [kind, title, ...rest] = args.filter((arg) => arg !== '--json');

  if (!title) {
    throw new Error(USAGE);
  }

  if (kind === 'movie') {
    const year = rest[0] === undefined ? 0 : parseNonNegative(rest[0], 'year');
    return { kind, title, year, json };
  }

  if (kind === 'series') {
    if (rest.length < 2) {
      throw new Error(USAGE);
    }
    return {
      kind,
      title,
      season: parseNonNegative(rest[0], 'season'),
      episode: parseNonNegative(rest[1], 'episode'),
      json,
    };
  }

  throw new Error(USAGE);
}

/**
 * Log level for --json runs. Debug and info lines share stdout with the
 * document; warnings and errors go to stderr. An `error` level is kept.
 */
export function quietLogLevel(configured: string | undefined): LogLevel {
  return configured?.trim().toLowerCase() === 'error' ? 'error' : 'warn';
}

function formatResult(result: TorrentResult, index: number): string {
  return [
    `${String(index + 1).padStart(2)}. ${result.title}`,
    `    ${result.source} | ${result.quality} | ${result.type} | ${result.size} | S:${result.seeds} P:${result.peers}`,
    `    ${result.hash}`,
  ].join('\n');
}

/**
 * Human-readable report of an aggregated search
 */
export function formatSearchReport(search: AggregatedSearch): string {
  const lines: string[] = [`Found ${search.results.length} torrent(s)`];

  search.results.forEach((result, i) => lines.push(formatResult(result, i)));

  for (const failure of search.failures) {
    lines.push(`! ${failure.provider}: ${failure.message}`);
  }

  return lines.join('\n');
}
