#!/usr/bin/env npx tsx

/**
 * Torrent Search Script
 *
 * Searches every bundled provider (YTS, EZTV, 1337x) for a movie or an
 * episode and prints the combined results.
 *
 * Usage:
 *   npx tsx scripts/search-torrents.ts movie <title> [year] [--json]
 *   npx tsx scripts/search-torrents.ts series <title> <season> <episode> [--json]
 *
 * Optional environment variables:
 *   - PROVIDER_USER_AGENT, PROVIDER_TIMEOUT_MS
 *   - L337X_BASE_URL, YTS_BASE_URL, EZTV_BASE_URL
 *   - LOG_LEVEL (raised to warn with --json, so stdout carries only the JSON)
 */

import { config } from 'dotenv';
import { getProviderConfig } from '../src/lib/config';
import { createDefaultRegistry } from '../src/lib/providers';
import { formatSearchReport, parseSearchCommand, quietLogLevel, type SearchCommand } from '../src/lib/search-cli';

// Load environment variables from .env file
config();

async function main() {
  let command: SearchCommand;
  try {
    command = parseSearchCommand(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
    return;
  }

  if (command.json) {
    process.env.LOG_LEVEL = quietLogLevel(process.env.LOG_LEVEL);
  }

  const registry = createDefaultRegistry(getProviderConfig());

  const search =
    command.kind === 'movie'
      ? await registry.searchMovie(command.title, command.year)
      : await registry.searchSeries(command.title, command.season, command.episode);

  console.log(command.json ? JSON.stringify(search, null, 2) : formatSearchReport(search));

  if (search.results.length === 0 && search.failures.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('\n❌ Fatal error:', error);
  process.exit(1);
});
