/**
 * Scrape Saudi regions, cities and districts from the SPL maps service
 * into an Excel workbook (one sheet per region) plus a JSON dump.
 *
 * Usage:
 *   npx tsx scripts/scrape-spl.ts          # Arabic names
 *   npx tsx scripts/scrape-spl.ts en       # English names
 *   npx tsx scripts/scrape-spl.ts en --output ./out --concurrency 4
 *
 * Environment (.env / .env.local are read too):
 *   SPL_BASE_URL, SPL_FETCH_TIMEOUT_MS, SPL_FETCH_ATTEMPTS, SPL_OUTPUT_DIR
 */

import { parseArgs, runScrape } from '../lib/spl/cli';
import { loadEnvIntoProcess, readConfig } from '../lib/spl/config';

async function main(): Promise<void> {
  loadEnvIntoProcess();
  const options = parseArgs(process.argv.slice(2));
  await runScrape(options, readConfig());
}

main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
