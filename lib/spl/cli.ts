import * as path from 'path';
import { SplClient } from './client';
import { readConfig, type ScraperConfig } from './config';
import { UsageError } from './errors';
import { loadRegions } from './regions';
import { scrapeGeography, summarize, type GeographySource } from './scraper';
import type { Language } from './types';
import { writeJson, writeWorkbook } from './workbook';

export const USAGE = 'Usage: scrape-spl [en|ar] [--output <dir>] [--concurrency <n>] [--no-json]';

const OUTPUT_BASENAME = 'region_cities_districts';

export interface CliOptions {
  language: Language;
  outputDir?: string;
  concurrency: number;
  json: boolean;
}

export function parseArgs(argv: string[]): CliOptions {
  const args = [...argv];
  const takeValue = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    if (index === -1) return undefined;
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${flag} needs a value\n${USAGE}`);
    }
    args.splice(index, 2);
    return value;
  };
  const takeFlag = (flag: string): boolean => {
    const index = args.indexOf(flag);
    if (index === -1) return false;
    args.splice(index, 1);
    return true;
  };

  const outputDir = takeValue('--output');
  const concurrencyRaw = takeValue('--concurrency');
  const json = !takeFlag('--no-json');

  const unknownFlag = args.find((arg) => arg.startsWith('--'));
  if (unknownFlag) throw new UsageError(`Unknown option ${unknownFlag}\n${USAGE}`);
  if (args.length > 1) throw new UsageError(`Too many arguments: ${args.join(' ')}\n${USAGE}`);

  const languageArg = args[0];
  if (languageArg !== undefined && languageArg !== 'en' && languageArg !== 'ar') {
    throw new UsageError(`Unknown language "${languageArg}"\n${USAGE}`);
  }

  let concurrency = 1;
  if (concurrencyRaw !== undefined) {
    concurrency = Number.parseInt(concurrencyRaw, 10);
    if (!/^\d+$/.test(concurrencyRaw) || concurrency < 1) {
      throw new UsageError(`--concurrency must be a positive integer\n${USAGE}`);
    }
  }

  return { language: languageArg ?? 'ar', outputDir, concurrency, json };
}

export function outputPaths(outputDir: string, language: Language): { xlsx: string; json: string } {
  const stem = path.join(outputDir, `${OUTPUT_BASENAME}.${language}`);
  return { xlsx: `${stem}.xlsx`, json: `${stem}.json` };
}

export interface RunResult {
  xlsxPath: string;
  jsonPath: string | null;
}

/**
 * Full pipeline: regions → cities → districts → files.
 * Files are only written once everything has been fetched.
 */
export async function runScrape(
  options: CliOptions,
  config: ScraperConfig = readConfig(),
  source?: GeographySource
): Promise<RunResult> {
  const label = options.language === 'en' ? 'English' : 'Arabic';
  console.log(`=== SPL geography scrape (${label}) ===\n`);

  const regions = loadRegions(options.language);
  console.log(`Loaded ${regions.length} regions`);

  const client =
    source ??
    new SplClient({
      baseUrl: config.baseUrl,
      timeoutMs: config.fetchTimeoutMs,
      attempts: config.fetchAttempts,
    });

  const tree = await scrapeGeography(client, {
    language: options.language,
    regions,
    concurrency: options.concurrency,
  });

  const paths = outputPaths(options.outputDir ?? config.outputDir, options.language);
  writeWorkbook(tree, paths.xlsx);
  if (options.json) writeJson(tree, paths.json);

  const summary = summarize(tree);
  console.log('\n=== Summary ===');
  console.log(`Regions: ${summary.regions}`);
  console.log(`Cities: ${summary.cities}`);
  console.log(`Districts: ${summary.districts}`);
  console.log(`Cities without districts: ${summary.citiesWithoutDistricts}`);
  console.log(`Workbook: ${paths.xlsx}`);
  if (options.json) console.log(`JSON: ${paths.json}`);
  console.log('\n✓ Done!');

  return { xlsxPath: paths.xlsx, jsonPath: options.json ? paths.json : null };
}
