import * as fs from 'fs';
import * as path from 'path';

export interface ScraperConfig {
  baseUrl: string;
  fetchTimeoutMs: number;
  fetchAttempts: number;
  outputDir: string;
}

export const DEFAULT_CONFIG: ScraperConfig = {
  baseUrl: 'https://maps.splonline.com.sa',
  fetchTimeoutMs: 30000,
  fetchAttempts: 1,
  outputDir: 'output',
};

export function parseEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) return {};
  const out: Record<string, string> = {};
  const raw = fs.readFileSync(filePath, 'utf-8');
  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const idx = trimmed.indexOf('=');
    if (idx <= 0) continue;
    const key = trimmed.slice(0, idx).trim();
    let value = trimmed.slice(idx + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    out[key] = value;
  }
  return out;
}

/**
 * Load .env and .env.local (the latter wins) without overriding variables
 * already set in the shell
 */
export function loadEnvIntoProcess(root: string = process.cwd()): void {
  const fromDotEnv = parseEnvFile(path.join(root, '.env'));
  const fromDotEnvLocal = parseEnvFile(path.join(root, '.env.local'));
  const merged = { ...fromDotEnv, ...fromDotEnvLocal };

  for (const [key, value] of Object.entries(merged)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

function readPositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) return fallback;
  return Math.max(1, parsed);
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  return {
    baseUrl: (env.SPL_BASE_URL || DEFAULT_CONFIG.baseUrl).replace(/\/+$/, ''),
    fetchTimeoutMs: readPositiveInt(env.SPL_FETCH_TIMEOUT_MS, DEFAULT_CONFIG.fetchTimeoutMs),
    fetchAttempts: readPositiveInt(env.SPL_FETCH_ATTEMPTS, DEFAULT_CONFIG.fetchAttempts),
    outputDir: env.SPL_OUTPUT_DIR || DEFAULT_CONFIG.outputDir,
  };
}
