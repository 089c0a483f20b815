import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { load } from 'cheerio';
import { ParseError } from './errors';
import { normalizeId } from './parser';
import type { Language, Region } from './types';

/**
 * Region selector markup copied from the SPL maps page.
 * The service exposes no endpoint for regions, so the Arabic names come from here.
 */
export const REGIONS_HTML_PATH = fileURLToPath(
  new URL('../data/spl/regions_list.html', import.meta.url)
);

// Keyed by SPL emirate id (fkEmirateID on cities)
export const ENGLISH_REGIONS: Readonly<Record<string, string>> = {
  '1': 'Riyadh',
  '2': 'Makkah',
  '3': 'Madinah',
  '4': 'Al Qassim',
  '5': 'Eastern',
  '6': 'Asir',
  '7': 'Tabuk',
  '8': 'Hail',
  '9': 'Northern Borders',
  '10': 'Jazan',
  '11': 'Najran',
  '12': 'Al Bahah',
  '13': 'Al Jawf',
};

function byNumericId(a: Region, b: Region): number {
  return Number(a.id) - Number(b.id);
}

/**
 * Parse `<option id="N">` entries of the region selector.
 * Options without a positive integer id (placeholders) are skipped.
 */
export function parseRegionsHtml(html: string): Region[] {
  const $ = load(html);
  const regions: Region[] = [];

  $('option').each((_, option) => {
    const rawId = ($(option).attr('id') ?? '').trim();
    const name = $(option).text().trim();
    if (!/^\d+$/.test(rawId)) {
      console.warn(`Skipping region option with id "${rawId}" (${name})`);
      return;
    }
    // id 0 is the "choose a region" placeholder
    if (Number(rawId) === 0 || !name) return;
    regions.push({ id: normalizeId(rawId), name });
  });

  return regions.sort(byNumericId);
}

export function loadRegions(language: Language, htmlPath: string = REGIONS_HTML_PATH): Region[] {
  if (language === 'en') {
    return Object.entries(ENGLISH_REGIONS)
      .map(([id, name]) => ({ id, name }))
      .sort(byNumericId);
  }

  if (!fs.existsSync(htmlPath)) {
    throw new ParseError(`Region list not found: ${htmlPath}`);
  }
  const regions = parseRegionsHtml(fs.readFileSync(htmlPath, 'utf-8'));
  if (regions.length === 0) {
    throw new ParseError(`No regions found in ${htmlPath}`);
  }
  return regions;
}
