import { ParseError } from './errors';
import type { City, District, Language, Region, SplCityEntry, SplDistrictEntry } from './types';

export interface ParsedCities {
  cities: City[];
  /** Entries whose fkEmirateID matches no known region */
  orphans: City[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectArray(raw: unknown, what: string): unknown[] {
  if (!Array.isArray(raw)) {
    throw new ParseError(`Expected a list of ${what}, got ${raw === null ? 'null' : typeof raw}`);
  }
  return raw;
}

/** "007" and 7 name the same record */
export function normalizeId(raw: string): string {
  return /^\d+$/.test(raw) ? raw.replace(/^0+(?=\d)/, '') : raw;
}

function readId(entry: Record<string, unknown>, field: string, what: string, index: number): string {
  const value = entry[field];
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return String(value);
  if (typeof value === 'string' && value.trim()) return normalizeId(value.trim());
  throw new ParseError(`${what} #${index}: missing or invalid "${field}"`);
}

function readName(entry: Record<string, unknown>, field: string, what: string, index: number): string {
  const value = entry[field];
  // null shows up for untranslated entries
  if (value === null) return '';
  if (typeof value !== 'string') {
    throw new ParseError(`${what} #${index}: missing or invalid "${field}"`);
  }
  return value.trim();
}

/**
 * Pick the name for the requested language, falling back to the other one
 * when the service has no translation
 */
function pickName(
  entry: { ArabicName: string; EnglishName: string },
  language: Language,
  what: string,
  index: number
): string {
  const { ArabicName: arabic, EnglishName: english } = entry;
  const name = language === 'ar' ? arabic || english : english || arabic;
  if (!name) throw new ParseError(`${what} #${index}: no name in either language`);
  return name;
}

function toCityEntry(value: unknown, index: number): SplCityEntry {
  if (!isRecord(value)) throw new ParseError(`city #${index}: not an object`);
  return {
    pkCityID: readId(value, 'pkCityID', 'city', index),
    fkEmirateID: readId(value, 'fkEmirateID', 'city', index),
    ArabicName: readName(value, 'ArabicName', 'city', index),
    EnglishName: readName(value, 'EnglishName', 'city', index),
  };
}

function toDistrictEntry(value: unknown, index: number): SplDistrictEntry {
  if (!isRecord(value)) throw new ParseError(`district #${index}: not an object`);
  return {
    pkDistrictID: readId(value, 'pkDistrictID', 'district', index),
    ArabicName: readName(value, 'ArabicName', 'district', index),
    EnglishName: readName(value, 'EnglishName', 'district', index),
  };
}

export function parseCities(raw: unknown, regions: Region[], language: Language): ParsedCities {
  const regionIds = new Set(regions.map((r) => r.id));
  const cities: City[] = [];
  const orphans: City[] = [];

  expectArray(raw, 'cities').forEach((value, index) => {
    const entry = toCityEntry(value, index);
    const city: City = {
      id: String(entry.pkCityID),
      regionId: String(entry.fkEmirateID),
      name: pickName(entry, language, 'city', index),
    };
    if (regionIds.has(city.regionId)) {
      cities.push(city);
    } else {
      orphans.push(city);
    }
  });

  return { cities, orphans };
}

export function parseDistricts(raw: unknown, cityId: string, language: Language): District[] {
  return expectArray(raw, 'districts').map((value, index) => {
    const entry = toDistrictEntry(value, index);
    return {
      id: String(entry.pkDistrictID),
      cityId,
      name: pickName(entry, language, 'district', index),
    };
  });
}
