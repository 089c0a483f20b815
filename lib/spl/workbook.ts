/**
 * Spreadsheet output.
 *
 * Layout, one sheet per region:
 *   | City A | District 1 | District 2 | ... |
 *   | City B | District 1 | ...              |
 * Cities with the most districts come first.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { FileWriteError, ParseError } from './errors';
import type { CityNode, GeographyTree, GeographyTriple } from './types';

const MAX_SHEET_NAME = 31;
const CITY_WIDTH_FACTOR = 1.2;

/** Excel rejects []:*?/\ in sheet names and anything past 31 chars */
export function toSheetName(name: string, taken: Set<string>): string {
  const base = name.replace(/[[\]:*?/\\]/g, '').trim().slice(0, MAX_SHEET_NAME) || 'Sheet';
  let candidate = base;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    const suffix = ` (${n})`;
    candidate = base.slice(0, MAX_SHEET_NAME - suffix.length) + suffix;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

export function sortCitiesByDistrictCount(cities: CityNode[]): CityNode[] {
  // Array.prototype.sort is stable, so ties keep response order
  return [...cities].sort((a, b) => b.districts.length - a.districts.length);
}

function columnWidths(rows: string[][]): XLSX.ColInfo[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((value, col) => {
      const width = col === 0 ? Math.round(value.length * CITY_WIDTH_FACTOR) : value.length;
      widths[col] = Math.max(widths[col] ?? 1, width);
    });
  }
  return widths.map((wch) => ({ wch }));
}

export function buildWorkbook(tree: GeographyTree): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const taken = new Set<string>();

  for (const region of tree.regions) {
    const rows = sortCitiesByDistrictCount(region.cities).map((city) => [
      city.name,
      ...city.districts.map((district) => district.name),
    ]);
    const sheet = XLSX.utils.aoa_to_sheet(rows);
    sheet['!cols'] = columnWidths(rows);
    XLSX.utils.book_append_sheet(workbook, sheet, toSheetName(region.name, taken));
  }

  // xlsx refuses to write a workbook without sheets
  if (workbook.SheetNames.length === 0) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([]), 'Empty');
  }
  return workbook;
}

function writeFile(filePath: string, data: Buffer | string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, data);
  } catch (error) {
    throw new FileWriteError(filePath, { cause: error });
  }
}

export function writeWorkbook(tree: GeographyTree, filePath: string): void {
  let data: Buffer;
  try {
    data = XLSX.write(buildWorkbook(tree), { type: 'buffer', bookType: 'xlsx' });
  } catch (error) {
    throw new FileWriteError(filePath, { cause: error });
  }
  writeFile(filePath, data);
}

export function writeJson(tree: GeographyTree, filePath: string): void {
  writeFile(filePath, JSON.stringify(tree, null, 2));
}

/**
 * Read a workbook written by writeWorkbook back into name triples.
 * Sheet names stand in for region names.
 */
export function readWorkbookTriples(filePath: string): GeographyTriple[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(fs.readFileSync(filePath), { type: 'buffer' });
  } catch (error) {
    throw new ParseError(`Cannot read workbook ${filePath}`, { cause: error });
  }

  const triples: GeographyTriple[] = [];
  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false });
    for (const row of rows) {
      const [city, ...districts] = row.map((cell) => (cell === undefined || cell === null ? '' : String(cell)));
      if (!city) continue;
      for (const district of districts) {
        if (district) triples.push({ region: sheetName, city, district });
      }
    }
  }
  return triples;
}
