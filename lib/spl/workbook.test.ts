import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileWriteError } from './errors';
import { parseDistricts } from './parser';
import { flattenTriples } from './scraper';
import type { GeographyTree, GeographyTriple } from './types';
import {
  buildWorkbook,
  readWorkbookTriples,
  toSheetName,
  writeJson,
  writeWorkbook,
} from './workbook';

const tree: GeographyTree = {
  language: 'en',
  scrapedAt: '2024-03-01T12:00:00.000Z',
  regions: [
    {
      id: '1',
      name: 'Riyadh',
      cities: [
        { id: '21', regionId: '1', name: 'Al Kharj', districts: [{ id: '301', cityId: '21', name: 'As Sih' }] },
        {
          id: '3',
          regionId: '1',
          name: 'Riyadh',
          districts: [
            { id: '101', cityId: '3', name: 'Al Olaya' },
            { id: '102', cityId: '3', name: 'Al Malaz' },
          ],
        },
        { id: '30', regionId: '1', name: 'Diriyah', districts: [] },
      ],
    },
    {
      id: '2',
      name: 'Makkah',
      cities: [
        { id: '18', regionId: '2', name: 'Jeddah', districts: [{ id: '201', cityId: '18', name: 'Al Rawdah' }] },
      ],
    },
    { id: '3', name: 'Madinah', cities: [] },
  ],
};

function sortTriples(triples: GeographyTriple[]): string[] {
  return triples.map((t) => `${t.region}|${t.city}|${t.district}`).sort();
}

describe('toSheetName', () => {
  it('strips characters Excel rejects', () => {
    expect(toSheetName('Makkah/Jeddah: [north]?', new Set())).toBe('MakkahJeddah north');
  });

  it('cuts names to 31 characters', () => {
    expect(toSheetName('x'.repeat(40), new Set())).toBe('x'.repeat(31));
  });

  it('suffixes clashing names case-insensitively', () => {
    const taken = new Set<string>();

    expect(toSheetName('Riyadh', taken)).toBe('Riyadh');
    expect(toSheetName('riyadh', taken)).toBe('riyadh (2)');
    expect(toSheetName('Riyadh', taken)).toBe('Riyadh (3)');
  });

  it('never returns an empty name', () => {
    expect(toSheetName('***', new Set())).toBe('Sheet');
  });
});

describe('buildWorkbook', () => {
  it('creates one sheet per region in order', () => {
    expect(buildWorkbook(tree).SheetNames).toEqual(['Riyadh', 'Makkah', 'Madinah']);
  });

  it('puts cities with the most districts first', () => {
    const sheet = buildWorkbook(tree).Sheets['Riyadh'];
    const rows = XLSX.utils.sheet_to_json<string[]>(sheet, { header: 1 });

    expect(rows).toEqual([['Riyadh', 'Al Olaya', 'Al Malaz'], ['Al Kharj', 'As Sih'], ['Diriyah']]);
  });

  it('sizes columns to their longest value', () => {
    const sheet = buildWorkbook(tree).Sheets['Riyadh'];

    // city column: round(8 * 1.2) = 10 for "Al Kharj"
    expect(sheet['!cols']).toEqual([{ wch: 10 }, { wch: 8 }, { wch: 8 }]);
  });

  it('adds a placeholder sheet when there are no regions', () => {
    const empty: GeographyTree = { ...tree, regions: [] };

    expect(buildWorkbook(empty).SheetNames).toEqual(['Empty']);
  });
});

describe('writing files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'spl-workbook-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads back exactly the triples that were written', () => {
    const file = path.join(dir, 'nested', 'out.xlsx');

    writeWorkbook(tree, file);

    expect(sortTriples(readWorkbookTriples(file))).toEqual(sortTriples(flattenTriples(tree)));
  });

  it('keeps districts whose name came from the fallback language', () => {
    const districts = parseDistricts(
      [
        { pkDistrictID: 9, ArabicName: '', EnglishName: 'Al Nakheel' },
        { pkDistrictID: 10, ArabicName: 'الورود', EnglishName: 'Al Wurud' },
      ],
      '3',
      'ar'
    );
    const mixed: GeographyTree = {
      language: 'ar',
      scrapedAt: tree.scrapedAt,
      regions: [{ id: '1', name: 'منطقة الرياض', cities: [{ id: '3', regionId: '1', name: 'الرياض', districts }] }],
    };
    const file = path.join(dir, 'mixed.xlsx');

    writeWorkbook(mixed, file);

    expect(readWorkbookTriples(file)).toEqual(flattenTriples(mixed));
    expect(readWorkbookTriples(file)).toHaveLength(2);
  });

  it('round-trips Arabic names', () => {
    const arabic: GeographyTree = {
      language: 'ar',
      scrapedAt: tree.scrapedAt,
      regions: [
        {
          id: '1',
          name: 'منطقة الرياض',
          cities: [
            {
              id: '3',
              regionId: '1',
              name: 'الرياض',
              districts: [
                { id: '101', cityId: '3', name: 'العليا' },
                { id: '102', cityId: '3', name: 'الملز' },
              ],
            },
          ],
        },
      ],
    };
    const file = path.join(dir, 'ar.xlsx');

    writeWorkbook(arabic, file);

    expect(readWorkbookTriples(file)).toEqual([
      { region: 'منطقة الرياض', city: 'الرياض', district: 'العليا' },
      { region: 'منطقة الرياض', city: 'الرياض', district: 'الملز' },
    ]);
  });

  it('overwrites a previous workbook', () => {
    const file = path.join(dir, 'out.xlsx');
    writeWorkbook(tree, file);

    writeWorkbook({ ...tree, regions: [tree.regions[1]] }, file);

    expect(readWorkbookTriples(file)).toEqual([{ region: 'Makkah', city: 'Jeddah', district: 'Al Rawdah' }]);
  });

  it('writes the tree as JSON', () => {
    const file = path.join(dir, 'out.json');

    writeJson(tree, file);

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(tree);
  });

  it('raises FileWriteError when the target cannot be created', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const file = path.join(blocker, 'out.xlsx');

    expect(() => writeWorkbook(tree, file)).toThrow(FileWriteError);
    expect(fs.existsSync(file)).toBe(false);
  });
});
