import pLimit from 'p-limit';
import { parseCities, parseDistricts } from './parser';
import type { CityNode, GeographyTree, GeographyTriple, Language, Region, RegionNode } from './types';

/** The subset of SplClient the scraper needs */
export interface GeographySource {
  getCities(): Promise<unknown>;
  getDistricts(cityId: string): Promise<unknown>;
}

export interface ScrapeOptions {
  language: Language;
  regions: Region[];
  /** Parallel district requests, 1 keeps them sequential */
  concurrency?: number;
  now?: () => Date;
}

export interface ScrapeSummary {
  regions: number;
  cities: number;
  districts: number;
  citiesWithoutDistricts: number;
}

/**
 * Fetch regions → cities → districts and assemble the tree.
 * Any fetch or parse failure rejects; no partial tree is returned.
 */
export async function scrapeGeography(
  source: GeographySource,
  options: ScrapeOptions
): Promise<GeographyTree> {
  const { language, regions } = options;
  const now = options.now ?? (() => new Date());
  const limit = pLimit(Math.max(1, options.concurrency ?? 1));

  console.log('Fetching cities...');
  const { cities, orphans } = parseCities(await source.getCities(), regions, language);
  console.log(`Scraped ${cities.length + orphans.length} cities`);
  for (const orphan of orphans) {
    console.warn(`Missing region ${orphan.regionId} for city ${orphan.id} (${orphan.name})`);
  }

  const tree: RegionNode[] = regions.map((region) => ({ ...region, cities: [] }));

  for (const node of tree) {
    const regionCities = cities.filter((city) => city.regionId === node.id);
    if (regionCities.length === 0) continue;
    console.log(`\n${node.name}: fetching districts for ${regionCities.length} cities`);

    let withDistricts: CityNode[];
    try {
      withDistricts = await Promise.all(
        regionCities.map((city) =>
          limit(async (): Promise<CityNode> => {
            const districts = parseDistricts(await source.getDistricts(city.id), city.id, language);
            console.log(`  Scraped ${districts.length} districts for city ${city.id} (${city.name})`);
            return { ...city, districts };
          })
        )
      );
    } catch (error) {
      // Drop requests still queued for this region
      limit.clearQueue();
      throw error;
    }
    node.cities.push(...withDistricts);
  }

  return { language, scrapedAt: now().toISOString(), regions: tree };
}

export function flattenTriples(tree: GeographyTree): GeographyTriple[] {
  const triples: GeographyTriple[] = [];
  for (const region of tree.regions) {
    for (const city of region.cities) {
      for (const district of city.districts) {
        triples.push({ region: region.name, city: city.name, district: district.name });
      }
    }
  }
  return triples;
}

export function summarize(tree: GeographyTree): ScrapeSummary {
  const cities = tree.regions.flatMap((region) => region.cities);
  return {
    regions: tree.regions.length,
    cities: cities.length,
    districts: cities.reduce((sum, city) => sum + city.districts.length, 0),
    citiesWithoutDistricts: cities.filter((city) => city.districts.length === 0).length,
  };
}
