/**
 * Saudi administrative geography as served by the SPL maps service.
 *
 * Three levels, a strict tree:
 * - Region (emirate, 13 in total)
 * - City, belongs to one region
 * - District, belongs to one city
 */

export type Language = 'ar' | 'en';

export interface Region {
  id: string;
  name: string;
}

export interface City {
  id: string;
  regionId: string;
  name: string;
}

export interface District {
  id: string;
  cityId: string;
  name: string;
}

export interface CityNode extends City {
  districts: District[];
}

export interface RegionNode extends Region {
  cities: CityNode[];
}

/**
 * Everything one run produces; serialized as-is to the JSON output
 */
export interface GeographyTree {
  language: Language;
  scrapedAt: string;
  regions: RegionNode[];
}

export interface GeographyTriple {
  region: string;
  city: string;
  district: string;
}

/** Raw entry of Home/GetCities */
export interface SplCityEntry {
  pkCityID: string | number;
  fkEmirateID: string | number;
  ArabicName: string;
  EnglishName: string;
}

/** Raw entry of Home/GetDistricts */
export interface SplDistrictEntry {
  pkDistrictID: string | number;
  ArabicName: string;
  EnglishName: string;
}
