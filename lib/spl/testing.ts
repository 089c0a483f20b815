import type { GeographySource } from './scraper';
import type { SplCityEntry, SplDistrictEntry } from './types';

export const SAMPLE_CITIES: SplCityEntry[] = [
  { pkCityID: 3, fkEmirateID: 1, ArabicName: 'الرياض', EnglishName: 'Riyadh' },
  { pkCityID: 18, fkEmirateID: '2', ArabicName: 'جدة', EnglishName: 'Jeddah' },
  { pkCityID: '21', fkEmirateID: 1, ArabicName: 'الخرج', EnglishName: 'Al Kharj' },
  { pkCityID: 40, fkEmirateID: 2, ArabicName: 'الطائف', EnglishName: 'Taif' },
];

export const SAMPLE_DISTRICTS: Record<string, SplDistrictEntry[]> = {
  '3': [
    { pkDistrictID: 101, ArabicName: 'العليا', EnglishName: 'Al Olaya' },
    { pkDistrictID: 102, ArabicName: 'الملز', EnglishName: 'Al Malaz' },
  ],
  '18': [
    { pkDistrictID: 201, ArabicName: 'الروضة', EnglishName: 'Al Rawdah' },
    { pkDistrictID: 202, ArabicName: 'الصفا', EnglishName: 'Al Safa' },
    { pkDistrictID: 203, ArabicName: 'البلد', EnglishName: 'Al Balad' },
  ],
  '21': [{ pkDistrictID: 301, ArabicName: 'السيح', EnglishName: 'As Sih' }],
  '40': [],
};

/**
 * In-memory stand-in for SplClient serving SAMPLE_* data
 */
export class FakeSource implements GeographySource {
  readonly districtCalls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly cities: unknown = SAMPLE_CITIES,
    private readonly districts: Record<string, unknown> = SAMPLE_DISTRICTS,
    private readonly failOnCity?: string
  ) {}

  async getCities(): Promise<unknown> {
    return this.cities;
  }

  async getDistricts(cityId: string): Promise<unknown> {
    this.districtCalls.push(cityId);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, 1));
      if (cityId === this.failOnCity) {
        throw new Error(`boom for city ${cityId}`);
      }
      return this.districts[cityId] ?? [];
    } finally {
      this.inFlight -= 1;
    }
  }
}
