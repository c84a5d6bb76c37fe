import { afterEach, describe, it, expect, vi } from 'vitest';
import { SqliteEngine } from '../db/sqlite';
import { fetchIndicator, indicatorUrl } from '../reference/worldbank';
import { StagingService } from '../service';
import { FileStore } from '../store';

const BASE_URL = 'http://worldbank.test/v2';

const page = (pageNumber: number, pages: number, observations: unknown[] | null) =>
  new Response(JSON.stringify([{ page: pageNumber, pages, per_page: '20000', total: 4 }, observations]), {
    status: 200,
    headers: { 'Content-Type': 'application/json' }
  });

describe('indicatorUrl', () => {
  it('requests every country with a large page size', () => {
    expect(indicatorUrl(`${BASE_URL}/`, 'PA.NUS.FCRF', 2)).toBe(
      'http://worldbank.test/v2/country/all/indicator/PA.NUS.FCRF?format=json&per_page=20000&page=2'
    );
  });
});

describe('fetchIndicator', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('walks every page and keeps ISO3 rows with values', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        page(1, 2, [
          { countryiso3code: 'FRA', date: '2015', value: 0.9 },
          { countryiso3code: '', date: '2015', value: 1.1 },
          { countryiso3code: 'FRA', date: '2016', value: null }
        ])
      )
      .mockResolvedValueOnce(page(2, 2, [{ countryiso3code: 'USA', date: '2015', value: 1 }]));
    vi.stubGlobal('fetch', fetchMock);

    expect(await fetchIndicator(BASE_URL, 'PA.NUS.FCRF')).toEqual([
      { country_iso3: 'FRA', year: 2015, value: 0.9 },
      { country_iso3: 'USA', year: 2015, value: 1 }
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock).toHaveBeenLastCalledWith(indicatorUrl(BASE_URL, 'PA.NUS.FCRF', 2));
  });

  it('treats a page without observations as empty', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(page(1, 1, null)));
    expect(await fetchIndicator(BASE_URL, 'PA.NUS.PPP')).toEqual([]);
  });

  it('fails on HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('down', { status: 503, statusText: 'Service Unavailable' })));
    await expect(fetchIndicator(BASE_URL, 'PA.NUS.PPP')).rejects.toThrow('World Bank request failed: 503 Service Unavailable');
  });

  it('fails on provider error payloads', async () => {
    const body = JSON.stringify([{ message: [{ id: '120', key: 'Invalid value' }] }]);
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(body, { status: 200 })));
    await expect(fetchIndicator(BASE_URL, 'XX.BAD')).rejects.toThrow('Unexpected World Bank response for XX.BAD');
  });

  it('refreshes a reference series through the service', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(page(1, 1, [{ countryiso3code: 'FRA', date: '2020', value: 120 }]))
    );
    const engine = new SqliteEngine();
    const service = new StagingService(engine, new FileStore('/unused'), { anchorCountry: 'USA', worldBankUrl: BASE_URL });

    expect(await service.refreshReference('gdp_deflators')).toEqual({ series: 'gdp_deflators', rows: 1 });
    expect(await engine.query('SELECT * FROM "reference"."gdp_deflators"')).toEqual([
      { country_iso3: 'FRA', year: 2020, gdp_deflator: 120 }
    ]);
    expect(fetch).toHaveBeenCalledWith(indicatorUrl(BASE_URL, 'NY.GDP.DEFL.ZS', 1));
    await engine.close();
  });
});
