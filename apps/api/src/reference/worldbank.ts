import { z } from 'zod';
import { ReferenceRecord } from '../types/schema';
import { REFERENCE_SERIES, SeriesKey } from './series';

const PAGE_SIZE = 20000;

const pageMetaSchema = z.object({
  page: z.coerce.number(),
  pages: z.coerce.number()
});

const observationSchema = z.object({
  countryiso3code: z.string().nullish(),
  date: z.string(),
  value: z.number().nullable()
});

// Error payloads come back as a one-element array holding a `message` list.
const pageSchema = z.tuple([pageMetaSchema, z.array(observationSchema).nullable()]);

const ISO3 = /^[A-Z]{3}$/;

export const indicatorUrl = (baseUrl: string, indicator: string, page: number) =>
  `${baseUrl.replace(/\/+$/, '')}/country/all/indicator/${indicator}?format=json&per_page=${PAGE_SIZE}&page=${page}`;

const toRecords = (observations: z.infer<typeof observationSchema>[]): ReferenceRecord[] =>
  observations.flatMap(o => {
    const year = Number(o.date);
    if (!o.countryiso3code || !ISO3.test(o.countryiso3code)) return [];
    if (o.value === null || !Number.isInteger(year)) return [];
    return [{ country_iso3: o.countryiso3code, year, value: o.value }];
  });

/** Downloads every page of a World Bank indicator for all countries. */
export const fetchIndicator = async (baseUrl: string, indicator: string): Promise<ReferenceRecord[]> => {
  const records: ReferenceRecord[] = [];
  let page = 1;
  let pages = 1;

  do {
    const url = indicatorUrl(baseUrl, indicator, page);
    const res = await fetch(url);
    if (!res.ok) {
      throw new Error(`World Bank request failed: ${res.status} ${res.statusText}`);
    }
    const parsed = pageSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Unexpected World Bank response for ${indicator}`);
    }
    const [meta, observations] = parsed.data;
    records.push(...toRecords(observations ?? []));
    pages = meta.pages;
    page += 1;
  } while (page <= pages);

  return records;
};

export const fetchSeries = async (baseUrl: string, key: SeriesKey) => {
  const records = await fetchIndicator(baseUrl, REFERENCE_SERIES[key].indicator);
  console.log(`[reference] fetched ${records.length} ${key} observations`);
  return records;
};
