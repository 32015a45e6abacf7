import fs from "fs";
import { z } from "zod";
import { CatalogIntegrityError } from "./errors";

export type City = {
  readonly name: string;
  readonly country: string;
  readonly region: string;
  readonly monthlyTemp: readonly number[];
  readonly monthlyPrecip: readonly number[];
  readonly peakMonths: readonly number[];
  readonly shoulderMonths: readonly number[];
  readonly tags: readonly string[];
};

const MonthlySeriesSchema = z.array(z.number()).length(12);
const MonthSetSchema = z.array(z.number().int().min(1).max(12));

export const CityRecordSchema = z.object({
  name: z.string().min(1),
  country: z.string().min(1),
  region: z.string().min(1),
  monthly_temp: MonthlySeriesSchema,
  monthly_precip: MonthlySeriesSchema,
  peak_months: MonthSetSchema.default([]),
  shoulder_months: MonthSetSchema.default([]),
  tags: z.array(z.string()).default([])
});
export type CityRecord = z.infer<typeof CityRecordSchema>;

export const CityCatalogSchema = z.object({
  cities: z.array(CityRecordSchema)
});

export function parseCityCatalog(raw: unknown): City[] {
  const parsed = CityCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new CatalogIntegrityError("City catalog failed validation.", issues);
  }
  return parsed.data.cities.map(toCity);
}

export function loadCityCatalog(filePath: string): City[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogIntegrityError(`Unable to read city catalog at ${filePath}.`, [reason]);
  }
  return parseCityCatalog(raw);
}

export function catalogFacets(cities: readonly City[]) {
  return {
    count: cities.length,
    regions: uniqueSorted(cities.map((city) => city.region)),
    countries: uniqueSorted(cities.map((city) => city.country)),
    tags: uniqueSorted(cities.flatMap((city) => city.tags))
  };
}

function toCity(record: CityRecord): City {
  return Object.freeze({
    name: record.name,
    country: record.country,
    region: record.region,
    monthlyTemp: Object.freeze([...record.monthly_temp]),
    monthlyPrecip: Object.freeze([...record.monthly_precip]),
    peakMonths: Object.freeze([...record.peak_months]),
    shoulderMonths: Object.freeze([...record.shoulder_months]),
    tags: Object.freeze(record.tags.map((tag) => tag.toLowerCase()))
  });
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort((a, b) => a.localeCompare(b));
}
