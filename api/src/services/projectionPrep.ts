import { readFileSync } from 'node:fs';

import { z } from 'zod';

import type { AxisValue, CategoryValues, TargetTotal } from '../models/types.js';

export type AgeBand = {
  label: string;
  min: number;
  /** Inclusive upper bound; null for an open-ended band such as 85+. */
  max: number | null;
};

export type CategoryRule = {
  recode?: Record<string, string>;
  allowed?: string[];
};

export type RawProjectionRow = {
  zoneId: string;
  axis: AxisValue;
  total: number;
  categories: CategoryValues;
};

export type ProjectionPrepOptions = {
  /** Category field holding single-year ages or band labels. */
  ageField?: string;
  ageBands?: AgeBand[];
  categoryRules?: Record<string, CategoryRule>;
  zoneAliases?: Record<string, string>;
};

export type DroppedProjectionRow = {
  row: RawProjectionRow;
  reason: 'age' | 'category' | 'total';
};

export type PreparedTargets = {
  totals: TargetTotal[];
  dropped: DroppedProjectionRow[];
};

export const ageBandsSchema = z.array(
  z.object({
    label: z.string().min(1),
    min: z.number().nonnegative(),
    max: z.number().nonnegative().nullable()
  })
);

export function loadDefaultAgeBands(): AgeBand[] {
  const raw = readFileSync(new URL('../data/age-bands.json', import.meta.url), 'utf8');
  return ageBandsSchema.parse(JSON.parse(raw));
}

export function ageBandFor(age: number, bands: AgeBand[]): string | null {
  const band = bands.find((candidate) => age >= candidate.min && (candidate.max === null || age <= candidate.max));
  return band?.label ?? null;
}

function bandAge(value: string, bands: AgeBand[]): string | null {
  if (bands.some((band) => band.label === value)) {
    return value;
  }
  const trimmed = value.trim();
  const age = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(age)) {
    return null;
  }
  return ageBandFor(age, bands);
}

function applyRules(categories: CategoryValues, rules: Record<string, CategoryRule>): CategoryValues | null {
  const result: CategoryValues = { ...categories };
  for (const [field, rule] of Object.entries(rules)) {
    const value = result[field];
    if (value === undefined) {
      return null;
    }
    const recoded = rule.recode?.[value] ?? value;
    if (rule.allowed && !rule.allowed.includes(recoded)) {
      return null;
    }
    result[field] = recoded;
  }
  return result;
}

function aggregationKey(row: RawProjectionRow): string {
  const entries = Object.entries(row.categories).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify([row.zoneId, row.axis, entries]);
}

/**
 * Normalizes raw projection rows into target totals: zone aliases, category
 * recodes and filters, single-year ages folded into bands, then a sum per
 * (zone, category tuple, axis).
 */
export function prepareTargetTotals(rows: RawProjectionRow[], options: ProjectionPrepOptions = {}): PreparedTargets {
  const { ageField, categoryRules = {}, zoneAliases = {} } = options;
  const ageBands = ageField ? options.ageBands ?? loadDefaultAgeBands() : [];

  const sums = new Map<string, TargetTotal>();
  const dropped: DroppedProjectionRow[] = [];

  for (const row of rows) {
    if (!Number.isFinite(row.total)) {
      dropped.push({ row, reason: 'total' });
      continue;
    }
    const categories = applyRules(row.categories, categoryRules);
    if (!categories) {
      dropped.push({ row, reason: 'category' });
      continue;
    }
    if (ageField) {
      const rawAge = categories[ageField];
      const band = rawAge === undefined ? null : bandAge(rawAge, ageBands);
      if (band === null) {
        dropped.push({ row, reason: 'age' });
        continue;
      }
      categories[ageField] = band;
    }

    const normalized: RawProjectionRow = {
      zoneId: zoneAliases[row.zoneId] ?? row.zoneId,
      axis: row.axis,
      total: row.total,
      categories
    };
    const key = aggregationKey(normalized);
    const existing = sums.get(key);
    if (existing) {
      existing.total += normalized.total;
    } else {
      sums.set(key, { ...normalized });
    }
  }

  return { totals: [...sums.values()], dropped };
}
