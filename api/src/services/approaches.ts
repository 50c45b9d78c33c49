import type {
  AllocatedRow,
  AllocationResult,
  ShareMode,
  Tolerances,
  UnitRecord,
  ZoneMembership
} from '../models/types.js';
import { runAllocation } from './allocationEngine.js';

export const APPROACHES = ['unit-count', 'dominant-magnitude', 'proportional-magnitude'] as const;

export type ApproachName = (typeof APPROACHES)[number];

export type ZoneCompositionRow = {
  zoneId: string;
  category: string;
  value: number;
  zoneTotal: number;
  proportion: number;
  percentage: number;
};

export type ApproachResult = {
  approach: ApproachName;
  dimension: string;
  composition: ZoneCompositionRow[];
  result: AllocationResult;
};

export type ComparisonRow = {
  zoneId: string;
  category: string;
  percentages: Record<ApproachName, number>;
};

export type DimensionComparison = {
  dimension: string;
  approaches: ApproachResult[];
  comparison: ComparisonRow[];
};

export type ComparisonInput = {
  units: UnitRecord[];
  memberships: ZoneMembership[];
  dimensions: string[];
  tolerances?: Partial<Tolerances>;
};

const approachModes: Record<ApproachName, ShareMode> = {
  'unit-count': 'count',
  'dominant-magnitude': 'magnitude',
  'proportional-magnitude': 'magnitude'
};

function compareText(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * Assigns each unit wholly to the zone holding its largest weight; ties go to
 * the smallest zone id.
 */
export function dominantMemberships(memberships: ZoneMembership[]): ZoneMembership[] {
  const best = new Map<string, ZoneMembership>();
  for (const membership of memberships) {
    const current = best.get(membership.unitId);
    if (
      !current ||
      membership.weight > current.weight ||
      (membership.weight === current.weight && compareText(membership.zoneId, current.zoneId) < 0)
    ) {
      best.set(membership.unitId, membership);
    }
  }
  return [...best.values()].map(({ unitId, zoneId }) => ({ unitId, zoneId, weight: 1 }));
}

/** Share of each category value within its zone, from a self-reallocation pass. */
export function summarizeZoneComposition(allocated: AllocatedRow[], dimension: string): ZoneCompositionRow[] {
  const zoneTotals = new Map<string, number>();
  const cells = new Map<string, { zoneId: string; category: string; value: number }>();

  for (const row of allocated) {
    const category = row.categories[dimension];
    if (category === undefined) {
      continue;
    }
    zoneTotals.set(row.zoneId, (zoneTotals.get(row.zoneId) ?? 0) + row.allocatedValue);
    const key = JSON.stringify([row.zoneId, category]);
    const cell = cells.get(key) ?? { zoneId: row.zoneId, category, value: 0 };
    cell.value += row.allocatedValue;
    cells.set(key, cell);
  }

  return [...cells.values()]
    .map((cell) => {
      const zoneTotal = zoneTotals.get(cell.zoneId) ?? 0;
      const proportion = zoneTotal > 0 ? cell.value / zoneTotal : 0;
      return { ...cell, zoneTotal, proportion, percentage: proportion * 100 };
    })
    .sort((a, b) => compareText(a.zoneId, b.zoneId) || compareText(a.category, b.category));
}

export function runApproach(approach: ApproachName, input: ComparisonInput, dimension: string): ApproachResult {
  const memberships =
    approach === 'proportional-magnitude' ? input.memberships : dominantMemberships(input.memberships);
  const result = runAllocation({
    units: input.units,
    memberships,
    categoryFields: [dimension],
    shareMode: approachModes[approach],
    path: 'advisory',
    tolerances: input.tolerances
  });
  return {
    approach,
    dimension,
    composition: summarizeZoneComposition(result.allocated, dimension),
    result
  };
}

function pivotApproaches(results: ApproachResult[]): ComparisonRow[] {
  const rows = new Map<string, ComparisonRow>();
  for (const { approach, composition } of results) {
    for (const cell of composition) {
      const key = JSON.stringify([cell.zoneId, cell.category]);
      const row = rows.get(key) ?? {
        zoneId: cell.zoneId,
        category: cell.category,
        percentages: { 'unit-count': 0, 'dominant-magnitude': 0, 'proportional-magnitude': 0 }
      };
      row.percentages[approach] = cell.percentage;
      rows.set(key, row);
    }
  }
  return [...rows.values()].sort((a, b) => compareText(a.zoneId, b.zoneId) || compareText(a.category, b.category));
}

/**
 * Runs unit-count, dominant-zone and proportional allocation for every
 * dimension and joins their within-zone percentages.
 */
export function compareApproaches(input: ComparisonInput): DimensionComparison[] {
  return input.dimensions.map((dimension) => {
    const approaches = APPROACHES.map((approach) => runApproach(approach, input, dimension));
    return { dimension, approaches, comparison: pivotApproaches(approaches) };
  });
}
