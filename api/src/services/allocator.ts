import { IntegrityError } from '../models/errors.js';
import type {
  AllocatedRow,
  AllocationIssue,
  AxisValue,
  ExpectedTotal,
  ShareRow,
  ShareTable,
  StratumKey,
  StratumSummary,
  TargetTotal
} from '../models/types.js';
import { encodeStratum, encodeStratumAxis, formatStratum, stratumKeyOf } from './stratumKey.js';

/** Axis label used when a stratum is reallocated onto its own total. */
export const BASE_AXIS = 'base';

export type Allocation = {
  rows: AllocatedRow[];
  expected: ExpectedTotal[];
  issues: AllocationIssue[];
};

type IndexedTarget = {
  stratum: StratumKey;
  axis: AxisValue;
  total: number;
};

function groupRows(rows: ShareRow[]): Map<string, ShareRow[]> {
  const grouped = new Map<string, ShareRow[]>();
  for (const row of rows) {
    const key = encodeStratum(row.stratum);
    const members = grouped.get(key) ?? [];
    members.push(row);
    grouped.set(key, members);
  }
  return grouped;
}

function indexTargets(
  targetTotals: TargetTotal[],
  categoryFields: readonly string[]
): { index: Map<string, IndexedTarget>; axes: AxisValue[] } {
  const index = new Map<string, IndexedTarget>();
  const axes: AxisValue[] = [];

  for (const target of targetTotals) {
    const stratum = stratumKeyOf(target.zoneId, target.categories, categoryFields);
    if (!Number.isFinite(target.total) || target.total < 0) {
      throw new IntegrityError(`Target total for ${formatStratum(stratum)} at ${target.axis} is invalid: ${target.total}`, {
        stratum,
        actual: target.total
      });
    }
    const key = encodeStratumAxis(stratum, target.axis);
    const existing = index.get(key);
    if (existing) {
      if (existing.total !== target.total) {
        throw new IntegrityError(`Conflicting target totals for ${formatStratum(stratum)} at ${target.axis}`, {
          stratum,
          expected: existing.total,
          actual: target.total
        });
      }
      continue;
    }
    if (!axes.includes(target.axis)) {
      axes.push(target.axis);
    }
    index.set(key, { stratum, axis: target.axis, total: target.total });
  }

  return { index, axes };
}

function toAllocatedRow(row: ShareRow, axis: AxisValue, allocatedValue: number): AllocatedRow {
  return {
    unitId: row.unitId,
    zoneId: row.zoneId,
    categories: row.categories,
    stratum: row.stratum,
    axis,
    share: row.share,
    allocatedValue
  };
}

function expectedFor(stratum: StratumSummary, axis: AxisValue, total: number): ExpectedTotal {
  return { stratum: stratum.stratum, categories: stratum.categories, axis, total };
}

function selfReallocate(table: ShareTable, grouped: Map<string, ShareRow[]>): Allocation {
  const rows: AllocatedRow[] = [];
  const expected: ExpectedTotal[] = [];

  for (const stratum of table.strata) {
    for (const row of grouped.get(encodeStratum(stratum.stratum)) ?? []) {
      // Summing the contributions reproduces the stratum total bit for bit.
      const value = stratum.fromUnits ? row.contribution : row.share * stratum.total;
      rows.push(toAllocatedRow(row, BASE_AXIS, value));
    }
    expected.push(expectedFor(stratum, BASE_AXIS, stratum.total));
  }

  return { rows, expected, issues: [] };
}

/**
 * Multiplies every share by the target total of its stratum, once per target
 * axis value. Without target totals each stratum is reallocated onto its own
 * total.
 */
export function allocate(table: ShareTable, targetTotals?: TargetTotal[]): Allocation {
  const grouped = groupRows(table.rows);
  if (!targetTotals) {
    return selfReallocate(table, grouped);
  }

  if (targetTotals.length === 0) {
    return {
      rows: [],
      expected: [],
      issues: table.strata.map(
        (stratum) => ({ kind: 'missing-target', stratum: stratum.stratum, axis: null }) satisfies AllocationIssue
      )
    };
  }

  const { index, axes } = indexTargets(targetTotals, table.categoryFields);
  const consumed = new Set<string>();
  const rows: AllocatedRow[] = [];
  const expected: ExpectedTotal[] = [];
  const issues: AllocationIssue[] = [];

  for (const axis of axes) {
    for (const stratum of table.strata) {
      const key = encodeStratumAxis(stratum.stratum, axis);
      const target = index.get(key);
      if (!target) {
        issues.push({ kind: 'missing-target', stratum: stratum.stratum, axis });
        continue;
      }
      consumed.add(key);
      if (stratum.empty) {
        if (target.total !== 0) {
          issues.push({ kind: 'unallocatable-total', stratum: stratum.stratum, axis, total: target.total });
        }
        continue;
      }
      for (const row of grouped.get(encodeStratum(stratum.stratum)) ?? []) {
        rows.push(toAllocatedRow(row, axis, row.share * target.total));
      }
      expected.push(expectedFor(stratum, axis, target.total));
    }
  }

  for (const [key, target] of index) {
    if (!consumed.has(key) && target.total !== 0) {
      issues.push({ kind: 'unallocatable-total', stratum: target.stratum, axis: target.axis, total: target.total });
    }
  }

  return { rows, expected, issues };
}
