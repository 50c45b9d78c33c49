import { IntegrityError } from '../models/errors.js';
import type { UnitFragment, UnitRecord, ZoneMembership } from '../models/types.js';

export const DEFAULT_SPLIT_TOLERANCE = 1e-5;

export type ResolvedUnits = {
  fragments: UnitFragment[];
  /** Unit ids with no zone membership, in first-seen order. */
  unmatched: string[];
};

function checkUnits(units: UnitRecord[], categoryFields: readonly string[]): UnitRecord[] {
  const seen = new Map<string, UnitRecord>();
  const checked: UnitRecord[] = [];

  for (const unit of units) {
    if (!Number.isFinite(unit.baseValue) || unit.baseValue < 0) {
      throw new IntegrityError(`Unit ${unit.unitId} has invalid base value ${unit.baseValue}`, {
        unitId: unit.unitId,
        actual: unit.baseValue
      });
    }
    for (const field of categoryFields) {
      if (unit.categories[field] === undefined) {
        throw new IntegrityError(`Unit ${unit.unitId} has no value for category field "${field}"`, {
          unitId: unit.unitId
        });
      }
    }
    // Rows differing in any category, grouped or not, are distinct rows.
    const entries = Object.entries(unit.categories).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const key = JSON.stringify([unit.unitId, entries]);
    const existing = seen.get(key);
    if (existing) {
      if (existing.baseValue !== unit.baseValue) {
        const tuple = entries.map(([field, value]) => `${field}=${value}`).join(', ');
        throw new IntegrityError(`Unit ${unit.unitId} has conflicting base values for (${tuple})`, {
          unitId: unit.unitId,
          expected: existing.baseValue,
          actual: unit.baseValue
        });
      }
      continue;
    }
    seen.set(key, unit);
    checked.push(unit);
  }

  return checked;
}

export function groupMemberships(
  memberships: ZoneMembership[],
  tolerance = DEFAULT_SPLIT_TOLERANCE
): Map<string, ZoneMembership[]> {
  const grouped = new Map<string, ZoneMembership[]>();

  for (const membership of memberships) {
    if (!Number.isFinite(membership.weight) || membership.weight < 0 || membership.weight > 1) {
      throw new IntegrityError(
        `Membership of unit ${membership.unitId} in zone ${membership.zoneId} has weight ${membership.weight} outside [0, 1]`,
        { unitId: membership.unitId, zoneId: membership.zoneId, actual: membership.weight }
      );
    }
    const entries = grouped.get(membership.unitId) ?? [];
    if (entries.some((entry) => entry.zoneId === membership.zoneId)) {
      throw new IntegrityError(`Unit ${membership.unitId} is listed twice in zone ${membership.zoneId}`, {
        unitId: membership.unitId,
        zoneId: membership.zoneId
      });
    }
    entries.push(membership);
    grouped.set(membership.unitId, entries);
  }

  for (const [unitId, entries] of grouped) {
    const weightSum = entries.reduce((sum, entry) => sum + entry.weight, 0);
    if (Math.abs(weightSum - 1) > tolerance) {
      throw new IntegrityError(`Membership weights for unit ${unitId} sum to ${weightSum}, not 1`, {
        unitId,
        expected: 1,
        actual: weightSum
      });
    }
  }

  return grouped;
}

function sumByUnit(rows: Array<{ unitId: string; baseValue: number }>): Map<string, number> {
  const sums = new Map<string, number>();
  for (const row of rows) {
    sums.set(row.unitId, (sums.get(row.unitId) ?? 0) + row.baseValue);
  }
  return sums;
}

function assertTotalsPreserved(units: UnitRecord[], fragments: UnitFragment[], tolerance: number): void {
  const before = sumByUnit(units);
  const after = sumByUnit(fragments);
  for (const [unitId, expected] of before) {
    const actual = after.get(unitId) ?? 0;
    if (Math.abs(actual - expected) > tolerance) {
      throw new IntegrityError(`Split expansion changed the total of unit ${unitId} from ${expected} to ${actual}`, {
        unitId,
        expected,
        actual
      });
    }
  }
}

/**
 * Expands units that straddle several zones into one weighted fragment per
 * membership. Pure units pass through with weight 1. The per-unit total must
 * survive expansion; anything else means the membership table is malformed.
 */
export function resolveSplitUnits(
  units: UnitRecord[],
  memberships: ZoneMembership[],
  categoryFields: readonly string[],
  tolerance = DEFAULT_SPLIT_TOLERANCE
): ResolvedUnits {
  const checkedUnits = checkUnits(units, categoryFields);
  const membershipsByUnit = groupMemberships(memberships, tolerance);

  const fragments: UnitFragment[] = [];
  const matched: UnitRecord[] = [];
  const unmatched = new Set<string>();

  for (const unit of checkedUnits) {
    const entries = membershipsByUnit.get(unit.unitId);
    if (!entries) {
      unmatched.add(unit.unitId);
      continue;
    }
    matched.push(unit);
    const [only] = entries;
    if (entries.length === 1 && only) {
      fragments.push({
        unitId: unit.unitId,
        zoneId: only.zoneId,
        weight: 1,
        baseValue: unit.baseValue,
        categories: { ...unit.categories },
        split: false
      });
      continue;
    }
    for (const entry of entries) {
      fragments.push({
        unitId: unit.unitId,
        zoneId: entry.zoneId,
        weight: entry.weight,
        baseValue: unit.baseValue * entry.weight,
        categories: { ...unit.categories },
        split: true
      });
    }
  }

  assertTotalsPreserved(matched, fragments, tolerance);

  return { fragments, unmatched: [...unmatched] };
}
