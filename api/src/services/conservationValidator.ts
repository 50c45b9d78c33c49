import { ConservationError } from '../models/errors.js';
import type {
  AllocatedRow,
  AllocationIssue,
  AxisValue,
  CategoryValues,
  ExpectedTotal,
  ShareTable,
  StratumKey,
  ValidationPath,
  ValidationRow
} from '../models/types.js';
import { encodeStratum, encodeStratumAxis } from './stratumKey.js';

export const DEFAULT_MAGNITUDE_TOLERANCE = 1e-2;
export const DEFAULT_SHARE_SUM_TOLERANCE = 1e-3;

type ActualSum = {
  stratum: StratumKey;
  categories: CategoryValues;
  axis: AxisValue;
  total: number;
};

function buildRow(
  stratum: StratumKey,
  categories: CategoryValues,
  axis: AxisValue,
  expectedTotal: number,
  actualTotal: number,
  withinTolerance: (discrepancy: number) => boolean
): ValidationRow {
  const discrepancy = actualTotal - expectedTotal;
  return {
    stratum,
    zoneId: stratum[0],
    categories,
    axis,
    expectedTotal,
    actualTotal,
    discrepancy,
    withinTolerance: withinTolerance(discrepancy)
  };
}

/**
 * Compares the allocated sum of every stratum and axis value with its expected
 * total. Every stratum gets a row, in tolerance or not; allocated strata that
 * have no expected total are checked against 0.
 */
export function validate(
  allocated: AllocatedRow[],
  expectedTotals: ExpectedTotal[],
  tolerance = DEFAULT_MAGNITUDE_TOLERANCE
): ValidationRow[] {
  const actual = new Map<string, ActualSum>();
  for (const row of allocated) {
    const key = encodeStratumAxis(row.stratum, row.axis);
    const sum = actual.get(key) ?? { stratum: row.stratum, categories: row.categories, axis: row.axis, total: 0 };
    sum.total += row.allocatedValue;
    actual.set(key, sum);
  }

  const inTolerance = (discrepancy: number): boolean => Math.abs(discrepancy) <= tolerance;
  const report: ValidationRow[] = [];
  const seen = new Set<string>();

  for (const expected of expectedTotals) {
    const key = encodeStratumAxis(expected.stratum, expected.axis);
    seen.add(key);
    report.push(
      buildRow(
        expected.stratum,
        expected.categories,
        expected.axis,
        expected.total,
        actual.get(key)?.total ?? 0,
        inTolerance
      )
    );
  }

  for (const [key, sum] of actual) {
    if (!seen.has(key)) {
      report.push(buildRow(sum.stratum, sum.categories, sum.axis, 0, sum.total, inTolerance));
    }
  }

  return report;
}

/**
 * Checks that shares within every non-empty stratum sum to 1, using a
 * relative tolerance.
 */
export function validateShareSums(
  table: ShareTable,
  relativeTolerance = DEFAULT_SHARE_SUM_TOLERANCE,
  axis: AxisValue = 'share'
): ValidationRow[] {
  const sums = new Map<string, number>();
  for (const row of table.rows) {
    const key = encodeStratum(row.stratum);
    sums.set(key, (sums.get(key) ?? 0) + row.share);
  }

  return table.strata
    .filter((stratum) => !stratum.empty)
    .map((stratum) =>
      buildRow(
        stratum.stratum,
        stratum.categories,
        axis,
        1,
        sums.get(encodeStratum(stratum.stratum)) ?? 0,
        (discrepancy) => Math.abs(discrepancy) <= relativeTolerance
      )
    );
}

export function discrepanciesOf(report: ValidationRow[]): ValidationRow[] {
  return report.filter((row) => !row.withinTolerance);
}

/**
 * Advisory paths turn discrepancies into warnings; on the authoritative path
 * any discrepancy aborts the pass.
 */
export function enforceConservation(report: ValidationRow[], path: ValidationPath): AllocationIssue[] {
  const failures = discrepanciesOf(report);
  if (failures.length > 0 && path === 'authoritative') {
    throw new ConservationError(failures);
  }
  return failures.map((row) => ({ kind: 'conservation-warning', row }) satisfies AllocationIssue);
}
