import { stringify } from 'csv-stringify/sync';

import type { AllocationIssue, AllocationResult, AxisValue } from '../models/types.js';
import { APPROACHES, type DimensionComparison } from './approaches.js';
import { formatStratum } from './stratumKey.js';

const castOptions = {
  boolean: (value: boolean): string => (value ? 'true' : 'false')
};

function toCsv(records: Array<Record<string, string | number | boolean>>, columns: string[]): string {
  return stringify(records, { header: true, columns, cast: castOptions });
}

export function allocatedToCsv(result: AllocationResult): string {
  const columns = ['unitId', 'zoneId', ...result.categoryFields, 'axis', 'allocatedValue', 'share'];
  return toCsv(
    result.allocated.map((row) => {
      const record: Record<string, string | number> = { unitId: row.unitId, zoneId: row.zoneId };
      for (const field of result.categoryFields) {
        record[field] = row.categories[field] ?? '';
      }
      record.axis = row.axis;
      record.allocatedValue = row.allocatedValue;
      record.share = row.share;
      return record;
    }),
    columns
  );
}

export function validationToCsv(result: AllocationResult): string {
  const columns = [
    'stratum',
    'zoneId',
    ...result.categoryFields,
    'axis',
    'expectedTotal',
    'actualTotal',
    'discrepancy',
    'withinTolerance'
  ];
  return toCsv(
    result.validation.map((row) => {
      const record: Record<string, string | number | boolean> = {
        stratum: formatStratum(row.stratum),
        zoneId: row.zoneId
      };
      for (const field of result.categoryFields) {
        record[field] = row.categories[field] ?? '';
      }
      record.axis = row.axis;
      record.expectedTotal = row.expectedTotal;
      record.actualTotal = row.actualTotal;
      record.discrepancy = row.discrepancy;
      record.withinTolerance = row.withinTolerance;
      return record;
    }),
    columns
  );
}

type IssueRecord = {
  kind: AllocationIssue['kind'];
  unitId: string;
  stratum: string;
  axis: AxisValue | '';
  value: number | '';
};

function describeIssue(issue: AllocationIssue): IssueRecord {
  const blank = { unitId: '', stratum: '', axis: '', value: '' } as const;
  switch (issue.kind) {
    case 'missing-membership':
      return { ...blank, kind: issue.kind, unitId: issue.unitId };
    case 'missing-target':
      return { ...blank, kind: issue.kind, stratum: formatStratum(issue.stratum), axis: issue.axis ?? '' };
    case 'missing-baseline':
    case 'empty-stratum':
      return { ...blank, kind: issue.kind, stratum: formatStratum(issue.stratum) };
    case 'unallocatable-total':
      return { ...blank, kind: issue.kind, stratum: formatStratum(issue.stratum), axis: issue.axis, value: issue.total };
    case 'share-sum':
    case 'conservation-warning':
      return {
        ...blank,
        kind: issue.kind,
        stratum: formatStratum(issue.row.stratum),
        axis: issue.row.axis,
        value: issue.row.discrepancy
      };
  }
}

export function issuesToCsv(result: AllocationResult): string {
  return toCsv(result.issues.map(describeIssue), ['kind', 'unitId', 'stratum', 'axis', 'value']);
}

export function comparisonToCsv(comparison: DimensionComparison): string {
  const columns = ['zoneId', 'category', ...APPROACHES.map((approach) => `${approach}-pct`)];
  return toCsv(
    comparison.comparison.map((row) => {
      const record: Record<string, string | number> = { zoneId: row.zoneId, category: row.category };
      for (const approach of APPROACHES) {
        record[`${approach}-pct`] = row.percentages[approach];
      }
      return record;
    }),
    columns
  );
}
