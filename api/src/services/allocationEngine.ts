import type {
  AllocationIssue,
  AllocationRequest,
  AllocationResult,
  Tolerances,
  ValidationPath
} from '../models/types.js';
import { allocate } from './allocator.js';
import {
  DEFAULT_MAGNITUDE_TOLERANCE,
  DEFAULT_SHARE_SUM_TOLERANCE,
  discrepanciesOf,
  enforceConservation,
  validate,
  validateShareSums
} from './conservationValidator.js';
import { buildShareTable } from './shareTableBuilder.js';
import { DEFAULT_SPLIT_TOLERANCE, resolveSplitUnits } from './splitUnitResolver.js';

export const DEFAULT_TOLERANCES: Tolerances = {
  split: DEFAULT_SPLIT_TOLERANCE,
  magnitude: DEFAULT_MAGNITUDE_TOLERANCE,
  shareSum: DEFAULT_SHARE_SUM_TOLERANCE
};

function resolvePath(request: AllocationRequest): ValidationPath {
  if (request.path) {
    return request.path;
  }
  return request.targetTotals ? 'authoritative' : 'advisory';
}

/**
 * Runs one allocation pass: split expansion, share table, allocation and
 * conservation check, each stage producing a new table from the previous one.
 *
 * Throws IntegrityError on malformed units or memberships and, on the
 * authoritative path, ConservationError when an allocated stratum drifts from
 * its target. Missing joins and advisory discrepancies come back as issues.
 */
export function runAllocation(request: AllocationRequest): AllocationResult {
  const tolerances: Tolerances = { ...DEFAULT_TOLERANCES, ...request.tolerances };
  const path = resolvePath(request);

  const { fragments, unmatched } = resolveSplitUnits(
    request.units,
    request.memberships,
    request.categoryFields,
    tolerances.split
  );

  const { table, issues: shareIssues } = buildShareTable(fragments, {
    mode: request.shareMode,
    categoryFields: request.categoryFields,
    denominator: request.denominator
  });

  const shareValidation = validateShareSums(table, tolerances.shareSum);

  const allocation = allocate(table, request.targetTotals);
  const validation = validate(allocation.rows, allocation.expected, tolerances.magnitude);
  const conservationIssues = enforceConservation(validation, path);

  const issues: AllocationIssue[] = [
    ...unmatched.map((unitId) => ({ kind: 'missing-membership', unitId }) satisfies AllocationIssue),
    ...shareIssues,
    ...discrepanciesOf(shareValidation).map((row) => ({ kind: 'share-sum', row }) satisfies AllocationIssue),
    ...allocation.issues,
    ...conservationIssues
  ];

  return {
    shareMode: request.shareMode,
    categoryFields: [...request.categoryFields],
    path,
    selfReallocation: request.targetTotals === undefined,
    strata: table.strata,
    shares: table.rows,
    allocated: allocation.rows,
    validation,
    shareValidation,
    issues
  };
}
