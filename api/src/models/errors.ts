import type { StratumKey, ValidationRow } from './types.js';

export type IntegrityContext = {
  unitId?: string;
  zoneId?: string;
  stratum?: StratumKey;
  expected?: number;
  actual?: number;
};

/**
 * Malformed input that would corrupt an allocation pass: split weights that
 * do not sum to 1, conflicting base values, negative quantities.
 */
export class IntegrityError extends Error {
  readonly code = 'INTEGRITY_ERROR';

  constructor(
    message: string,
    readonly context: IntegrityContext = {}
  ) {
    super(message);
    this.name = 'IntegrityError';
  }
}

/**
 * Allocated sums drifted from authoritative target totals.
 */
export class ConservationError extends Error {
  readonly code = 'CONSERVATION_ERROR';

  constructor(readonly discrepancies: ValidationRow[]) {
    super(
      `Conservation check failed for ${discrepancies.length} stratum/axis combination(s); ` +
        `largest discrepancy ${largestDiscrepancy(discrepancies)}`
    );
    this.name = 'ConservationError';
  }
}

export class RunNotFoundError extends Error {
  constructor(readonly runId: string) {
    super(`Run ${runId} not found`);
    this.name = 'RunNotFoundError';
  }
}

export class ProjectionSetNotFoundError extends Error {
  constructor(readonly projectionSetId: string) {
    super(`Projection set ${projectionSetId} not found`);
    this.name = 'ProjectionSetNotFoundError';
  }
}

function largestDiscrepancy(rows: ValidationRow[]): number {
  return rows.reduce((max, row) => Math.max(max, Math.abs(row.discrepancy)), 0);
}
