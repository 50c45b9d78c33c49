import { IntegrityError } from '../models/errors.js';
import type {
  AllocationIssue,
  BaselineTotal,
  CategoryValues,
  DenominatorSource,
  ShareMode,
  ShareRow,
  ShareTable,
  StratumKey,
  StratumSummary,
  UnitFragment
} from '../models/types.js';
import { categoriesOf, encodeStratum, formatStratum, stratumKeyOf } from './stratumKey.js';

export type ShareTableOptions = {
  mode: ShareMode;
  categoryFields: string[];
  denominator?: DenominatorSource;
};

export type ShareTableBuild = {
  table: ShareTable;
  issues: AllocationIssue[];
};

type StratumGroup = {
  stratum: StratumKey;
  categories: CategoryValues;
  total: number;
  fragments: UnitFragment[];
};

/** Count mode tallies units: a pure unit counts 1, a split unit counts its weight in each zone. */
export function contributionOf(fragment: UnitFragment, mode: ShareMode): number {
  return mode === 'count' ? fragment.weight : fragment.baseValue;
}

function indexBaseline(totals: BaselineTotal[], categoryFields: readonly string[]): Map<string, number> {
  const index = new Map<string, number>();
  for (const baseline of totals) {
    const stratum = stratumKeyOf(baseline.zoneId, baseline.categories, categoryFields);
    if (!Number.isFinite(baseline.total) || baseline.total < 0) {
      throw new IntegrityError(`Baseline total for ${formatStratum(stratum)} is invalid: ${baseline.total}`, {
        stratum,
        actual: baseline.total
      });
    }
    const key = encodeStratum(stratum);
    const existing = index.get(key);
    if (existing !== undefined && existing !== baseline.total) {
      throw new IntegrityError(`Conflicting baseline totals for ${formatStratum(stratum)}`, {
        stratum,
        expected: existing,
        actual: baseline.total
      });
    }
    index.set(key, baseline.total);
  }
  return index;
}

function groupFragments(
  fragments: UnitFragment[],
  mode: ShareMode,
  categoryFields: readonly string[]
): Map<string, StratumGroup> {
  const groups = new Map<string, StratumGroup>();
  for (const fragment of fragments) {
    const stratum = stratumKeyOf(fragment.zoneId, fragment.categories, categoryFields);
    const key = encodeStratum(stratum);
    const group = groups.get(key) ?? {
      stratum,
      categories: categoriesOf(stratum, categoryFields),
      total: 0,
      fragments: []
    };
    group.total += contributionOf(fragment, mode);
    group.fragments.push(fragment);
    groups.set(key, group);
  }
  return groups;
}

/**
 * Computes each fragment's share of its (zone, category tuple) stratum.
 * A stratum whose denominator is 0 keeps share 0 for every contributor and is
 * reported as empty.
 */
export function buildShareTable(fragments: UnitFragment[], options: ShareTableOptions): ShareTableBuild {
  const { mode, categoryFields } = options;
  const denominator = options.denominator ?? { kind: 'units' };
  const baseline = denominator.kind === 'baseline' ? indexBaseline(denominator.totals, categoryFields) : null;

  const rows: ShareRow[] = [];
  const strata: StratumSummary[] = [];
  const issues: AllocationIssue[] = [];

  for (const [key, group] of groupFragments(fragments, mode, categoryFields)) {
    let total = group.total;
    if (baseline) {
      const baselineTotal = baseline.get(key);
      if (baselineTotal === undefined) {
        issues.push({ kind: 'missing-baseline', stratum: group.stratum });
        continue;
      }
      total = baselineTotal;
    }

    const empty = total === 0;
    if (empty) {
      issues.push({ kind: 'empty-stratum', stratum: group.stratum });
    }

    strata.push({
      stratum: group.stratum,
      zoneId: group.stratum[0],
      categories: group.categories,
      total,
      contributors: group.fragments.length,
      empty,
      fromUnits: baseline === null
    });

    for (const fragment of group.fragments) {
      const contribution = contributionOf(fragment, mode);
      rows.push({
        unitId: fragment.unitId,
        zoneId: fragment.zoneId,
        categories: fragment.categories,
        stratum: group.stratum,
        contribution,
        share: empty ? 0 : contribution / total
      });
    }
  }

  return {
    table: { mode, categoryFields: [...categoryFields], rows, strata },
    issues
  };
}
